// ============================================================================
// @treekey/core — Node Key Computer
// ============================================================================
//
// Reduces a node and its whole subtree to one Key:
//
//   keyOf(attr)    = unique(hash(name), hash(value))
//   attributes(n)  = loose(keyOf(a) for a in n.attributes)
//   nodeKey(n)     = unique(hash(tag), hash(text), attributes(n),
//                           loose(nodeKey(c) for c in n.children))
//
// Identity-bearing facets are combined uniquely; unordered collections
// (attributes, children) loosely.
// ============================================================================

import { TreeDepthExceededError } from './errors.js';
import { DEFAULT_KEY_WIDTH, type Key, type KeySpace, type KeyWidth, createKeySpace } from './keys.js';
import { type TextHasher, resolveTextHasher } from './text_hash.js';

/**
 * A read-only (name, value) attribute pair.
 */
export interface AttributeView {
  readonly name: string;
  readonly value: string;
}

/**
 * A read-only tree node. The order of `attributes` and `children` is not
 * part of the node's identity.
 */
export interface NodeView {
  readonly tagName: string;
  /** Direct text value; empty when the node has none. */
  readonly textValue: string;
  readonly attributes: Iterable<AttributeView>;
  readonly children: Iterable<NodeView>;
}

/**
 * A read-only document handle exposing its document element.
 */
export interface DocumentView {
  readonly root: NodeView;
}

export interface NodeKeyOptions {
  keyWidth?: KeyWidth;
  hashText?: TextHasher;
  /** Maximum tree depth (root = 1). Defaults to unbounded. */
  maxDepth?: number;
}

export class NodeKeyComputer {
  readonly space: KeySpace;
  readonly maxDepth: number;
  private readonly hashText: TextHasher;

  constructor(options: NodeKeyOptions = {}) {
    this.space = createKeySpace(options.keyWidth ?? DEFAULT_KEY_WIDTH);
    this.hashText = options.hashText ?? resolveTextHasher();
    this.maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
  }

  get keyWidth(): KeyWidth {
    return this.space.width;
  }

  hash(text: string): Key {
    return this.hashText(text, this.space.width) & this.space.mask;
  }

  keyOfAttribute(attribute: AttributeView): Key {
    return this.space.combineUniquely(this.hash(attribute.name), this.hash(attribute.value));
  }

  attributesKey(node: NodeView): Key {
    let result = this.space.combineLoosely();
    for (const attribute of node.attributes) {
      result = this.space.combineLoosely(result, this.keyOfAttribute(attribute));
    }
    return result;
  }

  /**
   * Key of a node and its subtree.
   *
   * @param cache - Keys by node identity. Every subtree key computed is
   *   stored, and stored keys are reused instead of being recomputed.
   */
  nodeKey(node: NodeView, cache?: Map<NodeView, Key>): Key {
    return this.computeNodeKey(node, 1, cache);
  }

  private computeNodeKey(node: NodeView, depth: number, cache: Map<NodeView, Key> | undefined): Key {
    const cached = cache?.get(node);
    if (cached !== undefined) return cached;

    if (depth > this.maxDepth) {
      throw new TreeDepthExceededError(this.maxDepth);
    }

    let childrenKey = this.space.combineLoosely();
    for (const child of node.children) {
      childrenKey = this.space.combineLoosely(childrenKey, this.computeNodeKey(child, depth + 1, cache));
    }

    const key = this.space.combineUniquely(
      this.hash(node.tagName),
      this.hash(node.textValue),
      this.attributesKey(node),
      childrenKey,
    );
    cache?.set(node, key);
    return key;
  }
}

const defaultComputer = new NodeKeyComputer();

export function keyOfAttribute(attribute: AttributeView): Key {
  return defaultComputer.keyOfAttribute(attribute);
}

export function attributesKey(node: NodeView): Key {
  return defaultComputer.attributesKey(node);
}

/**
 * Key of a node and its subtree, using 64-bit keys and SHA-256 text hashing.
 */
export function nodeKey(node: NodeView): Key {
  return defaultComputer.nodeKey(node);
}
