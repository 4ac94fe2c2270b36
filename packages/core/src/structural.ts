// ============================================================================
// @treekey/core — Structural Confirmation
// ============================================================================
//
// Exact order-insensitive equivalence, used to confirm a key match when a
// false "equivalent" verdict is too costly. Children are bucketed by node key
// so that matching only compares candidates that already fingerprint alike.
// Node keys are cached for the duration of one comparison, so each subtree
// is hashed once however deep it sits.
// ============================================================================

import type { Key } from './keys.js';
import { type AttributeView, NodeKeyComputer, type NodeView } from './node_key.js';

function attributeSignatures(attributes: Iterable<AttributeView>): string[] {
  const signatures: string[] = [];
  for (const attribute of attributes) {
    signatures.push(JSON.stringify([attribute.name, attribute.value]));
  }
  return signatures.sort();
}

function sameAttributes(lhs: NodeView, rhs: NodeView): boolean {
  const a = attributeSignatures(lhs.attributes);
  const b = attributeSignatures(rhs.attributes);
  if (a.length !== b.length) return false;
  return a.every((signature, i) => signature === b[i]);
}

interface Comparison {
  readonly computer: NodeKeyComputer;
  readonly keys: Map<NodeView, Key>;
}

function keyOf(node: NodeView, comparison: Comparison): Key {
  return comparison.computer.nodeKey(node, comparison.keys);
}

function sameChildren(lhs: NodeView, rhs: NodeView, comparison: Comparison): boolean {
  const lhsChildren = [...lhs.children];
  const rhsChildren = [...rhs.children];
  if (lhsChildren.length !== rhsChildren.length) return false;

  const buckets = new Map<Key, NodeView[]>();
  for (const child of rhsChildren) {
    const key = keyOf(child, comparison);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(child);
    } else {
      buckets.set(key, [child]);
    }
  }

  // Equivalence is transitive, so taking the first equivalent candidate
  // never blocks a later match.
  for (const child of lhsChildren) {
    const bucket = buckets.get(keyOf(child, comparison));
    if (!bucket) return false;
    const index = bucket.findIndex((candidate) => equivalent(child, candidate, comparison));
    if (index === -1) return false;
    bucket.splice(index, 1);
  }

  return true;
}

function equivalent(lhs: NodeView, rhs: NodeView, comparison: Comparison): boolean {
  return (
    lhs.tagName === rhs.tagName &&
    lhs.textValue === rhs.textValue &&
    sameAttributes(lhs, rhs) &&
    sameChildren(lhs, rhs, comparison)
  );
}

/**
 * Exact structural equivalence up to attribute order and sibling order.
 *
 * Unlike a key comparison this has no false positives. It does not say where
 * two trees differ.
 */
export function isStructurallyEquivalent(
  lhs: NodeView,
  rhs: NodeView,
  computer: NodeKeyComputer = new NodeKeyComputer(),
): boolean {
  return equivalent(lhs, rhs, { computer, keys: new Map<NodeView, Key>() });
}
