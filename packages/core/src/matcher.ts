// ============================================================================
// @treekey/core — Document Matcher
// ============================================================================
//
// Two documents match loosely when the keys of their document elements are
// equal. Equal keys mean "probably structurally equivalent": two different
// trees can fold to the same key. Callers that cannot accept that enable
// `confirm`, which re-checks every key match exactly.
// ============================================================================

import type { Key, KeyWidth } from './keys.js';
import { debug, timer, warn } from './logger.js';
import { type DocumentView, NodeKeyComputer, type NodeKeyOptions } from './node_key.js';
import { isStructurallyEquivalent } from './structural.js';

export interface MatchOptions extends NodeKeyOptions {
  /** Confirm key matches with an exact structural comparison. */
  confirm?: boolean;
}

export interface MatchResult {
  equivalent: boolean;
  lhsKey: Key;
  rhsKey: Key;
  keyWidth: KeyWidth;
  /** True only when structural comparison ran and agreed with the keys. */
  confirmed: boolean;
}

export class DocumentMatcher {
  readonly computer: NodeKeyComputer;
  readonly confirm: boolean;

  constructor(options: MatchOptions = {}) {
    this.computer = new NodeKeyComputer(options);
    this.confirm = options.confirm ?? false;
  }

  documentKey(document: DocumentView): Key {
    const t = timer('documentKey');
    const key = this.computer.nodeKey(document.root);
    t.endWith({ root: document.root.tagName, key });
    return key;
  }

  match(lhs: DocumentView, rhs: DocumentView): MatchResult {
    const lhsKey = this.documentKey(lhs);
    const rhsKey = this.documentKey(rhs);
    const keyWidth = this.computer.keyWidth;

    if (lhsKey !== rhsKey) {
      debug('documents differ', { lhsKey, rhsKey });
      return { equivalent: false, lhsKey, rhsKey, keyWidth, confirmed: false };
    }

    if (!this.confirm) {
      return { equivalent: true, lhsKey, rhsKey, keyWidth, confirmed: false };
    }

    if (isStructurallyEquivalent(lhs.root, rhs.root, this.computer)) {
      return { equivalent: true, lhsKey, rhsKey, keyWidth, confirmed: true };
    }

    warn('key collision: equal keys for structurally different documents', {
      key: lhsKey,
      keyWidth,
    });
    return { equivalent: false, lhsKey, rhsKey, keyWidth, confirmed: false };
  }

  matchLoosely(lhs: DocumentView, rhs: DocumentView): boolean {
    return this.match(lhs, rhs).equivalent;
  }
}

/**
 * True when both documents are equivalent up to attribute order and sibling
 * order. Without `confirm`, equal keys are a strong indication, not a proof.
 */
export function matchLoosely(lhs: DocumentView, rhs: DocumentView, options?: MatchOptions): boolean {
  return new DocumentMatcher(options).matchLoosely(lhs, rhs);
}
