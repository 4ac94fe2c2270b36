import { afterEach, describe, expect, it } from 'vitest';
import { type LogEntry, onLog } from '../logger.js';
import { DocumentMatcher, matchLoosely } from '../matcher.js';
import { NodeKeyComputer } from '../node_key.js';
import { isStructurallyEquivalent } from '../structural.js';
import type { TextHasher } from '../text_hash.js';
import { parseXmlDocument } from '../xml.js';
import { chain, doc, el, text } from './trees.js';

// Every text hashes to zero, so keys depend only on shape.
const collidingHasher: TextHasher = () => 0n;

describe('Document Matcher', () => {
  describe('matchLoosely', () => {
    it('is reflexive', () => {
      const tree = doc(el('r', { a: '1' }, [el('x', {}, [text('y', 'z')])]));
      expect(matchLoosely(tree, tree)).toBe(true);
    });

    it('matches reordered attributes', () => {
      expect(matchLoosely(doc(el('r', { a: '1', b: '2' })), doc(el('r', { b: '2', a: '1' })))).toBe(true);
    });

    it('matches reordered siblings', () => {
      expect(matchLoosely(doc(el('r', {}, [el('x'), el('y')])), doc(el('r', {}, [el('y'), el('x')])))).toBe(true);
    });

    it('rejects a different attribute value', () => {
      expect(matchLoosely(doc(el('r', { a: '1' })), doc(el('r', { a: '2' })))).toBe(false);
    });

    it('rejects a different child count', () => {
      expect(matchLoosely(doc(el('r', {}, [el('x')])), doc(el('r', {}, [el('x'), el('x')])))).toBe(false);
    });

    it('rejects different text', () => {
      expect(matchLoosely(doc(text('r', 'hello')), doc(text('r', 'world')))).toBe(false);
    });

    it('honors the key width option', () => {
      const lhs = doc(el('r', { a: '1', b: '2' }));
      const rhs = doc(el('r', { b: '2', a: '1' }));
      expect(matchLoosely(lhs, rhs, { keyWidth: 128 })).toBe(true);
      expect(matchLoosely(lhs, doc(el('r', { a: '1' })), { keyWidth: 32 })).toBe(false);
    });
  });

  describe('DocumentMatcher.match', () => {
    it('reports both keys and the width', () => {
      const matcher = new DocumentMatcher({ keyWidth: 32 });
      const result = matcher.match(doc(el('r')), doc(el('s')));
      expect(result.equivalent).toBe(false);
      expect(result.keyWidth).toBe(32);
      expect(result.lhsKey).toBe(new NodeKeyComputer({ keyWidth: 32 }).nodeKey(el('r')));
      expect(result.lhsKey).not.toBe(result.rhsKey);
      expect(result.confirmed).toBe(false);
    });

    it('leaves key matches unconfirmed by default', () => {
      const result = new DocumentMatcher().match(doc(el('r')), doc(el('r')));
      expect(result).toMatchObject({ equivalent: true, confirmed: false });
    });

    it('confirms genuine matches structurally', () => {
      const matcher = new DocumentMatcher({ confirm: true });
      const result = matcher.match(
        doc(el('r', { a: '1', b: '2' }, [el('x'), text('y', 't')])),
        doc(el('r', { b: '2', a: '1' }, [text('y', 't'), el('x')])),
      );
      expect(result).toMatchObject({ equivalent: true, confirmed: true });
    });

    describe('collisions', () => {
      let unsubscribe: (() => void) | undefined;

      afterEach(() => {
        unsubscribe?.();
        unsubscribe = undefined;
      });

      it('accepts a collision without confirmation', () => {
        const matcher = new DocumentMatcher({ hashText: collidingHasher });
        expect(matcher.matchLoosely(doc(el('r', { a: '1' })), doc(el('r', { a: '2' })))).toBe(true);
      });

      it('rejects a collision with confirmation and logs a warning', () => {
        const entries: LogEntry[] = [];
        unsubscribe = onLog((entry) => entries.push(entry));

        const matcher = new DocumentMatcher({ hashText: collidingHasher, confirm: true });
        const result = matcher.match(doc(el('r', { a: '1' })), doc(el('r', { a: '2' })));

        expect(result.lhsKey).toBe(result.rhsKey);
        expect(result.equivalent).toBe(false);
        expect(result.confirmed).toBe(false);
        const warnings = entries.filter((e) => e.level === 'warn');
        expect(warnings).toHaveLength(1);
        expect(warnings[0].message).toBe('key collision: equal keys for structurally different documents');
      });
    });

    it('catches duplicate siblings that cancel out under XOR', () => {
      const lhs = doc(el('r', {}, [el('x'), el('x')]));
      const rhs = doc(el('r'));
      expect(matchLoosely(lhs, rhs)).toBe(true);
      expect(matchLoosely(lhs, rhs, { confirm: true })).toBe(false);
    });
  });
});

describe('isStructurallyEquivalent', () => {
  it('accepts permuted attributes and children', () => {
    const lhs = el('r', { a: '1', b: '2' }, [el('x', {}, [el('p'), el('q')]), text('y', 'v')]);
    const rhs = el('r', { b: '2', a: '1' }, [text('y', 'v'), el('x', {}, [el('q'), el('p')])]);
    expect(isStructurallyEquivalent(lhs, rhs)).toBe(true);
  });

  it('rejects differing tag, text or attributes', () => {
    expect(isStructurallyEquivalent(el('r'), el('s'))).toBe(false);
    expect(isStructurallyEquivalent(text('r', 'a'), text('r', 'b'))).toBe(false);
    expect(isStructurallyEquivalent(el('r', { a: '1' }), el('r', { a: '1', b: '2' }))).toBe(false);
  });

  it('compares children as a multiset', () => {
    const twoX = el('r', {}, [el('x'), el('x'), el('y')]);
    const twoY = el('r', {}, [el('x'), el('y'), el('y')]);
    expect(isStructurallyEquivalent(twoX, twoY)).toBe(false);
    expect(isStructurallyEquivalent(twoX, el('r', {}, [el('y'), el('x'), el('x')]))).toBe(true);
  });

  it('matches children whose keys collide', () => {
    const computer = new NodeKeyComputer({ hashText: collidingHasher });
    const lhs = el('r', {}, [el('a'), el('b')]);
    expect(isStructurallyEquivalent(lhs, el('r', {}, [el('b'), el('a')]), computer)).toBe(true);
    expect(isStructurallyEquivalent(lhs, el('r', {}, [el('b'), el('c')]), computer)).toBe(false);
  });

  it('hashes each node below the roots once', () => {
    let hashed = 0;
    const countingHasher: TextHasher = () => {
      hashed++;
      return 0n;
    };
    const computer = new NodeKeyComputer({ hashText: countingHasher });
    const depth = 50;

    expect(isStructurallyEquivalent(chain(depth), chain(depth), computer)).toBe(true);
    // Tag and text per node, for the depth - 1 non-root nodes of both trees.
    expect(hashed).toBe(4 * (depth - 1));
  });

  it('hashes each parsed node below the roots once', () => {
    let hashed = 0;
    const countingHasher: TextHasher = () => {
      hashed++;
      return 0n;
    };
    const computer = new NodeKeyComputer({ hashText: countingHasher });
    const markup = '<a><b><c><d/></c></b></a>';

    expect(isStructurallyEquivalent(parseXmlDocument(markup).root, parseXmlDocument(markup).root, computer)).toBe(true);
    expect(hashed).toBe(4 * 3);
  });
});
