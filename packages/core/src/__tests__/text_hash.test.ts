import { describe, expect, it } from 'vitest';
import { fnv1aTextHasher, resolveTextHasher, sha256TextHasher } from '../text_hash.js';

describe('Text hashing', () => {
  describe('sha256TextHasher', () => {
    it('takes the leading digest bytes big-endian', () => {
      // sha256('abc') = ba7816bf 8f01cfea 414140de 5dae2223 ...
      expect(sha256TextHasher('abc', 32)).toBe(0xba7816bfn);
      expect(sha256TextHasher('abc', 64)).toBe(0xba7816bf8f01cfean);
      expect(sha256TextHasher('abc', 128)).toBe(0xba7816bf8f01cfea414140de5dae2223n);
    });

    it('hashes the empty string', () => {
      // sha256('') = e3b0c442 98fc1c14 ...
      expect(sha256TextHasher('', 64)).toBe(0xe3b0c44298fc1c14n);
    });
  });

  describe('fnv1aTextHasher', () => {
    it('returns the offset basis for the empty string', () => {
      expect(fnv1aTextHasher('', 32)).toBe(0x811c9dc5n);
      expect(fnv1aTextHasher('', 64)).toBe(0xcbf29ce484222325n);
    });

    it('matches reference FNV-1a values', () => {
      expect(fnv1aTextHasher('a', 32)).toBe(0xe40c292cn);
      expect(fnv1aTextHasher('a', 64)).toBe(0xaf63dc4c8601ec8cn);
    });

    it('starts from the 128-bit offset basis', () => {
      expect(fnv1aTextHasher('', 128)).toBe(0x6c62272e07bb014262b821756295c58dn);
    });

    it('produces 128-bit keys', () => {
      const key = fnv1aTextHasher('treekey', 128);
      expect(key < 1n << 128n).toBe(true);
      expect(key).not.toBe(fnv1aTextHasher('treekeys', 128));
    });

    it('does not normalize text before hashing', () => {
      expect(fnv1aTextHasher('é', 64)).not.toBe(fnv1aTextHasher('é'.normalize('NFD'), 64));
    });
  });

  describe('resolveTextHasher', () => {
    it('defaults to sha256', () => {
      expect(resolveTextHasher()).toBe(sha256TextHasher);
    });

    it('resolves by name', () => {
      expect(resolveTextHasher('fnv1a')).toBe(fnv1aTextHasher);
    });
  });
});
