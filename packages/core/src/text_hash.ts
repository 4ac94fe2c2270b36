// ============================================================================
// @treekey/core — Text Hashing
// ============================================================================
//
// Turns a text value (tag name, text content, attribute name/value) into a
// Key of the requested width. Keys are never persisted, so the choice of
// hasher only has to be stable within one process.
// ============================================================================

import { createHash } from 'node:crypto';
import type { Key, KeyWidth } from './keys.js';

/**
 * Hash a text value to a key of the given width.
 */
export type TextHasher = (text: string, width: KeyWidth) => Key;

export type TextHasherName = 'sha256' | 'fnv1a';

export const DEFAULT_TEXT_HASHER: TextHasherName = 'sha256';

/**
 * SHA-256 of the UTF-8 text, truncated to the first `width / 8` bytes
 * (read big-endian).
 */
export const sha256TextHasher: TextHasher = (text, width) => {
  const digest = createHash('sha256').update(text, 'utf8').digest();
  return BigInt(`0x${digest.subarray(0, width / 8).toString('hex')}`);
};

// FNV-1a parameters per width (offset basis, prime)
const FNV_PARAMS: Record<KeyWidth, { offset: bigint; prime: bigint }> = {
  32: { offset: 0x811c9dc5n, prime: 0x01000193n },
  64: { offset: 0xcbf29ce484222325n, prime: 0x100000001b3n },
  128: {
    offset: 0x6c62272e07bb014262b821756295c58dn,
    prime: 0x0000000001000000000000000000013bn,
  },
};

/**
 * FNV-1a over the UTF-8 bytes of the text. Much faster than SHA-256 for
 * large documents, with weaker distribution.
 */
export const fnv1aTextHasher: TextHasher = (text, width) => {
  const { offset, prime } = FNV_PARAMS[width];
  const mask = (1n << BigInt(width)) - 1n;
  let h = offset;
  for (const byte of Buffer.from(text, 'utf8')) {
    h ^= BigInt(byte);
    h = (h * prime) & mask;
  }
  return h;
};

const HASHERS: Record<TextHasherName, TextHasher> = {
  sha256: sha256TextHasher,
  fnv1a: fnv1aTextHasher,
};

export function resolveTextHasher(name: TextHasherName = DEFAULT_TEXT_HASHER): TextHasher {
  return HASHERS[name];
}
