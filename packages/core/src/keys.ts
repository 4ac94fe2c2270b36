// ============================================================================
// @treekey/core — Key Combiner
// ============================================================================
//
// Two folds over fixed-width integer keys:
//   - combineUniquely: order-sensitive hash-combine (position matters)
//   - combineLoosely:  XOR (permutation-invariant, zero is identity)
//
// Keys are bigints masked to the key width so that shifts and additions wrap
// exactly like native unsigned words.
// ============================================================================

/**
 * A fixed-width unsigned fingerprint. Always within `[0, 2^width)`.
 */
export type Key = bigint;

/**
 * Supported key widths in bits.
 */
export type KeyWidth = 32 | 64 | 128;

export const DEFAULT_KEY_WIDTH: KeyWidth = 64;

/** Identity of both combiners and the seed of every fold. */
export const ZERO_KEY: Key = 0n;

/** Golden-ratio constant mixed into every step of the unique fold. */
export const GOLDEN_RATIO_MAGIC: Key = 0x9e3779b9n;

/**
 * A key width together with the combiners that wrap at that width.
 */
export interface KeySpace {
  readonly width: KeyWidth;
  readonly mask: Key;
  combineUniquely(...keys: Key[]): Key;
  combineLoosely(...keys: Key[]): Key;
}

export function keyMask(width: KeyWidth): Key {
  return (1n << BigInt(width)) - 1n;
}

/**
 * Create the key space for a given width.
 */
export function createKeySpace(width: KeyWidth = DEFAULT_KEY_WIDTH): KeySpace {
  const mask = keyMask(width);

  return {
    width,
    mask,
    combineUniquely(...keys: Key[]): Key {
      let acc = ZERO_KEY;
      for (const key of keys) {
        const mixed = (key + GOLDEN_RATIO_MAGIC + ((acc << 6n) & mask) + (acc >> 2n)) & mask;
        acc = (acc ^ mixed) & mask;
      }
      return acc;
    },
    combineLoosely(...keys: Key[]): Key {
      let acc = ZERO_KEY;
      for (const key of keys) {
        acc ^= key;
      }
      return acc & mask;
    },
  };
}

const defaultSpace = createKeySpace(DEFAULT_KEY_WIDTH);

/**
 * Order-sensitive combination in the default 64-bit key space.
 *
 * Swapping two distinct inputs changes the result (with high probability).
 */
export function combineUniquely(...keys: Key[]): Key {
  return defaultSpace.combineUniquely(...keys);
}

/**
 * Order-insensitive combination in the default 64-bit key space.
 */
export function combineLoosely(...keys: Key[]): Key {
  return defaultSpace.combineLoosely(...keys);
}

/**
 * Render a key as fixed-length lowercase hex (`width / 4` digits).
 */
export function formatKey(key: Key, width: KeyWidth = DEFAULT_KEY_WIDTH): string {
  return key.toString(16).padStart(width / 4, '0');
}
