// ============================================
// Tile Character Validation
// ============================================

import { InvalidCharacterError } from './errors';

// One symbol = one extended grapheme cluster, so 'é' (e + combining accent)
// and ZWJ emoji sequences count as a single tile character
const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

// In unicode mode a surrogate pair is one code point, so this only matches unpaired halves
const LONE_SURROGATE = /\p{Surrogate}/u;

/**
 * Check whether a value is exactly one symbol.
 */
export function isTileCharacter(value: unknown): value is string {
  if (typeof value !== 'string' || value.length === 0) return false;
  if (LONE_SURROGATE.test(value)) return false;

  const segments = segmenter.segment(value)[Symbol.iterator]();
  const first = segments.next();
  return !first.done && first.value.segment === value;
}

/**
 * Throw InvalidCharacterError unless `value` is exactly one symbol.
 */
export function assertTileCharacter(value: unknown): asserts value is string {
  if (!isTileCharacter(value)) {
    throw new InvalidCharacterError(value);
  }
}
