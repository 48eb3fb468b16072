/**
 * @file Write-mask merger for 6-bit fields inside 32-bit words.
 */

import { THRESHOLD_BITS, WORD_BITS } from './constants';

/** Lowest lsb position: the field's top bit is bit 0 of this word. */
export const MERGE_LSB_MIN = 1 - THRESHOLD_BITS;
/** Highest lsb position: only the field's low bit lands in this word. */
export const MERGE_LSB_MAX = WORD_BITS - 1;

const FIELD_MASK = (1 << THRESHOLD_BITS) - 1;

function windowMask(lsb: number): number {
  let mask = 0;
  const low = Math.max(lsb, 0);
  const high = Math.min(lsb + THRESHOLD_BITS - 1, WORD_BITS - 1);
  for (let bit = low; bit <= high; bit += 1) {
    mask |= 1 << bit;
  }
  return mask >>> 0;
}

/** Window masks indexed by `lsb - MERGE_LSB_MIN`. */
const MASK_TABLE: readonly number[] = Array.from(
  { length: MERGE_LSB_MAX - MERGE_LSB_MIN + 1 },
  (_, index) => windowMask(index + MERGE_LSB_MIN)
);

/**
 * Returns the mask of bits a merge at `lsb` replaces.
 */
export function mergeMask(lsb: number): number {
  const mask = MASK_TABLE[lsb - MERGE_LSB_MIN];
  if (mask === undefined || !Number.isInteger(lsb)) {
    throw new RangeError(`lsb position ${lsb} outside [${MERGE_LSB_MIN}, ${MERGE_LSB_MAX}]`);
  }
  return mask;
}

/**
 * Replaces the 6-bit window starting at `lsb` with `replacement`.
 *
 * A negative `lsb` means the field's low bits belong to the previous word:
 * only the high `6 + lsb` bits of `replacement` land here, at bit 0. Window
 * bits past bit 31 belong to the next word and are dropped.
 *
 * @throws {RangeError} If `lsb` is outside [-5, 31]
 */
export function mergeField(original: number, replacement: number, lsb: number): number {
  const mask = mergeMask(lsb);
  const value = replacement & FIELD_MASK;
  const shifted = lsb >= 0 ? value << lsb : value >>> -lsb;
  return ((original & ~mask) | (shifted & mask)) >>> 0;
}
