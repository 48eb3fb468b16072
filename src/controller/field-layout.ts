/**
 * @file Derived field tables for the per-channel threshold fields.
 *
 * A channel record is `channelBits` long and not a power of two, so each
 * 6-bit field lands at a different bit offset and may straddle a word
 * boundary. The table below resolves every channel's field to word indices
 * once, so the pattern modifier only does table lookups.
 */

import { LayoutError } from '../errors';
import { BitstreamLayout } from '../config/types';
import { CHANNELS_PER_DEVICE, MAX_BURST_WORDS, THRESHOLD_BITS, WORD_BITS } from './constants';

export const THRESHOLD_FIELDS = ['tth', 'eth'] as const;
/** Time threshold or energy threshold. */
export type ThresholdField = (typeof THRESHOLD_FIELDS)[number];

/**
 * Location of one channel's threshold field, relative to the start of the
 * device partition.
 */
export interface FieldTableEntry {
  channel: number;
  /** First storage bit of the field */
  bitStart: number;
  /** Last storage bit of the field (inclusive) */
  bitEnd: number;
  wordStart: number;
  wordEnd: number;
  wordCount: 1 | 2;
  /** Position of `bitStart` inside `wordStart` */
  bitOffset: number;
  /** Field bits that continue into the second word; 0 for single-word fields */
  spill: number;
}

export type FieldTable = readonly Readonly<FieldTableEntry>[];

/**
 * Offset of a field inside its channel record.
 */
export function fieldOffset(layout: BitstreamLayout, field: ThresholdField): number {
  return field === 'tth' ? layout.tthOffset : layout.ethOffset;
}

/**
 * Lists the reasons a layout cannot hold 32 channel records with both
 * threshold fields. An empty list means the layout is usable.
 */
export function layoutProblems(layout: BitstreamLayout): string[] {
  const problems: string[] = [];
  if (layout.lengthBits < 1) {
    problems.push(`layout.lengthBits must be positive, got ${layout.lengthBits}`);
  }
  for (const field of THRESHOLD_FIELDS) {
    const offset = fieldOffset(layout, field);
    if (offset + THRESHOLD_BITS > layout.channelBits) {
      problems.push(
        `layout.${field}Offset ${offset} does not leave ${THRESHOLD_BITS} bits inside a ${layout.channelBits}-bit channel record`
      );
    }
  }
  if (Math.abs(layout.tthOffset - layout.ethOffset) < THRESHOLD_BITS) {
    problems.push(
      `layout.tthOffset (${layout.tthOffset}) and layout.ethOffset (${layout.ethOffset}) overlap`
    );
  }
  const recordsEnd = layout.headerBits + CHANNELS_PER_DEVICE * layout.channelBits;
  if (recordsEnd > layout.lengthBits) {
    problems.push(
      `header and ${CHANNELS_PER_DEVICE} channel records need ${recordsEnd} bits, payload has ${layout.lengthBits}`
    );
  }
  const payloadWords = Math.ceil(layout.lengthBits / WORD_BITS);
  if (payloadWords > MAX_BURST_WORDS) {
    problems.push(
      `layout.lengthBits ${layout.lengthBits} needs ${payloadWords} words, more than one ${MAX_BURST_WORDS}-word burst`
    );
  }
  return problems;
}

/**
 * Computes the field table for one threshold field.
 * @throws {LayoutError} If the layout cannot hold the fields
 */
export function deriveFieldTable(layout: BitstreamLayout, field: ThresholdField): FieldTable {
  const problems = layoutProblems(layout);
  if (problems.length > 0) {
    throw new LayoutError(`Invalid bitstream layout: ${problems.join('; ')}`, { layout });
  }
  const offset = fieldOffset(layout, field);
  const entries: Readonly<FieldTableEntry>[] = [];
  for (let channel = 0; channel < CHANNELS_PER_DEVICE; channel += 1) {
    const bitStart = layout.headerBits + channel * layout.channelBits + offset;
    const bitEnd = bitStart + THRESHOLD_BITS - 1;
    const wordStart = Math.floor(bitStart / WORD_BITS);
    const wordEnd = Math.floor(bitEnd / WORD_BITS);
    const bitOffset = bitStart % WORD_BITS;
    const wordCount = wordEnd === wordStart ? 1 : 2;
    entries.push(
      Object.freeze({
        channel,
        bitStart,
        bitEnd,
        wordStart,
        wordEnd,
        wordCount,
        bitOffset,
        spill: wordCount === 1 ? 0 : bitEnd % WORD_BITS + 1,
      })
    );
  }
  return Object.freeze(entries);
}

/**
 * Computes the tables for every threshold field.
 */
export function deriveFieldTables(layout: BitstreamLayout): Readonly<Record<ThresholdField, FieldTable>> {
  return Object.freeze({
    tth: deriveFieldTable(layout, 'tth'),
    eth: deriveFieldTable(layout, 'eth'),
  });
}

/**
 * Reverses the bit order of a 6-bit value. Fields are stored with the
 * value's most significant bit at `bitStart`.
 */
export function reverseThreshold(value: number): number {
  let result = 0;
  for (let i = 0; i < THRESHOLD_BITS; i += 1) {
    if ((value >> i) & 1) {
      result |= 1 << (THRESHOLD_BITS - 1 - i);
    }
  }
  return result;
}

/**
 * Reads a field back from storage.
 * @param readBit - Returns the storage bit at an absolute bit address
 * @param baseBit - First bit of the device partition
 */
export function readFieldValue(
  readBit: (bitAddress: number) => number,
  baseBit: number,
  entry: Readonly<FieldTableEntry>
): number {
  let stored = 0;
  for (let k = 0; k < THRESHOLD_BITS; k += 1) {
    stored |= (readBit(baseBit + entry.bitStart + k) & 1) << k;
  }
  return reverseThreshold(stored);
}
