/**
 * @file SPI receiver model of one MuTRiG: captures the frames shifted in
 * while its chip select is low.
 */

import type { SpiLines } from '../controller/config-writer';
import { WORD_BITS } from '../controller/constants';
import { FieldTable, readFieldValue } from '../controller/field-layout';

/**
 * Converts a captured frame back to storage words. The first bit on the
 * wire is the highest storage bit of the payload.
 */
export function frameToWords(frame: readonly number[]): Uint32Array {
  const words = new Uint32Array(Math.ceil(frame.length / WORD_BITS));
  frame.forEach((bit, index) => {
    if (bit !== 0) {
      const storageBit = frame.length - 1 - index;
      const word = Math.floor(storageBit / WORD_BITS);
      words[word] = ((words[word] ?? 0) | (1 << storageBit % WORD_BITS)) >>> 0;
    }
  });
  return words;
}

/**
 * Reads every channel's threshold out of a captured frame.
 */
export function decodeThresholds(frame: readonly number[], table: FieldTable): number[] {
  const words = frameToWords(frame);
  const readBit = (bit: number): number =>
    ((words[Math.floor(bit / WORD_BITS)] ?? 0) >>> bit % WORD_BITS) & 1;
  return table.map((entry) => readFieldValue(readBit, 0, entry));
}

/**
 * Samples `mosi` on rising `sclk` edges while selected. A frame ends when
 * chip select is released.
 */
export class MutrigSpiDevice {
  readonly index: number;
  private readonly captured: number[][] = [];
  private shift: number[] = [];
  private selected = false;
  private sclk: 0 | 1 = 0;

  constructor(index: number) {
    this.index = index;
  }

  /** Complete frames, oldest first. */
  get frames(): readonly (readonly number[])[] {
    return this.captured;
  }

  get lastFrame(): readonly number[] | undefined {
    return this.captured[this.captured.length - 1];
  }

  /**
   * Observes the bus lines for one serial cycle.
   */
  sample(lines: Readonly<SpiLines>): void {
    const nextSelected = ((lines.ssn >> this.index) & 1) === 0;
    if (this.selected && !nextSelected) {
      if (this.shift.length > 0) {
        this.captured.push(this.shift);
      }
      this.shift = [];
    }
    if (nextSelected && this.sclk === 0 && lines.sclk === 1) {
      this.shift.push(lines.mosi);
    }
    this.selected = nextSelected;
    this.sclk = lines.sclk;
  }

  clear(): void {
    this.captured.length = 0;
    this.shift = [];
  }
}
