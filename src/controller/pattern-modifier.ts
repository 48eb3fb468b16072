/**
 * @file Pattern modifier: rewrites one threshold field in every channel
 * record of a device partition.
 */

import { CHANNELS_PER_DEVICE } from './constants';
import { FieldTable, FieldTableEntry, ThresholdField, reverseThreshold } from './field-layout';
import { Handshake, createHandshake, resetHandshake } from './handshake';
import { ConfigStore } from './memory';
import { mergeField } from './write-mask';

export interface ModifyArgs {
  deviceId: number;
  field: ThresholdField;
  /** Threshold value, 0..63 */
  value: number;
}

export type PatternModifierState = 'IDLE' | 'READ32' | 'MODIFY' | 'WRITE32';

export interface PatternModifierOptions {
  store: ConfigStore;
  tables: Readonly<Record<ThresholdField, FieldTable>>;
}

/**
 * Channel loop of read, modify and write-back. Reads go through a pending
 * phase: the address is issued in one cycle and the word latched in the
 * next. A single-word field costs 4 cycles, a straddling one 7.
 */
export class PatternModifier {
  readonly port: Handshake<ModifyArgs> = createHandshake<ModifyArgs>({
    deviceId: 0,
    field: 'tth',
    value: 0,
  });
  private readonly store: ConfigStore;
  private readonly tables: Readonly<Record<ThresholdField, FieldTable>>;
  private current: PatternModifierState = 'IDLE';
  private args: ModifyArgs = { deviceId: 0, field: 'tth', value: 0 };
  private channel = 0;
  private wordIndex = 0;
  private readPending = false;
  private readAddress = 0;
  private readonly latched: [number, number] = [0, 0];

  constructor(options: PatternModifierOptions) {
    this.store = options.store;
    this.tables = options.tables;
  }

  get state(): PatternModifierState {
    return this.current;
  }

  /** Channel currently being patched. */
  get currentChannel(): number {
    return this.channel;
  }

  tick(): void {
    switch (this.current) {
      case 'IDLE': {
        if (this.port.done) {
          if (!this.port.start) {
            this.port.done = false;
          }
          return;
        }
        if (!this.port.start) {
          return;
        }
        this.args = { ...this.port.args };
        this.channel = 0;
        this.beginChannel();
        return;
      }
      case 'READ32': {
        if (!this.readPending) {
          this.readAddress = this.wordAddress(this.wordIndex);
          this.readPending = true;
          return;
        }
        this.latched[this.wordIndex] = this.store.readWord(this.readAddress);
        this.readPending = false;
        if (this.wordIndex + 1 < this.entry().wordCount) {
          this.wordIndex += 1;
        } else {
          this.current = 'MODIFY';
        }
        return;
      }
      case 'MODIFY': {
        const entry = this.entry();
        const stored = reverseThreshold(this.args.value);
        this.latched[0] = mergeField(this.latched[0], stored, entry.bitOffset);
        if (entry.wordCount === 2) {
          this.latched[1] = mergeField(this.latched[1], stored, entry.bitOffset - 32);
        }
        this.wordIndex = 0;
        this.current = 'WRITE32';
        return;
      }
      case 'WRITE32': {
        this.store.requestWrite(
          'pattern-modifier',
          this.wordAddress(this.wordIndex),
          this.latched[this.wordIndex === 0 ? 0 : 1]
        );
        if (this.wordIndex + 1 < this.entry().wordCount) {
          this.wordIndex += 1;
          return;
        }
        if (this.channel + 1 < CHANNELS_PER_DEVICE) {
          this.channel += 1;
          this.beginChannel();
          return;
        }
        this.port.done = true;
        this.current = 'IDLE';
        return;
      }
    }
  }

  reset(): void {
    this.current = 'IDLE';
    this.channel = 0;
    this.wordIndex = 0;
    this.readPending = false;
    this.latched[0] = 0;
    this.latched[1] = 0;
    resetHandshake(this.port);
  }

  private beginChannel(): void {
    this.wordIndex = 0;
    this.readPending = false;
    this.current = 'READ32';
  }

  private entry(): Readonly<FieldTableEntry> {
    const entry = this.tables[this.args.field][this.channel];
    if (entry === undefined) {
      throw new RangeError(`No field table entry for channel ${this.channel}`);
    }
    return entry;
  }

  private wordAddress(wordIndex: number): number {
    const entry = this.entry();
    const word = wordIndex === 0 ? entry.wordStart : entry.wordEnd;
    return this.store.partitionBase(this.args.deviceId) + word;
  }
}
