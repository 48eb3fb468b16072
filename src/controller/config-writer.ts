/**
 * @file Config writer: shifts a device's configuration out over SPI
 * (CPOL=0, CPHA=0), twice per request.
 */

import { IDLE_WRITER_COMMAND, WRITER_ERROR_NONE, WriterCommand, WriterStatus } from './cdc-channel';
import { WORD_BITS } from './constants';
import { ConfigStore } from './memory';

export type ConfigWriterState =
  | 'IDLE'
  | 'INIT'
  | 'STARTING'
  | 'WRITING'
  | 'FINISHING'
  | 'PAUSE'
  | 'PAUSING';

/** Passes made over the bitstream for every request. */
export const WRITE_PASSES = 2;

/**
 * SPI output lines. `ssn` is an active-low chip-select mask, bit `n` for
 * device `n`.
 */
export interface SpiLines {
  sclk: 0 | 1;
  mosi: 0 | 1;
  ssn: number;
}

export interface ConfigWriterOptions {
  store: ConfigStore;
  deviceCount: number;
  /** Bits sent per pass: the payload rounded up to whole words */
  roundedBits: number;
  /** Cycles held idle before each pass */
  settleCycles: number;
}

/**
 * Each bit takes two cycles: the clock-low phase raises `sclk` and advances
 * the bit counter, the clock-high phase lowers `sclk` and presents the next
 * bit. `mosi` therefore changes only on falling edges. Bits are read from
 * the top of the device's payload downwards, so the last stored bit goes
 * out first.
 *
 * Readback of the device's output line during the second pass is not
 * implemented; the status always reports no error.
 */
export class ConfigWriter {
  /** Latest request seen from the control domain */
  command: WriterCommand = { ...IDLE_WRITER_COMMAND };
  private readonly store: ConfigStore;
  private readonly roundedBits: number;
  private readonly settleCycles: number;
  private readonly deselected: number;
  private current: ConfigWriterState = 'IDLE';
  private deviceId = 0;
  private bitCounter = 0;
  private wait = 0;
  private passes = 0;
  private done = false;
  private readonly out: SpiLines;

  constructor(options: ConfigWriterOptions) {
    this.store = options.store;
    this.roundedBits = options.roundedBits;
    this.settleCycles = options.settleCycles;
    this.deselected = (1 << options.deviceCount) - 1;
    this.out = { sclk: 0, mosi: 0, ssn: this.deselected };
  }

  get state(): ConfigWriterState {
    return this.current;
  }

  get lines(): Readonly<SpiLines> {
    return this.out;
  }

  get status(): WriterStatus {
    return { done: this.done, error: false, errorInfo: WRITER_ERROR_NONE };
  }

  /** Bits shifted so far in the current pass. */
  get bitsSent(): number {
    return this.bitCounter;
  }

  /** Completed passes of the current request. */
  get passesDone(): number {
    return this.passes;
  }

  tick(): void {
    switch (this.current) {
      case 'IDLE': {
        if (this.done) {
          if (!this.command.start) {
            this.done = false;
          }
          return;
        }
        if (this.command.start) {
          this.deviceId = this.command.deviceId;
          this.passes = 0;
          this.current = 'INIT';
        }
        return;
      }
      case 'INIT': {
        this.out.ssn = this.deselected & ~(1 << this.deviceId);
        this.out.sclk = 0;
        this.done = false;
        this.bitCounter = 0;
        this.wait = 0;
        this.current = 'STARTING';
        return;
      }
      case 'STARTING': {
        if (this.wait < this.settleCycles) {
          this.wait += 1;
          return;
        }
        this.out.mosi = this.bitAt(0);
        this.current = 'WRITING';
        return;
      }
      case 'WRITING': {
        if (this.out.sclk === 0) {
          this.out.sclk = 1;
          this.bitCounter += 1;
          return;
        }
        this.out.sclk = 0;
        if (this.bitCounter >= this.roundedBits) {
          this.out.mosi = 0;
          this.current = 'FINISHING';
        } else {
          this.out.mosi = this.bitAt(this.bitCounter);
        }
        return;
      }
      case 'FINISHING': {
        this.out.sclk = 0;
        this.out.ssn = this.deselected;
        this.passes += 1;
        this.current = 'PAUSE';
        return;
      }
      case 'PAUSE': {
        if (this.passes < WRITE_PASSES) {
          this.bitCounter = 0;
          this.wait = 0;
          this.current = 'PAUSING';
          return;
        }
        this.done = true;
        this.current = 'IDLE';
        return;
      }
      case 'PAUSING': {
        if (this.wait < this.settleCycles) {
          this.wait += 1;
          return;
        }
        this.current = 'INIT';
        return;
      }
    }
  }

  reset(): void {
    this.command = { ...IDLE_WRITER_COMMAND };
    this.current = 'IDLE';
    this.deviceId = 0;
    this.bitCounter = 0;
    this.wait = 0;
    this.passes = 0;
    this.done = false;
    this.out.sclk = 0;
    this.out.mosi = 0;
    this.out.ssn = this.deselected;
  }

  private bitAt(counter: number): 0 | 1 {
    const base = this.store.partitionBase(this.deviceId) * WORD_BITS;
    return this.store.readBit(base + this.roundedBits - 1 - counter) === 1 ? 1 : 0;
  }
}
