/**
 * @file In-process burst read memory, used for the staging buffer and as the
 * storage behind the counter bank.
 */

import {
  BUS_RESPONSE,
  BurstReadRequest,
  BurstReadResponse,
  BurstReadSlave,
  BusResponse,
} from './burst-bus';

export type BurstMemoryStall =
  /** Normal operation */
  | 'none'
  /** Hold waitrequest forever */
  | 'request'
  /** Accept requests but never return data */
  | 'data';

export interface BurstMemoryOptions {
  sizeWords: number;
  /** Word address of the first word */
  baseAddress?: number;
  /** Cycles waitrequest is held before a request is accepted */
  waitCycles?: number;
  /** Cycles from acceptance to the first data beat (at least 1) */
  latencyCycles?: number;
}

interface ActiveBurst {
  address: number;
  count: number;
  index: number;
  delay: number;
}

export interface AcceptedBurst {
  address: number;
  count: number;
}

/**
 * Word memory that serves one burst at a time. Addresses outside the
 * memory return a decode error with zero data.
 */
export class BurstMemory implements BurstReadSlave {
  readonly baseAddress: number;
  private readonly words: Uint32Array;
  private readonly waitCycles: number;
  private readonly latencyCycles: number;
  private stallMode: BurstMemoryStall = 'none';
  private waitCount = 0;
  private burst: ActiveBurst | undefined;
  private flushes = 0;
  private readonly accepted: AcceptedBurst[] = [];

  constructor(options: BurstMemoryOptions) {
    this.words = new Uint32Array(options.sizeWords);
    this.baseAddress = options.baseAddress ?? 0;
    this.waitCycles = Math.max(0, options.waitCycles ?? 0);
    this.latencyCycles = Math.max(1, options.latencyCycles ?? 1);
  }

  get sizeWords(): number {
    return this.words.length;
  }

  /** Bursts accepted since the last reset, oldest first. */
  get acceptedBursts(): readonly AcceptedBurst[] {
    return this.accepted;
  }

  get flushCount(): number {
    return this.flushes;
  }

  setStall(mode: BurstMemoryStall): void {
    this.stallMode = mode;
  }

  /**
   * Stores words starting at a bus address.
   */
  load(address: number, data: ArrayLike<number>): void {
    for (let i = 0; i < data.length; i += 1) {
      this.write(address + i, data[i] ?? 0);
    }
  }

  write(address: number, value: number): void {
    const index = address - this.baseAddress;
    if (index >= 0 && index < this.words.length) {
      this.words[index] = value >>> 0;
    }
  }

  read(address: number): number {
    return this.words[address - this.baseAddress] ?? 0;
  }

  tick(request: Readonly<BurstReadRequest>): BurstReadResponse {
    if (request.flush) {
      this.burst = undefined;
      this.waitCount = 0;
      this.flushes += 1;
    }

    let readDataValid = false;
    let readData = 0;
    let response: BusResponse = BUS_RESPONSE.OKAY;
    const burst = this.burst;
    if (burst !== undefined && this.stallMode !== 'data') {
      if (burst.delay > 0) {
        burst.delay -= 1;
      } else {
        const address = burst.address + burst.index;
        readDataValid = true;
        if (this.contains(address)) {
          readData = this.read(address);
        } else {
          response = BUS_RESPONSE.DECODE_ERROR;
        }
        burst.index += 1;
        if (burst.index >= burst.count) {
          this.burst = undefined;
        }
      }
    }

    let waitRequest = false;
    if (request.read) {
      if (this.stallMode === 'request' || this.burst !== undefined) {
        waitRequest = true;
      } else if (this.waitCount < this.waitCycles) {
        this.waitCount += 1;
        waitRequest = true;
      } else {
        this.waitCount = 0;
        const count = Math.max(1, request.burstCount);
        this.burst = {
          address: request.address,
          count,
          index: 0,
          delay: this.latencyCycles - 1,
        };
        this.accepted.push({ address: request.address, count });
      }
    }

    return { waitRequest, readDataValid, readData, response };
  }

  reset(): void {
    this.burst = undefined;
    this.waitCount = 0;
    this.flushes = 0;
    this.accepted.length = 0;
  }

  private contains(address: number): boolean {
    const index = address - this.baseAddress;
    return index >= 0 && index < this.words.length;
  }
}
