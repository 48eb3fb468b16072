/**
 * @file Word storage used by the controller: configuration store, mirror
 * store and scan result store.
 */

import { CHANNELS_PER_DEVICE, SCAN_STEPS, WORD_BITS } from './constants';

/** Writers of the configuration store, highest priority first. */
export const WRITE_PORT_PRIORITY = ['data-mover', 'pattern-modifier'] as const;
export type WritePortSource = (typeof WRITE_PORT_PRIORITY)[number];

interface PendingWrite {
  address: number;
  value: number;
}

/**
 * Per-device configuration partitions. The word port takes at most one
 * write per cycle; requests are collected during the cycle and
 * {@link ConfigStore.commit} applies the highest-priority one. The bit port
 * reads bit `b` from word `b >> 5`, position `b & 31`.
 */
export class ConfigStore {
  readonly devices: number;
  readonly partitionWords: number;
  private readonly words: Uint32Array;
  private readonly pending = new Map<WritePortSource, PendingWrite>();

  constructor(devices: number, partitionWords: number) {
    this.devices = devices;
    this.partitionWords = partitionWords;
    this.words = new Uint32Array(devices * partitionWords);
  }

  get sizeWords(): number {
    return this.words.length;
  }

  /** First word of a device's partition. */
  partitionBase(deviceId: number): number {
    return deviceId * this.partitionWords;
  }

  readWord(address: number): number {
    return this.words[address] ?? 0;
  }

  readBit(bitAddress: number): number {
    const word = this.words[Math.floor(bitAddress / WORD_BITS)] ?? 0;
    return (word >>> bitAddress % WORD_BITS) & 1;
  }

  /**
   * Queues a word write for the current cycle.
   */
  requestWrite(source: WritePortSource, address: number, value: number): void {
    this.pending.set(source, { address, value: value >>> 0 });
  }

  /**
   * Applies the highest-priority queued write and discards the rest.
   * Returns the source that was granted, if any.
   */
  commit(): WritePortSource | undefined {
    let granted: WritePortSource | undefined;
    for (const source of WRITE_PORT_PRIORITY) {
      const write = this.pending.get(source);
      if (write !== undefined) {
        if (write.address >= 0 && write.address < this.words.length) {
          this.words[write.address] = write.value;
        }
        granted = source;
        break;
      }
    }
    this.pending.clear();
    return granted;
  }

  /**
   * Copies `words` into a device partition directly, outside the cycle model.
   */
  loadPartition(deviceId: number, words: ArrayLike<number>): void {
    const base = this.partitionBase(deviceId);
    const count = Math.min(words.length, this.partitionWords);
    for (let i = 0; i < count; i += 1) {
      this.words[base + i] = (words[i] ?? 0) >>> 0;
    }
  }

  /** Copy of one device partition. */
  partition(deviceId: number): Uint32Array {
    const base = this.partitionBase(deviceId);
    return this.words.slice(base, base + this.partitionWords);
  }

  reset(): void {
    this.words.fill(0);
    this.pending.clear();
  }
}

/**
 * Write-only shadow of the configuration store, filled by bulk loads. No
 * component of the controller reads it; `peek` serves external consumers.
 */
export class MirrorStore {
  private readonly words: Uint32Array;

  constructor(sizeWords: number) {
    this.words = new Uint32Array(sizeWords);
  }

  write(address: number, value: number): void {
    if (address >= 0 && address < this.words.length) {
      this.words[address] = value >>> 0;
    }
  }

  peek(address: number): number {
    return this.words[address] ?? 0;
  }

  reset(): void {
    this.words.fill(0);
  }
}

/**
 * Counter snapshots indexed by (threshold, device, channel). Entries are
 * never invalidated; a new scan overwrites them in place.
 */
export class ResultStore {
  readonly devices: number;
  private readonly words: Uint32Array;

  constructor(devices: number) {
    this.devices = devices;
    this.words = new Uint32Array(SCAN_STEPS * devices * CHANNELS_PER_DEVICE);
  }

  get size(): number {
    return this.words.length;
  }

  /** Flat index of one entry, as seen through the host result region. */
  indexOf(threshold: number, deviceId: number, channel: number): number {
    return (threshold * this.devices + deviceId) * CHANNELS_PER_DEVICE + channel;
  }

  write(threshold: number, deviceId: number, channel: number, value: number): void {
    const index = this.indexOf(threshold, deviceId, channel);
    if (index >= 0 && index < this.words.length) {
      this.words[index] = value >>> 0;
    }
  }

  /** Host read; addresses outside the region read 0. */
  read(address: number): number {
    return this.words[address] ?? 0;
  }

  reset(): void {
    this.words.fill(0);
  }
}
