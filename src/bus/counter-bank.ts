/**
 * @file Per-channel hit counters read by the rate monitor.
 */

import { CHANNELS_PER_DEVICE } from '../controller/constants';
import { BurstReadRequest, BurstReadResponse, BurstReadSlave } from './burst-bus';
import { BurstMemory, BurstMemoryStall } from './burst-memory';

/**
 * Hits one channel accumulates over a monitor window.
 */
export type HitSource = (deviceId: number, channel: number) => number;

export interface CounterBankOptions {
  devices: number;
  baseAddress?: number;
  source: HitSource;
  waitCycles?: number;
  latencyCycles?: number;
}

/**
 * Counter block laid out as 32 consecutive words per device. A clear pulse
 * restarts the counters; the model then fills each counter with the hits
 * its channel collects in one window, as read from the {@link HitSource}.
 */
export class CounterBank implements BurstReadSlave {
  readonly devices: number;
  private readonly memory: BurstMemory;
  private readonly source: HitSource;
  private clears = 0;

  constructor(options: CounterBankOptions) {
    this.devices = options.devices;
    this.source = options.source;
    this.memory = new BurstMemory({
      sizeWords: options.devices * CHANNELS_PER_DEVICE,
      baseAddress: options.baseAddress ?? 0,
      waitCycles: options.waitCycles ?? 0,
      latencyCycles: options.latencyCycles ?? 1,
    });
  }

  get clearCount(): number {
    return this.clears;
  }

  get bus(): BurstMemory {
    return this.memory;
  }

  /**
   * Handles the counter-clear pulse.
   */
  clear(): void {
    this.clears += 1;
    for (let device = 0; device < this.devices; device += 1) {
      for (let channel = 0; channel < CHANNELS_PER_DEVICE; channel += 1) {
        this.memory.write(this.addressOf(device, channel), this.source(device, channel));
      }
    }
  }

  addressOf(deviceId: number, channel: number): number {
    return this.memory.baseAddress + deviceId * CHANNELS_PER_DEVICE + channel;
  }

  read(deviceId: number, channel: number): number {
    return this.memory.read(this.addressOf(deviceId, channel));
  }

  setStall(mode: BurstMemoryStall): void {
    this.memory.setStall(mode);
  }

  tick(request: Readonly<BurstReadRequest>): BurstReadResponse {
    return this.memory.tick(request);
  }

  reset(): void {
    this.clears = 0;
    this.memory.reset();
  }
}
