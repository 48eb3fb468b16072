/**
 * @file Rate monitor: clears the hit counters, waits one accumulation
 * window, then reads every device's counters into the result store.
 */

import { BurstReadRequest, BurstReadSlave, FLUSH_REQUEST, IDLE_REQUEST } from '../bus/burst-bus';
import { CHANNELS_PER_DEVICE } from './constants';
import { Handshake, createHandshake, resetHandshake } from './handshake';
import { ResultStore } from './memory';

export interface MonitorArgs {
  /** Threshold step the results are filed under */
  threshold: number;
}

export type RateMonitorState =
  | 'IDLE'
  | 'SCLR_COUNTERS'
  | 'WAIT_FOR_COUNTERS'
  | 'READ_RESULTS'
  | 'FINISHING';

export type ReadPhase = 'POSTING_CMD' | 'RECEIVING_READDATA' | 'FINISHED';

export interface RateMonitorOptions {
  results: ResultStore;
  bus: BurstReadSlave;
  deviceCount: number;
  counterBaseAddress: number;
  debounceCycles: number;
  windowCycles: number;
  marginCycles: number;
  timeoutCycles: number;
  log?: (message: string) => void;
}

/**
 * The counter bus is ticked exactly once per cycle. While reading, a run of
 * `timeoutCycles` cycles with neither an accepted request nor a valid beat
 * aborts the read: the remaining devices are skipped, `flush` is driven for
 * the following cycle and the monitor completes normally with
 * {@link RateMonitor.timedOut} set.
 */
export class RateMonitor {
  readonly port: Handshake<MonitorArgs> = createHandshake<MonitorArgs>({ threshold: 0 });
  private readonly options: RateMonitorOptions;
  private current: RateMonitorState = 'IDLE';
  private phase: ReadPhase = 'POSTING_CMD';
  private threshold = 0;
  private wait = 0;
  private device = 0;
  private channel = 0;
  private idleCycles = 0;
  private flushPending = false;
  private clearPulse = false;
  private timeoutLatched = false;
  private timeoutCount = 0;

  constructor(options: RateMonitorOptions) {
    this.options = options;
  }

  get state(): RateMonitorState {
    return this.current;
  }

  get readPhase(): ReadPhase {
    return this.phase;
  }

  /** True for the single cycle in which the counters are cleared. */
  get counterClear(): boolean {
    return this.clearPulse;
  }

  /** Set when the current run's read was aborted. */
  get timedOut(): boolean {
    return this.timeoutLatched;
  }

  /** Aborted reads since reset. */
  get timeouts(): number {
    return this.timeoutCount;
  }

  tick(): void {
    this.clearPulse = false;
    if (this.current === 'READ_RESULTS') {
      this.readTick();
      return;
    }
    this.options.bus.tick(IDLE_REQUEST);
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
        this.threshold = this.port.args.threshold;
        this.wait = 0;
        this.current = 'SCLR_COUNTERS';
        return;
      }
      case 'SCLR_COUNTERS': {
        if (this.wait < this.options.debounceCycles) {
          this.wait += 1;
          return;
        }
        this.clearPulse = true;
        this.wait = 0;
        this.current = 'WAIT_FOR_COUNTERS';
        return;
      }
      case 'WAIT_FOR_COUNTERS': {
        if (this.wait < this.options.windowCycles + this.options.marginCycles) {
          this.wait += 1;
          return;
        }
        this.device = 0;
        this.channel = 0;
        this.idleCycles = 0;
        this.phase = 'POSTING_CMD';
        this.current = 'READ_RESULTS';
        return;
      }
      case 'FINISHING': {
        if (this.port.start) {
          return;
        }
        this.port.done = false;
        this.clearRun();
        this.current = 'IDLE';
        return;
      }
    }
  }

  reset(): void {
    this.current = 'IDLE';
    this.clearRun();
    this.clearPulse = false;
    this.timeoutCount = 0;
    resetHandshake(this.port);
  }

  private readTick(): void {
    const { bus, deviceCount, counterBaseAddress } = this.options;
    switch (this.phase) {
      case 'POSTING_CMD': {
        const request: BurstReadRequest = {
          read: true,
          address: counterBaseAddress + this.device * CHANNELS_PER_DEVICE,
          burstCount: CHANNELS_PER_DEVICE,
          flush: false,
        };
        if (!bus.tick(request).waitRequest) {
          this.idleCycles = 0;
          this.channel = 0;
          this.phase = 'RECEIVING_READDATA';
          return;
        }
        this.countIdle();
        return;
      }
      case 'RECEIVING_READDATA': {
        const response = bus.tick(IDLE_REQUEST);
        if (!response.readDataValid) {
          this.countIdle();
          return;
        }
        this.idleCycles = 0;
        this.options.results.write(this.threshold, this.device, this.channel, response.readData);
        this.channel += 1;
        if (this.channel < CHANNELS_PER_DEVICE) {
          return;
        }
        this.device += 1;
        this.phase = this.device < deviceCount ? 'POSTING_CMD' : 'FINISHED';
        return;
      }
      case 'FINISHED': {
        bus.tick(this.flushPending ? FLUSH_REQUEST : IDLE_REQUEST);
        this.flushPending = false;
        this.port.done = true;
        this.current = 'FINISHING';
        return;
      }
    }
  }

  private countIdle(): void {
    this.idleCycles += 1;
    if (this.idleCycles < this.options.timeoutCycles) {
      return;
    }
    this.timeoutLatched = true;
    this.timeoutCount += 1;
    this.flushPending = true;
    this.phase = 'FINISHED';
    this.options.log?.(
      `Rate monitor: counter read timed out at device ${this.device} channel ${this.channel} (threshold ${this.threshold})`
    );
  }

  private clearRun(): void {
    this.phase = 'POSTING_CMD';
    this.wait = 0;
    this.device = 0;
    this.channel = 0;
    this.idleCycles = 0;
    this.flushPending = false;
    this.timeoutLatched = false;
  }
}
