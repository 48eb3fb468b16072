/**
 * @file Dual-clock testbench: the controller, the serial domain and
 * in-process models of everything they talk to.
 */

import { BurstMemory } from '../bus/burst-memory';
import { CounterBank, HitSource } from '../bus/counter-bank';
import { normalizeControllerConfig } from '../config/config';
import { ControllerConfig, ControllerConfigNormalized } from '../config/types';
import { WriterChannels, createWriterChannels } from '../controller/cdc-channel';
import {
  CHANNELS_PER_DEVICE,
  CMD_CONFIGURE,
  CMD_ETH_SCAN_ALL,
  CMD_ETH_SCAN_ONE,
  CMD_TTH_SCAN_ALL,
  CMD_TTH_SCAN_ONE,
  SCAN_STEPS,
  THRESHOLD_MAX,
} from '../controller/constants';
import { WRITE_PASSES } from '../controller/config-writer';
import { MutrigController } from '../controller/controller';
import { CSR_COMMAND_STATUS, CSR_OFFSET, CommandWord, encodeCommandWord } from '../controller/csr';
import { ThresholdField } from '../controller/field-layout';
import { SerialDomain } from '../controller/serial-domain';
import { SimulationTimeoutError } from '../errors';
import { SimClock } from './sim-clock';
import { MutrigSpiDevice, decodeThresholds } from './spi-device';

const PS_PER_SECOND = 1e12;
const DEFAULT_STAGING_WORDS = 0x10000;

export interface TestbenchOptions {
  config?: ControllerConfig;
  /** Staging buffer size in words */
  stagingWords?: number;
  /**
   * Hits reported by each channel per window. `'threshold'` derives them
   * from the threshold each device last received over SPI. Defaults to
   * {@link defaultHits}.
   */
  hits?: HitSource | 'threshold';
  log?: (message: string) => void;
}

/**
 * Deterministic placeholder hit counts.
 */
export const defaultHits: HitSource = (deviceId, channel) => deviceId * 1000 + channel;

/**
 * Hit count of a channel whose threshold is set to `threshold` under the
 * `'threshold'` hit model: fewer hits as the threshold rises.
 */
export function hitsAtThreshold(threshold: number, channel: number): number {
  return (THRESHOLD_MAX - threshold) * 100 + channel;
}

export type ScanTarget = number | 'all';

export function scanCommandCode(field: ThresholdField, target: ScanTarget): number {
  if (field === 'tth') {
    return target === 'all' ? CMD_TTH_SCAN_ALL : CMD_TTH_SCAN_ONE;
  }
  return target === 'all' ? CMD_ETH_SCAN_ALL : CMD_ETH_SCAN_ONE;
}

/**
 * The control and serial domains tick on their own periods against one
 * {@link SimClock}. The counter-clear output is wired to the counter bank
 * and the SPI lines to one device model per chip select.
 */
export class MutrigTestbench {
  readonly config: ControllerConfigNormalized;
  readonly clock = new SimClock();
  readonly channels: WriterChannels;
  readonly staging: BurstMemory;
  readonly counters: CounterBank;
  readonly controller: MutrigController;
  readonly serial: SerialDomain;
  readonly devices: readonly MutrigSpiDevice[];
  readonly controlPeriodPs: number;
  readonly serialPeriodPs: number;
  private readonly decoded = new Map<number, { frames: number; values: number[] }>();

  constructor(options: TestbenchOptions = {}) {
    this.config = normalizeControllerConfig(options.config);
    this.channels = createWriterChannels(options.log);
    this.staging = new BurstMemory({ sizeWords: options.stagingWords ?? DEFAULT_STAGING_WORDS });
    this.counters = new CounterBank({
      devices: this.config.deviceCount,
      baseAddress: this.config.counterBaseAddress,
      source:
        options.hits === 'threshold'
          ? (deviceId, channel) => this.thresholdHits(deviceId, channel)
          : (options.hits ?? defaultHits),
    });
    this.controller = new MutrigController({
      config: this.config,
      staging: this.staging,
      counters: this.counters,
      channels: this.channels,
      log: options.log,
    });
    this.serial = new SerialDomain({
      config: this.config,
      store: this.controller.store,
      channels: this.channels,
    });
    this.devices = Array.from({ length: this.config.deviceCount }, (_, i) => new MutrigSpiDevice(i));
    this.controlPeriodPs = Math.round(PS_PER_SECOND / this.config.controllerClockHz);
    this.serialPeriodPs = Math.round(PS_PER_SECOND / this.config.spiClockHz);
    this.clock.scheduleEvery(this.controlPeriodPs, () => this.controlTick());
    this.clock.scheduleEvery(this.serialPeriodPs, () => this.serialTick());
  }

  /** True once no routine is running or holding completion. */
  get idle(): boolean {
    const { controller } = this;
    return (
      !controller.busy &&
      !controller.interpreter.done &&
      !controller.mcc.busy &&
      !controller.tsa.busy &&
      this.serial.writer.state === 'IDLE' &&
      !this.serial.writer.status.done
    );
  }

  /**
   * Places a bitstream in the staging buffer.
   */
  loadStaging(offset: number, words: ArrayLike<number>): void {
    this.staging.load(offset, words);
  }

  /**
   * Writes a command and runs until the routine it started has finished.
   * Returns false when the command was discarded.
   */
  execute(command: CommandWord, limitPs: number): boolean {
    this.controller.writeCsr(CSR_COMMAND_STATUS, encodeCommandWord(command));
    this.clock.advance(this.controlPeriodPs);
    if (!this.controller.busy) {
      return false;
    }
    this.runUntilIdle(limitPs);
    return true;
  }

  /**
   * Runs until {@link MutrigTestbench.idle}, giving up after `limitPs` of
   * simulated time.
   */
  runUntilIdle(limitPs: number): void {
    const deadline = this.clock.now() + limitPs;
    if (!this.clock.runUntil(() => this.idle, deadline)) {
      throw new SimulationTimeoutError(
        `Controller did not return to idle within ${limitPs} ps`,
        this.clock.now()
      );
    }
  }

  /**
   * Loads `words` at `offset` and runs a configure command for one device.
   */
  configure(deviceId: number, words: ArrayLike<number>, offset = 0): boolean {
    this.loadStaging(offset, words);
    this.controller.writeCsr(CSR_OFFSET, offset);
    return this.execute(
      { command: CMD_CONFIGURE, deviceId, payloadLength: words.length },
      this.configureBudgetPs()
    );
  }

  /**
   * Runs a 64-step scan of one device or of all devices.
   */
  scan(field: ThresholdField, target: ScanTarget): boolean {
    return this.execute(
      {
        command: scanCommandCode(field, target),
        deviceId: target === 'all' ? 0 : target,
        payloadLength: 0,
      },
      this.scanBudgetPs(target)
    );
  }

  /**
   * The 32 results of one device at one threshold, read through the host
   * result region.
   */
  results(threshold: number, deviceId: number): number[] {
    const base = this.controller.results.indexOf(threshold, deviceId, 0);
    return Array.from({ length: CHANNELS_PER_DEVICE }, (_, ch) => this.controller.readResult(base + ch));
  }

  /**
   * Resets both domains; storage contents are kept.
   */
  reset(): void {
    this.controller.reset();
    this.serial.reset();
    this.counters.reset();
    this.staging.reset();
    for (const device of this.devices) {
      device.clear();
    }
    this.decoded.clear();
  }

  /** Generous simulated-time allowance for one configure command. */
  configureBudgetPs(): number {
    const moveCycles = this.config.partitionWords + 16;
    return 2 * (moveCycles * this.controlPeriodPs + this.writerPs()) + 100 * this.controlPeriodPs;
  }

  /** Generous simulated-time allowance for one scan command. */
  scanBudgetPs(target: ScanTarget): number {
    const { config } = this;
    const targets = target === 'all' ? config.deviceCount : 1;
    const modifierCycles = CHANNELS_PER_DEVICE * 7 + 4;
    const monitorCycles =
      config.debounceCycles +
      config.monitorWindowCycles +
      config.marginCycles +
      config.deviceCount * (CHANNELS_PER_DEVICE + config.timeoutCycles) +
      16;
    const stepPs =
      targets * (modifierCycles * this.controlPeriodPs + this.writerPs()) +
      monitorCycles * this.controlPeriodPs;
    return 2 * SCAN_STEPS * stepPs + 100 * this.controlPeriodPs;
  }

  private writerPs(): number {
    const passCycles = 2 * (this.config.settleCycles + 1) + 2 * this.config.roundedBits + 8;
    return (WRITE_PASSES * passCycles + 16) * this.serialPeriodPs;
  }

  private thresholdHits(deviceId: number, channel: number): number {
    const device = this.devices[deviceId];
    const frame = device?.lastFrame;
    if (device === undefined || frame === undefined) {
      return 0;
    }
    let cached = this.decoded.get(deviceId);
    if (cached === undefined || cached.frames !== device.frames.length) {
      const table = this.controller.tables[this.controller.tsa.field];
      cached = { frames: device.frames.length, values: decodeThresholds(frame, table) };
      this.decoded.set(deviceId, cached);
    }
    return hitsAtThreshold(cached.values[channel] ?? 0, channel);
  }

  private controlTick(): void {
    this.controller.tick();
    if (this.controller.counterClear) {
      this.counters.clear();
    }
  }

  private serialTick(): void {
    this.serial.tick();
    for (const device of this.devices) {
      device.sample(this.serial.lines);
    }
  }
}
