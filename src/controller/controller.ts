/**
 * @file Control clock domain of the MuTRiG controller: host registers,
 * routines, sub-routines and the storage they share.
 */

import { BurstReadSlave } from '../bus/burst-bus';
import { ControllerConfigNormalized } from '../config/types';
import { HandshakeFaultError } from '../errors';
import { WriterChannels } from './cdc-channel';
import { ConfigurationController } from './configuration-controller';
import { STATUS_OK } from './constants';
import {
  CSR_COMMAND_STATUS,
  CSR_MONITOR_INTERVAL,
  CSR_OFFSET,
  decodeCommandWord,
  encodeStatusWord,
} from './csr';
import { DataMover } from './data-mover';
import { FieldTable, ThresholdField, deriveFieldTables } from './field-layout';
import { RequestArbiter } from './handshake';
import { InstructionInterpreter } from './instruction-interpreter';
import { ConfigStore, MirrorStore, ResultStore } from './memory';
import { PatternModifier } from './pattern-modifier';
import { RateMonitor } from './rate-monitor';
import { ScanAutomation } from './scan-automation';
import { WriteArgs, WriterLink } from './writer-link';

export interface MutrigControllerOptions {
  config: ControllerConfigNormalized;
  /** Staging buffer read by the data mover */
  staging: BurstReadSlave;
  /** Counter source read by the rate monitor */
  counters: BurstReadSlave;
  /** Channels to the serial domain */
  channels: WriterChannels;
  log?: (message: string) => void;
}

/**
 * One {@link MutrigController.tick} is one control clock cycle. Within a
 * cycle the parts are evaluated in a fixed order: writer status in,
 * interpreter, routines, writer arbiter, sub-routines, store write commit,
 * writer command out.
 */
export class MutrigController {
  readonly config: ControllerConfigNormalized;
  readonly tables: Readonly<Record<ThresholdField, FieldTable>>;
  readonly store: ConfigStore;
  readonly mirror: MirrorStore;
  readonly results: ResultStore;
  readonly mover: DataMover;
  readonly modifier: PatternModifier;
  readonly monitor: RateMonitor;
  readonly mcc: ConfigurationController;
  readonly tsa: ScanAutomation;
  readonly interpreter: InstructionInterpreter;
  readonly writer: WriterLink;
  private readonly arbiter: RequestArbiter<WriteArgs>;
  private offsetRegister = 0;
  private monitorInterval = 0;
  private cycleCount = 0;

  constructor(options: MutrigControllerOptions) {
    const { config, log } = options;
    this.config = config;
    this.tables = deriveFieldTables(config.layout);
    this.store = new ConfigStore(config.deviceCount, config.partitionWords);
    this.mirror = new MirrorStore(this.store.sizeWords);
    this.results = new ResultStore(config.deviceCount);

    this.mover = new DataMover({
      store: this.store,
      mirror: this.mirror,
      bus: options.staging,
      log,
    });
    this.modifier = new PatternModifier({ store: this.store, tables: this.tables });
    this.monitor = new RateMonitor({
      results: this.results,
      bus: options.counters,
      deviceCount: config.deviceCount,
      counterBaseAddress: config.counterBaseAddress,
      debounceCycles: config.debounceCycles,
      windowCycles: config.monitorWindowCycles,
      marginCycles: config.marginCycles,
      timeoutCycles: config.timeoutCycles,
      log,
    });
    this.mcc = new ConfigurationController({
      mover: this.mover.port,
      offset: () => this.offsetRegister,
      log,
    });
    this.tsa = new ScanAutomation({
      modifier: this.modifier.port,
      monitor: this.monitor.port,
      deviceCount: config.deviceCount,
      log,
    });
    this.interpreter = new InstructionInterpreter({
      mcc: this.mcc,
      tsa: this.tsa,
      deviceCount: config.deviceCount,
      subroutines: config.subroutines,
      log,
    });
    this.writer = new WriterLink(options.channels, log);
    this.arbiter = new RequestArbiter(
      [
        { name: 'MCC', port: this.mcc.writerPort },
        { name: 'TSA', port: this.tsa.writerPort },
      ],
      this.writer.port
    );
  }

  /** Control cycles since reset. */
  get cycles(): number {
    return this.cycleCount;
  }

  /** Counter-clear output, high for one cycle per monitor run. */
  get counterClear(): boolean {
    return this.monitor.counterClear;
  }

  /** True while a routine is running. */
  get busy(): boolean {
    return this.interpreter.busy;
  }

  /** Set once the MCC has trapped; cleared only by reset. */
  get fault(): HandshakeFaultError | undefined {
    return this.mcc.fault;
  }

  /** Routine currently holding the config writer, if any. */
  get writerOwner(): string | undefined {
    return this.arbiter.grantee;
  }

  writeCsr(address: number, value: number): void {
    switch (address) {
      case CSR_COMMAND_STATUS:
        this.interpreter.submit(decodeCommandWord(value >>> 0));
        return;
      case CSR_OFFSET:
        this.offsetRegister = value & 0xffff;
        return;
      case CSR_MONITOR_INTERVAL:
        this.monitorInterval = value & 0xffff;
        return;
      default:
        return;
    }
  }

  readCsr(address: number): number {
    switch (address) {
      case CSR_COMMAND_STATUS:
        return this.statusWord();
      case CSR_OFFSET:
        return this.offsetRegister;
      case CSR_MONITOR_INTERVAL:
        return this.monitorInterval;
      default:
        return 0;
    }
  }

  /** Host read of the result region. */
  readResult(address: number): number {
    return this.results.read(address);
  }

  tick(): void {
    this.writer.receive();
    this.interpreter.tick();
    const request = this.interpreter.request;
    this.mcc.tick(request);
    this.tsa.tick(request);
    this.arbiter.tick();
    this.mover.tick();
    this.modifier.tick();
    this.monitor.tick();
    this.store.commit();
    this.writer.transmit();
    this.cycleCount += 1;
  }

  /**
   * Control-domain reset. Storage contents survive; every state machine,
   * flag and register returns to its initial value.
   */
  reset(): void {
    this.interpreter.reset();
    this.mcc.reset();
    this.tsa.reset();
    this.arbiter.reset();
    this.mover.reset();
    this.modifier.reset();
    this.monitor.reset();
    this.writer.reset();
    this.offsetRegister = 0;
    this.monitorInterval = 0;
    this.cycleCount = 0;
  }

  private statusWord(): number {
    const request = this.interpreter.request;
    return encodeStatusWord(
      request.start,
      request.command,
      request.deviceId,
      this.tsa.busy ? this.tsa.progress : 0,
      STATUS_OK
    );
  }
}
