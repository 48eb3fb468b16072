/**
 * @file Scan automation (TSA): steps a threshold field through all 64
 * values, reconfiguring the targeted devices and sampling hit rates at each
 * step.
 */

import {
  CMD_ETH_SCAN_ALL,
  CMD_ETH_SCAN_ONE,
  CMD_TTH_SCAN_ALL,
  CMD_TTH_SCAN_ONE,
  THRESHOLD_MAX,
} from './constants';
import { ThresholdField } from './field-layout';
import { Handshake, createHandshake, invoke, resetHandshake } from './handshake';
import { ModifyArgs } from './pattern-modifier';
import { MonitorArgs } from './rate-monitor';
import { DeviceStep, Routine, RoutineRequest } from './routine';
import { WriteArgs } from './writer-link';

export type ScanAutomationState = 'IDLE' | 'MOD_TTH' | 'CFG' | 'MONITOR_RATE' | 'EVALUATION';

export interface ScanCommand {
  field: ThresholdField;
  allDevices: boolean;
}

const SCAN_COMMANDS: ReadonlyMap<number, ScanCommand> = new Map([
  [CMD_TTH_SCAN_ONE, { field: 'tth', allDevices: false }],
  [CMD_TTH_SCAN_ALL, { field: 'tth', allDevices: true }],
  [CMD_ETH_SCAN_ONE, { field: 'eth', allDevices: false }],
  [CMD_ETH_SCAN_ALL, { field: 'eth', allDevices: true }],
]);

/**
 * Decodes a scan command code, or returns undefined for any other code.
 */
export function decodeScanCommand(command: number): ScanCommand | undefined {
  return SCAN_COMMANDS.get(command);
}

export interface ScanAutomationOptions {
  modifier: Handshake<ModifyArgs>;
  monitor: Handshake<MonitorArgs>;
  deviceCount: number;
  log?: (message: string) => void;
}

/**
 * The device being worked on is the interpreter's request device id. A
 * scan-all run walks it through every device with one-cycle
 * {@link ScanAutomation.deviceStep} requests, configuring them all at the
 * same threshold before a single monitor run covers them together.
 *
 * Every targeted device must already hold a full configuration; the scan
 * only patches the threshold field.
 */
export class ScanAutomation implements Routine {
  /** Request line into the config writer arbiter */
  readonly writerPort: Handshake<WriteArgs> = createHandshake<WriteArgs>({ deviceId: 0 });
  private readonly options: ScanAutomationOptions;
  private current: ScanAutomationState = 'IDLE';
  private scan: ScanCommand = { field: 'tth', allDevices: false };
  private threshold = 0;
  private progressValue = 0;
  private step: DeviceStep | undefined;
  private completed = false;

  constructor(options: ScanAutomationOptions) {
    this.options = options;
  }

  get state(): ScanAutomationState {
    return this.current;
  }

  get done(): boolean {
    return this.completed;
  }

  get busy(): boolean {
    return this.current !== 'IDLE';
  }

  /** Threshold value being applied. */
  get currentThreshold(): number {
    return this.threshold;
  }

  /** Last completed step, as shown to the host. */
  get progress(): number {
    return this.progressValue;
  }

  /** Device index request raised during the last tick, if any. */
  get deviceStep(): DeviceStep | undefined {
    return this.step;
  }

  get field(): ThresholdField {
    return this.scan.field;
  }

  tick(request: Readonly<RoutineRequest>): void {
    this.step = undefined;
    switch (this.current) {
      case 'IDLE': {
        if (!request.start || this.completed) {
          return;
        }
        const scan = decodeScanCommand(request.command);
        if (scan === undefined) {
          return;
        }
        this.scan = scan;
        this.threshold = 0;
        this.progressValue = 0;
        this.current = 'MOD_TTH';
        this.options.log?.(
          `TSA: ${scan.field} scan of ${scan.allDevices ? 'all devices' : `device ${request.deviceId}`}`
        );
        return;
      }
      case 'MOD_TTH': {
        const args: ModifyArgs = {
          deviceId: request.deviceId,
          field: this.scan.field,
          value: this.threshold,
        };
        if (invoke(this.options.modifier, args)) {
          this.current = 'CFG';
        }
        return;
      }
      case 'CFG': {
        if (!invoke(this.writerPort, { deviceId: request.deviceId })) {
          return;
        }
        if (!this.scan.allDevices) {
          this.current = 'MONITOR_RATE';
        } else if (request.deviceId + 1 < this.options.deviceCount) {
          this.step = 'increment';
          this.current = 'MOD_TTH';
        } else {
          this.step = 'reset';
          this.current = 'MONITOR_RATE';
        }
        return;
      }
      case 'MONITOR_RATE': {
        if (invoke(this.options.monitor, { threshold: this.threshold })) {
          this.current = 'EVALUATION';
        }
        return;
      }
      case 'EVALUATION': {
        if (this.completed) {
          if (!request.start) {
            this.completed = false;
            this.threshold = 0;
            this.current = 'IDLE';
          }
          return;
        }
        this.progressValue = this.threshold;
        if (this.threshold < THRESHOLD_MAX) {
          this.threshold += 1;
          this.current = 'MOD_TTH';
          return;
        }
        this.completed = true;
        return;
      }
    }
  }

  reset(): void {
    this.current = 'IDLE';
    this.threshold = 0;
    this.progressValue = 0;
    this.step = undefined;
    this.completed = false;
    resetHandshake(this.writerPort);
  }
}
