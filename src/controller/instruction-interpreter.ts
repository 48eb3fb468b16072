/**
 * @file Instruction interpreter: admits host commands one at a time and
 * owns the routine request seen by the MCC and TSA.
 */

import { SubroutineSelection } from '../config/types';
import { CMD_CONFIGURE } from './constants';
import { CommandWord } from './csr';
import { DeviceStep, IDLE_ROUTINE_REQUEST, Routine, RoutineRequest } from './routine';
import { decodeScanCommand } from './scan-automation';

export interface InstructionInterpreterOptions {
  mcc: Routine;
  tsa: Routine & { readonly deviceStep: DeviceStep | undefined };
  deviceCount: number;
  subroutines: SubroutineSelection;
  log?: (message: string) => void;
}

/**
 * A command written by the host is considered on the next tick. It starts a
 * routine only when nothing is running and no routine still holds `done`;
 * otherwise it is dropped. Unrecognized codes, codes for a disabled routine
 * and device ids outside the array are discarded without changing state.
 */
export class InstructionInterpreter {
  private readonly options: InstructionInterpreterOptions;
  private readonly rpc: RoutineRequest = { ...IDLE_ROUTINE_REQUEST };
  private pending: CommandWord | undefined;
  private droppedCount = 0;

  constructor(options: InstructionInterpreterOptions) {
    this.options = options;
  }

  /** Snapshot of the request for the routines to sample this cycle. */
  get request(): Readonly<RoutineRequest> {
    return { ...this.rpc };
  }

  /** True while a routine holds the request. */
  get busy(): boolean {
    return this.rpc.start;
  }

  /** Combined completion flag of both routines. */
  get done(): boolean {
    return this.options.mcc.done || this.options.tsa.done;
  }

  /** Commands dropped or discarded since reset. */
  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Records a host write to the command register.
   */
  submit(command: CommandWord): void {
    this.pending = { ...command };
  }

  tick(): void {
    this.applyDeviceStep(this.options.tsa.deviceStep);
    if (this.rpc.start && this.done) {
      this.rpc.start = false;
    }
    const command = this.pending;
    if (command === undefined) {
      return;
    }
    this.pending = undefined;
    if (this.rpc.start || this.done || this.options.mcc.busy || this.options.tsa.busy) {
      this.discard(command, 'a routine is active');
      return;
    }
    const reason = this.rejection(command);
    if (reason !== undefined) {
      this.discard(command, reason);
      return;
    }
    const scan = decodeScanCommand(command.command);
    this.rpc.command = command.command;
    this.rpc.deviceId = scan?.allDevices === true ? 0 : command.deviceId;
    this.rpc.payloadLength = command.payloadLength;
    this.rpc.start = true;
  }

  reset(): void {
    Object.assign(this.rpc, IDLE_ROUTINE_REQUEST);
    this.pending = undefined;
    this.droppedCount = 0;
  }

  private applyDeviceStep(step: DeviceStep | undefined): void {
    if (step === 'increment') {
      this.rpc.deviceId += 1;
    } else if (step === 'reset') {
      this.rpc.deviceId = 0;
    }
  }

  private rejection(command: CommandWord): string | undefined {
    const { subroutines, deviceCount } = this.options;
    const scan = decodeScanCommand(command.command);
    if (command.command === CMD_CONFIGURE) {
      if (subroutines === 'tsa-only') {
        return 'configuration is disabled';
      }
    } else if (scan !== undefined) {
      if (subroutines === 'mcc-only') {
        return 'scans are disabled';
      }
      if (scan.allDevices) {
        return undefined;
      }
    } else {
      return 'unrecognized command';
    }
    if (command.deviceId >= deviceCount) {
      return `device ${command.deviceId} is not present`;
    }
    return undefined;
  }

  private discard(command: CommandWord, reason: string): void {
    this.droppedCount += 1;
    this.options.log?.(
      `Interpreter: command 0x${command.command.toString(16).padStart(3, '0')} discarded (${reason})`
    );
  }
}
