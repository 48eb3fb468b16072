/**
 * @file Configuration controller (MCC): loads a device partition from the
 * staging buffer, then has the config writer send it.
 */

import { HandshakeFaultError } from '../errors';
import { CMD_CONFIGURE } from './constants';
import { MoveArgs } from './data-mover';
import { Handshake, createHandshake, invoke, resetHandshake } from './handshake';
import { Routine, RoutineRequest } from './routine';
import { WriteArgs } from './writer-link';

export type ConfigurationControllerState = 'IDLE' | 'MOVE_DATA' | 'WRITE_CFG' | 'EXCEPTION';

export interface ConfigurationControllerOptions {
  mover: Handshake<MoveArgs>;
  /** Current staging-buffer offset register */
  offset: () => number;
  log?: (message: string) => void;
}

export class ConfigurationController implements Routine {
  /** Request line into the config writer arbiter */
  readonly writerPort: Handshake<WriteArgs> = createHandshake<WriteArgs>({ deviceId: 0 });
  private readonly mover: Handshake<MoveArgs>;
  private readonly offset: () => number;
  private readonly log: ((message: string) => void) | undefined;
  private current: ConfigurationControllerState = 'IDLE';
  private moveArgs: MoveArgs = { deviceId: 0, payloadLength: 0, offset: 0 };
  private completed = false;
  private trap: HandshakeFaultError | undefined;

  constructor(options: ConfigurationControllerOptions) {
    this.mover = options.mover;
    this.offset = options.offset;
    this.log = options.log;
  }

  get state(): ConfigurationControllerState {
    return this.current;
  }

  get done(): boolean {
    return this.completed;
  }

  get busy(): boolean {
    return this.current !== 'IDLE';
  }

  /** Fault that trapped the controller, until reset. */
  get fault(): HandshakeFaultError | undefined {
    return this.trap;
  }

  tick(request: Readonly<RoutineRequest>): void {
    switch (this.current) {
      case 'IDLE': {
        if (!request.start || request.command !== CMD_CONFIGURE || this.completed) {
          return;
        }
        this.moveArgs = {
          deviceId: request.deviceId,
          payloadLength: request.payloadLength,
          offset: this.offset(),
        };
        this.current = 'MOVE_DATA';
        return;
      }
      case 'MOVE_DATA': {
        if (!this.mover.start && this.mover.done) {
          this.trap = new HandshakeFaultError('MCC', 'data mover reported done without a request');
          this.log?.(`MCC: ${this.trap.message}`);
          this.current = 'EXCEPTION';
          return;
        }
        if (invoke(this.mover, this.moveArgs)) {
          this.current = 'WRITE_CFG';
        }
        return;
      }
      case 'WRITE_CFG': {
        if (this.completed) {
          if (!request.start) {
            this.completed = false;
            this.current = 'IDLE';
          }
          return;
        }
        if (invoke(this.writerPort, { deviceId: this.moveArgs.deviceId })) {
          this.completed = true;
        }
        return;
      }
      case 'EXCEPTION':
        return;
    }
  }

  reset(): void {
    this.current = 'IDLE';
    this.completed = false;
    this.trap = undefined;
    resetHandshake(this.writerPort);
  }
}
