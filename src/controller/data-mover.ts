/**
 * @file Data mover: copies a payload from the staging buffer into a device
 * partition of the configuration store.
 */

import { BUS_RESPONSE, BurstReadRequest, BurstReadSlave, IDLE_REQUEST } from '../bus/burst-bus';
import { MAX_BURST_WORDS } from './constants';
import { Handshake, createHandshake, resetHandshake } from './handshake';
import { ConfigStore, MirrorStore } from './memory';

export interface MoveArgs {
  deviceId: number;
  /** Payload length in words */
  payloadLength: number;
  /** Staging buffer word address */
  offset: number;
}

export type DataMoverState = 'IDLE' | 'POSTING' | 'RECEIVING';

export interface DataMoverOptions {
  store: ConfigStore;
  mirror: MirrorStore;
  bus: BurstReadSlave;
  log?: (message: string) => void;
}

/**
 * Issues a single burst read and writes each returned beat to the store and
 * the mirror. There is no timeout: a staging bus that never answers stalls
 * the mover.
 */
export class DataMover {
  readonly port: Handshake<MoveArgs> = createHandshake<MoveArgs>({
    deviceId: 0,
    payloadLength: 0,
    offset: 0,
  });
  private readonly store: ConfigStore;
  private readonly mirror: MirrorStore;
  private readonly bus: BurstReadSlave;
  private readonly log: ((message: string) => void) | undefined;
  private current: DataMoverState = 'IDLE';
  private args: MoveArgs = { deviceId: 0, payloadLength: 0, offset: 0 };
  private length = 0;
  private index = 0;
  private errorBeats = 0;

  constructor(options: DataMoverOptions) {
    this.store = options.store;
    this.mirror = options.mirror;
    this.bus = options.bus;
    this.log = options.log;
  }

  get state(): DataMoverState {
    return this.current;
  }

  /** Beats of the last move that carried an error response. */
  get responseErrors(): number {
    return this.errorBeats;
  }

  tick(): void {
    switch (this.current) {
      case 'IDLE': {
        this.bus.tick(IDLE_REQUEST);
        if (this.port.done) {
          if (!this.port.start) {
            this.port.done = false;
          }
          return;
        }
        if (!this.port.start) {
          return;
        }
        this.args = { ...this.port.args };
        this.length = Math.min(this.args.payloadLength, this.store.partitionWords, MAX_BURST_WORDS);
        this.index = 0;
        this.errorBeats = 0;
        if (this.args.payloadLength > this.length) {
          this.log?.(
            `Data mover: payload of ${this.args.payloadLength} words truncated to ${this.length}`
          );
        }
        if (this.length === 0) {
          this.port.done = true;
          return;
        }
        this.current = 'POSTING';
        return;
      }
      case 'POSTING': {
        const request: BurstReadRequest = {
          read: true,
          address: this.args.offset,
          burstCount: this.length,
          flush: false,
        };
        const response = this.bus.tick(request);
        if (!response.waitRequest) {
          this.current = 'RECEIVING';
        }
        return;
      }
      case 'RECEIVING': {
        const response = this.bus.tick(IDLE_REQUEST);
        if (!response.readDataValid) {
          return;
        }
        if (response.response !== BUS_RESPONSE.OKAY) {
          this.errorBeats += 1;
          this.log?.(
            `Data mover: response ${response.response} on beat ${this.index} from 0x${(this.args.offset + this.index).toString(16)}`
          );
        }
        const address = this.store.partitionBase(this.args.deviceId) + this.index;
        this.store.requestWrite('data-mover', address, response.readData);
        this.mirror.write(address, response.readData);
        this.index += 1;
        if (this.index >= this.length) {
          this.port.done = true;
          this.current = 'IDLE';
        }
        return;
      }
    }
  }

  reset(): void {
    this.current = 'IDLE';
    this.index = 0;
    this.length = 0;
    this.errorBeats = 0;
    resetHandshake(this.port);
  }
}
