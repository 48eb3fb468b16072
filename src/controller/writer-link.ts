/**
 * @file Control-domain proxy for the config writer. Requests and completion
 * cross the clock boundary only as channel messages.
 */

import { Handshake, createHandshake, resetHandshake } from './handshake';
import { IDLE_WRITER_STATUS, WriterChannels, WriterStatus } from './cdc-channel';

export interface WriteArgs {
  deviceId: number;
}

export class WriterLink {
  readonly port: Handshake<WriteArgs> = createHandshake<WriteArgs>({ deviceId: 0 });
  private readonly channels: WriterChannels;
  private readonly log: ((message: string) => void) | undefined;
  private status: WriterStatus = { ...IDLE_WRITER_STATUS };

  constructor(channels: WriterChannels, log?: (message: string) => void) {
    this.channels = channels;
    this.log = log;
  }

  /** Last status received from the serial domain. */
  get lastStatus(): Readonly<WriterStatus> {
    return this.status;
  }

  /**
   * Drains the status channel; call at the start of a control cycle.
   */
  receive(): void {
    const status = this.channels.status.receive();
    if (status === undefined) {
      return;
    }
    if (status.error && !this.status.error) {
      this.log?.(`Config writer: error reported (info ${status.errorInfo})`);
    }
    this.status = status;
    this.port.done = status.done;
  }

  /**
   * Offers the current request to the command channel; call at the end of
   * a control cycle.
   */
  transmit(): void {
    this.channels.command.send({ start: this.port.start, deviceId: this.port.args.deviceId });
  }

  /**
   * Control-domain reset. The serial writer keeps running, so the idle
   * command is always re-sent to release a request it already holds.
   */
  reset(): void {
    resetHandshake(this.port);
    this.status = { ...IDLE_WRITER_STATUS };
    this.channels.command.resetSender();
  }
}
