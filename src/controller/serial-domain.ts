/**
 * @file Serial clock domain: the config writer and its channel endpoints.
 */

import { ConfigStore } from './memory';
import { WriterChannels } from './cdc-channel';
import { ConfigWriter, SpiLines } from './config-writer';
import { ControllerConfigNormalized } from '../config/types';

export interface SerialDomainOptions {
  config: ControllerConfigNormalized;
  store: ConfigStore;
  channels: WriterChannels;
}

export class SerialDomain {
  readonly writer: ConfigWriter;
  private readonly channels: WriterChannels;

  constructor(options: SerialDomainOptions) {
    this.channels = options.channels;
    this.writer = new ConfigWriter({
      store: options.store,
      deviceCount: options.config.deviceCount,
      roundedBits: options.config.roundedBits,
      settleCycles: options.config.settleCycles,
    });
  }

  get lines(): Readonly<SpiLines> {
    return this.writer.lines;
  }

  /**
   * One serial clock cycle.
   */
  tick(): void {
    const command = this.channels.command.receive();
    if (command !== undefined) {
      this.writer.command = command;
    }
    this.writer.tick();
    this.channels.status.send(this.writer.status);
  }

  /**
   * Serial-domain reset. Clears the writer and the channel it drives.
   */
  reset(): void {
    this.writer.reset();
    this.channels.status.reset();
  }
}
