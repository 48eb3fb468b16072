/**
 * @file One-slot, edge-triggered channels between the control and serial
 * clock domains, and the messages that cross them.
 */

/**
 * Converts a message to and from the fixed-width word carried by a channel.
 */
export interface WordCodec<T> {
  encode(value: T): number;
  decode(word: number): T;
}

export interface EdgeChannelOptions {
  /** Name used in log messages */
  name?: string;
  log?: (message: string) => void;
}

/**
 * A value is sent only when its encoding differs from the last value sent,
 * so repeating an unchanged value produces no traffic. The channel holds one
 * word; a change arriving before the receiver drained the previous one
 * replaces it and is counted in {@link EdgeChannel.overflows}.
 */
export class EdgeChannel<T> {
  private readonly codec: WordCodec<T>;
  private readonly resetWord: number;
  private readonly name: string;
  private readonly log: ((message: string) => void) | undefined;
  private lastSent: number | undefined;
  private slot: number | undefined;
  private overflowCount = 0;

  constructor(codec: WordCodec<T>, initial: T, options: EdgeChannelOptions = {}) {
    this.codec = codec;
    this.resetWord = codec.encode(initial);
    this.lastSent = this.resetWord;
    this.name = options.name ?? 'channel';
    this.log = options.log;
  }

  /**
   * Offers the sender's current value. Returns true when it was a change and
   * entered the channel.
   */
  send(value: T): boolean {
    const word = this.codec.encode(value);
    if (word === this.lastSent) {
      return false;
    }
    this.lastSent = word;
    if (this.slot !== undefined) {
      this.overflowCount += 1;
      this.log?.(
        `${this.name}: overflow, pending 0x${this.slot.toString(16)} replaced by 0x${word.toString(16)}`
      );
    }
    this.slot = word;
    return true;
  }

  /**
   * Removes and returns the pending message, if any.
   */
  receive(): T | undefined {
    if (this.slot === undefined) {
      return undefined;
    }
    const word = this.slot;
    this.slot = undefined;
    return this.codec.decode(word);
  }

  get empty(): boolean {
    return this.slot === undefined;
  }

  get overflows(): number {
    return this.overflowCount;
  }

  reset(): void {
    this.lastSent = this.resetWord;
    this.slot = undefined;
    this.overflowCount = 0;
  }

  /**
   * Resets the sending side only. The receiver may still hold an older value,
   * so the next {@link EdgeChannel.send} always enters the channel.
   */
  resetSender(): void {
    this.lastSent = undefined;
    this.slot = undefined;
    this.overflowCount = 0;
  }
}

// ============================================================================
// Config Writer messages
// ============================================================================

/** Control → serial: start request for the config writer. */
export interface WriterCommand {
  start: boolean;
  deviceId: number;
}

/** Serial → control: config writer completion status. */
export interface WriterStatus {
  done: boolean;
  error: boolean;
  /** 2-bit detail code; {@link WRITER_ERROR_NONE} in this core */
  errorInfo: number;
}

export const WRITER_ERROR_NONE = 0;

export const IDLE_WRITER_COMMAND: Readonly<WriterCommand> = Object.freeze({
  start: false,
  deviceId: 0,
});

export const IDLE_WRITER_STATUS: Readonly<WriterStatus> = Object.freeze({
  done: false,
  error: false,
  errorInfo: WRITER_ERROR_NONE,
});

export const writerCommandCodec: WordCodec<WriterCommand> = {
  encode: (value) => ((value.start ? 1 : 0) << 4) | (value.deviceId & 0x0f),
  decode: (word) => ({ start: (word & 0x10) !== 0, deviceId: word & 0x0f }),
};

export const writerStatusCodec: WordCodec<WriterStatus> = {
  encode: (value) => (value.done ? 1 : 0) | ((value.error ? 1 : 0) << 1) | ((value.errorInfo & 0x03) << 2),
  decode: (word) => ({
    done: (word & 0x01) !== 0,
    error: (word & 0x02) !== 0,
    errorInfo: (word >> 2) & 0x03,
  }),
};

/**
 * The pair of channels linking the control domain to the config writer.
 */
export interface WriterChannels {
  command: EdgeChannel<WriterCommand>;
  status: EdgeChannel<WriterStatus>;
}

export function createWriterChannels(log?: (message: string) => void): WriterChannels {
  return {
    command: new EdgeChannel(writerCommandCodec, IDLE_WRITER_COMMAND, {
      name: 'Writer command channel',
      log,
    }),
    status: new EdgeChannel(writerStatusCodec, IDLE_WRITER_STATUS, {
      name: 'Writer status channel',
      log,
    }),
  };
}
