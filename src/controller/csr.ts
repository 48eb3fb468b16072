/**
 * @file Host register map and command word codec.
 */

/** Word addresses of the host registers. */
export const CSR_COMMAND_STATUS = 0;
export const CSR_OFFSET = 1;
export const CSR_MONITOR_INTERVAL = 2;
export const CSR_RESERVED = 3;
export const CSR_WORDS = 4;

export interface CommandWord {
  /** 12-bit command code, bits [31:20] */
  command: number;
  /** 4-bit device id, bits [19:16] */
  deviceId: number;
  /** Payload length in words, bits [15:0] */
  payloadLength: number;
}

export function decodeCommandWord(raw: number): CommandWord {
  return {
    command: (raw >>> 20) & 0xfff,
    deviceId: (raw >>> 16) & 0x0f,
    payloadLength: raw & 0xffff,
  };
}

export function encodeCommandWord(word: CommandWord): number {
  return (
    (((word.command & 0xfff) << 20) | ((word.deviceId & 0x0f) << 16) | (word.payloadLength & 0xffff)) >>>
    0
  );
}

/**
 * Status register value. While busy the upper half echoes the command and
 * device fields and the lower half reports progress; when idle it holds the
 * completion code.
 */
export function encodeStatusWord(
  busy: boolean,
  command: number,
  deviceId: number,
  progress: number,
  completionCode: number
): number {
  if (!busy) {
    return completionCode >>> 0;
  }
  return (((command & 0xfff) << 20) | ((deviceId & 0x0f) << 16) | (progress & 0xffff)) >>> 0;
}
