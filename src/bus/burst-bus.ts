/**
 * @file Signals of a word-addressed burst read bus with wait, valid and
 * response handshakes. The controller is master on two such buses: the
 * staging buffer and the counter source.
 */

export const BUS_RESPONSE = {
  OKAY: 0,
  RESERVED: 1,
  SLAVE_ERROR: 2,
  DECODE_ERROR: 3,
} as const;
export type BusResponse = (typeof BUS_RESPONSE)[keyof typeof BUS_RESPONSE];

/** Master outputs for one cycle. */
export interface BurstReadRequest {
  read: boolean;
  address: number;
  burstCount: number;
  /** Discards any burst in flight */
  flush: boolean;
}

/** Slave outputs for one cycle. */
export interface BurstReadResponse {
  waitRequest: boolean;
  readDataValid: boolean;
  readData: number;
  response: BusResponse;
}

/**
 * A bus slave evaluated once per master clock cycle: it sees the master's
 * outputs for the cycle and returns its own.
 */
export interface BurstReadSlave {
  tick(request: Readonly<BurstReadRequest>): BurstReadResponse;
}

export const IDLE_REQUEST: Readonly<BurstReadRequest> = Object.freeze({
  read: false,
  address: 0,
  burstCount: 0,
  flush: false,
});

export const FLUSH_REQUEST: Readonly<BurstReadRequest> = Object.freeze({
  read: false,
  address: 0,
  burstCount: 0,
  flush: true,
});
