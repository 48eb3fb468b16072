/**
 * @file The request record the interpreter hands to the MCC and TSA, and
 * the view it needs of each routine.
 */

export interface RoutineRequest {
  /** 12-bit command code */
  command: number;
  deviceId: number;
  /** Payload length in words */
  payloadLength: number;
  start: boolean;
}

export const IDLE_ROUTINE_REQUEST: Readonly<RoutineRequest> = Object.freeze({
  command: 0,
  deviceId: 0,
  payloadLength: 0,
  start: false,
});

export interface Routine {
  /** Private completion flag, held until `start` is retracted. */
  readonly done: boolean;
  /** True while the routine is away from its idle state. */
  readonly busy: boolean;
}

/** One-cycle device index request raised by a scan-all run. */
export type DeviceStep = 'increment' | 'reset';
