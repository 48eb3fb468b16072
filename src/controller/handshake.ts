/**
 * @file Four-phase request/acknowledge protocol shared by every sub-routine.
 *
 * 1. The requester asserts `start` (with its arguments).
 * 2. The callee eventually asserts `done` and holds it.
 * 3. The requester observes `done` and retracts `start`.
 * 4. The callee observes the retraction and clears `done`.
 */

export interface Handshake<TArgs> {
  start: boolean;
  done: boolean;
  args: TArgs;
}

export function createHandshake<TArgs>(args: TArgs): Handshake<TArgs> {
  return { start: false, done: false, args };
}

/**
 * Advances the requester side of one call by a cycle. Returns true on the
 * cycle the call completes (`done` seen and `start` retracted).
 *
 * A new request is only raised once the callee has cleared `done` from the
 * previous call, so back-to-back calls never see a stale completion.
 */
export function invoke<TArgs>(port: Handshake<TArgs>, args: TArgs): boolean {
  if (!port.start) {
    if (!port.done) {
      port.args = args;
      port.start = true;
    }
    return false;
  }
  if (port.done) {
    port.start = false;
    return true;
  }
  return false;
}

export function resetHandshake<TArgs>(port: Handshake<TArgs>): void {
  port.start = false;
  port.done = false;
}

/**
 * A named requester competing for a shared callee.
 */
export interface Requester<TArgs> {
  name: string;
  port: Handshake<TArgs>;
}

/**
 * Grants a shared callee to at most one requester at a time. Requesters are
 * served in the order given when several ask in the same cycle; a grant is
 * held until its owner has retracted `start` and the callee has cleared
 * `done`.
 */
export class RequestArbiter<TArgs> {
  private readonly requesters: readonly Requester<TArgs>[];
  private readonly target: Handshake<TArgs>;
  private owner: Requester<TArgs> | undefined;

  constructor(requesters: readonly Requester<TArgs>[], target: Handshake<TArgs>) {
    this.requesters = requesters;
    this.target = target;
  }

  /**
   * Name of the requester holding the grant, if any.
   */
  get grantee(): string | undefined {
    return this.owner?.name;
  }

  tick(): void {
    if (this.owner === undefined) {
      if (this.target.done) {
        return;
      }
      this.owner = this.requesters.find((requester) => requester.port.start);
      if (this.owner === undefined) {
        return;
      }
    }
    const port = this.owner.port;
    this.target.args = port.args;
    this.target.start = port.start;
    port.done = this.target.done;
    if (!port.start && !this.target.done) {
      this.owner = undefined;
    }
  }

  reset(): void {
    this.owner = undefined;
  }
}
