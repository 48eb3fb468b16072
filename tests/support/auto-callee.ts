/**
 * @file Stand-in for a sub-routine: answers every request one cycle later
 * and records the arguments it was called with.
 */

import { Handshake } from '../../src/controller/handshake';

export class AutoCallee<TArgs extends object> {
  readonly calls: TArgs[] = [];
  readonly port: Handshake<TArgs>;

  constructor(port: Handshake<TArgs>) {
    this.port = port;
  }

  tick(): void {
    if (this.port.start && !this.port.done) {
      this.calls.push({ ...this.port.args });
      this.port.done = true;
    } else if (!this.port.start && this.port.done) {
      this.port.done = false;
    }
  }
}
