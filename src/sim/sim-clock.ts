/**
 * @file Picosecond event scheduler driving the clock domains.
 */

export type ClockCallback = () => void;

interface ClockEvent {
  id: number;
  at: number;
  interval?: number;
  callback: ClockCallback;
}

/**
 * Events due at the same instant fire in the order they were scheduled.
 */
export class SimClock {
  private nowPs = 0;
  private nextId = 1;
  private queue: ClockEvent[] = [];

  now(): number {
    return this.nowPs;
  }

  scheduleAt(at: number, callback: ClockCallback): number {
    const event: ClockEvent = {
      id: this.nextId++,
      at: Math.max(0, at),
      callback,
    };
    this.insertEvent(event);
    return event.id;
  }

  scheduleIn(delta: number, callback: ClockCallback): number {
    return this.scheduleAt(this.nowPs + Math.max(0, delta), callback);
  }

  /**
   * Runs `callback` every `periodPs`, first one period from now.
   */
  scheduleEvery(periodPs: number, callback: ClockCallback): number {
    const interval = Math.max(1, Math.round(periodPs));
    const event: ClockEvent = {
      id: this.nextId++,
      at: this.nowPs + interval,
      interval,
      callback,
    };
    this.insertEvent(event);
    return event.id;
  }

  cancel(id: number): boolean {
    const index = this.queue.findIndex((event) => event.id === id);
    if (index === -1) {
      return false;
    }
    this.queue.splice(index, 1);
    return true;
  }

  /**
   * Moves time forward by `deltaPs`, firing every event due on the way,
   * including those due now.
   */
  advance(deltaPs: number): void {
    if (deltaPs < 0) {
      return;
    }
    const target = this.nowPs + deltaPs;
    for (;;) {
      const next = this.queue[0];
      if (next === undefined || next.at > target) {
        break;
      }
      this.queue.shift();
      this.nowPs = next.at;
      next.callback();
      if (next.interval !== undefined) {
        next.at += next.interval;
        this.insertEvent(next);
      }
    }
    this.nowPs = target;
  }

  /**
   * Fires events one instant at a time until `predicate` holds or `limitPs`
   * is reached. Returns whether the predicate was met.
   */
  runUntil(predicate: () => boolean, limitPs: number): boolean {
    while (!predicate()) {
      const next = this.queue[0];
      if (next === undefined || next.at > limitPs) {
        this.nowPs = Math.max(this.nowPs, limitPs);
        return false;
      }
      this.advance(next.at - this.nowPs);
    }
    return true;
  }

  private insertEvent(event: ClockEvent): void {
    const index = this.queue.findIndex((item) => item.at > event.at);
    if (index === -1) {
      this.queue.push(event);
    } else {
      this.queue.splice(index, 0, event);
    }
  }
}
