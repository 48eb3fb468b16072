/**
 * @file Four-phase handshake and writer arbiter tests
 */

import { describe, it, expect } from 'vitest';
import {
  RequestArbiter,
  createHandshake,
  invoke,
  resetHandshake,
} from '../../src/controller/handshake';

describe('invoke', () => {
  it('walks through request, completion and acknowledgement', () => {
    const port = createHandshake({ value: 0 });

    expect(invoke(port, { value: 7 })).toBe(false);
    expect(port).toEqual({ start: true, done: false, args: { value: 7 } });

    // Callee still working.
    expect(invoke(port, { value: 7 })).toBe(false);
    expect(port.start).toBe(true);

    port.done = true;
    expect(invoke(port, { value: 7 })).toBe(true);
    expect(port.start).toBe(false);
  });

  it('does not raise a new request while done is still held', () => {
    const port = createHandshake({ value: 0 });
    port.done = true;
    expect(invoke(port, { value: 3 })).toBe(false);
    expect(port.start).toBe(false);
    expect(port.args).toEqual({ value: 0 });

    port.done = false;
    invoke(port, { value: 3 });
    expect(port.start).toBe(true);
    expect(port.args).toEqual({ value: 3 });
  });

  it('resets both lines', () => {
    const port = createHandshake({ value: 0 });
    port.start = true;
    port.done = true;
    resetHandshake(port);
    expect(port.start).toBe(false);
    expect(port.done).toBe(false);
  });
});

describe('RequestArbiter', () => {
  function setup() {
    const mcc = createHandshake({ deviceId: 0 });
    const tsa = createHandshake({ deviceId: 0 });
    const target = createHandshake({ deviceId: 0 });
    const arbiter = new RequestArbiter(
      [
        { name: 'MCC', port: mcc },
        { name: 'TSA', port: tsa },
      ],
      target
    );
    return { mcc, tsa, target, arbiter };
  }

  it('grants the first requester when both ask together', () => {
    const { mcc, tsa, target, arbiter } = setup();
    mcc.start = true;
    mcc.args = { deviceId: 1 };
    tsa.start = true;
    tsa.args = { deviceId: 2 };

    arbiter.tick();
    expect(arbiter.grantee).toBe('MCC');
    expect(target.start).toBe(true);
    expect(target.args).toEqual({ deviceId: 1 });
  });

  it('holds the grant until the callee has cleared done', () => {
    const { mcc, tsa, target, arbiter } = setup();
    mcc.start = true;
    tsa.start = true;
    tsa.args = { deviceId: 2 };
    arbiter.tick();

    target.done = true;
    arbiter.tick();
    expect(mcc.done).toBe(true);
    expect(tsa.done).toBe(false);

    mcc.start = false;
    arbiter.tick();
    expect(target.start).toBe(false);
    expect(arbiter.grantee).toBe('MCC');

    target.done = false;
    arbiter.tick();
    expect(mcc.done).toBe(false);
    expect(arbiter.grantee).toBeUndefined();

    arbiter.tick();
    expect(arbiter.grantee).toBe('TSA');
    expect(target.start).toBe(true);
    expect(target.args).toEqual({ deviceId: 2 });
  });

  it('grants nothing while the callee still reports done', () => {
    const { tsa, target, arbiter } = setup();
    target.done = true;
    tsa.start = true;
    arbiter.tick();
    expect(arbiter.grantee).toBeUndefined();
    expect(target.start).toBe(false);
  });

  it('forgets the grant on reset', () => {
    const { mcc, arbiter } = setup();
    mcc.start = true;
    arbiter.tick();
    arbiter.reset();
    expect(arbiter.grantee).toBeUndefined();
  });
});
