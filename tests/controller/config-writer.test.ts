/**
 * @file Config writer tests: bit order, pass structure and timing
 */

import { describe, it, expect } from 'vitest';
import { ConfigWriter } from '../../src/controller/config-writer';
import { ConfigStore } from '../../src/controller/memory';
import { MutrigSpiDevice, frameToWords } from '../../src/sim/spi-device';

function setup() {
  const store = new ConfigStore(2, 2);
  store.loadPartition(1, [1, 0x80000000]);
  const writer = new ConfigWriter({ store, deviceCount: 2, roundedBits: 64, settleCycles: 3 });
  const devices = [new MutrigSpiDevice(0), new MutrigSpiDevice(1)];
  return { store, writer, devices };
}

interface LineSample {
  sclk: number;
  mosi: number;
  ssn: number;
}

/**
 * Requests a write of `deviceId` and ticks until done, feeding the devices.
 */
function write(ctx: ReturnType<typeof setup>, deviceId: number): { ticks: number; trace: LineSample[] } {
  ctx.writer.command = { start: true, deviceId };
  const trace: LineSample[] = [];
  let ticks = 0;
  while (!ctx.writer.status.done) {
    if (ticks >= 10_000) {
      throw new Error('writer did not finish');
    }
    ctx.writer.tick();
    ticks += 1;
    const lines = ctx.writer.lines;
    trace.push({ sclk: lines.sclk, mosi: lines.mosi, ssn: lines.ssn });
    ctx.devices.forEach((device) => device.sample(lines));
  }
  return { ticks, trace };
}

describe('ConfigWriter', () => {
  it('sends the partition twice with settle gaps', () => {
    const ctx = setup();
    const { ticks } = write(ctx, 1);

    // 1 + 2 x (init 1 + settle 4 + 128 + finish 1 + pause 1) + pausing 4
    expect(ticks).toBe(275);
    expect(ctx.devices[1]?.frames.length).toBe(2);
    expect(ctx.devices[0]?.frames.length).toBe(0);
  });

  it('sends the highest stored bit first', () => {
    const ctx = setup();
    write(ctx, 1);
    const frame = ctx.devices[1]?.lastFrame ?? [];

    expect(frame.length).toBe(64);
    expect(frame[0]).toBe(1);
    expect(frame[63]).toBe(1);
    expect(frame.slice(1, 63).every((bit) => bit === 0)).toBe(true);
    expect(Array.from(frameToWords(frame))).toEqual([1, 0x80000000]);
    expect(ctx.devices[1]?.frames[0]).toEqual(frame);
  });

  it('selects only the addressed device', () => {
    const ctx = setup();
    const { trace } = write(ctx, 1);
    const selections = new Set(trace.map((sample) => sample.ssn));
    expect([...selections].sort()).toEqual([0b01, 0b11]);
  });

  it('changes mosi only while sclk is low', () => {
    const ctx = setup();
    const { trace } = write(ctx, 1);
    const violations = trace.filter(
      (sample, i) => i > 0 && sample.mosi !== trace[i - 1]?.mosi && sample.sclk === 1
    );
    expect(violations).toEqual([]);
  });

  it('holds done until the request is withdrawn', () => {
    const ctx = setup();
    write(ctx, 1);
    ctx.writer.tick();
    expect(ctx.writer.status.done).toBe(true);
    expect(ctx.writer.state).toBe('IDLE');

    ctx.writer.command = { start: false, deviceId: 1 };
    ctx.writer.tick();
    expect(ctx.writer.status.done).toBe(false);
    expect(ctx.writer.lines.ssn).toBe(0b11);
  });

  it('returns to idle lines on reset', () => {
    const ctx = setup();
    ctx.writer.command = { start: true, deviceId: 0 };
    for (let i = 0; i < 10; i += 1) {
      ctx.writer.tick();
    }
    expect(ctx.writer.lines.ssn).toBe(0b10);
    ctx.writer.reset();
    expect(ctx.writer.lines).toEqual({ sclk: 0, mosi: 0, ssn: 0b11 });
    expect(ctx.writer.state).toBe('IDLE');
  });
});
