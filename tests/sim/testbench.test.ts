/**
 * @file End-to-end runs of the controller against the in-process models
 */

import { describe, it, expect, vi } from 'vitest';
import { CSR_COMMAND_STATUS, CSR_OFFSET, encodeCommandWord } from '../../src/controller/csr';
import { CMD_CONFIGURE, CMD_TTH_SCAN_ONE } from '../../src/controller/constants';
import { frameToWords } from '../../src/sim/spi-device';
import { MutrigTestbench, hitsAtThreshold } from '../../src/sim/testbench';
import { SMALL_CONFIG, SMALL_PARTITION_WORDS, samplePayload } from '../support/small-config';

const channels = Array.from({ length: 32 }, (_, ch) => ch);

describe('MutrigTestbench', () => {
  it('configures a device from the staging buffer', () => {
    const tb = new MutrigTestbench({ config: SMALL_CONFIG });
    const payload = samplePayload();

    expect(tb.configure(1, payload, 0x100)).toBe(true);

    const partition = Array.from(tb.controller.store.partition(1));
    expect(partition).toEqual([...payload, 0, 0, 0]);
    expect(channels.slice(0, 13).map((i) => tb.controller.mirror.peek(SMALL_PARTITION_WORDS + i))).toEqual(
      payload
    );
    const frames = tb.devices[1]?.frames ?? [];
    expect(frames.length).toBe(2);
    expect(frames.map((frame) => Array.from(frameToWords(frame)))).toEqual([payload, payload]);
    expect(tb.devices[0]?.frames).toEqual([]);
    expect(tb.controller.writerOwner).toBeUndefined();
  });

  it('records the hit rate of every threshold step of one device', () => {
    const tb = new MutrigTestbench({ config: SMALL_CONFIG, hits: 'threshold' });
    tb.configure(1, samplePayload());

    expect(tb.scan('tth', 1)).toBe(true);

    for (const threshold of [0, 1, 31, 62, 63]) {
      expect(tb.results(threshold, 1)).toEqual(channels.map((ch) => hitsAtThreshold(threshold, ch)));
    }
    expect(tb.results(10, 0)).toEqual(channels.map(() => 0));
    expect(tb.devices[1]?.frames.length).toBe(2 + 64 * 2);
    expect(tb.controller.readCsr(CSR_COMMAND_STATUS)).toBe(0);
  });

  it('scans all devices at every threshold', () => {
    const tb = new MutrigTestbench({ config: SMALL_CONFIG, hits: 'threshold' });
    tb.configure(0, samplePayload());
    tb.configure(1, samplePayload());
    const write = vi.spyOn(tb.controller.results, 'write');

    expect(tb.scan('eth', 'all')).toBe(true);

    const keys = new Set(write.mock.calls.map(([t, d, ch]) => `${t}/${d}/${ch}`));
    expect(write).toHaveBeenCalledTimes(4096);
    expect(keys.size).toBe(4096);
    expect(tb.results(17, 0)).toEqual(channels.map((ch) => hitsAtThreshold(17, ch)));
    expect(tb.results(17, 1)).toEqual(channels.map((ch) => hitsAtThreshold(17, ch)));
    expect(tb.counters.clearCount).toBe(64);
  });

  it('discards an unrecognized command and stays idle', () => {
    const log = vi.fn();
    const tb = new MutrigTestbench({ config: SMALL_CONFIG, log });
    expect(tb.execute({ command: 0x0ff, deviceId: 0, payloadLength: 0 }, 1_000_000)).toBe(false);
    expect(tb.controller.readCsr(CSR_COMMAND_STATUS)).toBe(0);
    expect(log).toHaveBeenCalledWith('Interpreter: command 0x0ff discarded (unrecognized command)');
  });

  it('reports progress and drops commands while a scan runs', () => {
    const log = vi.fn();
    const tb = new MutrigTestbench({ config: SMALL_CONFIG, log });
    tb.controller.writeCsr(
      CSR_COMMAND_STATUS,
      encodeCommandWord({ command: CMD_TTH_SCAN_ONE, deviceId: 1, payloadLength: 0 })
    );

    const reached = tb.clock.runUntil(() => tb.controller.tsa.progress === 5, tb.scanBudgetPs(1));
    expect(reached).toBe(true);
    expect(tb.controller.readCsr(CSR_COMMAND_STATUS)).toBe(0x01310005);

    tb.controller.writeCsr(
      CSR_COMMAND_STATUS,
      encodeCommandWord({ command: CMD_CONFIGURE, deviceId: 0, payloadLength: 13 })
    );
    tb.clock.advance(tb.controlPeriodPs);
    expect(tb.controller.interpreter.dropped).toBe(1);
    expect(tb.controller.interpreter.request.command).toBe(CMD_TTH_SCAN_ONE);
    expect(log).toHaveBeenCalledWith('Interpreter: command 0x011 discarded (a routine is active)');
  });

  it('completes a scan whose counter reads all time out', () => {
    const tb = new MutrigTestbench({ config: SMALL_CONFIG });
    tb.counters.setStall('request');

    expect(tb.scan('tth', 0)).toBe(true);

    expect(tb.controller.monitor.timeouts).toBe(64);
    expect(tb.counters.bus.flushCount).toBe(64);
    expect(tb.controller.monitor.timedOut).toBe(false);
  });

  it('configures again after a controller reset during a write', () => {
    const tb = new MutrigTestbench({ config: SMALL_CONFIG });
    const payload = samplePayload();
    tb.controller.writeCsr(
      CSR_COMMAND_STATUS,
      encodeCommandWord({ command: CMD_CONFIGURE, deviceId: 0, payloadLength: payload.length })
    );
    tb.loadStaging(0, payload);

    const writing = tb.clock.runUntil(
      () => tb.serial.writer.state === 'WRITING',
      tb.configureBudgetPs()
    );
    expect(writing).toBe(true);
    tb.controller.reset();
    tb.clock.advance(tb.configureBudgetPs());

    expect(tb.serial.writer.command.start).toBe(false);
    expect(tb.serial.writer.status.done).toBe(false);
    expect(tb.configure(1, payload)).toBe(true);
    expect((tb.devices[1]?.frames ?? []).map((frame) => Array.from(frameToWords(frame)))).toEqual([
      payload,
      payload,
    ]);
  });

  it('keeps storage across a reset', () => {
    const tb = new MutrigTestbench({ config: SMALL_CONFIG });
    const payload = samplePayload();
    tb.configure(0, payload, 0x200);
    expect(tb.controller.readCsr(CSR_OFFSET)).toBe(0x200);

    tb.reset();

    expect(tb.controller.cycles).toBe(0);
    expect(tb.controller.readCsr(CSR_OFFSET)).toBe(0);
    expect(Array.from(tb.controller.store.partition(0).slice(0, 13))).toEqual(payload);
    expect(tb.devices[0]?.frames).toEqual([]);
    expect(tb.idle).toBe(true);
  });
});
