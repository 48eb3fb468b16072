/**
 * @file Instruction interpreter tests
 */

import { describe, it, expect, vi } from 'vitest';
import { SubroutineSelection } from '../../src/config/types';
import {
  CMD_CONFIGURE,
  CMD_TTH_SCAN_ALL,
  CMD_TTH_SCAN_ONE,
} from '../../src/controller/constants';
import { InstructionInterpreter } from '../../src/controller/instruction-interpreter';
import { DeviceStep } from '../../src/controller/routine';

interface FakeRoutine {
  done: boolean;
  busy: boolean;
  deviceStep: DeviceStep | undefined;
}

function setup(subroutines: SubroutineSelection = 'both') {
  const mcc: FakeRoutine = { done: false, busy: false, deviceStep: undefined };
  const tsa: FakeRoutine = { done: false, busy: false, deviceStep: undefined };
  const log = vi.fn();
  const interpreter = new InstructionInterpreter({ mcc, tsa, deviceCount: 2, subroutines, log });
  return { mcc, tsa, log, interpreter };
}

describe('InstructionInterpreter', () => {
  it('starts a routine on the tick after the write', () => {
    const { interpreter } = setup();
    interpreter.submit({ command: CMD_CONFIGURE, deviceId: 1, payloadLength: 13 });
    expect(interpreter.busy).toBe(false);

    interpreter.tick();
    expect(interpreter.request).toEqual({
      command: CMD_CONFIGURE,
      deviceId: 1,
      payloadLength: 13,
      start: true,
    });
    expect(interpreter.busy).toBe(true);
  });

  it('discards unrecognized commands', () => {
    const { interpreter, log } = setup();
    interpreter.submit({ command: 0x0ff, deviceId: 0, payloadLength: 0 });
    interpreter.tick();

    expect(interpreter.busy).toBe(false);
    expect(interpreter.dropped).toBe(1);
    expect(log).toHaveBeenCalledWith('Interpreter: command 0x0ff discarded (unrecognized command)');
  });

  it('drops commands while a routine runs', () => {
    const { interpreter, log } = setup();
    interpreter.submit({ command: CMD_CONFIGURE, deviceId: 0, payloadLength: 4 });
    interpreter.tick();
    interpreter.submit({ command: CMD_TTH_SCAN_ONE, deviceId: 1, payloadLength: 0 });
    interpreter.tick();

    expect(interpreter.request.command).toBe(CMD_CONFIGURE);
    expect(log).toHaveBeenCalledWith('Interpreter: command 0x013 discarded (a routine is active)');
  });

  it('withdraws the request once a routine reports done', () => {
    const { interpreter, mcc, log } = setup();
    interpreter.submit({ command: CMD_CONFIGURE, deviceId: 0, payloadLength: 4 });
    interpreter.tick();

    mcc.done = true;
    interpreter.tick();
    expect(interpreter.busy).toBe(false);

    // Still done: a new command is not admitted yet
    interpreter.submit({ command: CMD_CONFIGURE, deviceId: 1, payloadLength: 4 });
    interpreter.tick();
    expect(interpreter.busy).toBe(false);
    expect(log).toHaveBeenCalledWith('Interpreter: command 0x011 discarded (a routine is active)');

    mcc.done = false;
    interpreter.submit({ command: CMD_CONFIGURE, deviceId: 1, payloadLength: 4 });
    interpreter.tick();
    expect(interpreter.busy).toBe(true);
  });

  it('drops commands while a routine is still leaving its busy state', () => {
    const { interpreter, tsa } = setup();
    tsa.busy = true;
    interpreter.submit({ command: CMD_CONFIGURE, deviceId: 0, payloadLength: 4 });
    interpreter.tick();
    expect(interpreter.busy).toBe(false);
    expect(interpreter.dropped).toBe(1);
  });

  it('rejects scans when only configuration is enabled', () => {
    const { interpreter, log } = setup('mcc-only');
    interpreter.submit({ command: CMD_TTH_SCAN_ONE, deviceId: 0, payloadLength: 0 });
    interpreter.tick();
    expect(interpreter.busy).toBe(false);
    expect(log).toHaveBeenCalledWith('Interpreter: command 0x013 discarded (scans are disabled)');
  });

  it('rejects configuration when only scans are enabled', () => {
    const { interpreter, log } = setup('tsa-only');
    interpreter.submit({ command: CMD_CONFIGURE, deviceId: 0, payloadLength: 4 });
    interpreter.tick();
    expect(interpreter.busy).toBe(false);
    expect(log).toHaveBeenCalledWith(
      'Interpreter: command 0x011 discarded (configuration is disabled)'
    );
  });

  it('rejects device ids beyond the array', () => {
    const { interpreter, log } = setup();
    interpreter.submit({ command: CMD_TTH_SCAN_ONE, deviceId: 5, payloadLength: 0 });
    interpreter.tick();
    expect(interpreter.busy).toBe(false);
    expect(log).toHaveBeenCalledWith('Interpreter: command 0x013 discarded (device 5 is not present)');
  });

  it('starts a scan-all at device 0 whatever the device field says', () => {
    const { interpreter } = setup();
    interpreter.submit({ command: CMD_TTH_SCAN_ALL, deviceId: 7, payloadLength: 0 });
    interpreter.tick();
    expect(interpreter.busy).toBe(true);
    expect(interpreter.request.deviceId).toBe(0);
  });

  it('applies device steps raised by the scan automation', () => {
    const { interpreter, tsa } = setup();
    interpreter.submit({ command: CMD_TTH_SCAN_ALL, deviceId: 0, payloadLength: 0 });
    interpreter.tick();

    tsa.deviceStep = 'increment';
    interpreter.tick();
    expect(interpreter.request.deviceId).toBe(1);

    tsa.deviceStep = 'reset';
    interpreter.tick();
    expect(interpreter.request.deviceId).toBe(0);
  });

  it('returns to idle on reset', () => {
    const { interpreter } = setup();
    interpreter.submit({ command: CMD_CONFIGURE, deviceId: 0, payloadLength: 4 });
    interpreter.tick();
    interpreter.reset();
    expect(interpreter.request).toEqual({ command: 0, deviceId: 0, payloadLength: 0, start: false });
    expect(interpreter.dropped).toBe(0);
  });
});
