#!/usr/bin/env node
/**
 * mutrig-sim command line.
 *
 * - `layout` prints the derived threshold field tables;
 * - `configure <bitstream>` runs one configure command and summarizes the
 *   SPI frames the device received;
 * - `scan <bitstream>` configures the targeted devices, runs a 64-step scan
 *   and prints (or writes) the results as CSV.
 */

import * as fs from 'fs';
import * as path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadBitstreamFile } from './config/bitstream-loader';
import { normalizeControllerConfig } from './config/config';
import { resolveConfig } from './config/config-loader';
import { ControllerConfig } from './config/types';
import { CHANNELS_PER_DEVICE, SCAN_STEPS } from './controller/constants';
import { THRESHOLD_FIELDS, ThresholdField, deriveFieldTables } from './controller/field-layout';
import { MutrigError, getErrorMessage } from './errors';
import { formatFieldTable, formatResultsCsv, summarizeFrames } from './report';
import { MutrigTestbench, ScanTarget } from './sim/testbench';

/** Accumulation window used by `scan` unless configured otherwise. */
export const CLI_WINDOW_CYCLES = 1000;

export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

const consoleIo: CliIo = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

interface CommonArgs {
  config: string | undefined;
  verbose: boolean;
}

function loadConfig(cwd: string, args: CommonArgs): ControllerConfig {
  return resolveConfig(cwd, args.config);
}

function makeBench(config: ControllerConfig, io: CliIo, verbose: boolean): MutrigTestbench {
  return new MutrigTestbench({
    config,
    hits: 'threshold',
    log: verbose ? (message) => io.err(message) : undefined,
  });
}

function checkDevice(bench: MutrigTestbench, deviceId: number): void {
  if (!Number.isInteger(deviceId) || deviceId < 0 || deviceId >= bench.config.deviceCount) {
    throw new MutrigError(
      `Device ${deviceId} is out of range (0..${bench.config.deviceCount - 1})`,
      'INVALID_ARGUMENT',
      { deviceId }
    );
  }
}

function configureDevice(bench: MutrigTestbench, deviceId: number, words: number[]): void {
  if (!bench.configure(deviceId, words)) {
    throw new MutrigError(`Configure command for device ${deviceId} was discarded`, 'COMMAND_DISCARDED');
  }
}

function layoutCommand(
  cwd: string,
  args: CommonArgs & { field: ThresholdField | undefined },
  io: CliIo
): void {
  const config = normalizeControllerConfig(loadConfig(cwd, args));
  const tables = deriveFieldTables(config.layout);
  const fields = args.field !== undefined ? [args.field] : THRESHOLD_FIELDS;
  io.out(`${config.variant}: ${config.layout.lengthBits} bits, ${config.partitionWords} words per partition`);
  for (const field of fields) {
    io.out(formatFieldTable(field, tables[field]));
  }
}

function configureCommand(
  cwd: string,
  args: CommonArgs & { bitstream: string; device: number },
  io: CliIo
): void {
  const bench = makeBench(loadConfig(cwd, args), io, args.verbose);
  checkDevice(bench, args.device);
  configureDevice(bench, args.device, loadBitstreamFile(path.resolve(cwd, args.bitstream)));
  io.out(summarizeFrames(args.device, bench.devices[args.device]?.frames ?? []));
}

function scanCommand(
  cwd: string,
  args: CommonArgs & {
    bitstream: string;
    device: number;
    all: boolean;
    field: ThresholdField;
    window: number | undefined;
    out: string | undefined;
  },
  io: CliIo
): void {
  const loaded = loadConfig(cwd, args);
  const config: ControllerConfig = {
    ...loaded,
    monitorWindowCycles: args.window ?? loaded.monitorWindowCycles ?? CLI_WINDOW_CYCLES,
  };
  const bench = makeBench(config, io, args.verbose);
  const words = loadBitstreamFile(path.resolve(cwd, args.bitstream));
  const target: ScanTarget = args.all ? 'all' : args.device;
  const devices = args.all
    ? Array.from({ length: bench.config.deviceCount }, (_, i) => i)
    : [args.device];
  for (const deviceId of devices) {
    checkDevice(bench, deviceId);
    configureDevice(bench, deviceId, words);
  }
  if (!bench.scan(args.field, target)) {
    throw new MutrigError('Scan command was discarded', 'COMMAND_DISCARDED');
  }
  const csv = formatResultsCsv(devices, (threshold, deviceId, channel) =>
    bench.controller.readResult(bench.controller.results.indexOf(threshold, deviceId, channel))
  );
  if (args.out !== undefined) {
    fs.writeFileSync(path.resolve(cwd, args.out), csv);
    io.out(`Wrote ${devices.length * SCAN_STEPS * CHANNELS_PER_DEVICE} results to ${args.out}`);
  } else {
    io.out(csv.trimEnd());
  }
}

/**
 * Runs the command line and returns the exit code.
 */
export function runCli(args: string[], io: CliIo = consoleIo, cwd = process.cwd()): number {
  try {
    yargs(args)
      .scriptName('mutrig-sim')
      .option('config', { type: 'string', describe: 'Path to a mutrig.json file' })
      .option('verbose', { type: 'boolean', default: false, describe: 'Log controller events' })
      .command(
        'layout',
        'Print the threshold field tables',
        (y) => y.option('field', { choices: THRESHOLD_FIELDS, describe: 'Only this field' }),
        (argv) => layoutCommand(cwd, argv, io)
      )
      .command(
        'configure <bitstream>',
        'Configure one device and summarize the SPI frames',
        (y) =>
          y
            .positional('bitstream', { type: 'string', demandOption: true })
            .option('device', { type: 'number', default: 0, describe: 'Device id' }),
        (argv) => configureCommand(cwd, argv, io)
      )
      .command(
        'scan <bitstream>',
        'Configure and scan one or all devices',
        (y) =>
          y
            .positional('bitstream', { type: 'string', demandOption: true })
            .option('device', { type: 'number', default: 0, describe: 'Device id' })
            .option('all', { type: 'boolean', default: false, describe: 'Scan every device' })
            .option('field', { choices: THRESHOLD_FIELDS, default: 'tth' as const })
            .option('window', { type: 'number', describe: 'Monitor window in controller cycles' })
            .option('out', { type: 'string', describe: 'Write CSV here' }),
        (argv) => scanCommand(cwd, argv, io)
      )
      .demandCommand(1)
      .strict()
      .exitProcess(false)
      .fail(false)
      .parseSync();
    return 0;
  } catch (err) {
    io.err(`Error: ${getErrorMessage(err)}`);
    return 1;
  }
}

if (require.main === module) {
  process.exitCode = runCli(hideBin(process.argv));
}
