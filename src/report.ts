/**
 * @file Plain-text and CSV renderings used by the command line.
 */

import { CHANNELS_PER_DEVICE, SCAN_STEPS } from './controller/constants';
import { FieldTable, ThresholdField } from './controller/field-layout';

const TABLE_COLUMNS = ['ch', 'bitStart', 'bitEnd', 'wordStart', 'wordEnd', 'words', 'offset', 'spill'];

/**
 * Renders a field table with right-aligned columns.
 */
export function formatFieldTable(field: ThresholdField, table: FieldTable): string {
  const rows = table.map((entry) => [
    entry.channel,
    entry.bitStart,
    entry.bitEnd,
    entry.wordStart,
    entry.wordEnd,
    entry.wordCount,
    entry.bitOffset,
    entry.spill,
  ].map(String));
  const widths = TABLE_COLUMNS.map((name, col) =>
    Math.max(name.length, ...rows.map((row) => (row[col] ?? '').length))
  );
  const render = (cells: string[]): string =>
    cells.map((cell, col) => cell.padStart(widths[col] ?? 0)).join('  ');
  return [`${field} field`, render(TABLE_COLUMNS), ...rows.map(render)].join('\n');
}

/**
 * Scan results as CSV, one row per (threshold, device, channel).
 *
 * @param read - Returns the counter snapshot for one entry
 */
export function formatResultsCsv(
  devices: readonly number[],
  read: (threshold: number, deviceId: number, channel: number) => number
): string {
  const lines = ['threshold,device,channel,count'];
  for (let threshold = 0; threshold < SCAN_STEPS; threshold += 1) {
    for (const device of devices) {
      for (let channel = 0; channel < CHANNELS_PER_DEVICE; channel += 1) {
        lines.push(`${threshold},${device},${channel},${read(threshold, device, channel)}`);
      }
    }
  }
  return `${lines.join('\n')}\n`;
}

/**
 * One-line summary of the frames a device captured during a configure run.
 */
export function summarizeFrames(deviceId: number, frames: readonly (readonly number[])[]): string {
  const [first, ...rest] = frames;
  if (first === undefined) {
    return `device ${deviceId}: no frames captured`;
  }
  const lengths = frames.map((frame) => frame.length).join('/');
  const identical = rest.every(
    (frame) => frame.length === first.length && frame.every((bit, i) => bit === first[i])
  );
  return `device ${deviceId}: ${frames.length} frame(s) of ${lengths} bits, ${identical ? 'identical' : 'differing'}`;
}
