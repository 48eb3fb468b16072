/**
 * @file SPI receiver model tests
 */

import { describe, it, expect } from 'vitest';
import { deriveFieldTable, reverseThreshold } from '../../src/controller/field-layout';
import { MutrigSpiDevice, decodeThresholds, frameToWords } from '../../src/sim/spi-device';
import { SMALL_LAYOUT } from '../support/small-config';

function clockBits(device: MutrigSpiDevice, ssn: number, bits: (0 | 1)[]): void {
  for (const bit of bits) {
    device.sample({ sclk: 0, mosi: bit, ssn });
    device.sample({ sclk: 1, mosi: bit, ssn });
  }
}

describe('MutrigSpiDevice', () => {
  it('captures bits on rising edges while selected', () => {
    const device = new MutrigSpiDevice(1);
    clockBits(device, 0b01, [1, 0, 1]);
    expect(device.frames).toEqual([]);

    device.sample({ sclk: 0, mosi: 0, ssn: 0b11 });
    expect(device.frames).toEqual([[1, 0, 1]]);
    expect(device.lastFrame).toEqual([1, 0, 1]);
  });

  it('ignores traffic for other devices', () => {
    const device = new MutrigSpiDevice(0);
    clockBits(device, 0b01, [1, 1]);
    device.sample({ sclk: 0, mosi: 0, ssn: 0b11 });
    expect(device.frames).toEqual([]);
  });

  it('records no frame for a select without clocks', () => {
    const device = new MutrigSpiDevice(0);
    device.sample({ sclk: 0, mosi: 1, ssn: 0b10 });
    device.sample({ sclk: 0, mosi: 1, ssn: 0b11 });
    expect(device.lastFrame).toBeUndefined();
  });

  it('forgets frames on clear', () => {
    const device = new MutrigSpiDevice(0);
    clockBits(device, 0b10, [1]);
    device.sample({ sclk: 0, mosi: 0, ssn: 0b11 });
    device.clear();
    expect(device.frames).toEqual([]);
  });
});

describe('frameToWords', () => {
  it('maps the first bit on the wire to the highest storage bit', () => {
    const frame = new Array<number>(64).fill(0);
    frame[0] = 1;
    frame[62] = 1;
    expect(Array.from(frameToWords(frame))).toEqual([2, 0x80000000]);
  });
});

describe('decodeThresholds', () => {
  it('reads each channel field from a frame', () => {
    const table = deriveFieldTable(SMALL_LAYOUT, 'tth');
    const storage = new Array<number>(416).fill(0);
    table.forEach((entry) => {
      const stored = reverseThreshold(entry.channel);
      for (let k = 0; k < 6; k += 1) {
        storage[entry.bitStart + k] = (stored >> k) & 1;
      }
    });
    const frame = storage.slice().reverse();

    expect(decodeThresholds(frame, table)).toEqual(Array.from({ length: 32 }, (_, ch) => ch));
  });
});
