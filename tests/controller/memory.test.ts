/**
 * @file Configuration, mirror and result store tests
 */

import { describe, it, expect } from 'vitest';
import { ConfigStore, MirrorStore, ResultStore } from '../../src/controller/memory';

describe('ConfigStore', () => {
  it('commits the data mover write when both ports write in one cycle', () => {
    const store = new ConfigStore(2, 16);
    store.requestWrite('pattern-modifier', 3, 5);
    store.requestWrite('data-mover', 4, 7);

    expect(store.commit()).toBe('data-mover');
    expect(store.readWord(4)).toBe(7);
    expect(store.readWord(3)).toBe(0);
  });

  it('commits a lone pattern modifier write', () => {
    const store = new ConfigStore(2, 16);
    store.requestWrite('pattern-modifier', 3, 5);
    expect(store.commit()).toBe('pattern-modifier');
    expect(store.readWord(3)).toBe(5);
    expect(store.commit()).toBeUndefined();
  });

  it('reads bit b from word b >> 5', () => {
    const store = new ConfigStore(1, 4);
    store.loadPartition(0, [0, 0x80000001]);
    expect(store.readBit(32)).toBe(1);
    expect(store.readBit(33)).toBe(0);
    expect(store.readBit(63)).toBe(1);
  });

  it('lays partitions out back to back', () => {
    const store = new ConfigStore(3, 16);
    expect(store.sizeWords).toBe(48);
    expect(store.partitionBase(2)).toBe(32);
    store.loadPartition(2, [9, 8]);
    expect(store.readWord(32)).toBe(9);
    expect(Array.from(store.partition(2).slice(0, 3))).toEqual([9, 8, 0]);
  });

  it('clears contents on reset', () => {
    const store = new ConfigStore(1, 4);
    store.loadPartition(0, [1, 2, 3, 4]);
    store.reset();
    expect(Array.from(store.partition(0))).toEqual([0, 0, 0, 0]);
  });
});

describe('MirrorStore', () => {
  it('shadows writes and ignores addresses outside it', () => {
    const mirror = new MirrorStore(4);
    mirror.write(2, 0xdeadbeef);
    mirror.write(9, 1);
    expect(mirror.peek(2)).toBe(0xdeadbeef);
    expect(mirror.peek(9)).toBe(0);
  });
});

describe('ResultStore', () => {
  it('indexes by threshold, device and channel', () => {
    const results = new ResultStore(2);
    expect(results.size).toBe(4096);
    expect(results.indexOf(3, 1, 5)).toBe(229);
    results.write(3, 1, 5, 42);
    expect(results.read(229)).toBe(42);
  });

  it('reads 0 outside the region', () => {
    const results = new ResultStore(2);
    expect(results.read(-1)).toBe(0);
    expect(results.read(4096)).toBe(0);
  });
});
