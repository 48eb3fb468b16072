/**
 * @file Tests for bitstream file parsing
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect } from 'vitest';
import {
  formatBitstreamText,
  loadBitstreamFile,
  parseBitstreamBinary,
  parseBitstreamText,
} from '../../src/config/bitstream-loader';
import { BitstreamParseError, ParseError } from '../../src/errors';

describe('parseBitstreamText', () => {
  it('should read hex words with or without prefix', () => {
    expect(parseBitstreamText('0x1 0x2 # header\nffffffff')).toEqual([1, 2, 0xffffffff]);
  });

  it('should accept commas and semicolon comments', () => {
    expect(parseBitstreamText('1,2 ; two words\n\n  3\r\n')).toEqual([1, 2, 3]);
  });

  it('should report the line of a bad token', () => {
    expect(() => parseBitstreamText('1\nzz')).toThrow(BitstreamParseError);
    expect(() => parseBitstreamText('1\nzz')).toThrow('Invalid bitstream word "zz" on line 2');
  });

  it('should reject words wider than 32 bits', () => {
    expect(() => parseBitstreamText('123456789')).toThrow('Invalid bitstream word "123456789" on line 1');
  });
});

describe('parseBitstreamBinary', () => {
  it('should decode little-endian words', () => {
    const data = new Uint8Array([0x01, 0x00, 0x00, 0x00, 0x78, 0x56, 0x34, 0x12]);
    expect(parseBitstreamBinary(data)).toEqual([1, 0x12345678]);
  });

  it('should reject a partial word', () => {
    expect(() => parseBitstreamBinary(new Uint8Array(3))).toThrow(ParseError);
    expect(() => parseBitstreamBinary(new Uint8Array(3))).toThrow(
      'Binary bitstream length 3 is not a multiple of 4 bytes'
    );
  });
});

describe('formatBitstreamText', () => {
  it('should print eight padded words per line', () => {
    const words = [1, 0xabc, 3, 4, 5, 6, 7, 8, 0xffffffff];
    expect(formatBitstreamText(words)).toBe(
      '00000001 00000abc 00000003 00000004 00000005 00000006 00000007 00000008\nffffffff\n'
    );
    expect(parseBitstreamText(formatBitstreamText(words))).toEqual(words);
  });

  it('should print nothing for no words', () => {
    expect(formatBitstreamText([])).toBe('');
  });
});

describe('loadBitstreamFile', () => {
  it('should pick the format from the extension', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mutrig-bits-'));
    try {
      const bin = path.join(dir, 'cfg.bin');
      const txt = path.join(dir, 'cfg.txt');
      fs.writeFileSync(bin, Buffer.from([0xef, 0xbe, 0xad, 0xde]));
      fs.writeFileSync(txt, 'deadbeef\n');
      expect(loadBitstreamFile(bin)).toEqual([0xdeadbeef]);
      expect(loadBitstreamFile(txt)).toEqual([0xdeadbeef]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
