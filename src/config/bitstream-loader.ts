/**
 * @fileoverview Loaders for configuration bitstream files.
 *
 * Two formats are accepted:
 * - text: 32-bit words as hex (optional `0x` prefix), separated by
 *   whitespace or commas, with `#` and `;` starting a comment;
 * - binary (`.bin`): little-endian 32-bit words.
 */

import * as fs from 'fs';
import * as path from 'path';
import { BitstreamParseError, ParseError } from '../errors';

const HEX_WORD = /^(?:0x)?([0-9a-f]{1,8})$/i;

/**
 * Parses a text bitstream into words.
 *
 * @example
 * ```typescript
 * parseBitstreamText('0x1 0x2 # header\nffffffff'); // [1, 2, 0xffffffff]
 * ```
 */
export function parseBitstreamText(content: string): number[] {
  const words: number[] = [];
  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.replace(/[#;].*$/, '');
    for (const token of line.split(/[\s,]+/)) {
      if (token === '') {
        continue;
      }
      const match = HEX_WORD.exec(token);
      if (match === null || match[1] === undefined) {
        throw new BitstreamParseError(token, index + 1);
      }
      words.push(parseInt(match[1], 16) >>> 0);
    }
  });
  return words;
}

/**
 * Decodes little-endian 32-bit words.
 */
export function parseBitstreamBinary(data: Uint8Array): number[] {
  if (data.length % 4 !== 0) {
    throw new ParseError(`Binary bitstream length ${data.length} is not a multiple of 4 bytes`);
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const words: number[] = [];
  for (let offset = 0; offset < data.length; offset += 4) {
    words.push(view.getUint32(offset, true));
  }
  return words;
}

/**
 * Encodes words as a text bitstream, eight words per line.
 */
export function formatBitstreamText(words: readonly number[]): string {
  const lines: string[] = [];
  for (let i = 0; i < words.length; i += 8) {
    lines.push(
      words
        .slice(i, i + 8)
        .map((word) => (word >>> 0).toString(16).padStart(8, '0'))
        .join(' ')
    );
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}

/**
 * Loads a bitstream file, choosing the format from its extension.
 */
export function loadBitstreamFile(filePath: string): number[] {
  if (path.extname(filePath).toLowerCase() === '.bin') {
    return parseBitstreamBinary(fs.readFileSync(filePath));
  }
  return parseBitstreamText(fs.readFileSync(filePath, 'utf-8'));
}
