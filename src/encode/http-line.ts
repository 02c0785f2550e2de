import { Buffer } from 'node:buffer';

import { CR, HEADER_TEXT_ENCODING, LF } from '../specs.js';

export function encodeHttpLines(lines: string[]): Buffer {
  if (lines.length === 0) {
    return Buffer.alloc(0);
  }
  const totalLength = lines.reduce(
    (sum, line) => sum + Buffer.byteLength(line, HEADER_TEXT_ENCODING) + 2,
    0,
  );
  const result = Buffer.allocUnsafe(totalLength);
  let offset = 0;
  for (const line of lines) {
    offset += result.write(line, offset, HEADER_TEXT_ENCODING);
    result[offset++] = CR;
    result[offset++] = LF;
  }
  return result;
}
