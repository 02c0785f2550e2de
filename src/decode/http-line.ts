import type { Buffer } from 'node:buffer';

import { CR, LF } from '../specs.js';
import type { DecodeLineResult } from '../types.js';

const enum HttpLineState {
  DATA,
  CR,
}

export type HttpLineOutcome =
  | { type: 'line'; result: DecodeLineResult }
  | { type: 'incomplete'; scannedBytes: number }
  | { type: 'invalid'; reason: string };

/**
 * Scans `buffer` from `offset` for the next CRLF-terminated line.
 *
 * The returned `line` excludes the terminator; `bytesConsumed` includes it.
 * A CR without LF after it, or an LF without CR before it, makes the line invalid.
 * `scannedBytes` skips bytes after `offset` that an earlier `incomplete`
 * outcome already reported as line data.
 */
export function decodeHttpLine(
  buffer: Buffer,
  offset: number = 0,
  scannedBytes: number = 0,
): HttpLineOutcome {
  if (!Number.isInteger(offset) || offset < 0 || offset > buffer.length) {
    throw new RangeError(`offset (${offset}) out of range for buffer length ${buffer.length}`);
  }

  if (!Number.isInteger(scannedBytes) || scannedBytes < 0 || offset + scannedBytes > buffer.length) {
    throw new RangeError(`scannedBytes (${scannedBytes}) out of range for buffer length ${buffer.length}`);
  }

  let state = HttpLineState.DATA;

  for (let cursor = offset + scannedBytes; cursor < buffer.length; cursor++) {
    const byte = buffer[cursor];

    if (state === HttpLineState.DATA) {
      if (byte === CR) {
        state = HttpLineState.CR;
      } else if (byte === LF) {
        return { type: 'invalid', reason: 'LF without preceding CR' };
      }
      continue;
    }

    if (byte !== LF) {
      return { type: 'invalid', reason: 'CR not followed by LF' };
    }

    return {
      type: 'line',
      result: {
        line: buffer.subarray(offset, cursor - 1),
        bytesConsumed: cursor - offset + 1,
      },
    };
  }

  // a trailing CR is rescanned once its LF arrives
  const pending = state === HttpLineState.CR ? 1 : 0;
  return { type: 'incomplete', scannedBytes: buffer.length - offset - pending };
}
