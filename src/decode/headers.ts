import { Buffer } from 'node:buffer';

import {
  HttpDecodeError,
  HttpDecodeErrorCode,
} from '../errors.js';
import { COLON, HEADER_TEXT_ENCODING, TOKEN_REG } from '../specs.js';
import {
  err, type Header, type Headers, ok, type Result,
} from '../types.js';
import { decodeHttpLine } from './http-line.js';

const OWS_REG = /^[ \t]+|[ \t]+$/g;

export enum HeadersDecodePhase {
  LINE = 'line',
  DONE = 'done',
}

export interface HeadersState {
  buffer: Buffer;
  phase: HeadersDecodePhase;
  headers: Headers;
  receivedBytes: number;
  /** Bytes of the partial line in `buffer` already checked for CRLF. */
  scannedBytes: number;
}

function malformed(message: string): { ok: false; error: HttpDecodeError } {
  return err(new HttpDecodeError({
    code: HttpDecodeErrorCode.MALFORMED_HEADER,
    message,
  }));
}

export function decodeHeaderLine(line: Buffer): Result<Header, HttpDecodeError> {
  const colonIndex = line.indexOf(COLON);

  if (colonIndex < 0) {
    return malformed('Header missing ":" separator');
  }

  if (colonIndex === 0) {
    return malformed('Header name is empty');
  }

  const name = line.subarray(0, colonIndex).toString(HEADER_TEXT_ENCODING);

  if (!TOKEN_REG.test(name)) {
    return malformed(`Invalid characters in header name: ${JSON.stringify(name)}`);
  }

  const value = line
    .subarray(colonIndex + 1)
    .toString(HEADER_TEXT_ENCODING)
    .replace(OWS_REG, '');

  return ok({ name, value });
}

export function createHeadersState(): HeadersState {
  return {
    buffer: Buffer.alloc(0),
    phase: HeadersDecodePhase.LINE,
    headers: [],
    receivedBytes: 0,
    scannedBytes: 0,
  };
}

/**
 * Consumes header lines until the empty line that ends the block. Bytes that
 * follow the block are left in `buffer` of the returned state.
 */
export function decodeHeaders(
  prev: HeadersState,
  input: Buffer,
): Result<HeadersState, HttpDecodeError> {
  if (prev.phase === HeadersDecodePhase.DONE) {
    throw new TypeError('Headers decoding already finished');
  }

  const buffer = prev.buffer.length === 0 ? input : Buffer.concat([prev.buffer, input]);
  let { headers, receivedBytes, scannedBytes } = prev;
  let offset = 0;

  while (offset < buffer.length) {
    const outcome = decodeHttpLine(buffer, offset, scannedBytes);

    if (outcome.type === 'incomplete') {
      scannedBytes = outcome.scannedBytes;
      break;
    }

    if (outcome.type === 'invalid') {
      return malformed(`Invalid header line: ${outcome.reason}`);
    }

    const { line, bytesConsumed } = outcome.result;
    offset += bytesConsumed;
    receivedBytes += bytesConsumed;
    scannedBytes = 0;

    if (line.length === 0) {
      return ok({
        buffer: buffer.subarray(offset),
        phase: HeadersDecodePhase.DONE,
        headers,
        receivedBytes,
        scannedBytes,
      });
    }

    const header = decodeHeaderLine(line);
    if (!header.ok) {
      return header;
    }
    if (headers === prev.headers) {
      headers = [...prev.headers];
    }
    headers.push(header.value);
  }

  return ok({
    buffer: buffer.subarray(offset),
    phase: HeadersDecodePhase.LINE,
    headers,
    receivedBytes,
    scannedBytes,
  });
}

export function isHeadersFinished(state: HeadersState): boolean {
  return state.phase === HeadersDecodePhase.DONE;
}
