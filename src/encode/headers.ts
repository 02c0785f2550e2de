import type { Buffer } from 'node:buffer';

import type { Headers } from '../types.js';
import { encodeHttpLines } from './http-line.js';

export function encodeHeaderLines(headers: Headers): string[] {
  return headers.map(({ name, value }) => `${name}: ${value}`);
}

/** Header lines in stored order, each CRLF-terminated. Nothing is added or merged. */
export function encodeHeaders(headers: Headers): Buffer {
  return encodeHttpLines(encodeHeaderLines(headers));
}
