import { SP } from '../specs.js';
import type { RequestLine, StatusLine } from '../types.js';

export function encodeRequestLine({ method, target, version }: RequestLine): string {
  return [method, target, version].join(SP);
}

/** An empty reason still gets its separating space: `HTTP/1.1 200 `. */
export function encodeResponseLine({ version, statusCode, reason }: StatusLine): string {
  return [version, String(statusCode), reason].join(SP);
}
