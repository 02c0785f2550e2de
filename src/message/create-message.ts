import { Buffer } from 'node:buffer';
import { STATUS_CODES } from 'node:http';

import { DEFAULT_HTTP_VERSION } from '../specs.js';
import type {
  Headers, HttpMethod, HttpRequest, HttpResponse,
} from '../types.js';

export type BodyInit = Buffer | Uint8Array | string;

export interface RequestInit {
  method?: HttpMethod | string;
  target?: string;
  version?: string;
  headers?: Headers;
  body?: BodyInit;
}

export interface ResponseInit {
  version?: string;
  statusCode?: number;
  reason?: string;
  headers?: Headers;
  body?: BodyInit;
}

function toBody(body: BodyInit | undefined): Buffer {
  if (body === undefined) {
    return Buffer.alloc(0);
  }
  if (typeof body === 'string') {
    return Buffer.from(body, 'utf-8');
  }
  return Buffer.from(body);
}

export function createRequest({
  method = 'GET',
  target = '/',
  version = DEFAULT_HTTP_VERSION,
  headers = [],
  body,
}: RequestInit = {}): HttpRequest {
  return {
    type: 'request',
    requestLine: { method, target, version },
    headers: headers.map((header) => ({ ...header })),
    body: toBody(body),
  };
}

/**
 * `reason` falls back to the canonical phrase for `statusCode`, or `''` if there is none.
 * Throws `RangeError` for a status code that is not a three-digit integer.
 */
export function createResponse({
  version = DEFAULT_HTTP_VERSION,
  statusCode = 200,
  reason,
  headers = [],
  body,
}: ResponseInit = {}): HttpResponse {
  if (!Number.isInteger(statusCode) || statusCode < 100 || statusCode > 999) {
    throw new RangeError(`Invalid status code: ${statusCode}`);
  }

  return {
    type: 'response',
    statusLine: {
      version,
      statusCode,
      reason: reason ?? STATUS_CODES[statusCode] ?? '',
    },
    headers: headers.map((header) => ({ ...header })),
    body: toBody(body),
  };
}
