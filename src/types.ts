import type { Buffer } from 'node:buffer';

export type HttpMethod = 'GET' | 'PUT' | 'DELETE' | 'POST' | 'PATCH' | 'HEAD' | 'OPTIONS' | 'CONNECT' | 'TRACE';

export interface RequestLine {
  method: HttpMethod | string;
  target: string;
  version: string;
}

export interface StatusLine {
  version: string;
  statusCode: number;
  reason: string;
}

export interface Header {
  name: string;
  value: string;
}

export type Headers = Header[];

export interface HttpRequest {
  type: 'request';
  requestLine: RequestLine;
  headers: Headers;
  body: Buffer;
}

export interface HttpResponse {
  type: 'response';
  statusLine: StatusLine;
  headers: Headers;
  body: Buffer;
}

export type HttpMessage = HttpRequest | HttpResponse;

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export interface DecodeLineResult {
  line: Buffer;
  bytesConsumed: number;
}
