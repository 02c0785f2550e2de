import { Buffer } from 'node:buffer';

import type {
  HttpMessage, HttpRequest, HttpResponse,
} from '../types.js';
import { encodeHeaderLines } from './headers.js';
import { encodeHttpLines } from './http-line.js';
import { encodeRequestLine, encodeResponseLine } from './start-line.js';

function encodeHead(startLine: string, message: HttpMessage): Buffer {
  return encodeHttpLines([
    startLine,
    ...encodeHeaderLines(message.headers),
    '',
  ]);
}

/**
 * Serializes a request as `start line CRLF *(header CRLF) CRLF body`.
 * No header is injected and the body is not checked against `content-length`.
 */
export function encodeRequest(request: HttpRequest): Buffer {
  const head = encodeHead(encodeRequestLine(request.requestLine), request);
  return Buffer.concat([head, request.body], head.length + request.body.length);
}

export function encodeResponse(response: HttpResponse): Buffer {
  const head = encodeHead(encodeResponseLine(response.statusLine), response);
  return Buffer.concat([head, response.body], head.length + response.body.length);
}

export function encodeMessage(message: HttpMessage): Buffer {
  return message.type === 'request'
    ? encodeRequest(message)
    : encodeResponse(message);
}
