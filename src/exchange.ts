import { ByteReader } from './decode/byte-reader.js';
import { readRequest } from './decode/read.js';
import { type ByteSink, writeResponse } from './encode/write.js';
import type { HttpDecodeError, HttpEncodeError } from './errors.js';
import { hasHeader } from './headers/headers.js';
import { CONTENT_LENGTH } from './specs.js';
import type { HttpRequest, HttpResponse, Result } from './types.js';

/** A duplex byte stream such as a `net.Socket`. */
export type Connection = AsyncIterable<Uint8Array> & ByteSink;

export interface HttpExchange {
  readonly request: HttpRequest;
  /** Positioned after `request`; pass it back to `acceptRequest` for a pipelined request. */
  readonly reader: ByteReader;
  respond(response: HttpResponse): Promise<Result<void, HttpEncodeError>>;
}

export function withContentLength(response: HttpResponse): HttpResponse {
  if (hasHeader(response.headers, CONTENT_LENGTH)) {
    return response;
  }
  return {
    ...response,
    headers: [
      ...response.headers,
      { name: CONTENT_LENGTH, value: String(response.body.length) },
    ],
  };
}

/**
 * Reads one request from `connection` and pairs it with a way to answer on
 * the same connection.
 */
export async function acceptRequest(
  connection: Connection,
  reader: ByteReader = new ByteReader(connection),
): Promise<Result<HttpExchange, HttpDecodeError>> {
  const request = await readRequest(reader);

  if (!request.ok) {
    return request;
  }

  return {
    ok: true,
    value: {
      request: request.value,
      reader,
      respond: (response) => writeResponse(connection, withContentLength(response)),
    },
  };
}
