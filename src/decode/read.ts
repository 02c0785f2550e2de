import type { Buffer } from 'node:buffer';

import { HttpDecodeError, HttpDecodeErrorCode } from '../errors.js';
import type {
  HttpRequest, HttpResponse, RequestLine, Result, StatusLine,
} from '../types.js';
import { type ByteReader, toBuffer } from './byte-reader.js';
import {
  createRequestState,
  createResponseState,
  decodeRequest,
  decodeResponse,
  endOfInput,
  type HttpState,
  isMessageEnded,
  isMessageFinished,
  toRequest,
  toResponse,
} from './message.js';

export interface ParsedMessage<M> {
  message: M;
  bytesConsumed: number;
}

interface MessageCodec<L, M> {
  create(): HttpState<L>;
  decode(prev: HttpState<L> | null, input: Buffer): HttpState<L>;
  build(state: HttpState<L>): Result<M, HttpDecodeError>;
}

const requestCodec: MessageCodec<RequestLine, HttpRequest> = {
  create: createRequestState,
  decode: decodeRequest,
  build: toRequest,
};

const responseCodec: MessageCodec<StatusLine, HttpResponse> = {
  create: createResponseState,
  decode: decodeResponse,
  build: toResponse,
};

function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function readMessage<L, M>(
  reader: ByteReader,
  codec: MessageCodec<L, M>,
): Promise<Result<M, HttpDecodeError>> {
  let state = codec.create();

  while (!isMessageEnded(state)) {
    let chunk: Buffer | null;
    try {
      chunk = await reader.read();
    } catch (error) {
      return {
        ok: false,
        error: new HttpDecodeError({
          code: HttpDecodeErrorCode.UNEXPECTED_EOF,
          message: `Stream failed before the message was complete: ${formatError(error)}`,
          cause: error,
        }),
      };
    }

    state = chunk === null ? endOfInput(state) : codec.decode(state, chunk);
  }

  if (isMessageFinished(state)) {
    reader.unread(state.buffer);
  }

  return codec.build(state);
}

function parseMessage<L, M>(
  bytes: Uint8Array,
  codec: MessageCodec<L, M>,
): Result<ParsedMessage<M>, HttpDecodeError> {
  const state = endOfInput(codec.decode(null, toBuffer(bytes)));
  const message = codec.build(state);

  if (!message.ok) {
    return message;
  }

  return {
    ok: true,
    value: { message: message.value, bytesConsumed: state.bytesConsumed },
  };
}

/**
 * Reads exactly one request from `reader`. Bytes after the end of the request
 * stay in the reader for the next call.
 */
export function readRequest(reader: ByteReader): Promise<Result<HttpRequest, HttpDecodeError>> {
  return readMessage(reader, requestCodec);
}

export function readResponse(reader: ByteReader): Promise<Result<HttpResponse, HttpDecodeError>> {
  return readMessage(reader, responseCodec);
}

/**
 * Decodes one request from the start of `bytes`, treating the end of `bytes`
 * as the end of the stream.
 */
export function parseRequest(bytes: Uint8Array): Result<ParsedMessage<HttpRequest>, HttpDecodeError> {
  return parseMessage(bytes, requestCodec);
}

export function parseResponse(bytes: Uint8Array): Result<ParsedMessage<HttpResponse>, HttpDecodeError> {
  return parseMessage(bytes, responseCodec);
}
