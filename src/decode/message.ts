import { Buffer } from 'node:buffer';

import { HttpDecodeError, HttpDecodeErrorCode } from '../errors.js';
import { HEADER_TEXT_ENCODING } from '../specs.js';
import type {
  HttpRequest, HttpResponse, RequestLine, Result, StatusLine,
} from '../types.js';
import { resolveContentLength } from './content-length.js';
import {
  createFixedLengthBodyState,
  decodeFixedLengthBody,
  type FixedLengthBodyState,
  getBody,
} from './fixed-length-body.js';
import {
  createHeadersState,
  decodeHeaders,
  type HeadersState,
  isHeadersFinished,
} from './headers.js';
import { decodeHttpLine } from './http-line.js';
import { decodeRequestStartLine, decodeResponseStartLine } from './start-line.js';

const EMPTY_BUFFER = Buffer.alloc(0);

export enum HttpDecodePhase {
  START_LINE = 'start-line',
  HEADERS = 'headers',
  BODY = 'body',
  FINISHED = 'finished',
  ERROR = 'error',
}

export interface HttpState<L> {
  phase: HttpDecodePhase;
  buffer: Buffer;
  startLine: L | null;
  headersState: HeadersState | null;
  bodyState: FixedLengthBodyState | null;
  error: HttpDecodeError | null;
  bytesConsumed: number;
  /** Bytes of a partial start line already checked for CRLF. */
  scannedBytes: number;
}

export type HttpRequestState = HttpState<RequestLine>;
export type HttpResponseState = HttpState<StatusLine>;

type StartLineDecoder<L> = (line: string) => Result<L, HttpDecodeError>;
type PhaseHandler<L> = (state: HttpState<L>) => HttpState<L>;

function createHttpState<L>(): HttpState<L> {
  return {
    phase: HttpDecodePhase.START_LINE,
    buffer: EMPTY_BUFFER,
    startLine: null,
    headersState: null,
    bodyState: null,
    error: null,
    bytesConsumed: 0,
    scannedBytes: 0,
  };
}

export function createRequestState(): HttpRequestState {
  return createHttpState();
}

export function createResponseState(): HttpResponseState {
  return createHttpState();
}

function fail<L>(state: HttpState<L>, error: HttpDecodeError): HttpState<L> {
  return { ...state, phase: HttpDecodePhase.ERROR, error };
}

function handleStartLinePhase<L>(
  state: HttpState<L>,
  decodeStartLine: StartLineDecoder<L>,
): HttpState<L> {
  const outcome = decodeHttpLine(state.buffer, 0, state.scannedBytes);

  if (outcome.type === 'incomplete') {
    return { ...state, scannedBytes: outcome.scannedBytes };
  }

  if (outcome.type === 'invalid') {
    return fail(state, new HttpDecodeError({
      code: HttpDecodeErrorCode.MALFORMED_START_LINE,
      message: `Invalid start line: ${outcome.reason}`,
    }));
  }

  const { line, bytesConsumed } = outcome.result;
  const startLine = decodeStartLine(line.toString(HEADER_TEXT_ENCODING));

  if (!startLine.ok) {
    return fail(state, startLine.error);
  }

  return {
    ...state,
    phase: HttpDecodePhase.HEADERS,
    buffer: state.buffer.subarray(bytesConsumed),
    startLine: startLine.value,
    headersState: createHeadersState(),
    bytesConsumed: state.bytesConsumed + bytesConsumed,
    scannedBytes: 0,
  };
}

function handleHeadersPhase<L>(state: HttpState<L>): HttpState<L> {
  const headersState = decodeHeaders(state.headersState ?? createHeadersState(), state.buffer);

  if (!headersState.ok) {
    return fail(state, headersState.error);
  }

  const { buffer, headers, receivedBytes } = headersState.value;

  if (!isHeadersFinished(headersState.value)) {
    return {
      ...state,
      buffer: EMPTY_BUFFER,
      headersState: { ...headersState.value, buffer },
    };
  }

  const contentLength = resolveContentLength(headers);

  if (!contentLength.ok) {
    return fail(state, contentLength.error);
  }

  return {
    ...state,
    phase: HttpDecodePhase.BODY,
    buffer,
    headersState: { ...headersState.value, buffer: EMPTY_BUFFER },
    bodyState: createFixedLengthBodyState(contentLength.value),
    bytesConsumed: state.bytesConsumed + receivedBytes,
  };
}

function handleBodyPhase<L>(state: HttpState<L>): HttpState<L> {
  const prevBody = state.bodyState ?? createFixedLengthBodyState(0);
  const bodyState = decodeFixedLengthBody(prevBody, state.buffer);

  if (!bodyState.finished) {
    return { ...state, buffer: EMPTY_BUFFER, bodyState };
  }

  return {
    ...state,
    phase: HttpDecodePhase.FINISHED,
    buffer: bodyState.buffer,
    bodyState: { ...bodyState, buffer: EMPTY_BUFFER },
    bytesConsumed: state.bytesConsumed + bodyState.contentLength,
  };
}

function createPhaseHandlers<L>(
  decodeStartLine: StartLineDecoder<L>,
): Map<HttpDecodePhase, PhaseHandler<L>> {
  return new Map<HttpDecodePhase, PhaseHandler<L>>([
    [HttpDecodePhase.START_LINE, (state) => handleStartLinePhase(state, decodeStartLine)],
    [HttpDecodePhase.HEADERS, handleHeadersPhase],
    [HttpDecodePhase.BODY, handleBodyPhase],
  ]);
}

const requestPhaseHandlers = createPhaseHandlers(decodeRequestStartLine);
const responsePhaseHandlers = createPhaseHandlers(decodeResponseStartLine);

function genericDecode<L>(
  prev: HttpState<L>,
  input: Buffer,
  phaseHandlers: Map<HttpDecodePhase, PhaseHandler<L>>,
): HttpState<L> {
  if (prev.phase === HttpDecodePhase.FINISHED || prev.phase === HttpDecodePhase.ERROR) {
    throw new TypeError(`Decoding already ended in phase "${prev.phase}"`);
  }

  let state: HttpState<L> = input.length > 0
    ? { ...prev, buffer: prev.buffer.length === 0 ? input : Buffer.concat([prev.buffer, input]) }
    : prev;

  for (;;) {
    const handler = phaseHandlers.get(state.phase);
    if (!handler) {
      return state;
    }

    const prevPhase = state.phase;
    state = handler(state);

    if (state.phase === prevPhase) {
      return state;
    }
  }
}

/**
 * Feeds one chunk into the request decoder. Pass `null` as `prev` to start a
 * new message. The returned state is `FINISHED` once the whole message has
 * arrived, with any surplus bytes left in `buffer`.
 */
export function decodeRequest(
  prev: HttpRequestState | null,
  input: Buffer,
): HttpRequestState {
  return genericDecode(prev ?? createRequestState(), input, requestPhaseHandlers);
}

export function decodeResponse(
  prev: HttpResponseState | null,
  input: Buffer,
): HttpResponseState {
  return genericDecode(prev ?? createResponseState(), input, responsePhaseHandlers);
}

/** Marks the input as exhausted: an unfinished message becomes `UNEXPECTED_EOF`. */
export function endOfInput<L>(state: HttpState<L>): HttpState<L> {
  if (state.phase === HttpDecodePhase.FINISHED || state.phase === HttpDecodePhase.ERROR) {
    return state;
  }

  const missing = state.phase === HttpDecodePhase.BODY && state.bodyState
    ? `${state.bodyState.contentLength - state.bodyState.bytesReceived} body bytes`
    : `the end of the ${state.phase}`;

  return fail(state, new HttpDecodeError({
    code: HttpDecodeErrorCode.UNEXPECTED_EOF,
    message: `Stream ended before ${missing}`,
  }));
}

export function isMessageFinished<L>(state: HttpState<L>): boolean {
  return state.phase === HttpDecodePhase.FINISHED;
}

export function isMessageEnded<L>(state: HttpState<L>): boolean {
  return state.phase === HttpDecodePhase.FINISHED || state.phase === HttpDecodePhase.ERROR;
}

function toMessage<L, M>(
  state: HttpState<L>,
  build: (startLine: L, rest: Pick<HttpRequest, 'headers' | 'body'>) => M,
): Result<M, HttpDecodeError> {
  if (state.error) {
    return { ok: false, error: state.error };
  }

  if (state.phase !== HttpDecodePhase.FINISHED || !state.startLine || !state.headersState || !state.bodyState) {
    throw new TypeError(`Message not finished, decoder is in phase "${state.phase}"`);
  }

  return {
    ok: true,
    value: build(state.startLine, {
      headers: state.headersState.headers,
      body: getBody(state.bodyState),
    }),
  };
}

export function toRequest(state: HttpRequestState): Result<HttpRequest, HttpDecodeError> {
  return toMessage(state, (requestLine, rest): HttpRequest => ({
    type: 'request',
    requestLine,
    ...rest,
  }));
}

export function toResponse(state: HttpResponseState): Result<HttpResponse, HttpDecodeError> {
  return toMessage(state, (statusLine, rest): HttpResponse => ({
    type: 'response',
    statusLine,
    ...rest,
  }));
}
