export { ByteReader, type ByteSource, createByteReader } from './decode/byte-reader.js';
export { parseContentLength, resolveContentLength } from './decode/content-length.js';
export {
  createRequestState,
  createResponseState,
  decodeRequest,
  decodeResponse,
  endOfInput,
  HttpDecodePhase,
  type HttpRequestState,
  type HttpResponseState,
  type HttpState,
  isMessageEnded,
  isMessageFinished,
  toRequest,
  toResponse,
} from './decode/message.js';
export {
  type ParsedMessage,
  parseRequest,
  parseResponse,
  readRequest,
  readResponse,
} from './decode/read.js';
export { decodeRequestStartLine, decodeResponseStartLine } from './decode/start-line.js';
export { encodeHeaders } from './encode/headers.js';
export { encodeMessage, encodeRequest, encodeResponse } from './encode/message.js';
export { encodeRequestLine, encodeResponseLine } from './encode/start-line.js';
export {
  type ByteSink,
  writeMessage,
  writeRequest,
  writeResponse,
} from './encode/write.js';
export {
  HttpDecodeError,
  HttpDecodeErrorCode,
  HttpEncodeError,
  HttpEncodeErrorCode,
  isHttpDecodeError,
  isHttpEncodeError,
} from './errors.js';
export {
  acceptRequest,
  type Connection,
  type HttpExchange,
  withContentLength,
} from './exchange.js';
export {
  getHeader,
  getHeaderValues,
  hasHeader,
  setHeader,
} from './headers/headers.js';
export {
  type BodyInit,
  createRequest,
  createResponse,
  type RequestInit,
  type ResponseInit,
} from './message/create-message.js';
export type {
  Header,
  Headers,
  HttpMessage,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  RequestLine,
  Result,
  StatusLine,
} from './types.js';
