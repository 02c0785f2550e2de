import { HttpEncodeError, HttpEncodeErrorCode } from '../errors.js';
import {
  err, type HttpMessage, type HttpRequest, type HttpResponse, ok, type Result,
} from '../types.js';
import { encodeMessage } from './message.js';

/** The part of a Node `Writable` the writer relies on. */
export interface ByteSink {
  write(chunk: Uint8Array, callback: (error?: Error | null) => void): boolean;
  readonly destroyed?: boolean;
  readonly writableEnded?: boolean;
}

function writeFailed(message: string, cause?: unknown): { ok: false; error: HttpEncodeError } {
  return err(new HttpEncodeError({
    code: HttpEncodeErrorCode.WRITE_FAILED,
    message,
    cause,
  }));
}

function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Writes the serialized message to `sink` and settles once the sink reports
 * the chunk as flushed. `error` events of a `Writable` sink still need a
 * listener on the caller's side.
 */
export function writeMessage(
  sink: ByteSink,
  message: HttpMessage,
): Promise<Result<void, HttpEncodeError>> {
  if (sink.destroyed || sink.writableEnded) {
    return Promise.resolve(writeFailed('Sink is no longer writable'));
  }

  const bytes = encodeMessage(message);

  return new Promise((resolve) => {
    try {
      sink.write(bytes, (error) => {
        resolve(error
          ? writeFailed(`Write failed: ${formatError(error)}`, error)
          : ok(undefined));
      });
    } catch (error) {
      resolve(writeFailed(`Write failed: ${formatError(error)}`, error));
    }
  });
}

export function writeRequest(
  sink: ByteSink,
  request: HttpRequest,
): Promise<Result<void, HttpEncodeError>> {
  return writeMessage(sink, request);
}

export function writeResponse(
  sink: ByteSink,
  response: HttpResponse,
): Promise<Result<void, HttpEncodeError>> {
  return writeMessage(sink, response);
}
