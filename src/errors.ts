export enum HttpDecodeErrorCode {
  MALFORMED_START_LINE = 'MALFORMED_START_LINE',
  MALFORMED_HEADER = 'MALFORMED_HEADER',
  INVALID_CONTENT_LENGTH = 'INVALID_CONTENT_LENGTH',
  UNEXPECTED_EOF = 'UNEXPECTED_EOF',
}

export enum HttpEncodeErrorCode {
  WRITE_FAILED = 'WRITE_FAILED',
}

export interface CustomErrorOptions<C extends string> {
  code: C;
  message?: string;
  cause?: unknown;
}

function createCustomError<C extends string>(defaultMessage: string) {
  return class extends Error {
    public readonly code: C;

    constructor({ code, message, cause }: CustomErrorOptions<C>) {
      super(message ?? defaultMessage, cause === undefined ? undefined : { cause });
      this.name = this.constructor.name;
      this.code = code;
      if (Error.captureStackTrace) {
        Error.captureStackTrace(this, this.constructor);
      }
    }
  };
}

export class HttpDecodeError extends createCustomError<HttpDecodeErrorCode>(
  'Decode Http Error',
) {};

export class HttpEncodeError extends createCustomError<HttpEncodeErrorCode>(
  'Encode Http Error',
) {};

export function isHttpDecodeError(error: unknown): error is HttpDecodeError {
  return error instanceof HttpDecodeError;
}

export function isHttpEncodeError(error: unknown): error is HttpEncodeError {
  return error instanceof HttpEncodeError;
}
