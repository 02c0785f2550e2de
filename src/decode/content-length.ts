import { HttpDecodeError, HttpDecodeErrorCode } from '../errors.js';
import { getHeaderValues } from '../headers/headers.js';
import { CONTENT_LENGTH, CONTENT_LENGTH_REG } from '../specs.js';
import {
  err, type Headers, ok, type Result,
} from '../types.js';

export function parseContentLength(value: string): number | null {
  if (!CONTENT_LENGTH_REG.test(value)) {
    return null;
  }
  const length = Number(value);
  return Number.isSafeInteger(length) ? length : null;
}

/**
 * Body length declared by the `content-length` headers, `0` when there are
 * none. Repeated headers are accepted only when they all agree.
 */
export function resolveContentLength(headers: Headers): Result<number, HttpDecodeError> {
  const values = getHeaderValues(headers, CONTENT_LENGTH);
  let contentLength = 0;

  for (const [index, value] of values.entries()) {
    const length = parseContentLength(value);

    if (length === null) {
      return err(new HttpDecodeError({
        code: HttpDecodeErrorCode.INVALID_CONTENT_LENGTH,
        message: `Invalid content-length value: ${JSON.stringify(value)}`,
      }));
    }

    if (index > 0 && length !== contentLength) {
      return err(new HttpDecodeError({
        code: HttpDecodeErrorCode.INVALID_CONTENT_LENGTH,
        message: `Conflicting content-length values: ${values.join(', ')}`,
      }));
    }

    contentLength = length;
  }

  return ok(contentLength);
}
