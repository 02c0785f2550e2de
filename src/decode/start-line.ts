import { HttpDecodeError, HttpDecodeErrorCode } from '../errors.js';
import {
  HTTP_VERSION_REG, SP, STATUS_CODE_REG, TOKEN_REG,
} from '../specs.js';
import {
  err, ok, type RequestLine, type Result, type StatusLine,
} from '../types.js';

const ERROR_PREVIEW_LENGTH = 50;

function createErrorPreview(str: string, maxLength: number = ERROR_PREVIEW_LENGTH): string {
  return str.length > maxLength
    ? `${str.substring(0, maxLength)}...`
    : str;
}

function malformed(message: string): { ok: false; error: HttpDecodeError } {
  return err(new HttpDecodeError({
    code: HttpDecodeErrorCode.MALFORMED_START_LINE,
    message,
  }));
}

export function decodeRequestStartLine(str: string): Result<RequestLine, HttpDecodeError> {
  const firstSpace = str.indexOf(SP);
  const secondSpace = firstSpace < 0 ? -1 : str.indexOf(SP, firstSpace + 1);

  if (secondSpace < 0) {
    return malformed(`Request line needs method, target and version: "${createErrorPreview(str)}"`);
  }

  const method = str.slice(0, firstSpace);
  const target = str.slice(firstSpace + 1, secondSpace);
  const version = str.slice(secondSpace + 1);

  if (!TOKEN_REG.test(method)) {
    return malformed(`Invalid request method: "${createErrorPreview(method)}"`);
  }

  if (target === '') {
    return malformed('Request target is empty');
  }

  if (!HTTP_VERSION_REG.test(version)) {
    return malformed(`Unsupported HTTP version: "${createErrorPreview(version)}"`);
  }

  return ok({ method, target, version });
}

/**
 * Only the splits after the version and the status code are strict; whatever
 * follows the second space, spaces included, is the reason phrase. A missing
 * reason decodes as `''`.
 */
export function decodeResponseStartLine(str: string): Result<StatusLine, HttpDecodeError> {
  const firstSpace = str.indexOf(SP);

  if (firstSpace < 0) {
    return malformed(`Status line needs version and status code: "${createErrorPreview(str)}"`);
  }

  const version = str.slice(0, firstSpace);
  const rest = str.slice(firstSpace + 1);
  const secondSpace = rest.indexOf(SP);
  const statusCodeStr = secondSpace < 0 ? rest : rest.slice(0, secondSpace);
  const reason = secondSpace < 0 ? '' : rest.slice(secondSpace + 1);

  if (!HTTP_VERSION_REG.test(version)) {
    return malformed(`Unsupported HTTP version: "${createErrorPreview(version)}"`);
  }

  if (!STATUS_CODE_REG.test(statusCodeStr)) {
    return malformed(`Invalid HTTP status code: "${createErrorPreview(statusCodeStr)}"`);
  }

  return ok({
    version,
    statusCode: Number(statusCodeStr),
    reason,
  });
}
