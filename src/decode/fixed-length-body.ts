import { Buffer } from 'node:buffer';

export interface FixedLengthBodyState {
  buffer: Buffer;
  contentLength: number;
  bytesReceived: number;
  /**
   * May be shared with later states and hold more chunks than this state
   * owns; only the first `chunkCount` belong to it.
   */
  bodyChunks: Buffer[];
  chunkCount: number;
  finished: boolean;
}

const EMPTY_BUFFER = Buffer.alloc(0);

export function createFixedLengthBodyState(contentLength: number): FixedLengthBodyState {
  if (!Number.isSafeInteger(contentLength) || contentLength < 0) {
    throw new RangeError(`Invalid content length: ${contentLength}`);
  }

  return {
    buffer: EMPTY_BUFFER,
    contentLength,
    bytesReceived: 0,
    bodyChunks: [],
    chunkCount: 0,
    finished: contentLength === 0,
  };
}

/**
 * Takes at most the bytes still owed to the body; anything past the declared
 * length is returned untouched in `buffer`.
 */
export function decodeFixedLengthBody(
  prev: FixedLengthBodyState,
  input: Buffer,
): FixedLengthBodyState {
  if (prev.finished) {
    return { ...prev, buffer: Buffer.concat([prev.buffer, input]) };
  }

  if (input.length === 0) {
    return prev;
  }

  const remaining = prev.contentLength - prev.bytesReceived;
  const taken = input.length > remaining ? input.subarray(0, remaining) : input;
  const bytesReceived = prev.bytesReceived + taken.length;
  // append in place unless a state derived from `prev` already did
  const bodyChunks = prev.bodyChunks.length === prev.chunkCount
    ? prev.bodyChunks
    : prev.bodyChunks.slice(0, prev.chunkCount);
  bodyChunks.push(taken);

  return {
    buffer: input.subarray(taken.length),
    contentLength: prev.contentLength,
    bytesReceived,
    bodyChunks,
    chunkCount: prev.chunkCount + 1,
    finished: bytesReceived === prev.contentLength,
  };
}

/** Copies the received chunks into a buffer the message owns. */
export function getBody(state: FixedLengthBodyState): Buffer {
  return Buffer.concat(state.bodyChunks.slice(0, state.chunkCount), state.bytesReceived);
}
