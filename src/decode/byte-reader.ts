import { Buffer } from 'node:buffer';

export type ByteSource = AsyncIterable<Uint8Array> | Iterable<Uint8Array>;

function isAsyncIterable(value: unknown): value is AsyncIterable<Uint8Array> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.asyncIterator in value
  );
}

async function* toAsyncIterable(source: Iterable<Uint8Array>): AsyncGenerator<Uint8Array> {
  yield* source;
}

export function toBuffer(chunk: Uint8Array): Buffer {
  return Buffer.isBuffer(chunk)
    ? chunk
    : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

/**
 * Pull-based view over a byte source that can hand bytes back.
 *
 * Message readers pull chunks only while a message is incomplete and return
 * whatever they over-read through `unread`, so the next read starts exactly
 * where the previous message ended. The underlying iterator is never closed
 * by the reader; destroying the source is the caller's business.
 */
export class ByteReader {
  private readonly iterator: AsyncIterator<Uint8Array>;

  private readonly pending: Buffer[] = [];

  private done = false;

  constructor(source: ByteSource) {
    const iterable = isAsyncIterable(source) ? source : toAsyncIterable(source);
    this.iterator = iterable[Symbol.asyncIterator]();
  }

  /** Next chunk of bytes, or `null` once the source is exhausted. */
  async read(): Promise<Buffer | null> {
    const pendingChunk = this.pending.shift();
    if (pendingChunk) {
      return pendingChunk;
    }

    if (this.done) {
      return null;
    }

    const next = await this.iterator.next();
    if (next.done) {
      this.done = true;
      return null;
    }

    return toBuffer(next.value);
  }

  unread(chunk: Buffer): void {
    if (chunk.length > 0) {
      this.pending.unshift(chunk);
    }
  }

  get bufferedBytes(): number {
    return this.pending.reduce((sum, chunk) => sum + chunk.length, 0);
  }

  get ended(): boolean {
    return this.done && this.pending.length === 0;
  }
}

export function createByteReader(source: ByteSource): ByteReader {
  return new ByteReader(source);
}
