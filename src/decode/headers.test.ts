import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { describe, it } from 'node:test';

import { type HttpDecodeError, HttpDecodeErrorCode } from '../errors.js';
import type { Result } from '../types.js';
import {
  createHeadersState,
  decodeHeaderLine,
  decodeHeaders,
  HeadersDecodePhase,
  type HeadersState,
  isHeadersFinished,
} from './headers.js';

function unwrap<T>(result: Result<T, HttpDecodeError>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function unwrapError<T>(result: Result<T, HttpDecodeError>): HttpDecodeError {
  if (result.ok) {
    throw new assert.AssertionError({ message: 'expected a decode failure' });
  }
  return result.error;
}

describe('decodeHeaderLine', () => {
  it('should split on the first colon and keep the name case', () => {
    assert.deepStrictEqual(
      unwrap(decodeHeaderLine(Buffer.from('Host: 10.0.2.2:8080'))),
      { name: 'Host', value: '10.0.2.2:8080' },
    );
  });

  it('should trim spaces and tabs around the value', () => {
    assert.deepStrictEqual(
      unwrap(decodeHeaderLine(Buffer.from('X-Pad:\t  padded value \t'))),
      { name: 'X-Pad', value: 'padded value' },
    );
  });

  it('should accept an empty value', () => {
    assert.deepStrictEqual(
      unwrap(decodeHeaderLine(Buffer.from('X-Empty:'))),
      { name: 'X-Empty', value: '' },
    );
  });

  it('should decode the value as UTF-8', () => {
    const header = unwrap(decodeHeaderLine(Buffer.from([0x58, 0x3a, 0x20, 0x35, 0x20, 0xe2, 0x82, 0xac])));
    assert.strictEqual(header.value, '5 €');
  });

  it('should reject a line without a colon', () => {
    const error = unwrapError(decodeHeaderLine(Buffer.from('host 10.0.2.2')));
    assert.strictEqual(error.code, HttpDecodeErrorCode.MALFORMED_HEADER);
    assert.strictEqual(error.message, 'Header missing ":" separator');
  });

  it('should reject a name containing a space', () => {
    const error = unwrapError(decodeHeaderLine(Buffer.from('host 10.0.2.2:8080')));
    assert.strictEqual(error.code, HttpDecodeErrorCode.MALFORMED_HEADER);
    assert.strictEqual(error.message, 'Invalid characters in header name: "host 10.0.2.2"');
  });

  it('should reject whitespace before the colon', () => {
    const error = unwrapError(decodeHeaderLine(Buffer.from('Host : example.com')));
    assert.strictEqual(error.code, HttpDecodeErrorCode.MALFORMED_HEADER);
  });

  it('should reject an empty name', () => {
    const error = unwrapError(decodeHeaderLine(Buffer.from(': value')));
    assert.strictEqual(error.code, HttpDecodeErrorCode.MALFORMED_HEADER);
    assert.strictEqual(error.message, 'Header name is empty');
  });
});

describe('decodeHeaders', () => {
  it('should start in the line phase with no headers', () => {
    const state = createHeadersState();

    assert.strictEqual(state.phase, HeadersDecodePhase.LINE);
    assert.deepStrictEqual(state.headers, []);
    assert.strictEqual(state.buffer.length, 0);
    assert.strictEqual(state.receivedBytes, 0);
    assert.strictEqual(state.scannedBytes, 0);
  });

  it('should finish on the empty line and leave the rest in buffer', () => {
    const state = unwrap(decodeHeaders(
      createHeadersState(),
      Buffer.from('Host: example.com\r\nAccept: */*\r\n\r\nbody'),
    ));

    assert.ok(isHeadersFinished(state));
    assert.deepStrictEqual(state.headers, [
      { name: 'Host', value: 'example.com' },
      { name: 'Accept', value: '*/*' },
    ]);
    assert.strictEqual(state.buffer.toString(), 'body');
    assert.strictEqual(state.receivedBytes, 34);
  });

  it('should keep duplicates in arrival order without merging', () => {
    const state = unwrap(decodeHeaders(
      createHeadersState(),
      Buffer.from('Set-Cookie: a=1\r\nX-Other: x\r\nset-cookie: b=2\r\n\r\n'),
    ));

    assert.deepStrictEqual(state.headers, [
      { name: 'Set-Cookie', value: 'a=1' },
      { name: 'X-Other', value: 'x' },
      { name: 'set-cookie', value: 'b=2' },
    ]);
  });

  it('should resume a line split across chunks', () => {
    let state: HeadersState = unwrap(decodeHeaders(createHeadersState(), Buffer.from('Content-Ty')));
    assert.strictEqual(state.phase, HeadersDecodePhase.LINE);
    assert.deepStrictEqual(state.headers, []);
    assert.strictEqual(state.buffer.toString(), 'Content-Ty');
    assert.strictEqual(state.scannedBytes, 10);

    state = unwrap(decodeHeaders(state, Buffer.from('pe: text/plain\r')));
    assert.strictEqual(state.phase, HeadersDecodePhase.LINE);
    assert.strictEqual(state.scannedBytes, 24);

    state = unwrap(decodeHeaders(state, Buffer.from('\n\r\n')));
    assert.strictEqual(state.phase, HeadersDecodePhase.DONE);
    assert.deepStrictEqual(state.headers, [{ name: 'Content-Type', value: 'text/plain' }]);
    assert.strictEqual(state.receivedBytes, 28);
  });

  it('should not change the previous state', () => {
    const first = unwrap(decodeHeaders(createHeadersState(), Buffer.from('A: 1\r\n')));
    unwrap(decodeHeaders(first, Buffer.from('B: 2\r\n')));

    assert.deepStrictEqual(first.headers, [{ name: 'A', value: '1' }]);
  });

  it('should fail on a header line without colon instead of skipping it', () => {
    const error = unwrapError(decodeHeaders(
      createHeadersState(),
      Buffer.from('user-agent: test\r\nhost 10.0.2.2:8080\r\n\r\n'),
    ));
    assert.strictEqual(error.code, HttpDecodeErrorCode.MALFORMED_HEADER);
  });

  it('should fail on a bare LF', () => {
    const error = unwrapError(decodeHeaders(createHeadersState(), Buffer.from('A: 1\nB: 2\r\n')));
    assert.strictEqual(error.code, HttpDecodeErrorCode.MALFORMED_HEADER);
    assert.strictEqual(error.message, 'Invalid header line: LF without preceding CR');
  });

  it('should throw when fed after finishing', () => {
    const state = unwrap(decodeHeaders(createHeadersState(), Buffer.from('\r\n')));
    assert.throws(() => decodeHeaders(state, Buffer.from('A: 1\r\n')), TypeError);
  });
});
