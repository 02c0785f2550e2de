import * as assert from 'node:assert';
import { Buffer } from 'node:buffer';
import { Duplex, PassThrough } from 'node:stream';
import { describe, it } from 'node:test';
import { setImmediate } from 'node:timers/promises';

import { HttpDecodeErrorCode } from './errors.js';
import { acceptRequest, withContentLength } from './exchange.js';
import { createResponse } from './message/create-message.js';

/**
 * In-process stand-in for a socket: bytes written by the test arrive on the
 * readable side, bytes the exchange writes are collected in `written`.
 */
function createConnection() {
  const incoming = new PassThrough();
  const written: Buffer[] = [];
  const connection = Duplex.from({
    readable: incoming,
    writable: new PassThrough().on('data', (chunk: Buffer) => written.push(chunk)),
  });
  return { connection, incoming, written };
}

describe('withContentLength', () => {
  it('should append content-length computed from the body', () => {
    const response = withContentLength(createResponse({ body: 'hello me' }));

    assert.deepStrictEqual(response.headers, [{ name: 'content-length', value: '8' }]);
  });

  it('should keep an existing content-length of any case', () => {
    const original = createResponse({
      headers: [{ name: 'Content-Length', value: '3' }],
      body: 'hello me',
    });

    assert.strictEqual(withContentLength(original), original);
  });

  it('should not modify the given response', () => {
    const original = createResponse({ statusCode: 204 });
    withContentLength(original);

    assert.deepStrictEqual(original.headers, []);
  });
});

describe('acceptRequest', () => {
  it('should read the request and answer on the same connection', async () => {
    const { connection, incoming, written } = createConnection();
    incoming.write(
      'GET / HTTP/1.1\r\n' +
      'user-agent: test-agent\r\n' +
      'content-length: 11\r\n' +
      'host: 10.0.2.2:8080\r\n' +
      '\r\n' +
      'Hello world',
    );

    const exchange = await acceptRequest(connection);
    assert.ok(exchange.ok);
    if (!exchange.ok) return;
    assert.strictEqual(exchange.value.request.requestLine.target, '/');
    assert.strictEqual(exchange.value.request.body.toString(), 'Hello world');

    const result = await exchange.value.respond(createResponse({ body: 'hello me' }));
    assert.ok(result.ok);
    await setImmediate();

    assert.strictEqual(
      Buffer.concat(written).toString(),
      'HTTP/1.1 200 OK\r\ncontent-length: 8\r\n\r\nhello me',
    );
    connection.destroy();
  });

  it('should serve a pipelined request through the returned reader', async () => {
    const { connection, incoming } = createConnection();
    incoming.end('GET /a HTTP/1.1\r\n\r\nGET /b HTTP/1.1\r\n\r\n');

    const first = await acceptRequest(connection);
    assert.ok(first.ok);
    if (!first.ok) return;

    const second = await acceptRequest(connection, first.value.reader);
    assert.ok(second.ok);
    if (!second.ok) return;

    assert.strictEqual(first.value.request.requestLine.target, '/a');
    assert.strictEqual(second.value.request.requestLine.target, '/b');
    connection.destroy();
  });

  it('should return the decode error for a bad request', async () => {
    const { connection, incoming } = createConnection();
    incoming.end('GET / HTTP/1.1\r\ncontent-length: abc\r\n\r\n');

    const exchange = await acceptRequest(connection);

    assert.strictEqual(exchange.ok, false);
    if (exchange.ok) return;
    assert.strictEqual(exchange.error.code, HttpDecodeErrorCode.INVALID_CONTENT_LENGTH);
    connection.destroy();
  });
});
