import { Buffer } from 'node:buffer';
import { once } from 'node:events';
import * as net from 'node:net';

import {
  acceptRequest,
  ByteReader,
  createResponse,
  encodeRequest,
  readResponse,
} from '../src/index.js';

const incomingRequest = Buffer.from(
  'GET / HTTP/1.1\r\n' +
  'user-agent: loopback-example\r\n' +
  'content-type: text/plain; charset=utf-8\r\n' +
  'accept-encoding: gzip\r\n' +
  'content-length: 11\r\n' +
  'host: 127.0.0.1\r\n' +
  '\r\n' +
  'Hello world',
);

async function handleConnection(socket: net.Socket) {
  const exchange = await acceptRequest(socket);
  if (!exchange.ok) {
    console.error('request rejected:', exchange.error.code, exchange.error.message);
    socket.destroy();
    return;
  }

  console.log(encodeRequest(exchange.value.request).toString());

  const written = await exchange.value.respond(createResponse({ body: 'hello me' }));
  if (!written.ok) {
    console.error('response failed:', written.error.message);
  }
  socket.end();
}

const server = net.createServer((socket) => {
  socket.on('error', (error) => console.error('server socket error:', error.message));
  handleConnection(socket).catch((error: unknown) => {
    console.error('connection failed:', error);
    socket.destroy();
  });
});

server.listen(0, '127.0.0.1');
await once(server, 'listening');

const address = server.address();
if (address === null || typeof address === 'string') {
  throw new Error('server is not listening on a TCP port');
}

const client = net.connect(address.port, '127.0.0.1');
await once(client, 'connect');
client.write(incomingRequest);

const response = await readResponse(new ByteReader(client));
if (response.ok) {
  const { statusLine, body } = response.value;
  console.log(`${statusLine.statusCode} ${statusLine.reason}: ${body.toString()}`);
} else {
  console.error('response rejected:', response.error.code, response.error.message);
}

client.destroy();
server.close();
