import type * as net from 'node:net';
import { classifyConnectError, connectUpstream } from '../upstream/connector';
import {
  ConnectTimeoutError,
  ConnectionRefusedError,
  DnsFailureError,
} from '../errors';
import { closedPort, listen, type TestServer } from './helpers/net';

function errno(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(code), { code });
}

const failingLookup = (code: string): net.LookupFunction => (hostname, _options, callback) => {
  callback(Object.assign(new Error(`getaddrinfo ${code} ${hostname}`), { code }), '', 4);
};

describe('classifyConnectError', () => {
  it.each(['ENOTFOUND', 'EAI_AGAIN'])('maps %s to a DNS failure', (code) => {
    const error = classifyConnectError(errno(code), 'nowhere.test', 80, 1_000);
    expect(error).toBeInstanceOf(DnsFailureError);
    expect(error.code).toBe('DNS_FAILURE');
    expect(error.status).toBe(502);
  });

  it('maps ETIMEDOUT to a connect timeout', () => {
    expect(classifyConnectError(errno('ETIMEDOUT'), 'slow.test', 80, 1_000)).toBeInstanceOf(
      ConnectTimeoutError,
    );
  });

  it('maps other errnos to a refused connection and keeps the errno', () => {
    const error = classifyConnectError(errno('EHOSTUNREACH'), 'far.test', 80, 1_000);
    expect(error).toBeInstanceOf(ConnectionRefusedError);
    expect(error.code).toBe('CONNECTION_REFUSED');
    expect(error.message).toBe('Connection to far.test:80 failed (EHOSTUNREACH)');
  });

  it('looks inside aggregate errors', () => {
    const error = classifyConnectError(
      new AggregateError([errno('ECONNREFUSED'), errno('ECONNREFUSED')]),
      'localhost',
      81,
      1_000,
    );
    expect(error.message).toBe('Connection to localhost:81 refused');
  });
});

describe('connectUpstream', () => {
  let server: TestServer | undefined;

  afterEach(async () => {
    await server?.close();
    server = undefined;
  });

  it('resolves with a connected socket', async () => {
    server = await listen((socket) => socket.end('hello'));

    const socket = await connectUpstream({ host: '127.0.0.1', port: server.port, timeoutMs: 1_000 });
    const received = await new Promise<string>((resolve) => {
      let text = '';
      socket.on('data', (chunk: Buffer) => (text += chunk.toString()));
      socket.on('end', () => resolve(text));
    });

    expect(received).toBe('hello');
    socket.destroy();
  });

  it('reports a refused connection', async () => {
    const port = await closedPort();
    await expect(connectUpstream({ host: '127.0.0.1', port, timeoutMs: 1_000 })).rejects.toBeInstanceOf(
      ConnectionRefusedError,
    );
  });

  it('reports a DNS failure from the resolver', async () => {
    await expect(
      connectUpstream({
        host: 'nowhere.invalid',
        port: 80,
        timeoutMs: 1_000,
        lookup: failingLookup('ENOTFOUND'),
      }),
    ).rejects.toBeInstanceOf(DnsFailureError);
  });

  it('times out when the connection does not complete', async () => {
    const hangingLookup: net.LookupFunction = () => {};
    const attempt = connectUpstream({ host: 'slow.test', port: 80, timeoutMs: 50, lookup: hangingLookup });

    await expect(attempt).rejects.toBeInstanceOf(ConnectTimeoutError);
    await expect(attempt).rejects.toThrow('Connecting to slow.test:80 timed out after 50ms');
  });
});
