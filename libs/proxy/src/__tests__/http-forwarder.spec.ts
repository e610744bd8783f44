import { forwardHttpRequest, responseFraming } from '../relay/http-forwarder';
import { parseRequestHead } from '../http/request-parser';
import { buildUpstreamRequestHead } from '../http/headers';
import { UpstreamClosedError, UpstreamTimeoutError } from '../errors';
import { readBytes, readUntil, socketPair, type SocketPair } from './helpers/net';

const parse = (text: string) => parseRequestHead(Buffer.from(text, 'latin1'));

describe('responseFraming', () => {
  const head = (text: string) => Buffer.from(text, 'latin1');

  it('expects head plus Content-Length bytes', () => {
    const h = head('HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\n');
    expect(responseFraming(h, 200, 'GET')).toEqual({ expectedBytes: h.length + 5 });
  });

  it('reads until close for chunked responses', () => {
    const h = head('HTTP/1.1 200 OK\r\nTransfer-Encoding: chunked\r\nContent-Length: 5\r\n\r\n');
    expect(responseFraming(h, 200, 'GET')).toEqual({ expectedBytes: null });
  });

  it('expects no body for HEAD, 204 and 304', () => {
    const h = head('HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\n');
    expect(responseFraming(h, 200, 'HEAD')).toEqual({ expectedBytes: h.length });
    expect(responseFraming(h, 204, 'GET')).toEqual({ expectedBytes: h.length });
    expect(responseFraming(h, 304, 'GET')).toEqual({ expectedBytes: h.length });
  });

  it('reads until close without a length', () => {
    expect(responseFraming(head('HTTP/1.0 200 OK\r\n\r\n'), 200, 'GET')).toEqual({ expectedBytes: null });
  });
});

describe('forwardHttpRequest', () => {
  let downstream: SocketPair;
  let upstream: SocketPair;

  beforeEach(async () => {
    downstream = await socketPair();
    upstream = await socketPair();
  });

  afterEach(async () => {
    await downstream.close();
    await upstream.close();
  });

  const request = parse(
    'GET http://example.com/hello HTTP/1.1\r\nHost: example.com\r\nProxy-Connection: keep-alive\r\n\r\n',
  );
  const expectedHead = 'GET /hello HTTP/1.1\r\nHost: example.com\r\nConnection: close\r\n\r\n';

  it('sends the rewritten head and relays a Content-Length response byte for byte', async () => {
    const response = 'HTTP/1.1 200 OK\r\nContent-Length: 5\r\n\r\nhello';
    const destination = upstream.accepted;
    const received = readUntil(destination, '\r\n\r\n').then((data) => {
      destination.write(response);
      return data;
    });

    const forwarding = forwardHttpRequest({
      request,
      client: downstream.accepted,
      upstream: upstream.client,
      idleTimeoutMs: 2_000,
    });
    const clientGot = readBytes(downstream.client, response.length);

    const result = await forwarding;
    expect((await received).toString('latin1')).toBe(expectedHead);
    expect((await clientGot).toString('latin1')).toBe(response);

    expect(buildUpstreamRequestHead(request)).toBe(expectedHead);
    expect(result.error).toBeUndefined();
    expect(result.requestHead).toBe(expectedHead);
    expect(result.status).toBe(200);
    expect(result.statusLine).toBe('HTTP/1.1 200 OK');
    expect(result.bytesSent).toBe(expectedHead.length);
    expect(result.bytesReceived).toBe(response.length);
    expect(result.ttfbMs).not.toBeNull();
  });

  it('relays a close-delimited response until the upstream ends', async () => {
    const response = 'HTTP/1.0 200 OK\r\nContent-Type: text/plain\r\n\r\nstreamed body';
    const destination = upstream.accepted;
    void readUntil(destination, '\r\n\r\n').then(() => destination.end(response));

    const result = await forwardHttpRequest({
      request,
      client: downstream.accepted,
      upstream: upstream.client,
      idleTimeoutMs: 2_000,
    });

    expect(result.error).toBeUndefined();
    expect(result.bytesReceived).toBe(response.length);
  });

  it('streams the request body after the head', async () => {
    const post = parse('POST /submit HTTP/1.1\r\nHost: example.com\r\nContent-Length: 6\r\n\r\n');
    const postHead = 'POST /submit HTTP/1.1\r\nHost: example.com\r\nContent-Length: 6\r\nConnection: close\r\n\r\n';
    const destination = upstream.accepted;
    const received = readUntil(destination, 'abcdef').then((data) => {
      destination.end('HTTP/1.1 204 No Content\r\n\r\n');
      return data;
    });

    const forwarding = forwardHttpRequest({
      request: post,
      client: downstream.accepted,
      upstream: upstream.client,
      body: Buffer.from('abc'),
      idleTimeoutMs: 2_000,
    });
    downstream.client.write('def');

    const result = await forwarding;
    expect((await received).toString('latin1')).toBe(`${postHead}abcdef`);
    expect(result.status).toBe(204);
    expect(result.bytesSent).toBe(postHead.length + 6);
  });

  it('reports the final status after an interim 100 Continue', async () => {
    const put = parse('PUT /upload HTTP/1.1\r\nHost: example.com\r\nExpect: 100-continue\r\nContent-Length: 2\r\n\r\n');
    const response = 'HTTP/1.1 100 Continue\r\n\r\nHTTP/1.1 200 OK\r\nContent-Length: 2\r\n\r\nok';
    const destination = upstream.accepted;
    void readUntil(destination, '\r\n\r\n').then(() => destination.write(response));

    const forwarding = forwardHttpRequest({
      request: put,
      client: downstream.accepted,
      upstream: upstream.client,
      idleTimeoutMs: 2_000,
    });
    const clientGot = readBytes(downstream.client, response.length);

    const result = await forwarding;
    expect((await clientGot).toString('latin1')).toBe(response);
    expect(result.error).toBeUndefined();
    expect(result.status).toBe(200);
    expect(result.statusLine).toBe('HTTP/1.1 200 OK');
    expect(result.bytesReceived).toBe(response.length);
  });

  it('fails with UpstreamClosedError when no response arrives', async () => {
    const destination = upstream.accepted;
    void readUntil(destination, '\r\n\r\n').then(() => destination.end());

    const result = await forwardHttpRequest({
      request,
      client: downstream.accepted,
      upstream: upstream.client,
      idleTimeoutMs: 2_000,
    });

    expect(result.error).toBeInstanceOf(UpstreamClosedError);
    expect(result.error?.message).toBe('Upstream closed without sending a response');
    expect(result.bytesReceived).toBe(0);
    expect(result.status).toBe(0);
  });

  it('fails when the upstream closes short of Content-Length', async () => {
    const destination = upstream.accepted;
    const partial = 'HTTP/1.1 200 OK\r\nContent-Length: 10\r\n\r\nhalf';
    void readUntil(destination, '\r\n\r\n').then(() => destination.end(partial));

    const result = await forwardHttpRequest({
      request,
      client: downstream.accepted,
      upstream: upstream.client,
      idleTimeoutMs: 2_000,
    });

    expect(result.error).toBeInstanceOf(UpstreamClosedError);
    expect(result.error?.message).toBe(`Upstream closed after ${partial.length} of ${partial.length + 6} response bytes`);
    expect(result.status).toBe(200);
  });

  it('times out when the upstream stays silent', async () => {
    const result = await forwardHttpRequest({
      request,
      client: downstream.accepted,
      upstream: upstream.client,
      idleTimeoutMs: 50,
    });

    expect(result.error).toBeInstanceOf(UpstreamTimeoutError);
    expect(result.error?.status).toBe(504);
    expect(result.ttfbMs).toBeNull();
  });
});
