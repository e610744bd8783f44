/**
 * HTTP Forwarder
 *
 * Sends a parsed plain-HTTP request upstream with its headers rewritten, then
 * relays the response to the client byte for byte. The response is complete
 * when its declared length has been relayed or, without one, when the
 * upstream closes (requests always go out with `Connection: close`).
 */

import type * as net from 'node:net';
import { performance } from 'node:perf_hooks';
import type { ParsedRequest } from '@portcullis/ipc';
import { buildUpstreamRequestHead } from '../http/headers.js';
import { findHeadEnd } from '../http/request-parser.js';
import { parseStatusLine } from '../http/responses.js';
import {
  ClientClosedError,
  UpstreamClosedError,
  UpstreamTimeoutError,
  type ProxyError,
} from '../errors.js';
import { BytePump } from './pump.js';

/** Response heads larger than this are relayed without framing detection. */
const MAX_RESPONSE_HEAD_BYTES = 64 * 1024;

export interface ForwardOptions {
  request: ParsedRequest;
  client: net.Socket;
  upstream: net.Socket;
  /** Client bytes already read past the header block (start of the request body) */
  body?: Buffer;
  /** Upstream silence that aborts the exchange */
  idleTimeoutMs: number;
  clock?: () => number;
}

export interface ForwardResult {
  /** Request head as sent upstream */
  requestHead: string;
  /** Upstream status line, empty if none arrived */
  statusLine: string;
  status: number;
  /** Bytes written upstream (request head and body) */
  bytesSent: number;
  /** Bytes received from upstream and relayed to the client */
  bytesReceived: number;
  /** From request sent to first response byte */
  ttfbMs: number | null;
  /** From request sent to response fully relayed */
  durationMs: number;
  /** Set when the exchange failed; counts above cover what was relayed until then */
  error?: ProxyError;
}

interface ResponseFraming {
  /** Total response bytes expected, or null when the body runs until close */
  expectedBytes: number | null;
}

/**
 * Work out where a response ends from its head.
 */
export function responseFraming(
  head: Buffer,
  status: number,
  requestMethod: string,
): ResponseFraming {
  if (status >= 100 && status < 200) {
    return { expectedBytes: null };
  }
  if (requestMethod === 'HEAD' || status === 204 || status === 304) {
    return { expectedBytes: head.length };
  }

  const lines = head.toString('latin1').split(/\r?\n/);
  let contentLength: number | null = null;
  for (const line of lines.slice(1)) {
    const colon = line.indexOf(':');
    if (colon <= 0) continue;
    const name = line.slice(0, colon).trim().toLowerCase();
    const value = line.slice(colon + 1).trim();
    if (name === 'transfer-encoding') {
      return { expectedBytes: null };
    }
    if (name === 'content-length' && /^\d+$/.test(value)) {
      contentLength = Number(value);
    }
  }

  return { expectedBytes: contentLength === null ? null : head.length + contentLength };
}

/** 1xx heads other than 101 precede the final response. */
function isInterimStatus(status: number): boolean {
  return status >= 100 && status < 200 && status !== 101;
}

export function forwardHttpRequest(options: ForwardOptions): Promise<ForwardResult> {
  const { request, client, upstream, idleTimeoutMs } = options;
  const clock = options.clock ?? (() => performance.now());
  const requestHead = buildUpstreamRequestHead(request);

  return new Promise((resolve) => {
    const writeStartedAt = clock();
    let sentAt: number | null = null;
    let firstByteAt: number | null = null;
    let responseHead = Buffer.alloc(0);
    let headComplete = false;
    let statusLine = '';
    let status = 0;
    let expectedBytes: number | null = null;
    let finished = false;

    // Response bytes taken up by interim 1xx heads before the final head
    let interimBytes = 0;

    const inspect = (chunk: Buffer) => {
      if (firstByteAt === null) {
        firstByteAt = clock();
      }
      if (headComplete) return;

      responseHead = Buffer.concat([responseHead, chunk]);
      for (;;) {
        if (!statusLine) {
          const parsed = parseStatusLine(responseHead);
          if (parsed) {
            statusLine = parsed.line;
            status = parsed.status;
          }
        }

        const end = findHeadEnd(responseHead);
        if (end === -1) {
          if (responseHead.length > MAX_RESPONSE_HEAD_BYTES) {
            headComplete = true;
            responseHead = Buffer.alloc(0);
          }
          return;
        }

        if (isInterimStatus(status)) {
          interimBytes += end;
          responseHead = responseHead.subarray(end);
          statusLine = '';
          status = 0;
          continue;
        }

        headComplete = true;
        const framing = responseFraming(responseHead.subarray(0, end), status, request.method);
        expectedBytes = framing.expectedBytes === null ? null : interimBytes + framing.expectedBytes;
        responseHead = Buffer.alloc(0);
        return;
      }
    };

    const requestPump = new BytePump(client, upstream);
    const responsePump = new BytePump(upstream, client, { onChunk: inspect });

    const finish = (error?: ProxyError) => {
      if (finished) return;
      finished = true;

      requestPump.stop();
      responsePump.stop();
      upstream.setTimeout(0);
      upstream.off('timeout', onTimeout);

      const base = sentAt ?? writeStartedAt;
      const now = clock();
      resolve({
        requestHead,
        statusLine,
        status,
        bytesSent: Buffer.byteLength(requestHead, 'latin1') + requestPump.bytes,
        bytesReceived: responsePump.bytes,
        ttfbMs: firstByteAt === null ? null : Math.max(0, firstByteAt - base),
        durationMs: Math.max(0, now - base),
        ...(error ? { error } : {}),
      });
    };

    const checkComplete = () => {
      if (headComplete && expectedBytes !== null && responsePump.bytes >= expectedBytes) {
        finish();
      }
    };

    const onTimeout = () => finish(new UpstreamTimeoutError(idleTimeoutMs));

    upstream.on('end', () => {
      if (responsePump.bytes === 0) {
        finish(new UpstreamClosedError('Upstream closed without sending a response'));
      } else if (!headComplete) {
        finish(new UpstreamClosedError('Upstream closed inside the response head'));
      } else if (expectedBytes !== null && responsePump.bytes < expectedBytes) {
        finish(
          new UpstreamClosedError(
            `Upstream closed after ${responsePump.bytes} of ${expectedBytes} response bytes`,
          ),
        );
      } else {
        finish();
      }
    });
    upstream.on('error', (error) =>
      finish(new UpstreamClosedError(`Upstream connection failed: ${error.message}`, { cause: error })),
    );
    upstream.on('close', () => finish(new UpstreamClosedError()));
    upstream.on('timeout', onTimeout);

    client.on('error', (error) =>
      finish(new ClientClosedError(`Client connection failed: ${error.message}`, { cause: error })),
    );
    client.on('close', () => finish(new ClientClosedError()));

    upstream.setTimeout(idleTimeoutMs);
    upstream.write(Buffer.from(requestHead, 'latin1'), (error) => {
      if (!error && sentAt === null) {
        sentAt = clock();
      }
    });
    if (options.body && options.body.length > 0) {
      requestPump.inject(options.body);
    }
    requestPump.start();
    responsePump.start();
    // Registered after the pump so the byte count already includes the chunk.
    upstream.on('data', checkComplete);
  });
}
