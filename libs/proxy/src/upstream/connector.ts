/**
 * Upstream Connector
 *
 * Opens the TCP connection to a request's destination, bounded by a connect
 * timeout, and classifies failures so callers can tell DNS problems from
 * refused or slow destinations.
 */

import * as net from 'node:net';
import {
  ConnectTimeoutError,
  ConnectionRefusedError,
  DnsFailureError,
  type UpstreamConnectError,
} from '../errors.js';

export interface ConnectOptions {
  host: string;
  port: number;
  timeoutMs: number;
  /** Custom resolver, passed through to `net.connect` */
  lookup?: net.LookupFunction;
}

export type UpstreamConnectFn = (options: ConnectOptions) => Promise<net.Socket>;

const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'EAI_FAIL', 'EAI_NONAME', 'ENODATA']);

function errnoOf(error: unknown): string | undefined {
  if (error instanceof AggregateError) {
    for (const inner of error.errors) {
      const code = errnoOf(inner);
      if (code) return code;
    }
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a socket connect error onto the upstream error taxonomy.
 */
export function classifyConnectError(
  error: unknown,
  host: string,
  port: number,
  timeoutMs: number,
): UpstreamConnectError {
  const code = errnoOf(error);
  if (code && DNS_ERROR_CODES.has(code)) {
    return new DnsFailureError(host, port, { cause: error });
  }
  if (code === 'ETIMEDOUT') {
    return new ConnectTimeoutError(host, port, timeoutMs);
  }
  return new ConnectionRefusedError(host, port, code, { cause: error });
}

/**
 * Connect to `host:port`. The returned socket is connected and owned by the caller.
 */
export const connectUpstream: UpstreamConnectFn = (options) => {
  const { host, port, timeoutMs, lookup } = options;

  return new Promise((resolve, reject) => {
    const socket = net.connect({ host, port, allowHalfOpen: true, ...(lookup ? { lookup } : {}) });

    const cleanup = () => {
      clearTimeout(timer);
      socket.off('connect', onConnect);
      socket.off('error', onError);
    };

    const timer = setTimeout(() => {
      cleanup();
      socket.destroy();
      reject(new ConnectTimeoutError(host, port, timeoutMs));
    }, timeoutMs);

    const onConnect = () => {
      cleanup();
      socket.setNoDelay(true);
      resolve(socket);
    };

    const onError = (error: Error) => {
      cleanup();
      socket.destroy();
      reject(classifyConnectError(error, host, port, timeoutMs));
    };

    socket.once('connect', onConnect);
    socket.once('error', onError);
  });
};
