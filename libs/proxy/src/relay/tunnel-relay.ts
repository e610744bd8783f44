/**
 * Tunnel Relay
 *
 * Pumps opaque bytes both ways between a client and its CONNECT destination.
 * Each direction runs independently. End-of-stream on one side is forwarded
 * to the other as a FIN; the relay finishes when:
 *   - both directions have ended,
 *   - either socket errors or closes abruptly, or
 *   - no byte has moved in either direction for `idleTimeoutMs`.
 * In every case both sockets are closed before the returned promise settles.
 */

import type * as net from 'node:net';
import { performance } from 'node:perf_hooks';
import { BytePump } from './pump.js';
import { closeGracefully, destroyAndWait } from '../utils/socket.js';

export type TunnelTermination = 'closed' | 'idle' | 'error';

export interface TunnelOptions {
  client: net.Socket;
  upstream: net.Socket;
  idleTimeoutMs: number;
  /** Client bytes already read past the CONNECT header block */
  head?: Buffer;
  /** Clock reading taken when `200 Connection Established` was sent */
  establishedAt?: number;
  clock?: () => number;
}

export interface TunnelResult {
  /** Client-to-upstream bytes */
  bytesFromClient: number;
  /** Upstream-to-client bytes */
  bytesToClient: number;
  /** From tunnel establishment to the first byte in either direction */
  ttfbMs: number | null;
  durationMs: number;
  termination: TunnelTermination;
  /** Which side failed, for `error` terminations */
  failedSide?: 'client' | 'upstream';
  error?: Error;
}

export function relayTunnel(options: TunnelOptions): Promise<TunnelResult> {
  const { client, upstream, idleTimeoutMs } = options;
  const clock = options.clock ?? (() => performance.now());
  const startedAt = options.establishedAt ?? clock();

  return new Promise((resolve) => {
    let firstByteAt: number | null = null;
    let clientEnded = false;
    let upstreamEnded = false;
    let finished = false;
    let idleTimer: NodeJS.Timeout | null = null;

    const touch = () => {
      if (firstByteAt === null) {
        firstByteAt = clock();
      }
      armIdleTimer();
    };

    const armIdleTimer = () => {
      if (idleTimer) clearTimeout(idleTimer);
      idleTimer = setTimeout(() => finish('idle'), idleTimeoutMs);
    };

    const clientToUpstream = new BytePump(client, upstream, { onChunk: touch });
    const upstreamToClient = new BytePump(upstream, client, { onChunk: touch });

    const finish = (termination: TunnelTermination, failedSide?: 'client' | 'upstream', error?: Error) => {
      if (finished) return;
      finished = true;
      if (idleTimer) clearTimeout(idleTimer);

      clientToUpstream.stop();
      upstreamToClient.stop();

      const result: TunnelResult = {
        bytesFromClient: clientToUpstream.bytes,
        bytesToClient: upstreamToClient.bytes,
        ttfbMs: firstByteAt === null ? null : Math.max(0, firstByteAt - startedAt),
        durationMs: Math.max(0, clock() - startedAt),
        termination,
        ...(failedSide ? { failedSide } : {}),
        ...(error ? { error } : {}),
      };

      const teardown =
        termination === 'closed'
          ? Promise.all([closeGracefully(client), closeGracefully(upstream)])
          : Promise.all([destroyAndWait(client), destroyAndWait(upstream)]);

      void teardown.then(() => resolve(result));
    };

    client.on('end', () => {
      clientEnded = true;
      if (!upstream.destroyed) upstream.end();
      if (upstreamEnded) finish('closed');
    });
    upstream.on('end', () => {
      upstreamEnded = true;
      if (!client.destroyed) client.end();
      if (clientEnded) finish('closed');
    });

    client.on('error', (error) => finish('error', 'client', error));
    upstream.on('error', (error) => finish('error', 'upstream', error));

    client.on('close', () => finish('closed'));
    upstream.on('close', () => finish('closed'));

    armIdleTimer();
    if (options.head && options.head.length > 0) {
      clientToUpstream.inject(options.head);
    }
    clientToUpstream.start();
    upstreamToClient.start();

    if (client.destroyed || upstream.destroyed) {
      finish('closed');
    }
  });
}
