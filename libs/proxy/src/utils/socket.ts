/**
 * Socket helpers
 */

import type * as net from 'node:net';

/** Grace period for a peer to acknowledge our FIN before the socket is destroyed. */
export const CLOSE_LINGER_MS = 2_000;

/**
 * Flush pending writes, send FIN, and resolve once the socket has closed.
 * Sockets that do not close within `lingerMs` are destroyed.
 */
export function closeGracefully(socket: net.Socket, lingerMs = CLOSE_LINGER_MS): Promise<void> {
  return new Promise((resolve) => {
    if (socket.destroyed) {
      resolve();
      return;
    }

    const timer = setTimeout(() => socket.destroy(), lingerMs);
    timer.unref();

    socket.once('close', () => {
      clearTimeout(timer);
      resolve();
    });
    // A peer that resets while we flush ends the grace period early.
    socket.once('error', () => socket.destroy());

    // Paused sockets never see the peer's FIN; unread input is discarded.
    socket.resume();
    socket.end();
  });
}

/**
 * Destroy a socket and resolve once its 'close' event has fired.
 */
export function destroyAndWait(socket: net.Socket): Promise<void> {
  return new Promise((resolve) => {
    if (socket.destroyed) {
      resolve();
      return;
    }
    socket.once('close', () => resolve());
    socket.destroy();
  });
}

/**
 * Write a buffer and resolve when it has been handed to the kernel.
 * Rejects if the socket fails or is already gone.
 */
export function writeAll(socket: net.Socket, data: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    if (socket.destroyed || !socket.writable) {
      reject(new Error('Socket is not writable'));
      return;
    }
    socket.write(data, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

export interface RemoteEndpoint {
  ip: string;
  port: number;
}

/**
 * Client address with IPv4-mapped IPv6 addresses unwrapped (`::ffff:127.0.0.1` -> `127.0.0.1`).
 */
export function remoteEndpoint(socket: net.Socket): RemoteEndpoint {
  const address = socket.remoteAddress ?? 'unknown';
  return {
    ip: address.startsWith('::ffff:') && address.includes('.') ? address.slice(7) : address,
    port: socket.remotePort ?? 0,
  };
}
