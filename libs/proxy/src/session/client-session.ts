/**
 * One accepted client connection and its lifecycle state.
 */

import { randomUUID } from 'node:crypto';
import type * as net from 'node:net';
import type { ParsedRequest } from '@portcullis/ipc';
import type { Logger } from '../logger.js';
import type { SessionState } from '../types.js';
import { remoteEndpoint } from '../utils/socket.js';

export class ClientSession {
  readonly id = randomUUID();
  readonly clientIp: string;
  readonly clientPort: number;
  /** Wall-clock accept time */
  readonly acceptedAt = new Date();

  /** Header block as received (empty until one was read) */
  rawHeader = '';
  request: ParsedRequest | null = null;
  /** Upstream connection, owned by this session once opened */
  upstream: net.Socket | null = null;
  /** Set once anything has been written to the client */
  responded = false;
  /** Set once the metrics record or blocked event has been handed to the sink */
  emitted = false;

  private current: SessionState = 'ACCEPTED';

  constructor(
    readonly socket: net.Socket,
    /** Monotonic clock reading at accept */
    readonly startedAt: number,
    private readonly logger: Logger,
  ) {
    const endpoint = remoteEndpoint(socket);
    this.clientIp = endpoint.ip;
    this.clientPort = endpoint.port;
  }

  get state(): SessionState {
    return this.current;
  }

  /** Short id for log lines */
  get tag(): string {
    return this.id.slice(0, 8);
  }

  transition(next: SessionState): void {
    this.logger.debug(`${this.tag} ${this.current} -> ${next}`);
    this.current = next;
  }
}
