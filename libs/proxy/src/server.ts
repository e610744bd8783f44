/**
 * Proxy Server
 *
 * Accepts client connections and runs each through its own SessionHandler
 * invocation. Owns the AccessPolicy and RateLimiter shared by all sessions.
 */

import * as net from 'node:net';
import type { MetricsSink, ProxyConfig } from '@portcullis/ipc';
import { AccessPolicy } from './policies/access-policy.js';
import { RateLimiter } from './policies/rate-limiter.js';
import { SessionHandler } from './session/session-handler.js';
import { Logger } from './logger.js';
import { LoggingSink } from './sinks/logging-sink.js';
import type { ListeningAddress, ProxyServerOptions, SessionSummary } from './types.js';

/** How long stop() waits for in-flight sessions before destroying their sockets */
export const DEFAULT_DRAIN_TIMEOUT_MS = 5_000;

export class ProxyServer {
  private server: net.Server | null = null;
  private config: ProxyConfig;
  private logger: Logger;
  private accessPolicy: AccessPolicy;
  private rateLimiter: RateLimiter;
  private sessionHandler: SessionHandler;
  private connections: Set<net.Socket> = new Set();
  private sessions: Set<Promise<SessionSummary>> = new Set();
  private listening: ListeningAddress | null = null;

  constructor(options: ProxyServerOptions) {
    this.config = options.config;
    this.logger = options.logger ?? new Logger({ level: options.config.logLevel });
    this.accessPolicy = options.accessPolicy ?? new AccessPolicy(options.config.blocklist);
    this.rateLimiter =
      options.rateLimiter ??
      new RateLimiter({
        limit: options.config.rateLimit.limit,
        windowMs: options.config.rateLimit.windowSeconds * 1000,
        staleAfterMs:
          options.config.rateLimit.windowSeconds * 1000 * options.config.rateLimit.staleAfterWindows,
        ...(options.clock ? { clock: options.clock } : {}),
      });

    const sink: MetricsSink = options.sink ?? new LoggingSink(this.logger.child('metrics'));
    this.sessionHandler = new SessionHandler({
      accessPolicy: this.accessPolicy,
      rateLimiter: this.rateLimiter,
      sink,
      logger: this.logger.child('session'),
      timeouts: options.config.timeouts,
      maxHeaderBytes: options.config.maxHeaderBytes,
      ...(options.connect ? { connect: options.connect } : {}),
      ...(options.lookup ? { lookup: options.lookup } : {}),
      ...(options.clock ? { clock: options.clock } : {}),
    });
  }

  /**
   * Start listening. Resolves with the bound address (useful with port 0).
   */
  async start(): Promise<ListeningAddress> {
    if (this.server) {
      throw new Error('Proxy server already started');
    }

    const server = net.createServer({ allowHalfOpen: true }, (socket) => {
      this.handleConnection(socket);
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        this.server = null;
        reject(error);
      };
      server.once('error', onError);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (error) => {
      this.logger.error(`Server error: ${error.message}`);
    });

    const address = server.address();
    this.listening =
      address && typeof address === 'object'
        ? { host: address.address, port: address.port }
        : { host: this.config.host, port: this.config.port };

    this.rateLimiter.startSweeper();
    this.logger.info(
      `Proxy listening on ${this.listening.host}:${this.listening.port} ` +
        `(${this.accessPolicy.size} blocked patterns, ${this.config.rateLimit.limit} req/${this.config.rateLimit.windowSeconds}s per client)`,
    );
    return this.listening;
  }

  /**
   * Stop accepting connections, let in-flight sessions finish for up to
   * `drainTimeoutMs`, then destroy whatever is still open.
   */
  async stop(drainTimeoutMs = DEFAULT_DRAIN_TIMEOUT_MS): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    this.rateLimiter.stopSweeper();

    if (this.sessions.size > 0) {
      this.logger.info(`Waiting for ${this.sessions.size} active session(s) to finish`);
      let timer: NodeJS.Timeout | undefined;
      const drained = await Promise.race([
        Promise.all(this.sessions).then(() => true),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(false), drainTimeoutMs);
        }),
      ]);
      clearTimeout(timer);

      if (!drained) {
        this.logger.warn(`Closing ${this.connections.size} connection(s) still open after ${drainTimeoutMs}ms`);
        for (const socket of this.connections) {
          socket.destroy();
        }
        await Promise.all(this.sessions);
      }
    }

    await closed;
    this.connections.clear();
    this.listening = null;
    this.logger.info('Proxy stopped');
  }

  /**
   * Replace the blocklist for all subsequent policy checks.
   */
  updateBlocklist(patterns: readonly string[]): void {
    this.accessPolicy.replace(patterns);
    this.logger.info(`Blocklist updated (${this.accessPolicy.size} patterns)`);
  }

  get address(): ListeningAddress | null {
    return this.listening;
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  get policy(): AccessPolicy {
    return this.accessPolicy;
  }

  get limiter(): RateLimiter {
    return this.rateLimiter;
  }

  /**
   * Handle a new client connection
   */
  private handleConnection(socket: net.Socket): void {
    this.connections.add(socket);
    socket.once('close', () => {
      this.connections.delete(socket);
    });

    const session = this.sessionHandler.handle(socket);
    this.sessions.add(session);
    void session.finally(() => {
      this.sessions.delete(session);
    });
  }
}
