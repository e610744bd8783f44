/**
 * Session Handler
 *
 * Drives one client connection through the pipeline:
 *   parse -> access policy -> rate limit -> connect -> forward | tunnel
 *
 * Every terminal state hands exactly one MetricsRecord (or a BlockedEvent for
 * blocked requests) to the sink, and every path closes the client socket and
 * any upstream socket it opened. Nothing thrown here escapes `handle()`.
 */

import type * as net from 'node:net';
import { performance } from 'node:perf_hooks';
import type {
  BlockedDecision,
  MetricsRecord,
  MetricsSink,
  ParsedRequest,
  RateLimitedDecision,
  TimeoutsConfig,
} from '@portcullis/ipc';
import {
  ClientClosedError,
  MalformedRequestError,
  UpstreamClosedError,
  isProxyError,
  type ProxyError,
} from '../errors.js';
import { parseRequestHead, readRequestHead, type RequestHead } from '../http/request-parser.js';
import {
  CONNECTION_ESTABLISHED_LINE,
  buildStatusResponse,
  connectionEstablishedResponse,
  statusLine,
} from '../http/responses.js';
import type { Logger } from '../logger.js';
import type { AccessPolicy } from '../policies/access-policy.js';
import { RateLimiter } from '../policies/rate-limiter.js';
import { forwardHttpRequest } from '../relay/http-forwarder.js';
import { relayTunnel } from '../relay/tunnel-relay.js';
import { classifyConnectError, connectUpstream, type UpstreamConnectFn } from '../upstream/connector.js';
import { closeGracefully, destroyAndWait, writeAll } from '../utils/socket.js';
import {
  OUTCOME_BY_STATE,
  type SessionHandlerOptions,
  type SessionSummary,
  type TerminalSessionState,
} from '../types.js';
import { ClientSession } from './client-session.js';

type RecordState = Exclude<TerminalSessionState, 'BLOCKED'>;

/** Fields of a record that vary by terminal path */
type RecordFields = Pick<MetricsRecord, 'status' | 'outcomeLine' | 'bytesSent' | 'bytesReceived'> &
  Partial<
    Pick<
      MetricsRecord,
      | 'modifiedHeader'
      | 'upstreamBytesSent'
      | 'upstreamBytesReceived'
      | 'durationMs'
      | 'ttfbMs'
      | 'errorCode'
      | 'errorMessage'
      | 'rateLimit'
    >
  >;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function trimHead(head: Buffer): string {
  return head.toString('latin1').replace(/(\r?\n){2}$/, '');
}

export class SessionHandler {
  private readonly accessPolicy: AccessPolicy;
  private readonly rateLimiter: RateLimiter;
  private readonly sink: MetricsSink;
  private readonly logger: Logger;
  private readonly timeouts: TimeoutsConfig;
  private readonly maxHeaderBytes: number;
  private readonly connect: UpstreamConnectFn;
  private readonly lookup?: net.LookupFunction;
  private readonly clock: () => number;

  constructor(options: SessionHandlerOptions) {
    this.accessPolicy = options.accessPolicy;
    this.rateLimiter = options.rateLimiter;
    this.sink = options.sink;
    this.logger = options.logger;
    this.timeouts = options.timeouts;
    this.maxHeaderBytes = options.maxHeaderBytes;
    this.connect = options.connect ?? connectUpstream;
    this.lookup = options.lookup;
    this.clock = options.clock ?? (() => performance.now());
  }

  /**
   * Serve one accepted connection to completion. Never rejects.
   */
  async handle(socket: net.Socket): Promise<SessionSummary> {
    const session = new ClientSession(socket, this.clock(), this.logger);
    socket.on('error', (error) => {
      this.logger.debug(`${session.tag} client socket error: ${error.message}`);
    });

    try {
      return await this.run(session);
    } catch (error) {
      return this.abort(session, error);
    }
  }

  private async run(session: ClientSession): Promise<SessionSummary> {
    const { socket } = session;

    session.transition('PARSING');
    let head: RequestHead;
    let request: ParsedRequest;
    try {
      head = await readRequestHead(socket, {
        timeoutMs: this.timeouts.headerReadMs,
        maxHeaderBytes: this.maxHeaderBytes,
      });
      session.rawHeader = trimHead(head.head);
      request = parseRequestHead(head.head);
    } catch (error) {
      const failure = isProxyError(error)
        ? error
        : new MalformedRequestError(errorMessage(error), { cause: error });
      return this.rejectMalformed(session, failure);
    }
    session.request = request;
    session.transition('CLASSIFIED');

    session.transition('POLICY_CHECK');
    const access = this.accessPolicy.evaluate(request.host);
    if (access.verdict === 'blocked') {
      return this.rejectBlocked(session, request, access);
    }
    const rate = this.rateLimiter.admit(session.clientIp);
    if (!rate.admitted) {
      return this.rejectRateLimited(session, request, RateLimiter.toDecision(rate));
    }
    session.transition('AUTHORIZED');

    session.transition('CONNECTING');
    let upstream: net.Socket;
    try {
      upstream = await this.connect({
        host: request.host,
        port: request.port,
        timeoutMs: this.timeouts.connectMs,
        ...(this.lookup ? { lookup: this.lookup } : {}),
      });
    } catch (error) {
      const failure = isProxyError(error)
        ? error
        : classifyConnectError(error, request.host, request.port, this.timeouts.connectMs);
      return this.rejectConnectFailed(session, request, failure);
    }
    session.upstream = upstream;
    upstream.on('error', (error) => {
      this.logger.debug(`${session.tag} upstream socket error: ${error.message}`);
    });
    session.transition('CONNECTED');

    if (socket.destroyed) {
      return this.clientGone(session, request, upstream);
    }

    return request.kind === 'connect'
      ? this.tunnel(session, request, upstream, head.rest)
      : this.forward(session, request, upstream, head.rest);
  }

  // ---- Declined and failed before any upstream traffic ----

  private async rejectMalformed(session: ClientSession, error: ProxyError): Promise<SessionSummary> {
    session.transition('MALFORMED');
    this.logger.debug(`${session.tag} malformed request from ${session.clientIp}: ${error.message}`);

    const written = error.status > 0 ? await this.respond(session, buildStatusResponse(error.status)) : 0;
    const closing = closeGracefully(session.socket);
    await this.emitRecord(session, 'MALFORMED', {
      status: written > 0 ? error.status : 0,
      outcomeLine: written > 0 ? statusLine(error.status) : '',
      bytesSent: written,
      bytesReceived: session.socket.bytesRead,
      errorCode: error.code,
      errorMessage: error.message,
    });
    await closing;
    return this.summary(session, 'MALFORMED', written > 0 ? error.status : 0, error.code);
  }

  private async rejectBlocked(
    session: ClientSession,
    request: ParsedRequest,
    decision: BlockedDecision,
  ): Promise<SessionSummary> {
    session.transition('BLOCKED');
    this.logger.warn(
      `BLOCKED ${request.method} ${request.host} from ${session.clientIp} (matched ${decision.pattern})`,
    );

    await this.respond(session, buildStatusResponse(403));
    const closing = closeGracefully(session.socket);
    await this.emit(session, (sink) =>
      sink.recordBlocked({
        timestamp: new Date().toISOString(),
        blockedHostname: request.host,
        clientIp: session.clientIp,
        pattern: decision.pattern,
      }),
    );
    await closing;
    return this.summary(session, 'BLOCKED', 403);
  }

  private async rejectRateLimited(
    session: ClientSession,
    request: ParsedRequest,
    decision: RateLimitedDecision,
  ): Promise<SessionSummary> {
    session.transition('RATE_LIMITED');
    this.logger.warn(
      `RATE_LIMITED ${session.clientIp}: ${decision.count} requests in ${decision.windowMs}ms (limit ${decision.limit})`,
    );

    const retryAfterSeconds = Math.max(1, Math.ceil(decision.retryAfterMs / 1000));
    const response = buildStatusResponse(429, { headers: { 'Retry-After': String(retryAfterSeconds) } });
    const written = await this.respond(session, response);
    const closing = closeGracefully(session.socket);
    await this.emitRecord(session, 'RATE_LIMITED', {
      status: 429,
      outcomeLine: statusLine(429),
      bytesSent: written,
      bytesReceived: request.headerBytes,
      errorCode: 'RATE_LIMITED',
      errorMessage: `Rate limit of ${decision.limit} requests per ${decision.windowMs}ms exceeded`,
      rateLimit: { limit: decision.limit, windowMs: decision.windowMs, count: decision.count },
    });
    await closing;
    return this.summary(session, 'RATE_LIMITED', 429);
  }

  private async rejectConnectFailed(
    session: ClientSession,
    request: ParsedRequest,
    error: ProxyError,
  ): Promise<SessionSummary> {
    session.transition('CONNECT_FAILED');
    this.logger.warn(`CONNECT_FAILED ${request.host}:${request.port} [${error.code}] ${error.message}`);

    const written = await this.respond(session, buildStatusResponse(error.status));
    const closing = closeGracefully(session.socket);
    await this.emitRecord(session, 'CONNECT_FAILED', {
      status: written > 0 ? error.status : 0,
      outcomeLine: written > 0 ? statusLine(error.status) : '',
      bytesSent: written,
      bytesReceived: request.headerBytes,
      errorCode: error.code,
      errorMessage: error.message,
    });
    await closing;
    return this.summary(session, 'CONNECT_FAILED', written > 0 ? error.status : 0, error.code);
  }

  private async clientGone(
    session: ClientSession,
    request: ParsedRequest,
    upstream: net.Socket,
  ): Promise<SessionSummary> {
    session.transition('FAILED');
    const error = new ClientClosedError('Client closed the connection while the upstream was connecting');
    this.logger.debug(`${session.tag} ${error.message}`);

    await destroyAndWait(upstream);
    await this.emitRecord(session, 'FAILED', {
      status: 0,
      outcomeLine: '',
      bytesSent: 0,
      bytesReceived: request.headerBytes,
      errorCode: error.code,
      errorMessage: error.message,
    });
    return this.summary(session, 'FAILED', 0, error.code);
  }

  // ---- Data paths ----

  private async tunnel(
    session: ClientSession,
    request: ParsedRequest,
    upstream: net.Socket,
    rest: Buffer,
  ): Promise<SessionSummary> {
    session.transition('TUNNELING');

    const established = connectionEstablishedResponse();
    session.responded = true;
    try {
      await writeAll(session.socket, established);
    } catch (error) {
      session.transition('FAILED');
      const failure = new ClientClosedError(`Could not confirm the tunnel: ${errorMessage(error)}`, {
        cause: error,
      });
      await Promise.all([destroyAndWait(session.socket), destroyAndWait(upstream)]);
      await this.emitRecord(session, 'FAILED', {
        status: 0,
        outcomeLine: '',
        bytesSent: 0,
        bytesReceived: request.headerBytes,
        errorCode: failure.code,
        errorMessage: failure.message,
      });
      return this.summary(session, 'FAILED', 0, failure.code);
    }

    const result = await relayTunnel({
      client: session.socket,
      upstream,
      idleTimeoutMs: this.timeouts.idleMs,
      head: rest,
      establishedAt: this.clock(),
      clock: this.clock,
    });

    let failure: ProxyError | undefined;
    if (result.termination === 'error') {
      const cause = result.error;
      const detail = cause ? `: ${cause.message}` : '';
      failure =
        result.failedSide === 'client'
          ? new ClientClosedError(`Client connection failed${detail}`, { cause })
          : new UpstreamClosedError(`Upstream connection failed${detail}`, { cause });
    }
    const state: RecordState = failure ? 'FAILED' : 'COMPLETED';
    session.transition(state);

    const line = `TUNNEL ${request.host}:${request.port} ${result.termination} (${result.bytesFromClient}B up, ${result.bytesToClient}B down, ${Math.round(result.durationMs)}ms)`;
    if (failure) {
      this.logger.warn(`${line} [${failure.code}] ${failure.message}`);
    } else {
      this.logger.info(line);
    }

    await this.emitRecord(session, state, {
      status: 200,
      outcomeLine: CONNECTION_ESTABLISHED_LINE,
      bytesSent: result.bytesToClient,
      bytesReceived: result.bytesFromClient,
      upstreamBytesSent: result.bytesFromClient,
      upstreamBytesReceived: result.bytesToClient,
      durationMs: result.durationMs,
      ttfbMs: result.ttfbMs,
      ...(failure ? { errorCode: failure.code, errorMessage: failure.message } : {}),
    });
    return this.summary(session, state, 200, failure?.code);
  }

  private async forward(
    session: ClientSession,
    request: ParsedRequest,
    upstream: net.Socket,
    rest: Buffer,
  ): Promise<SessionSummary> {
    session.transition('FORWARDING');
    session.responded = true;

    const result = await forwardHttpRequest({
      request,
      client: session.socket,
      upstream,
      body: rest,
      idleTimeoutMs: this.timeouts.idleMs,
      clock: this.clock,
    });

    const requestHeadBytes = Buffer.byteLength(result.requestHead, 'latin1');
    const bytesReceived = request.headerBytes + (result.bytesSent - requestHeadBytes);
    let status = result.status;
    let outcomeLine = result.statusLine;
    let bytesSent = result.bytesReceived;
    const { error } = result;

    let closing: Promise<unknown>;
    if (!error) {
      closing = Promise.all([destroyAndWait(upstream), closeGracefully(session.socket)]);
    } else if (result.bytesReceived === 0) {
      // Nothing relayed yet: the client still gets a proper error response.
      await destroyAndWait(upstream);
      const written =
        error.status > 0 && !session.socket.destroyed
          ? await this.writeTo(session, buildStatusResponse(error.status))
          : 0;
      status = written > 0 ? error.status : 0;
      outcomeLine = written > 0 ? statusLine(error.status) : '';
      bytesSent = written;
      closing = closeGracefully(session.socket);
    } else {
      // A truncated response must not look complete to the client.
      closing = Promise.all([destroyAndWait(upstream), destroyAndWait(session.socket)]);
    }

    const state: RecordState = error ? 'FAILED' : 'COMPLETED';
    session.transition(state);

    const line = `PROXY ${request.method} ${request.host}:${request.port}${request.path} -> ${status || '-'} (${bytesSent}B, ${Math.round(result.durationMs)}ms)`;
    if (error) {
      this.logger.warn(`${line} [${error.code}] ${error.message}`);
    } else {
      this.logger.info(line);
    }

    await this.emitRecord(session, state, {
      status,
      outcomeLine,
      modifiedHeader: result.requestHead,
      bytesSent,
      bytesReceived,
      upstreamBytesSent: result.bytesSent,
      upstreamBytesReceived: result.bytesReceived,
      durationMs: result.durationMs,
      ttfbMs: result.ttfbMs,
      ...(error ? { errorCode: error.code, errorMessage: error.message } : {}),
    });
    await closing;
    return this.summary(session, state, status, error?.code);
  }

  // ---- Unexpected failures ----

  private async abort(session: ClientSession, error: unknown): Promise<SessionSummary> {
    this.logger.error(`Session ${session.tag} failed unexpectedly: ${errorMessage(error)}`);
    session.transition('FAILED');

    const { socket, upstream } = session;
    const written =
      !session.responded && !socket.destroyed ? await this.writeTo(session, buildStatusResponse(502)) : 0;
    await Promise.all([
      destroyAndWait(socket),
      upstream ? destroyAndWait(upstream) : Promise.resolve(),
    ]);

    await this.emitRecord(session, 'FAILED', {
      status: written > 0 ? 502 : 0,
      outcomeLine: written > 0 ? statusLine(502) : '',
      bytesSent: written,
      bytesReceived: socket.bytesRead,
      errorCode: 'INTERNAL',
      errorMessage: errorMessage(error),
    });
    return this.summary(session, 'FAILED', written > 0 ? 502 : 0, 'INTERNAL');
  }

  // ---- Helpers ----

  /**
   * Write a proxy-generated response. Returns the bytes written, 0 if the client is gone.
   */
  private async respond(session: ClientSession, response: Buffer): Promise<number> {
    session.responded = true;
    return this.writeTo(session, response);
  }

  private async writeTo(session: ClientSession, response: Buffer): Promise<number> {
    try {
      await writeAll(session.socket, response);
      return response.length;
    } catch (error) {
      this.logger.debug(`${session.tag} could not write response: ${errorMessage(error)}`);
      return 0;
    }
  }

  private emitRecord(session: ClientSession, state: RecordState, fields: RecordFields): Promise<void> {
    const request = session.request;
    const record: MetricsRecord = {
      id: session.id,
      timestamp: session.acceptedAt.toISOString(),
      clientIp: session.clientIp,
      clientPort: session.clientPort,
      ...(request
        ? {
            kind: request.kind,
            method: request.method,
            targetHost: request.host,
            targetPort: request.port,
          }
        : {}),
      outcome: OUTCOME_BY_STATE[state],
      rawHeader: session.rawHeader,
      upstreamBytesSent: 0,
      upstreamBytesReceived: 0,
      durationMs: Math.max(0, this.clock() - session.startedAt),
      ttfbMs: null,
      ...fields,
    };
    return this.emit(session, (sink) => sink.recordRequest(record));
  }

  /**
   * Hand one event to the sink. Sink failures are logged and never reach the session.
   */
  private async emit(
    session: ClientSession,
    deliver: (sink: MetricsSink) => void | Promise<void>,
  ): Promise<void> {
    if (session.emitted) return;
    session.emitted = true;
    try {
      await deliver(this.sink);
    } catch (error) {
      this.logger.error(`Metrics sink failed for session ${session.tag}: ${errorMessage(error)}`);
    }
  }

  private summary(
    session: ClientSession,
    state: TerminalSessionState,
    status: number,
    errorCode?: string,
  ): SessionSummary {
    return {
      id: session.id,
      state,
      clientIp: session.clientIp,
      status,
      ...(session.request ? { targetHost: session.request.host } : {}),
      ...(errorCode ? { errorCode } : {}),
    };
  }
}
