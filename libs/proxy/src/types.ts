/**
 * Proxy engine types
 */

import type * as net from 'node:net';
import type { MetricsSink, ProxyConfig, SessionOutcome, TimeoutsConfig } from '@portcullis/ipc';
import type { AccessPolicy } from './policies/access-policy.js';
import type { RateLimiter } from './policies/rate-limiter.js';
import type { Logger } from './logger.js';
import type { UpstreamConnectFn } from './upstream/connector.js';

/**
 * Lifecycle of one client connection.
 */
export type SessionState =
  | 'ACCEPTED'
  | 'PARSING'
  | 'MALFORMED'
  | 'CLASSIFIED'
  | 'POLICY_CHECK'
  | 'BLOCKED'
  | 'RATE_LIMITED'
  | 'AUTHORIZED'
  | 'CONNECTING'
  | 'CONNECT_FAILED'
  | 'CONNECTED'
  | 'FORWARDING'
  | 'TUNNELING'
  | 'COMPLETED'
  | 'FAILED';

export type TerminalSessionState = Extract<
  SessionState,
  'MALFORMED' | 'BLOCKED' | 'RATE_LIMITED' | 'CONNECT_FAILED' | 'COMPLETED' | 'FAILED'
>;

/**
 * Terminal state to the outcome recorded in metrics (BLOCKED emits a blocked event instead).
 */
export const OUTCOME_BY_STATE: Readonly<Record<Exclude<TerminalSessionState, 'BLOCKED'>, SessionOutcome>> = {
  MALFORMED: 'malformed',
  RATE_LIMITED: 'rate_limited',
  CONNECT_FAILED: 'connect_failed',
  COMPLETED: 'completed',
  FAILED: 'failed',
};

export interface SessionHandlerOptions {
  accessPolicy: AccessPolicy;
  rateLimiter: RateLimiter;
  sink: MetricsSink;
  logger: Logger;
  timeouts: TimeoutsConfig;
  maxHeaderBytes: number;
  /** Upstream connector (defaults to a plain TCP connect) */
  connect?: UpstreamConnectFn;
  /** Resolver handed to the connector */
  lookup?: net.LookupFunction;
  /** Monotonic millisecond clock used for durations and TTFB */
  clock?: () => number;
}

/**
 * What a finished session reports back to the server.
 */
export interface SessionSummary {
  id: string;
  state: TerminalSessionState;
  clientIp: string;
  status: number;
  targetHost?: string;
  errorCode?: string;
}

export interface ProxyServerOptions {
  config: ProxyConfig;
  sink?: MetricsSink;
  logger?: Logger;
  accessPolicy?: AccessPolicy;
  rateLimiter?: RateLimiter;
  connect?: UpstreamConnectFn;
  lookup?: net.LookupFunction;
  clock?: () => number;
}

export interface ListeningAddress {
  host: string;
  port: number;
}
