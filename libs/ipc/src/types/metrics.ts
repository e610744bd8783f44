/**
 * Metrics emitted by the proxy engine to external sinks
 */

import type { RequestKind } from './proxy';

export type SessionOutcome =
  | 'completed'
  | 'failed'
  | 'malformed'
  | 'rate_limited'
  | 'connect_failed';

/**
 * One record per terminal session outcome (blocked requests emit a {@link BlockedEvent} instead).
 *
 * `bytesSent` / `bytesReceived` are seen from the client: bytes the proxy wrote to
 * the client and bytes it read from the client.
 */
export interface MetricsRecord {
  id: string;
  timestamp: string;
  clientIp: string;
  clientPort: number;
  kind?: RequestKind;
  method?: string;
  targetHost?: string;
  targetPort?: number;
  outcome: SessionOutcome;
  /** HTTP status sent to (or relayed to) the client, 0 when nothing could be sent */
  status: number;
  /** Status line sent to (or relayed to) the client */
  outcomeLine: string;
  rawHeader: string;
  /** Request head as forwarded upstream (plain HTTP only) */
  modifiedHeader?: string;
  bytesSent: number;
  bytesReceived: number;
  upstreamBytesSent: number;
  upstreamBytesReceived: number;
  durationMs: number;
  ttfbMs: number | null;
  errorCode?: string;
  errorMessage?: string;
  /** Window state behind a `rate_limited` outcome */
  rateLimit?: RateLimitSnapshot;
}

export interface RateLimitSnapshot {
  limit: number;
  windowMs: number;
  /** Requests counted in the window, the rejected one included */
  count: number;
}

export interface BlockedEvent {
  timestamp: string;
  blockedHostname: string;
  clientIp: string;
  pattern: string;
}

/**
 * Receiver of per-request metrics. Storage, reporting and visualisation live behind it.
 */
export interface MetricsSink {
  recordRequest(record: MetricsRecord): void | Promise<void>;
  recordBlocked(event: BlockedEvent): void | Promise<void>;
  close?(): void | Promise<void>;
}
