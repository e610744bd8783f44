/**
 * SqliteSink: stores proxy metrics in a {@link TrafficDatabase}
 */

import type { BlockedEvent, MetricsRecord, MetricsSink } from '@portcullis/ipc';
import type { TrafficDatabase } from '../traffic-database';
import { isRelayedRecord } from './relayed';

export interface SqliteSinkOptions {
  /** Close the database when the sink is closed (default true) */
  closeDatabase?: boolean;
}

export class SqliteSink implements MetricsSink {
  private readonly closeDatabase: boolean;

  constructor(
    private readonly database: TrafficDatabase,
    options: SqliteSinkOptions = {},
  ) {
    this.closeDatabase = options.closeDatabase ?? true;
  }

  recordRequest(record: MetricsRecord): void {
    if (record.outcome === 'rate_limited') {
      this.database.rateLimits.create({
        timestamp: record.timestamp,
        sourceIp: record.clientIp,
        destinationHost: record.targetHost ?? null,
        requestCount: record.rateLimit?.count ?? 1,
        limit: record.rateLimit?.limit ?? 1,
        windowMs: record.rateLimit?.windowMs ?? 1,
      });
      return;
    }

    if (!isRelayedRecord(record)) return;

    this.database.requests.create({
      recordId: record.id,
      timestamp: record.timestamp,
      sourceIp: record.clientIp,
      destinationHost: record.targetHost,
      destinationPort: record.targetPort,
      method: record.method,
      protocol: record.kind === 'connect' ? 'HTTPS' : 'HTTP',
      statusCode: record.status,
      outcome: record.outcome === 'completed' ? 'completed' : 'failed',
      bytesSent: record.bytesSent,
      bytesReceived: record.bytesReceived,
      durationSeconds: record.durationMs / 1000,
      ttfbSeconds: record.ttfbMs === null ? null : record.ttfbMs / 1000,
      errorCode: record.errorCode ?? null,
    });
  }

  recordBlocked(event: BlockedEvent): void {
    this.database.blocked.create({
      timestamp: event.timestamp,
      sourceIp: event.clientIp,
      blockedHostname: event.blockedHostname,
      pattern: event.pattern,
    });
  }

  close(): void {
    if (this.closeDatabase) {
      this.database.close();
    }
  }
}
