/**
 * Sink that writes metrics to the logger at debug level.
 */

import type { BlockedEvent, MetricsRecord, MetricsSink } from '@portcullis/ipc';
import type { Logger } from '../logger.js';

export class LoggingSink implements MetricsSink {
  constructor(private readonly logger: Logger) {}

  recordRequest(record: MetricsRecord): void {
    this.logger.debug(`request ${record.outcome} ${record.targetHost ?? '-'}`, {
      id: record.id,
      clientIp: record.clientIp,
      status: record.status,
      bytesSent: record.bytesSent,
      bytesReceived: record.bytesReceived,
      durationMs: Math.round(record.durationMs),
      ttfbMs: record.ttfbMs === null ? null : Math.round(record.ttfbMs),
      ...(record.errorCode ? { errorCode: record.errorCode } : {}),
    });
  }

  recordBlocked(event: BlockedEvent): void {
    this.logger.debug(`blocked ${event.blockedHostname}`, {
      clientIp: event.clientIp,
      pattern: event.pattern,
    });
  }
}
