/**
 * Per-host traffic statistics gathered in memory while the proxy runs
 */

import type { BlockedEvent, MetricsRecord, MetricsSink } from '@portcullis/ipc';
import { isRelayedRecord } from '../sinks/relayed';

/** Durations are in seconds. */
export interface DomainStats {
  requests: number;
  bytesSent: number;
  bytesReceived: number;
  totalDuration: number;
  totalTtfb: number;
  avgDuration: number;
  /** Average over requests that saw a first response byte */
  avgTtfb: number;
}

interface Accumulator {
  requests: number;
  bytesSent: number;
  bytesReceived: number;
  totalDuration: number;
  totalTtfb: number;
  ttfbSamples: number;
}

export class DomainStatsCollector implements MetricsSink {
  private readonly domains = new Map<string, Accumulator>();
  private blockedCount = 0;

  recordRequest(record: MetricsRecord): void {
    if (!isRelayedRecord(record)) return;

    let acc = this.domains.get(record.targetHost);
    if (!acc) {
      acc = { requests: 0, bytesSent: 0, bytesReceived: 0, totalDuration: 0, totalTtfb: 0, ttfbSamples: 0 };
      this.domains.set(record.targetHost, acc);
    }

    acc.requests += 1;
    acc.bytesSent += record.bytesSent;
    acc.bytesReceived += record.bytesReceived;
    acc.totalDuration += record.durationMs / 1000;
    if (record.ttfbMs !== null) {
      acc.totalTtfb += record.ttfbMs / 1000;
      acc.ttfbSamples += 1;
    }
  }

  recordBlocked(_event: BlockedEvent): void {
    this.blockedCount += 1;
  }

  get blocked(): number {
    return this.blockedCount;
  }

  /**
   * Current statistics keyed by host, in first-seen order.
   */
  snapshot(): Record<string, DomainStats> {
    const result: Record<string, DomainStats> = {};
    for (const [host, acc] of this.domains) {
      result[host] = {
        requests: acc.requests,
        bytesSent: acc.bytesSent,
        bytesReceived: acc.bytesReceived,
        totalDuration: acc.totalDuration,
        totalTtfb: acc.totalTtfb,
        avgDuration: acc.requests > 0 ? acc.totalDuration / acc.requests : 0,
        avgTtfb: acc.ttfbSamples > 0 ? acc.totalTtfb / acc.ttfbSamples : 0,
      };
    }
    return result;
  }
}
