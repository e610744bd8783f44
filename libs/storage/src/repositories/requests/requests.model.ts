/**
 * Requests model: DB row mappers
 */

import type { DbBandwidthRow, DbDomainTotalsRow, DbRequestRow } from '../../types';
import type { TrafficProtocol } from './requests.schema';

export interface TrafficRequest {
  id: number;
  recordId: string;
  timestamp: string;
  sourceIp: string;
  destinationHost: string;
  destinationPort: number;
  method: string;
  protocol: TrafficProtocol;
  statusCode: number;
  outcome: string;
  bytesSent: number;
  bytesReceived: number;
  durationSeconds: number;
  ttfbSeconds: number | null;
  errorCode: string | null;
}

export interface DomainTotals {
  host: string;
  requests: number;
  bytesSent: number;
  bytesReceived: number;
  avgDurationSeconds: number;
}

export interface BandwidthStats {
  requests: number;
  totalBytesSent: number;
  totalBytesReceived: number;
  /** null when no requests are stored */
  avgDurationSeconds: number | null;
  avgTtfbSeconds: number | null;
}

// ---- Row mappers ----

export function mapRequest(row: DbRequestRow): TrafficRequest {
  return {
    id: row.id,
    recordId: row.record_id,
    timestamp: row.timestamp,
    sourceIp: row.source_ip,
    destinationHost: row.destination_host,
    destinationPort: row.destination_port,
    method: row.request_method,
    protocol: row.protocol === 'HTTPS' ? 'HTTPS' : 'HTTP',
    statusCode: row.status_code,
    outcome: row.outcome,
    bytesSent: row.bytes_sent,
    bytesReceived: row.bytes_received,
    durationSeconds: row.duration_seconds,
    ttfbSeconds: row.ttfb_seconds,
    errorCode: row.error_code,
  };
}

export function mapDomainTotals(row: DbDomainTotalsRow): DomainTotals {
  return {
    host: row.host,
    requests: row.requests,
    bytesSent: row.bytes_sent,
    bytesReceived: row.bytes_received,
    avgDurationSeconds: row.avg_duration,
  };
}

export function mapBandwidth(row: DbBandwidthRow | undefined): BandwidthStats {
  return {
    requests: row?.requests ?? 0,
    totalBytesSent: row?.total_sent ?? 0,
    totalBytesReceived: row?.total_received ?? 0,
    avgDurationSeconds: row?.avg_duration ?? null,
    avgTtfbSeconds: row?.avg_ttfb ?? null,
  };
}
