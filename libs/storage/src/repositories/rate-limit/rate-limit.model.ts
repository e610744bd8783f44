/**
 * Rate-limit violation model: DB row mapper
 */

import type { DbRateLimitViolationRow } from '../../types';

export interface RateLimitViolation {
  id: number;
  timestamp: string;
  sourceIp: string;
  destinationHost: string | null;
  requestCount: number;
  limit: number;
  windowMs: number;
}

export function mapRateLimitViolation(row: DbRateLimitViolationRow): RateLimitViolation {
  return {
    id: row.id,
    timestamp: row.timestamp,
    sourceIp: row.source_ip,
    destinationHost: row.destination_host,
    requestCount: row.request_count,
    limit: row.limit_count,
    windowMs: row.window_ms,
  };
}
