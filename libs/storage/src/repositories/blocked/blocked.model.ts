/**
 * Blocked request model: DB row mapper
 */

import type { DbBlockedRequestRow } from '../../types';

export interface BlockedRequest {
  id: number;
  timestamp: string;
  sourceIp: string;
  blockedHostname: string;
  pattern: string;
  reason: string;
}

export function mapBlockedRequest(row: DbBlockedRequestRow): BlockedRequest {
  return {
    id: row.id,
    timestamp: row.timestamp,
    sourceIp: row.source_ip,
    blockedHostname: row.blocked_hostname,
    pattern: row.pattern,
    reason: row.reason,
  };
}
