/**
 * Database row types (snake_case, as stored)
 */

export interface DbRequestRow {
  id: number;
  record_id: string;
  timestamp: string;
  source_ip: string;
  destination_host: string;
  destination_port: number;
  request_method: string;
  protocol: string;
  status_code: number;
  outcome: string;
  bytes_sent: number;
  bytes_received: number;
  duration_seconds: number;
  ttfb_seconds: number | null;
  error_code: string | null;
}

export interface DbBlockedRequestRow {
  id: number;
  timestamp: string;
  source_ip: string;
  blocked_hostname: string;
  pattern: string;
  reason: string;
}

export interface DbRateLimitViolationRow {
  id: number;
  timestamp: string;
  source_ip: string;
  destination_host: string | null;
  request_count: number;
  limit_count: number;
  window_ms: number;
}

export interface DbDomainTotalsRow {
  host: string;
  requests: number;
  bytes_sent: number;
  bytes_received: number;
  avg_duration: number;
}

export interface DbBandwidthRow {
  requests: number;
  total_sent: number;
  total_received: number;
  avg_duration: number | null;
  avg_ttfb: number | null;
}

export interface DbCountRow {
  count: number;
}
