/**
 * Rate-limit violation SQL queries
 */

const TABLE = 'rate_limit_violations';

export const Q = {
  insert: `
    INSERT INTO ${TABLE} (timestamp, source_ip, destination_host, request_count, limit_count, window_ms)
    VALUES (@timestamp, @sourceIp, @destinationHost, @requestCount, @limit, @windowMs)`,

  count: `SELECT COUNT(*) AS count FROM ${TABLE}`,

  selectBySource: `SELECT * FROM ${TABLE} WHERE source_ip = ? ORDER BY timestamp DESC, id DESC`,
} as const;
