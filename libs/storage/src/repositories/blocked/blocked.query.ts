/**
 * Blocked request SQL queries
 */

const TABLE = 'blocked_requests';

export const Q = {
  insert: `
    INSERT INTO ${TABLE} (timestamp, source_ip, blocked_hostname, pattern, reason)
    VALUES (@timestamp, @sourceIp, @blockedHostname, @pattern, @reason)`,

  count: `SELECT COUNT(*) AS count FROM ${TABLE}`,

  selectRecent: `SELECT * FROM ${TABLE} ORDER BY timestamp DESC, id DESC LIMIT @limit`,
} as const;
