/**
 * Requests SQL queries
 */

const TABLE = 'requests';

export const Q = {
  insert: `
    INSERT INTO ${TABLE} (
      record_id, timestamp, source_ip, destination_host, destination_port,
      request_method, protocol, status_code, outcome,
      bytes_sent, bytes_received, duration_seconds, ttfb_seconds, error_code
    ) VALUES (
      @recordId, @timestamp, @sourceIp, @destinationHost, @destinationPort,
      @method, @protocol, @statusCode, @outcome,
      @bytesSent, @bytesReceived, @durationSeconds, @ttfbSeconds, @errorCode
    )`,

  count: `SELECT COUNT(*) AS count FROM ${TABLE}`,

  selectAll: `SELECT * FROM ${TABLE} ORDER BY id`,

  selectByHost: `SELECT * FROM ${TABLE} WHERE destination_host = ? ORDER BY timestamp DESC, id DESC`,

  topDomains: `
    SELECT destination_host AS host,
           COUNT(*) AS requests,
           SUM(bytes_sent) AS bytes_sent,
           SUM(bytes_received) AS bytes_received,
           AVG(duration_seconds) AS avg_duration
    FROM ${TABLE}
    GROUP BY destination_host
    ORDER BY requests DESC, host ASC
    LIMIT @limit`,

  bandwidth: `
    SELECT COUNT(*) AS requests,
           COALESCE(SUM(bytes_sent), 0) AS total_sent,
           COALESCE(SUM(bytes_received), 0) AS total_received,
           AVG(duration_seconds) AS avg_duration,
           AVG(ttfb_seconds) AS avg_ttfb
    FROM ${TABLE}`,
} as const;
