/**
 * Migration 001: Traffic schema
 *
 * Relayed requests, blocked attempts and rate-limit violations.
 */

import type Database from 'better-sqlite3';
import type { Migration } from './types';

export class TrafficSchemaMigration implements Migration {
  readonly version = 1;
  readonly name = '001-traffic-schema';

  up(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS requests (
        id               INTEGER PRIMARY KEY AUTOINCREMENT,
        record_id        TEXT NOT NULL UNIQUE,
        timestamp        TEXT NOT NULL,
        source_ip        TEXT NOT NULL,
        destination_host TEXT NOT NULL,
        destination_port INTEGER NOT NULL,
        request_method   TEXT NOT NULL,
        protocol         TEXT NOT NULL,
        status_code      INTEGER NOT NULL DEFAULT 0,
        outcome          TEXT NOT NULL,
        bytes_sent       INTEGER NOT NULL DEFAULT 0,
        bytes_received   INTEGER NOT NULL DEFAULT 0,
        duration_seconds REAL NOT NULL DEFAULT 0,
        ttfb_seconds     REAL,
        error_code       TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_requests_host ON requests(destination_host);
      CREATE INDEX IF NOT EXISTS idx_requests_ts ON requests(timestamp DESC);

      CREATE TABLE IF NOT EXISTS blocked_requests (
        id               INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp        TEXT NOT NULL,
        source_ip        TEXT NOT NULL,
        blocked_hostname TEXT NOT NULL,
        pattern          TEXT NOT NULL,
        reason           TEXT NOT NULL DEFAULT 'Blocklist'
      );
      CREATE INDEX IF NOT EXISTS idx_blocked_ts ON blocked_requests(timestamp DESC);

      CREATE TABLE IF NOT EXISTS rate_limit_violations (
        id               INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp        TEXT NOT NULL,
        source_ip        TEXT NOT NULL,
        destination_host TEXT,
        request_count    INTEGER NOT NULL,
        limit_count      INTEGER NOT NULL,
        window_ms        INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_violations_ip ON rate_limit_violations(source_ip);
    `);
  }
}
