/**
 * TrafficDatabase: SQLite store of proxy traffic
 *
 * Holds relayed requests, blocked attempts and rate-limit violations, and
 * answers the aggregate queries the reports are built from.
 */

import type Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { openDatabase, closeDatabase } from './database';
import { runMigrations } from './migrations/index';
import { RequestsRepository } from './repositories/requests';
import { BlockedRequestsRepository } from './repositories/blocked';
import { RateLimitViolationsRepository } from './repositories/rate-limit';
import { toCsv } from './export/csv';

export class TrafficDatabase {
  readonly requests: RequestsRepository;
  readonly blocked: BlockedRequestsRepository;
  readonly rateLimits: RateLimitViolationsRepository;

  private constructor(private readonly db: Database.Database) {
    this.requests = new RequestsRepository(db);
    this.blocked = new BlockedRequestsRepository(db);
    this.rateLimits = new RateLimitViolationsRepository(db);
  }

  /**
   * Open (or create) the traffic database at `dbPath` and bring its schema up to date.
   */
  static open(dbPath: string): TrafficDatabase {
    const db = openDatabase(dbPath);
    runMigrations(db);
    return new TrafficDatabase(db);
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Write every stored request to `outFile` as CSV. Returns the number of rows written.
   */
  exportCsv(outFile: string): number {
    const rows = this.requests.getAll();
    fs.mkdirSync(path.dirname(outFile), { recursive: true });
    fs.writeFileSync(outFile, toCsv(rows), 'utf-8');
    return rows.length;
  }

  close(): void {
    closeDatabase(this.db);
  }
}
