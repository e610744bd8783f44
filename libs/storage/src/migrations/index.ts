/**
 * Schema migrations
 *
 * The schema version is kept in `PRAGMA user_version`. Pending migrations and
 * the version bump share one transaction.
 */

import type Database from 'better-sqlite3';
import type { Migration } from './types';
import { TrafficSchemaMigration } from './001-traffic-schema';

export type { Migration };

export const ALL_MIGRATIONS: readonly Migration[] = [new TrafficSchemaMigration()];

export function schemaVersion(db: Database.Database): number {
  const version: unknown = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/**
 * Apply every migration newer than the stored schema version.
 * Returns the number applied.
 */
export function runMigrations(db: Database.Database, migrations: readonly Migration[] = ALL_MIGRATIONS): number {
  const current = schemaVersion(db);
  const pending = migrations.filter((m) => m.version > current).sort((a, b) => a.version - b.version);
  if (pending.length === 0) return 0;

  db.transaction(() => {
    for (const migration of pending) {
      migration.up(db);
      db.pragma(`user_version = ${migration.version}`);
    }
  })();

  return pending.length;
}
