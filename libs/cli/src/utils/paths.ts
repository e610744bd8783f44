import * as path from 'node:path';
import { TRAFFIC_LOG_DIR } from '@portcullis/ipc';
import { CSV_EXPORT_FILENAME, DATABASE_DIR, TRAFFIC_DB_FILENAME } from '@portcullis/storage';

/**
 * Traffic database location under a traffic log directory.
 */
export function trafficDatabasePath(logDir: string = TRAFFIC_LOG_DIR): string {
  return path.join(logDir, DATABASE_DIR, TRAFFIC_DB_FILENAME);
}

/**
 * Default CSV export location: beside the database.
 */
export function defaultExportPath(dbPath: string): string {
  return path.join(path.dirname(dbPath), CSV_EXPORT_FILENAME);
}
