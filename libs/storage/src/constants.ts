/**
 * Storage constants
 */

export const DATABASE_DIR = 'Database';
export const TRAFFIC_DB_FILENAME = 'proxy_traffic.db';
export const CSV_EXPORT_FILENAME = 'traffic_export.csv';

/** Directories under the traffic log root */
export const TRAFFIC_DIRS = {
  WEBSITE_TRAFFIC: 'Website Traffic',
  BLOCKED: 'Blocked Logs',
  SUMMARY: 'Summary Logs',
} as const;

export const SUMMARY_FILES = {
  JSON: 'summary.json',
  TEXT: 'summary_report.txt',
} as const;

/** Domains listed in the end-of-run text summary */
export const SUMMARY_TOP_DOMAINS = 5;

/** Domains listed in the database report */
export const REPORT_TOP_DOMAINS = 10;

export const DB_PRAGMAS = {
  JOURNAL_MODE: 'WAL',
  BUSY_TIMEOUT: 5000,
} as const;

export const FILE_PERMISSIONS = {
  DB_FILE: 0o600,
  DB_DIR: 0o700,
} as const;

/** SQLite application_id for the traffic database ("PCTR" in hex). */
export const APPLICATION_ID = 0x50435452;
