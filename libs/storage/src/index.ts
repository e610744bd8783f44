/**
 * Portcullis Storage Library
 *
 * Metrics sinks for the proxy: JSON traffic logs, a SQLite traffic database
 * with migrations and repositories, per-domain statistics and reports.
 *
 * @packageDocumentation
 */

// Core
export { TrafficDatabase } from './traffic-database';

// Errors
export { ValidationError, DatabaseTamperError, TrafficLogError } from './errors';

// Constants
export {
  DATABASE_DIR,
  TRAFFIC_DB_FILENAME,
  CSV_EXPORT_FILENAME,
  TRAFFIC_DIRS,
  SUMMARY_FILES,
  SUMMARY_TOP_DOMAINS,
  REPORT_TOP_DOMAINS,
  APPLICATION_ID,
} from './constants';

// Database
export { openDatabase, closeDatabase } from './database';

// Repositories
export { BaseRepository } from './repositories/base.repository';
export { RequestsRepository, CreateTrafficRequestSchema, TrafficProtocolSchema } from './repositories/requests';
export type {
  CreateTrafficRequestInput,
  TrafficProtocol,
  TrafficRequest,
  DomainTotals,
  BandwidthStats,
} from './repositories/requests';
export { BlockedRequestsRepository, CreateBlockedRequestSchema } from './repositories/blocked';
export type { CreateBlockedRequestInput, BlockedRequest } from './repositories/blocked';
export { RateLimitViolationsRepository, CreateRateLimitViolationSchema } from './repositories/rate-limit';
export type { CreateRateLimitViolationInput, RateLimitViolation } from './repositories/rate-limit';

// Migrations
export { runMigrations, schemaVersion, ALL_MIGRATIONS } from './migrations/index';
export type { Migration } from './migrations/types';

// Sinks
export { SqliteSink } from './sinks/sqlite-sink';
export type { SqliteSinkOptions } from './sinks/sqlite-sink';
export {
  JsonFileSink,
  formatLocalTimestamp,
  safeFileComponent,
  toTrafficLogEntry,
  toBlockedLogEntry,
} from './sinks/json-file-sink';
export type { TrafficLogEntry } from './sinks/json-file-sink';
export { isRelayedRecord } from './sinks/relayed';
export type { RelayedRecord } from './sinks/relayed';

// Statistics and reports
export { DomainStatsCollector } from './stats/domain-stats';
export type { DomainStats } from './stats/domain-stats';
export { formatTextSummary, writeSummaryFiles, rankDomains } from './stats/summary';
export type { SummaryFiles } from './stats/summary';
export { formatTrafficReport, formatDomainRequests, heading } from './reports/traffic-report';
export { toCsv, toCsvRow, escapeCsvField, CSV_COLUMNS } from './export/csv';
