/**
 * CLI Commands
 *
 * Exports all command creator functions for registration in the main CLI.
 */

export { createStartCommand, buildStartConfig, type StartOptions } from './start.js';
export { createReportCommand, renderReport, openExistingDatabase, type ReportOptions } from './report.js';
export { createExportCommand, exportTraffic, type ExportOptions, type ExportResult } from './export.js';
