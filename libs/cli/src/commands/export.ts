/**
 * Export command
 *
 * Writes every stored request to a CSV file.
 */

import { Command } from 'commander';
import { defaultExportPath, trafficDatabasePath } from '../utils/paths.js';
import { openExistingDatabase } from './report.js';

export interface ExportOptions {
  db?: string;
  out?: string;
}

export interface ExportResult {
  file: string;
  rows: number;
}

export function exportTraffic(options: ExportOptions): ExportResult {
  const dbPath = options.db ?? trafficDatabasePath();
  const file = options.out ?? defaultExportPath(dbPath);
  const database = openExistingDatabase(dbPath);
  try {
    return { file, rows: database.exportCsv(file) };
  } finally {
    database.close();
  }
}

/**
 * Create the export command
 */
export function createExportCommand(): Command {
  const cmd = new Command('export')
    .description('Export stored requests as CSV')
    .option('--db <path>', 'Traffic database file')
    .option('-o, --out <file>', 'CSV file to write (default: beside the database)')
    .action((options: ExportOptions) => {
      const result = exportTraffic(options);
      if (result.rows === 0) {
        console.log(`No data to export; wrote the header to ${result.file}`);
      } else {
        console.log(`Exported ${result.rows.toLocaleString('en-US')} requests to ${result.file}`);
      }
    });

  return cmd;
}
