/**
 * Report command
 *
 * Prints analytics from the traffic database.
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import { TrafficDatabase, formatDomainRequests, formatTrafficReport } from '@portcullis/storage';
import { trafficDatabasePath } from '../utils/paths.js';

export interface ReportOptions {
  db?: string;
  domain?: string;
}

/**
 * Open an existing traffic database; a missing file is an error rather than a new empty database.
 */
export function openExistingDatabase(dbPath: string): TrafficDatabase {
  if (!fs.existsSync(dbPath)) {
    throw new Error(`No traffic database at ${dbPath}. Run "portcullis start --db" to collect traffic.`);
  }
  return TrafficDatabase.open(dbPath);
}

export function renderReport(options: ReportOptions): string {
  const database = openExistingDatabase(options.db ?? trafficDatabasePath());
  try {
    if (options.domain) {
      return formatDomainRequests(options.domain, database.requests.getByHost(options.domain.toLowerCase()));
    }
    return formatTrafficReport(database);
  } finally {
    database.close();
  }
}

/**
 * Create the report command
 */
export function createReportCommand(): Command {
  const cmd = new Command('report')
    .description('Print traffic analytics from the database')
    .option('--db <path>', 'Traffic database file')
    .option('-d, --domain <host>', 'List the stored requests to one host')
    .action((options: ReportOptions) => {
      console.log(renderReport(options));
    });

  return cmd;
}
