/**
 * End-of-run summary files
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { SUMMARY_FILES, SUMMARY_TOP_DOMAINS, TRAFFIC_DIRS } from '../constants';
import { TrafficLogError } from '../errors';
import type { DomainStats } from './domain-stats';

/**
 * Hosts ordered by request count, busiest first. Equal counts keep their input order.
 */
export function rankDomains(stats: Record<string, DomainStats>): Array<[string, DomainStats]> {
  return Object.entries(stats).sort(([, a], [, b]) => b.requests - a.requests);
}

export function formatTextSummary(stats: Record<string, DomainStats>, top = SUMMARY_TOP_DOMAINS): string {
  const all = Object.values(stats);
  const totalRequests = all.reduce((sum, d) => sum + d.requests, 0);
  const totalSent = all.reduce((sum, d) => sum + d.bytesSent, 0);
  const totalReceived = all.reduce((sum, d) => sum + d.bytesReceived, 0);

  const lines = [
    `Total requests handled: ${totalRequests}`,
    `Total bytes sent: ${totalSent}`,
    `Total bytes received: ${totalReceived}\n`,
    `Top ${top} domains by request count:`,
  ];

  rankDomains(stats)
    .slice(0, top)
    .forEach(([host, d], i) => {
      lines.push(
        `${i + 1}. ${host} - Requests: ${d.requests}, Avg Duration: ${d.avgDuration.toFixed(3)}s, ` +
          `Bytes Sent: ${d.bytesSent}, Bytes Received: ${d.bytesReceived}`,
      );
    });

  return lines.join('\n');
}

export interface SummaryFiles {
  jsonPath: string;
  textPath: string;
}

/**
 * Write `summary.json` and `summary_report.txt` under `<rootDir>/Summary Logs`.
 */
export async function writeSummaryFiles(rootDir: string, stats: Record<string, DomainStats>): Promise<SummaryFiles> {
  const dir = path.join(rootDir, TRAFFIC_DIRS.SUMMARY);
  const jsonPath = path.join(dir, SUMMARY_FILES.JSON);
  const textPath = path.join(dir, SUMMARY_FILES.TEXT);

  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(jsonPath, JSON.stringify(stats, null, 4), 'utf-8');
    await fs.writeFile(textPath, formatTextSummary(stats), 'utf-8');
  } catch (error) {
    throw new TrafficLogError(`Failed to write summary files in ${dir}`, { cause: error });
  }

  return { jsonPath, textPath };
}
