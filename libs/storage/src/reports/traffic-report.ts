/**
 * Text reports over the traffic database
 */

import type { TrafficDatabase } from '../traffic-database';
import type { TrafficRequest } from '../repositories/requests';
import { REPORT_TOP_DOMAINS } from '../constants';

const RULE = '='.repeat(70);

function count(n: number): string {
  return n.toLocaleString('en-US');
}

function megabytes(bytes: number): string {
  return (bytes / 1024 / 1024).toFixed(2);
}

function seconds(value: number | null): string {
  return value === null ? 'n/a' : `${value.toFixed(3)}s`;
}

/**
 * Centre `title` in a line of dashes, like a section heading.
 */
export function heading(title: string, width = 70): string {
  const padded = ` ${title} `;
  const left = Math.max(0, Math.floor((width - padded.length) / 2));
  const right = Math.max(0, width - padded.length - left);
  return `${'-'.repeat(left)}${padded}${'-'.repeat(right)}`;
}

export function formatTrafficReport(database: TrafficDatabase, top = REPORT_TOP_DOMAINS): string {
  const lines = [RULE, 'PROXY TRAFFIC DATABASE ANALYTICS', RULE];
  const total = database.requests.total();
  lines.push('', `Total Requests Logged: ${count(total)}`);

  if (total === 0) {
    lines.push('', 'No traffic data in database yet.', 'Run the proxy with --db to collect data.');
  } else {
    const bandwidth = database.requests.bandwidth();
    lines.push(
      '',
      'Bandwidth Statistics:',
      `  Total Bytes Sent:     ${count(bandwidth.totalBytesSent)} bytes (${megabytes(bandwidth.totalBytesSent)} MB)`,
      `  Total Bytes Received: ${count(bandwidth.totalBytesReceived)} bytes (${megabytes(bandwidth.totalBytesReceived)} MB)`,
      `  Average Duration:     ${seconds(bandwidth.avgDurationSeconds)}`,
      `  Average TTFB:         ${seconds(bandwidth.avgTtfbSeconds)}`,
      '',
      heading(`Top ${top} Domains by Request Count`),
    );

    database.requests.topDomains(top).forEach((domain, i) => {
      lines.push(
        '',
        `${i + 1}. ${domain.host}`,
        `   Requests: ${count(domain.requests)} | Bytes Sent: ${count(domain.bytesSent)} | Bytes Received: ${count(domain.bytesReceived)}`,
        `   Avg Duration: ${seconds(domain.avgDurationSeconds)}`,
      );
    });
  }

  lines.push(
    '',
    heading('Security Statistics'),
    `  Blocked Requests:        ${count(database.blocked.total())}`,
    `  Rate Limit Violations:   ${count(database.rateLimits.total())}`,
    RULE,
  );

  return lines.join('\n');
}

/**
 * One line per stored request to `host`, newest first.
 */
export function formatDomainRequests(host: string, requests: readonly TrafficRequest[]): string {
  if (requests.length === 0) {
    return `No requests found for domain: ${host}`;
  }
  return [
    `Requests to ${host}:`,
    '-'.repeat(70),
    ...requests.map(
      (r) =>
        `${r.timestamp} | ${r.sourceIp} | Sent: ${r.bytesSent} | Recv: ${r.bytesReceived} | Duration: ${seconds(r.durationSeconds)}`,
    ),
  ].join('\n');
}
