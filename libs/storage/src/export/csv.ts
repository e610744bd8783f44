/**
 * CSV export of stored requests
 */

import type { TrafficRequest } from '../repositories/requests';

export const CSV_COLUMNS = [
  'id',
  'timestamp',
  'source_ip',
  'dest_host',
  'dest_port',
  'method',
  'protocol',
  'bytes_sent',
  'bytes_received',
  'duration',
  'ttfb',
] as const;

/**
 * Quote a field when it contains a delimiter, a quote or a line break.
 */
export function escapeCsvField(value: string | number | null): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvRow(request: TrafficRequest): string {
  return [
    request.id,
    request.timestamp,
    request.sourceIp,
    request.destinationHost,
    request.destinationPort,
    request.method,
    request.protocol,
    request.bytesSent,
    request.bytesReceived,
    request.durationSeconds,
    request.ttfbSeconds,
  ]
    .map(escapeCsvField)
    .join(',');
}

export function toCsv(requests: readonly TrafficRequest[]): string {
  const lines = [CSV_COLUMNS.join(','), ...requests.map(toCsvRow)];
  return `${lines.join('\n')}\n`;
}
