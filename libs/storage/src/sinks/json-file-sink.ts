/**
 * JsonFileSink: one pretty-printed JSON file per request or blocked attempt
 *
 * Layout under the root directory:
 *   Website Traffic/<host>/<host>_<uuid>.json
 *   Blocked Logs/blocked_<uuid>.json
 */

import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { BlockedEvent, MetricsRecord, MetricsSink } from '@portcullis/ipc';
import { TRAFFIC_DIRS } from '../constants';
import { TrafficLogError } from '../errors';
import { isRelayedRecord } from './relayed';

/**
 * Local wall-clock time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatLocalTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Host names become directory and file names; anything outside `[A-Za-z0-9._-]` is replaced.
 */
export function safeFileComponent(host: string): string {
  return host.replace(/[^A-Za-z0-9._-]/g, '_');
}

export type TrafficLogEntry = Record<string, string | number>;

/**
 * The JSON document for one relayed request. Absent values are omitted.
 */
export function toTrafficLogEntry(record: MetricsRecord): TrafficLogEntry {
  const entry: Record<string, string | number | null | undefined> = {
    'Timestamp': formatLocalTimestamp(new Date(record.timestamp)),
    'Incoming header': record.rawHeader,
    'Modified header': record.modifiedHeader,
    'Proxy response sent': record.outcomeLine,
    'Bytes sent': record.bytesSent,
    'Bytes received': record.bytesReceived,
    'Request duration (s)': record.durationMs / 1000,
    'TTFB (s)': record.ttfbMs === null ? null : record.ttfbMs / 1000,
  };

  const result: TrafficLogEntry = {};
  for (const [key, value] of Object.entries(entry)) {
    if (value !== null && value !== undefined) result[key] = value;
  }
  return result;
}

export function toBlockedLogEntry(event: BlockedEvent): TrafficLogEntry {
  return {
    'Timestamp': formatLocalTimestamp(new Date(event.timestamp)),
    'Blocked hostname': event.blockedHostname,
    'Client IP': event.clientIp,
  };
}

export class JsonFileSink implements MetricsSink {
  constructor(private readonly rootDir: string) {}

  get trafficDir(): string {
    return path.join(this.rootDir, TRAFFIC_DIRS.WEBSITE_TRAFFIC);
  }

  get blockedDir(): string {
    return path.join(this.rootDir, TRAFFIC_DIRS.BLOCKED);
  }

  async recordRequest(record: MetricsRecord): Promise<void> {
    if (!isRelayedRecord(record)) return;

    const host = safeFileComponent(record.targetHost);
    const dir = path.join(this.trafficDir, host);
    await this.writeJson(dir, `${host}_${crypto.randomUUID()}.json`, toTrafficLogEntry(record));
  }

  async recordBlocked(event: BlockedEvent): Promise<void> {
    await this.writeJson(this.blockedDir, `blocked_${crypto.randomUUID()}.json`, toBlockedLogEntry(event));
  }

  private async writeJson(dir: string, fileName: string, entry: TrafficLogEntry): Promise<void> {
    const file = path.join(dir, fileName);
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(file, JSON.stringify(entry, null, 4), 'utf-8');
    } catch (error) {
      throw new TrafficLogError(`Failed to write traffic log ${file}`, { cause: error });
    }
  }
}
