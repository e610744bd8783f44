import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { BlockedEvent, MetricsRecord } from '@portcullis/ipc';

let seq = 0;

export function makeRecord(overrides: Partial<MetricsRecord> = {}): MetricsRecord {
  seq += 1;
  return {
    id: `00000000-0000-4000-8000-${String(seq).padStart(12, '0')}`,
    timestamp: '2026-01-02T03:04:05.000Z',
    clientIp: '127.0.0.1',
    clientPort: 50000,
    kind: 'http',
    method: 'GET',
    targetHost: 'example.test',
    targetPort: 80,
    outcome: 'completed',
    status: 200,
    outcomeLine: 'HTTP/1.1 200 OK',
    rawHeader: 'GET http://example.test/ HTTP/1.1\r\nHost: example.test',
    modifiedHeader: 'GET / HTTP/1.1\r\nHost: example.test\r\nConnection: close\r\n\r\n',
    bytesSent: 120,
    bytesReceived: 60,
    upstreamBytesSent: 60,
    upstreamBytesReceived: 120,
    durationMs: 250,
    ttfbMs: 40,
    ...overrides,
  };
}

export function makeBlocked(overrides: Partial<BlockedEvent> = {}): BlockedEvent {
  return {
    timestamp: '2026-01-02T03:04:05.000Z',
    blockedHostname: 'www.youtube.com',
    clientIp: '127.0.0.1',
    pattern: '*.youtube.com',
    ...overrides,
  };
}

export function tmpDir(prefix = 'storage-test-'): { dir: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  return {
    dir,
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}
