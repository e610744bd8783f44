/**
 * RequestsRepository: relayed request log and aggregates
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import Database from 'better-sqlite3';
import { TrafficSchemaMigration } from '../../../migrations/001-traffic-schema';
import { ValidationError } from '../../../errors';
import { RequestsRepository } from '../requests.repository';
import type { CreateTrafficRequestInput } from '../requests.schema';

function createTestDb(): { db: Database.Database; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'storage-test-'));
  const dbPath = path.join(dir, 'test.db');
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  new TrafficSchemaMigration().up(db);
  return {
    db,
    cleanup: () => {
      db.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

let seq = 0;

function makeRequestInput(overrides?: Partial<CreateTrafficRequestInput>): CreateTrafficRequestInput {
  seq += 1;
  return {
    recordId: `record-${seq}`,
    timestamp: '2026-01-02T03:04:05.000Z',
    sourceIp: '127.0.0.1',
    destinationHost: 'a.test',
    destinationPort: 80,
    method: 'GET',
    protocol: 'HTTP',
    statusCode: 200,
    outcome: 'completed',
    bytesSent: 100,
    bytesReceived: 50,
    durationSeconds: 0.5,
    ttfbSeconds: 0.1,
    ...overrides,
  };
}

describe('RequestsRepository', () => {
  let db: Database.Database;
  let cleanup: () => void;
  let repo: RequestsRepository;

  beforeEach(() => {
    ({ db, cleanup } = createTestDb());
    repo = new RequestsRepository(db);
  });

  afterEach(() => {
    cleanup();
  });

  // ---- create ----

  describe('create', () => {
    it('stores a request and returns it with its row id', () => {
      const stored = repo.create(makeRequestInput({ recordId: 'first' }));

      expect(stored.id).toBe(1);
      expect(stored.recordId).toBe('first');
      expect(stored.errorCode).toBeNull();
      expect(repo.getAll()).toEqual([stored]);
    });

    it('defaults ttfbSeconds to null', () => {
      const input = makeRequestInput();
      delete input.ttfbSeconds;

      expect(repo.create(input).ttfbSeconds).toBeNull();
      expect(repo.getAll()[0].ttfbSeconds).toBeNull();
    });

    it('rejects invalid input with ValidationError', () => {
      expect(() => repo.create(makeRequestInput({ destinationPort: 0 }))).toThrow(ValidationError);
      expect(() => repo.create(makeRequestInput({ timestamp: 'yesterday' }))).toThrow(ValidationError);
      expect(repo.total()).toBe(0);
    });

    it('rejects a duplicate record id', () => {
      repo.create(makeRequestInput({ recordId: 'dup' }));
      expect(() => repo.create(makeRequestInput({ recordId: 'dup' }))).toThrow(/UNIQUE/);
    });
  });

  // ---- Aggregates ----

  describe('aggregates', () => {
    beforeEach(() => {
      repo.create(makeRequestInput({ destinationHost: 'b.test', bytesSent: 10, bytesReceived: 1, durationSeconds: 1 }));
      repo.create(makeRequestInput({ destinationHost: 'a.test', bytesSent: 100, bytesReceived: 20, durationSeconds: 0.5 }));
      repo.create(makeRequestInput({ destinationHost: 'c.test', bytesSent: 5, bytesReceived: 5, durationSeconds: 2, ttfbSeconds: null }));
      repo.create(makeRequestInput({ destinationHost: 'a.test', bytesSent: 300, bytesReceived: 40, durationSeconds: 1.5 }));
      repo.create(makeRequestInput({ destinationHost: 'b.test', bytesSent: 30, bytesReceived: 3, durationSeconds: 2 }));
    });

    it('total counts every request', () => {
      expect(repo.total()).toBe(5);
    });

    it('topDomains orders by count, then host', () => {
      expect(repo.topDomains()).toEqual([
        { host: 'a.test', requests: 2, bytesSent: 400, bytesReceived: 60, avgDurationSeconds: 1 },
        { host: 'b.test', requests: 2, bytesSent: 40, bytesReceived: 4, avgDurationSeconds: 1.5 },
        { host: 'c.test', requests: 1, bytesSent: 5, bytesReceived: 5, avgDurationSeconds: 2 },
      ]);
    });

    it('topDomains honours the limit', () => {
      expect(repo.topDomains(1).map((d) => d.host)).toEqual(['a.test']);
    });

    it('bandwidth sums bytes and averages durations, ignoring missing TTFB', () => {
      const stats = repo.bandwidth();

      expect(stats.requests).toBe(5);
      expect(stats.totalBytesSent).toBe(445);
      expect(stats.totalBytesReceived).toBe(69);
      expect(stats.avgDurationSeconds).toBeCloseTo(1.4);
      expect(stats.avgTtfbSeconds).toBeCloseTo(0.1);
    });

    it('getByHost returns only that host', () => {
      const rows = repo.getByHost('b.test');
      expect(rows.map((r) => r.bytesSent).sort((x, y) => x - y)).toEqual([10, 30]);
    });
  });

  it('bandwidth of an empty table has zero sums and null averages', () => {
    expect(repo.bandwidth()).toEqual({
      requests: 0,
      totalBytesSent: 0,
      totalBytesReceived: 0,
      avgDurationSeconds: null,
      avgTtfbSeconds: null,
    });
  });
});
