import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import Database from 'better-sqlite3';
import { TrafficSchemaMigration } from '../../../migrations/001-traffic-schema';
import { ValidationError } from '../../../errors';
import { RateLimitViolationsRepository } from '../rate-limit.repository';

function createTestDb(): { db: Database.Database; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'storage-test-'));
  const db = new Database(path.join(dir, 'test.db'));
  new TrafficSchemaMigration().up(db);
  return {
    db,
    cleanup: () => {
      db.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

describe('RateLimitViolationsRepository', () => {
  let cleanup: () => void;
  let repo: RateLimitViolationsRepository;

  beforeEach(() => {
    let db: Database.Database;
    ({ db, cleanup } = createTestDb());
    repo = new RateLimitViolationsRepository(db);
  });

  afterEach(() => {
    cleanup();
  });

  it('stores a violation with the window state', () => {
    const stored = repo.create({
      timestamp: '2026-01-02T03:04:05.000Z',
      sourceIp: '10.0.0.7',
      destinationHost: 'a.test',
      requestCount: 101,
      limit: 100,
      windowMs: 10_000,
    });

    expect(stored.id).toBe(1);
    expect(repo.getBySource('10.0.0.7')).toEqual([
      {
        id: 1,
        timestamp: '2026-01-02T03:04:05.000Z',
        sourceIp: '10.0.0.7',
        destinationHost: 'a.test',
        requestCount: 101,
        limit: 100,
        windowMs: 10_000,
      },
    ]);
  });

  it('counts violations across sources', () => {
    const base = { timestamp: '2026-01-02T03:04:05.000Z', requestCount: 2, limit: 1, windowMs: 1000 };
    repo.create({ ...base, sourceIp: '10.0.0.7' });
    repo.create({ ...base, sourceIp: '10.0.0.8' });
    repo.create({ ...base, sourceIp: '10.0.0.7' });

    expect(repo.total()).toBe(3);
    expect(repo.getBySource('10.0.0.8')).toHaveLength(1);
    expect(repo.getBySource('10.0.0.8')[0].destinationHost).toBeNull();
  });

  it('rejects a zero request count', () => {
    expect(() =>
      repo.create({ timestamp: '2026-01-02T03:04:05.000Z', sourceIp: '10.0.0.7', requestCount: 0, limit: 1, windowMs: 1000 }),
    ).toThrow(ValidationError);
  });
});
