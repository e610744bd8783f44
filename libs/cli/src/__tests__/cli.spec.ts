import * as fs from 'node:fs';
import * as net from 'node:net';
import * as os from 'node:os';
import * as path from 'node:path';
import { InvalidArgumentError } from 'commander';
import type { MetricsRecord } from '@portcullis/ipc';
import { createSilentLogger } from '@portcullis/proxy';
import { SqliteSink, TrafficDatabase } from '@portcullis/storage';
import { buildStartConfig } from '../commands/start';
import { exportTraffic } from '../commands/export';
import { renderReport } from '../commands/report';
import { createProgram, VERSION } from '../program';
import { runProxy } from '../runtime';
import { parseLogLevel, parsePort, parsePositiveInt, parsePositiveNumber } from '../utils/parse';
import { defaultExportPath, trafficDatabasePath } from '../utils/paths';

function tmpDir(): { dir: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-test-'));
  return { dir, cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) };
}

function record(overrides: Partial<MetricsRecord> = {}): MetricsRecord {
  return {
    id: '00000000-0000-4000-8000-000000000001',
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
    bytesSent: 120,
    bytesReceived: 60,
    upstreamBytesSent: 60,
    upstreamBytesReceived: 120,
    durationMs: 250,
    ttfbMs: 40,
    ...overrides,
  };
}

/** Send raw bytes and collect everything until the proxy closes the connection. */
function exchange(port: number, request: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: '127.0.0.1', port });
    const chunks: Buffer[] = [];
    socket.on('data', (chunk: Buffer) => chunks.push(chunk));
    socket.on('error', reject);
    socket.on('close', () => resolve(Buffer.concat(chunks).toString('latin1')));
    socket.write(request);
  });
}

// ---- Option parsers ----

describe('option parsers', () => {
  it('parsePort accepts 0..65535', () => {
    expect(parsePort('8080')).toBe(8080);
    expect(parsePort('0')).toBe(0);
    expect(() => parsePort('65536')).toThrow(InvalidArgumentError);
    expect(() => parsePort('80a')).toThrow(InvalidArgumentError);
    expect(() => parsePort('-1')).toThrow(InvalidArgumentError);
  });

  it('parsePositiveInt and parsePositiveNumber reject zero', () => {
    expect(parsePositiveInt('50')).toBe(50);
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
    expect(parsePositiveNumber('2.5')).toBe(2.5);
    expect(() => parsePositiveNumber('0')).toThrow(InvalidArgumentError);
  });

  it('parseLogLevel is case-insensitive', () => {
    expect(parseLogLevel('WARN')).toBe('warn');
    expect(() => parseLogLevel('loud')).toThrow('Expected one of: debug, info, warn, error.');
  });
});

describe('paths', () => {
  it('places the database and export under the log directory', () => {
    expect(trafficDatabasePath()).toBe(path.join('Logs', 'Database', 'proxy_traffic.db'));
    expect(defaultExportPath(path.join('x', 'y.db'))).toBe(path.join('x', 'traffic_export.csv'));
  });
});

// ---- start configuration ----

describe('buildStartConfig', () => {
  it('maps flags onto the configuration', () => {
    const config = buildStartConfig(
      3128,
      { log: true, db: true, logDir: 'traffic', rateLimit: 5, rateWindow: 2.5, logLevel: 'warn' },
      {},
    );

    expect(config.port).toBe(3128);
    expect(config.host).toBe('0.0.0.0');
    expect(config.logLevel).toBe('warn');
    expect(config.rateLimit).toEqual({ limit: 5, windowSeconds: 2.5, staleAfterWindows: 6 });
    expect(config.traffic).toEqual({ enabled: true, sqlite: true, dir: 'traffic' });
    expect(config.blocklist).toEqual(['*.youtube.com', '*.ytimg.com', '*.googlevideo.com']);
  });

  it('lets flags win over the environment', () => {
    const env = { PORTCULLIS_PORT: '9000', PORTCULLIS_RATE_LIMIT: '7' };

    expect(buildStartConfig(undefined, {}, env).port).toBe(9000);
    expect(buildStartConfig(3128, {}, env).port).toBe(3128);
    expect(buildStartConfig(undefined, { rateLimit: 3 }, env).rateLimit.limit).toBe(3);
    expect(buildStartConfig(undefined, {}, env).traffic.enabled).toBe(false);
  });

  it('reads the blocklist file', () => {
    const { dir, cleanup } = tmpDir();
    try {
      const file = path.join(dir, 'blocked.txt');
      fs.writeFileSync(file, '# streaming\n*.example.test\nads.test\n');

      expect(buildStartConfig(undefined, { blocklist: file }, {}).blocklist).toEqual(['*.example.test', 'ads.test']);
    } finally {
      cleanup();
    }
  });
});

// ---- runtime ----

describe('runProxy', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = tmpDir());
  });

  afterEach(() => {
    cleanup();
  });

  it('records traffic and writes summaries on shutdown', async () => {
    const config = buildStartConfig(0, { host: '127.0.0.1', log: true, db: true, logDir: dir }, {});
    const running = await runProxy(config, { logger: createSilentLogger() });

    const response = await exchange(
      running.address.port,
      'GET http://www.youtube.com/ HTTP/1.1\r\nHost: www.youtube.com\r\n\r\n',
    );
    expect(response.startsWith('HTTP/1.1 403 Forbidden\r\n')).toBe(true);

    const first = running.shutdown(1000);
    expect(running.shutdown()).toBe(first);
    const result = await first;

    expect(result.summary).toEqual({
      jsonPath: path.join(dir, 'Summary Logs', 'summary.json'),
      textPath: path.join(dir, 'Summary Logs', 'summary_report.txt'),
    });
    expect(JSON.parse(fs.readFileSync(path.join(dir, 'Summary Logs', 'summary.json'), 'utf-8'))).toEqual({});
    expect(fs.readdirSync(path.join(dir, 'Blocked Logs'))).toHaveLength(1);

    const database = TrafficDatabase.open(trafficDatabasePath(dir));
    expect(database.blocked.total()).toBe(1);
    expect(database.requests.total()).toBe(0);
    database.close();
  });

  it('writes no summaries when traffic logging is off', async () => {
    const config = buildStartConfig(0, { host: '127.0.0.1', logDir: dir }, {});
    const running = await runProxy(config, { logger: createSilentLogger() });

    expect(running.stats).toBeNull();
    expect(await running.shutdown(100)).toEqual({ summary: null });
    expect(fs.readdirSync(dir)).toEqual([]);
  });
});

// ---- report and export ----

describe('report and export', () => {
  let dir: string;
  let cleanup: () => void;
  let dbPath: string;

  beforeEach(() => {
    ({ dir, cleanup } = tmpDir());
    dbPath = path.join(dir, 'Database', 'proxy_traffic.db');
    const database = TrafficDatabase.open(dbPath);
    const sink = new SqliteSink(database);
    sink.recordRequest(record());
    sink.close();
  });

  afterEach(() => {
    cleanup();
  });

  it('renders the database report', () => {
    expect(renderReport({ db: dbPath }).split('\n')).toContain('Total Requests Logged: 1');
  });

  it('lists requests for one domain', () => {
    expect(renderReport({ db: dbPath, domain: 'EXAMPLE.test' }).split('\n')).toEqual([
      'Requests to EXAMPLE.test:',
      '-'.repeat(70),
      '2026-01-02T03:04:05.000Z | 127.0.0.1 | Sent: 120 | Recv: 60 | Duration: 0.250s',
    ]);
  });

  it('refuses to report on a missing database without creating it', () => {
    const missing = path.join(dir, 'missing.db');
    expect(() => renderReport({ db: missing })).toThrow(`No traffic database at ${missing}.`);
    expect(fs.existsSync(missing)).toBe(false);
  });

  it('exports CSV beside the database by default', () => {
    const result = exportTraffic({ db: dbPath });

    expect(result).toEqual({ file: path.join(dir, 'Database', 'traffic_export.csv'), rows: 1 });
    expect(fs.readFileSync(result.file, 'utf-8').split('\n')[1]).toBe(
      '1,2026-01-02T03:04:05.000Z,127.0.0.1,example.test,80,GET,HTTP,120,60,0.25,0.04',
    );
  });
});

describe('createProgram', () => {
  it('registers the commands', () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual(['start', 'report', 'export']);
  });

  it('reports the package version', () => {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf-8'));

    expect(pkg).toMatchObject({ version: VERSION });
    expect(createProgram().version()).toBe(VERSION);
  });
});
