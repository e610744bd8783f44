import { ProxyConfigSchema, BlockPatternSchema, MetricsRecordSchema } from '../schemas/index';
import { DEFAULT_BLOCKLIST, DEFAULT_PORT } from '../constants';

describe('ProxyConfigSchema', () => {
  it('fills every default from an empty object', () => {
    const config = ProxyConfigSchema.parse({});

    expect(config.port).toBe(DEFAULT_PORT);
    expect(config.host).toBe('0.0.0.0');
    expect(config.blocklist).toEqual([...DEFAULT_BLOCKLIST]);
    expect(config.rateLimit).toEqual({ limit: 100, windowSeconds: 10, staleAfterWindows: 6 });
    expect(config.timeouts).toEqual({ connectMs: 5000, headerReadMs: 10000, idleMs: 30000 });
    expect(config.maxHeaderBytes).toBe(65536);
    expect(config.logLevel).toBe('info');
    expect(config.traffic).toEqual({ enabled: false, dir: 'Logs', sqlite: false });
  });

  it('keeps nested defaults when only some fields are given', () => {
    const config = ProxyConfigSchema.parse({ rateLimit: { limit: 5 } });
    expect(config.rateLimit).toEqual({ limit: 5, windowSeconds: 10, staleAfterWindows: 6 });
  });

  it('rejects an out-of-range port', () => {
    expect(ProxyConfigSchema.safeParse({ port: 70000 }).success).toBe(false);
  });

  it('rejects an unknown log level', () => {
    expect(ProxyConfigSchema.safeParse({ logLevel: 'verbose' }).success).toBe(false);
  });
});

describe('BlockPatternSchema', () => {
  it.each(['example.com', '*.example.com', 'a-b.c_d.org', 'localhost'])('accepts %s', (pattern) => {
    expect(BlockPatternSchema.safeParse(pattern).success).toBe(true);
  });

  it.each(['', '*', 'exa mple.com', '*example.com', 'http://example.com'])('rejects %j', (pattern) => {
    expect(BlockPatternSchema.safeParse(pattern).success).toBe(false);
  });

  it('trims surrounding whitespace', () => {
    expect(BlockPatternSchema.parse('  *.example.com ')).toBe('*.example.com');
  });
});

describe('MetricsRecordSchema', () => {
  const record = {
    id: 'rec-1',
    timestamp: '2026-01-02T03:04:05.000Z',
    clientIp: '127.0.0.1',
    clientPort: 50123,
    outcome: 'completed',
    status: 200,
    outcomeLine: 'HTTP/1.1 200 OK',
    rawHeader: 'GET http://example.com/ HTTP/1.1\r\nHost: example.com',
    bytesSent: 120,
    bytesReceived: 52,
    upstreamBytesSent: 60,
    upstreamBytesReceived: 120,
    durationMs: 12.5,
    ttfbMs: 3.25,
  };

  it('accepts a complete record', () => {
    expect(MetricsRecordSchema.safeParse(record).success).toBe(true);
  });

  it('accepts a null ttfb', () => {
    expect(MetricsRecordSchema.safeParse({ ...record, ttfbMs: null }).success).toBe(true);
  });

  it('rejects negative byte counts', () => {
    expect(MetricsRecordSchema.safeParse({ ...record, bytesSent: -1 }).success).toBe(false);
  });
});
