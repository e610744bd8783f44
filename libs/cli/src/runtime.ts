/**
 * Proxy runtime
 *
 * Wires the proxy server to the traffic sinks selected by the configuration
 * and owns the orderly shutdown: drain sessions, write summaries, close sinks.
 */

import type { MetricsSink, ProxyConfig } from '@portcullis/ipc';
import {
  DEFAULT_DRAIN_TIMEOUT_MS,
  FanoutSink,
  Logger,
  LoggingSink,
  ProxyServer,
  type ListeningAddress,
} from '@portcullis/proxy';
import {
  DomainStatsCollector,
  JsonFileSink,
  SqliteSink,
  TrafficDatabase,
  writeSummaryFiles,
  type SummaryFiles,
} from '@portcullis/storage';
import { trafficDatabasePath } from './utils/paths.js';

export interface TrafficSinks {
  sink: MetricsSink;
  /** Present when traffic logging is enabled */
  stats: DomainStatsCollector | null;
  /** Present when the SQLite database is enabled */
  database: TrafficDatabase | null;
}

/**
 * Build the sink chain: console logging always, JSON logs and statistics with
 * `traffic.enabled`, the SQLite database with `traffic.sqlite`.
 */
export function createTrafficSinks(config: ProxyConfig, logger: Logger): TrafficSinks {
  const sinks: MetricsSink[] = [new LoggingSink(logger.child('metrics'))];
  let stats: DomainStatsCollector | null = null;
  let database: TrafficDatabase | null = null;

  if (config.traffic.enabled) {
    stats = new DomainStatsCollector();
    sinks.push(new JsonFileSink(config.traffic.dir), stats);
  }

  if (config.traffic.sqlite) {
    const dbPath = trafficDatabasePath(config.traffic.dir);
    database = TrafficDatabase.open(dbPath);
    sinks.push(new SqliteSink(database));
    logger.info(`Recording traffic in ${dbPath}`);
  }

  return { sink: new FanoutSink(sinks), stats, database };
}

export interface RunProxyOptions {
  logger?: Logger;
}

export interface ShutdownResult {
  summary: SummaryFiles | null;
}

export interface RunningProxy {
  readonly server: ProxyServer;
  readonly address: ListeningAddress;
  readonly logger: Logger;
  readonly stats: DomainStatsCollector | null;
  /** Safe to call more than once; later calls share the first shutdown. */
  shutdown(drainTimeoutMs?: number): Promise<ShutdownResult>;
}

export async function runProxy(config: ProxyConfig, options: RunProxyOptions = {}): Promise<RunningProxy> {
  const logger = options.logger ?? new Logger({ level: config.logLevel });
  const traffic = createTrafficSinks(config, logger);
  const server = new ProxyServer({ config, sink: traffic.sink, logger });

  let address: ListeningAddress;
  try {
    address = await server.start();
  } catch (error) {
    await traffic.sink.close?.();
    throw error;
  }

  let shuttingDown: Promise<ShutdownResult> | null = null;

  const shutdown = async (drainTimeoutMs: number): Promise<ShutdownResult> => {
    await server.stop(drainTimeoutMs);

    let summary: SummaryFiles | null = null;
    if (traffic.stats) {
      summary = await writeSummaryFiles(config.traffic.dir, traffic.stats.snapshot());
      logger.info(`Summaries written to ${summary.jsonPath} and ${summary.textPath}`);
    }

    await traffic.sink.close?.();
    return { summary };
  };

  return {
    server,
    address,
    logger,
    stats: traffic.stats,
    shutdown(drainTimeoutMs = DEFAULT_DRAIN_TIMEOUT_MS) {
      shuttingDown ??= shutdown(drainTimeoutMs);
      return shuttingDown;
    },
  };
}
