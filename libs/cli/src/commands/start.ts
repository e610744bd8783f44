/**
 * Start command
 *
 * Runs the proxy in the foreground until SIGINT or SIGTERM.
 */

import { Command } from 'commander';
import type { LogLevel, ProxyConfig, ProxyConfigInput } from '@portcullis/ipc';
import { DEFAULT_DRAIN_TIMEOUT_MS, loadBlocklistFile, loadConfig } from '@portcullis/proxy';
import { runProxy } from '../runtime.js';
import { parseLogLevel, parsePort, parsePositiveInt, parsePositiveNumber } from '../utils/parse.js';

export interface StartOptions {
  host?: string;
  log?: boolean;
  db?: boolean;
  logDir?: string;
  config?: string;
  blocklist?: string;
  rateLimit?: number;
  rateWindow?: number;
  logLevel?: LogLevel;
  drainTimeout?: number;
}

/**
 * Resolve the configuration for `start`: config file and environment first,
 * command-line flags last.
 */
export function buildStartConfig(
  port: number | undefined,
  options: StartOptions,
  env: NodeJS.ProcessEnv = process.env,
): ProxyConfig {
  const overrides: ProxyConfigInput = {
    port,
    host: options.host,
    logLevel: options.logLevel,
    blocklist: options.blocklist ? loadBlocklistFile(options.blocklist) : undefined,
    rateLimit: {
      limit: options.rateLimit,
      windowSeconds: options.rateWindow,
    },
    traffic: {
      enabled: options.log || undefined,
      sqlite: options.db || undefined,
      dir: options.logDir,
    },
  };

  return loadConfig({ configPath: options.config, env, overrides });
}

/**
 * Create the start command
 */
export function createStartCommand(): Command {
  const cmd = new Command('start')
    .description('Start the forward proxy')
    .argument('[port]', 'Port to listen on', parsePort)
    .option('--host <host>', 'Address to bind')
    .option('--log', 'Write per-request JSON logs and end-of-run summaries')
    .option('--db', 'Record traffic in the SQLite database')
    .option('--log-dir <dir>', 'Directory for traffic logs and the database')
    .option('-c, --config <file>', 'JSON configuration file')
    .option('--blocklist <file>', 'Blocklist file (one pattern per line, or a JSON array)')
    .option('--rate-limit <n>', 'Requests allowed per client per window', parsePositiveInt)
    .option('--rate-window <seconds>', 'Rate-limit window in seconds', parsePositiveNumber)
    .option('--log-level <level>', 'debug, info, warn or error', parseLogLevel)
    .option('--drain-timeout <ms>', 'How long shutdown waits for open sessions', parsePositiveInt)
    .action(async (port: number | undefined, options: StartOptions) => {
      const config = buildStartConfig(port, options);
      const running = await runProxy(config);
      const drainTimeout = options.drainTimeout ?? DEFAULT_DRAIN_TIMEOUT_MS;

      const onSignal = (signal: NodeJS.Signals) => {
        running.logger.info(`${signal} received, shutting down`);
        void running
          .shutdown(drainTimeout)
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            running.logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
            process.exit(1);
          });
      };

      process.once('SIGINT', onSignal);
      process.once('SIGTERM', onSignal);
    });

  return cmd;
}
