/**
 * Logger
 *
 * Level-filtered console logging with a `[scope]` prefix per component.
 */

import type { LogLevel } from '@portcullis/ipc';

export interface LoggerOptions {
  level: LogLevel;
  scope?: string;
  /** Output target, defaults to the global console */
  console?: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private readonly level: LogLevel;
  private readonly scope: string;
  private readonly out: Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.scope = options.scope ?? 'portcullis';
    this.out = options.console ?? console;
  }

  /**
   * Create a logger for a sub-component, e.g. `[portcullis:session]`
   */
  child(scope: string): Logger {
    return new Logger({ level: this.level, scope: `${this.scope}:${scope}`, console: this.out });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.isLevelEnabled('debug')) {
      this.write('debug', message, data);
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.isLevelEnabled('info')) {
      this.write('info', message, data);
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.isLevelEnabled('warn')) {
      this.write('warn', message, data);
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.isLevelEnabled('error')) {
      this.write('error', message, data);
    }
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const line = `[${this.scope}] ${message}`;
    if (data) {
      this.out[level](line, data);
    } else {
      this.out[level](line);
    }
  }
}

/**
 * Logger that drops everything. Useful for embedding and tests.
 */
export function createSilentLogger(): Logger {
  const noop = (): void => {};
  return new Logger({
    level: 'error',
    console: { debug: noop, info: noop, warn: noop, error: noop },
  });
}
