/**
 * Option value parsers for commander
 */

import { InvalidArgumentError } from 'commander';
import { LogLevelSchema } from '@portcullis/ipc';
import type { LogLevel } from '@portcullis/ipc';

export function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value.trim()) || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return n;
}

export function parseLogLevel(value: string): LogLevel {
  const result = LogLevelSchema.safeParse(value.toLowerCase());
  if (!result.success) {
    throw new InvalidArgumentError(`Expected one of: ${LogLevelSchema.options.join(', ')}.`);
  }
  return result.data;
}
