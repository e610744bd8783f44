/**
 * Zod schemas for proxy configuration validation
 */

import { z } from 'zod';
import {
  DEFAULT_BLOCKLIST,
  DEFAULT_HOST,
  DEFAULT_PORT,
  DEFAULT_RATE_LIMIT,
  DEFAULT_TIMEOUTS,
  MAX_HEADER_BYTES,
  TRAFFIC_LOG_DIR,
} from '../constants';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Blocklist pattern: an exact host (`example.com`) or a wildcard suffix (`*.example.com`)
 */
export const BlockPatternSchema = z
  .string()
  .trim()
  .min(1)
  .regex(/^(\*\.)?[a-z0-9_-]+(\.[a-z0-9_-]+)*\.?$/i, 'Expected a host name or *.suffix pattern');

export const RateLimitConfigSchema = z.object({
  /** Requests admitted per window and client IP */
  limit: z.number().int().min(1).default(DEFAULT_RATE_LIMIT.LIMIT),
  windowSeconds: z.number().positive().default(DEFAULT_RATE_LIMIT.WINDOW_SECONDS),
  /** Idle windows after which a client's counter is reclaimed */
  staleAfterWindows: z.number().int().min(1).default(DEFAULT_RATE_LIMIT.STALE_AFTER_WINDOWS),
});

export const TimeoutsConfigSchema = z.object({
  connectMs: z.number().int().positive().default(DEFAULT_TIMEOUTS.CONNECT_MS),
  headerReadMs: z.number().int().positive().default(DEFAULT_TIMEOUTS.HEADER_READ_MS),
  idleMs: z.number().int().positive().default(DEFAULT_TIMEOUTS.IDLE_MS),
});

export const TrafficConfigSchema = z.object({
  /** Write per-request JSON logs and end-of-run summaries */
  enabled: z.boolean().default(false),
  dir: z.string().min(1).default(TRAFFIC_LOG_DIR),
  /** Also record traffic in the SQLite database under `<dir>/Database` */
  sqlite: z.boolean().default(false),
});

export const ProxyConfigSchema = z.object({
  port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
  host: z.string().min(1).default(DEFAULT_HOST),
  blocklist: z.array(BlockPatternSchema).default([...DEFAULT_BLOCKLIST]),
  rateLimit: RateLimitConfigSchema.default({}),
  timeouts: TimeoutsConfigSchema.default({}),
  maxHeaderBytes: z.number().int().min(1024).default(MAX_HEADER_BYTES),
  logLevel: LogLevelSchema.default('info'),
  traffic: TrafficConfigSchema.default({}),
});
