/**
 * Shared constants
 */

export const DEFAULT_PORT = 8080;
export const DEFAULT_HOST = '0.0.0.0';

export const DEFAULT_HTTP_PORT = 80;
export const DEFAULT_HTTPS_PORT = 443;

/** Domains blocked when no blocklist is configured. */
export const DEFAULT_BLOCKLIST = ['*.youtube.com', '*.ytimg.com', '*.googlevideo.com'] as const;

export const DEFAULT_RATE_LIMIT = {
  LIMIT: 100,
  WINDOW_SECONDS: 10,
  STALE_AFTER_WINDOWS: 6,
} as const;

export const DEFAULT_TIMEOUTS = {
  CONNECT_MS: 5_000,
  HEADER_READ_MS: 10_000,
  IDLE_MS: 30_000,
} as const;

/** Upper bound for a request header block, request line included. */
export const MAX_HEADER_BYTES = 64 * 1024;

export const TRAFFIC_LOG_DIR = 'Logs';

export const ENV_PREFIX = 'PORTCULLIS_';
