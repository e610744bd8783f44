/**
 * Configuration types (inferred from the zod schemas)
 */

import type { z } from 'zod';
import type {
  ProxyConfigSchema,
  RateLimitConfigSchema,
  TimeoutsConfigSchema,
  TrafficConfigSchema,
  LogLevelSchema,
} from '../schemas/config.schema';

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;
export type TimeoutsConfig = z.infer<typeof TimeoutsConfigSchema>;
export type TrafficConfig = z.infer<typeof TrafficConfigSchema>;

/** Fully resolved configuration snapshot */
export type ProxyConfig = z.infer<typeof ProxyConfigSchema>;

/** Partial configuration as written in files or passed as overrides */
export type ProxyConfigInput = z.input<typeof ProxyConfigSchema>;
