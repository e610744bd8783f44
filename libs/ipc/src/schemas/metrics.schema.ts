/**
 * Zod schemas for metrics records and blocked events
 */

import { z } from 'zod';

export const SessionOutcomeSchema = z.enum([
  'completed',
  'failed',
  'malformed',
  'rate_limited',
  'connect_failed',
]);

export const MetricsRecordSchema = z.object({
  id: z.string().min(1),
  timestamp: z.string().datetime(),
  clientIp: z.string(),
  clientPort: z.number().int().min(0),
  kind: z.enum(['http', 'connect']).optional(),
  method: z.string().optional(),
  targetHost: z.string().optional(),
  targetPort: z.number().int().min(0).max(65535).optional(),
  outcome: SessionOutcomeSchema,
  status: z.number().int().min(0),
  outcomeLine: z.string(),
  rawHeader: z.string(),
  modifiedHeader: z.string().optional(),
  bytesSent: z.number().int().min(0),
  bytesReceived: z.number().int().min(0),
  upstreamBytesSent: z.number().int().min(0),
  upstreamBytesReceived: z.number().int().min(0),
  durationMs: z.number().min(0),
  ttfbMs: z.number().min(0).nullable(),
  errorCode: z.string().optional(),
  errorMessage: z.string().optional(),
  rateLimit: z
    .object({
      limit: z.number().int().min(1),
      windowMs: z.number().positive(),
      count: z.number().int().min(1),
    })
    .optional(),
});

export const BlockedEventSchema = z.object({
  timestamp: z.string().datetime(),
  blockedHostname: z.string().min(1),
  clientIp: z.string(),
  pattern: z.string(),
});
