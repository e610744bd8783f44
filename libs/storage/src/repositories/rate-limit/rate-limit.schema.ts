/**
 * Rate-limit violation schemas
 */

import { z } from 'zod';

export const CreateRateLimitViolationSchema = z.object({
  timestamp: z.string().datetime(),
  sourceIp: z.string().min(1),
  destinationHost: z.string().min(1).nullable().default(null),
  requestCount: z.number().int().min(1),
  limit: z.number().int().min(1),
  windowMs: z.number().int().positive(),
});

export type CreateRateLimitViolationInput = z.input<typeof CreateRateLimitViolationSchema>;
