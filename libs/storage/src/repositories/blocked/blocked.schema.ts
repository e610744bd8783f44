/**
 * Blocked request schemas
 */

import { z } from 'zod';

export const CreateBlockedRequestSchema = z.object({
  timestamp: z.string().datetime(),
  sourceIp: z.string().min(1),
  blockedHostname: z.string().min(1),
  pattern: z.string().min(1),
  reason: z.string().min(1).default('Blocklist'),
});

export type CreateBlockedRequestInput = z.input<typeof CreateBlockedRequestSchema>;
