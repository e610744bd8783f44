/**
 * Requests schemas
 */

import { z } from 'zod';

export const TrafficProtocolSchema = z.enum(['HTTP', 'HTTPS']);

export const CreateTrafficRequestSchema = z.object({
  recordId: z.string().min(1),
  timestamp: z.string().datetime(),
  sourceIp: z.string().min(1),
  destinationHost: z.string().min(1),
  destinationPort: z.number().int().min(1).max(65535),
  method: z.string().min(1),
  protocol: TrafficProtocolSchema,
  statusCode: z.number().int().min(0),
  outcome: z.enum(['completed', 'failed']),
  bytesSent: z.number().int().nonnegative(),
  bytesReceived: z.number().int().nonnegative(),
  durationSeconds: z.number().nonnegative(),
  ttfbSeconds: z.number().nonnegative().nullable().default(null),
  errorCode: z.string().nullable().default(null),
});

export type TrafficProtocol = z.infer<typeof TrafficProtocolSchema>;
export type CreateTrafficRequestInput = z.input<typeof CreateTrafficRequestSchema>;
