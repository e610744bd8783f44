export { RateLimitViolationsRepository } from './rate-limit.repository';
export { CreateRateLimitViolationSchema } from './rate-limit.schema';
export type { CreateRateLimitViolationInput } from './rate-limit.schema';
export type { RateLimitViolation } from './rate-limit.model';
