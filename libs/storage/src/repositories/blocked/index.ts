export { BlockedRequestsRepository } from './blocked.repository';
export { CreateBlockedRequestSchema } from './blocked.schema';
export type { CreateBlockedRequestInput } from './blocked.schema';
export type { BlockedRequest } from './blocked.model';
