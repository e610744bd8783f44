export { RequestsRepository } from './requests.repository';
export { CreateTrafficRequestSchema, TrafficProtocolSchema } from './requests.schema';
export type { CreateTrafficRequestInput, TrafficProtocol } from './requests.schema';
export type { TrafficRequest, DomainTotals, BandwidthStats } from './requests.model';
