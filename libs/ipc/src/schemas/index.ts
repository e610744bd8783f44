export {
  LogLevelSchema,
  BlockPatternSchema,
  RateLimitConfigSchema,
  TimeoutsConfigSchema,
  TrafficConfigSchema,
  ProxyConfigSchema,
} from './config.schema';

export {
  SessionOutcomeSchema,
  MetricsRecordSchema,
  BlockedEventSchema,
} from './metrics.schema';
