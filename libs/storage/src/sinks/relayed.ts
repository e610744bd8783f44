import type { MetricsRecord } from '@portcullis/ipc';

export type RelayedRecord = MetricsRecord & { targetHost: string; targetPort: number; method: string };

/**
 * Records of sessions that reached an upstream: forwarded requests and tunnels,
 * whether they finished cleanly or not.
 */
export function isRelayedRecord(record: MetricsRecord): record is RelayedRecord {
  return (
    (record.outcome === 'completed' || record.outcome === 'failed') &&
    record.targetHost !== undefined &&
    record.targetPort !== undefined &&
    record.method !== undefined
  );
}
