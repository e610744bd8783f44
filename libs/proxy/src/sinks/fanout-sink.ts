/**
 * Sink that forwards every event to several sinks.
 *
 * All sinks receive the event even when one of them fails; failures are
 * reported together afterwards.
 */

import type { BlockedEvent, MetricsRecord, MetricsSink } from '@portcullis/ipc';

export class FanoutSink implements MetricsSink {
  private readonly sinks: readonly MetricsSink[];

  constructor(sinks: readonly MetricsSink[]) {
    this.sinks = [...sinks];
  }

  async recordRequest(record: MetricsRecord): Promise<void> {
    await this.each((sink) => sink.recordRequest(record));
  }

  async recordBlocked(event: BlockedEvent): Promise<void> {
    await this.each((sink) => sink.recordBlocked(event));
  }

  async close(): Promise<void> {
    await this.each((sink) => sink.close?.());
  }

  get size(): number {
    return this.sinks.length;
  }

  private async each(call: (sink: MetricsSink) => void | Promise<void>): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map(async (sink) => call(sink)));
    const errors: unknown[] = results.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []));
    if (errors.length === 1) {
      throw errors[0];
    }
    if (errors.length > 1) {
      throw new AggregateError(errors, `${errors.length} metrics sinks failed`);
    }
  }
}
