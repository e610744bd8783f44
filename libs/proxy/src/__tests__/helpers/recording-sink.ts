import type { BlockedEvent, MetricsRecord, MetricsSink } from '@portcullis/ipc';

type Waiter = { count: number; resolve: () => void };

/**
 * In-memory sink that lets a test wait for a number of events.
 */
export class RecordingSink implements MetricsSink {
  readonly records: MetricsRecord[] = [];
  readonly blocked: BlockedEvent[] = [];
  private waiters: Waiter[] = [];

  recordRequest(record: MetricsRecord): void {
    this.records.push(record);
    this.notify();
  }

  recordBlocked(event: BlockedEvent): void {
    this.blocked.push(event);
    this.notify();
  }

  /** Resolve once at least `count` events (records and blocked events together) have arrived. */
  waitForEvents(count: number): Promise<void> {
    if (this.total >= count) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push({ count, resolve }));
  }

  get total(): number {
    return this.records.length + this.blocked.length;
  }

  private notify(): void {
    const ready = this.waiters.filter((w) => this.total >= w.count);
    this.waiters = this.waiters.filter((w) => this.total < w.count);
    for (const waiter of ready) waiter.resolve();
  }
}
