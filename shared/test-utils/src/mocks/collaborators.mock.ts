import type { MetricPoint, MetricsSink, Notifier } from '@tradeguard/types';

/**
 * Captures notifications. With `failWith` set, every notify() rejects after
 * recording the message.
 */
export class RecordingNotifier implements Notifier {
  readonly messages: string[] = [];

  constructor(private readonly failWith?: Error) {}

  async notify(message: string): Promise<void> {
    this.messages.push(message);
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

export class InMemoryMetricsSink implements MetricsSink {
  readonly batches: MetricPoint[][] = [];

  constructor(private readonly failWith?: Error) {}

  async write(points: readonly MetricPoint[]): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.batches.push([...points]);
  }

  get points(): MetricPoint[] {
    return this.batches.flat();
  }
}
