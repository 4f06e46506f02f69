/**
 * In-process stand-in for the exchange API.
 *
 * Outcomes queued with respond()/fail() are consumed one per call, in order;
 * after the queue for a method drains, its handler (if any) answers.
 */

import type { ExchangeTransport } from '@tradeguard/types';

type Handler = (params: Record<string, unknown>) => unknown;

type Outcome = { kind: 'value'; value: unknown } | { kind: 'error'; error: unknown };

export interface RecordedCall {
  method: string;
  params: Record<string, unknown>;
}

export class StubExchangeTransport implements ExchangeTransport {
  readonly calls: RecordedCall[] = [];
  private readonly queued = new Map<string, Outcome[]>();
  private readonly handlers = new Map<string, Handler>();

  respond(method: string, value: unknown): this {
    this.enqueue(method, { kind: 'value', value });
    return this;
  }

  fail(method: string, error: unknown): this {
    this.enqueue(method, { kind: 'error', error });
    return this;
  }

  on(method: string, handler: Handler): this {
    this.handlers.set(method, handler);
    return this;
  }

  async call(method: string, params: Record<string, unknown> = {}): Promise<unknown> {
    this.calls.push({ method, params });

    const next = this.queued.get(method)?.shift();
    if (next) {
      if (next.kind === 'error') throw next.error;
      return next.value;
    }

    const handler = this.handlers.get(method);
    if (handler) return handler(params);

    throw new Error(`No stub response for ${method}`);
  }

  callCount(method?: string): number {
    return method === undefined ? this.calls.length : this.calls.filter(c => c.method === method).length;
  }

  private enqueue(method: string, outcome: Outcome): void {
    const queue = this.queued.get(method) ?? [];
    queue.push(outcome);
    this.queued.set(method, queue);
  }
}
