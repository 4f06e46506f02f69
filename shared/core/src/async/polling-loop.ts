/**
 * PollingLoop
 *
 * Runs an async task repeatedly with a fixed pause *between* runs, so
 * iterations never overlap even when a run takes longer than the interval.
 * Used by the failover supervision loop and the metrics collector.
 *
 * - A task error is logged and the loop continues after the normal pause
 * - The pause timer is unref'd; the loop alone never keeps the process alive
 * - stop() waits a bounded time for the in-flight run
 *
 * @example
 * ```typescript
 * const loop = new PollingLoop('failover', () => this.runCycle(), () => this.config.checkIntervalMs, { logger });
 * loop.start();
 * await loop.stop(1000);
 * ```
 */

import type { ILogger } from '../logging';
import { formatErrorForLog } from '../error-handling';

export interface PollingLoopStats {
  name: string;
  running: boolean;
  iterations: number;
  failures: number;
}

export class PollingLoop {
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private iterations = 0;
  private failures = 0;

  constructor(
    private readonly name: string,
    private readonly task: () => Promise<void>,
    private readonly intervalMs: () => number,
    private readonly deps: { logger?: ILogger } = {}
  ) {}

  /**
   * Start the loop. The first run happens immediately.
   * @returns false if already running
   */
  start(): boolean {
    if (this.running) return false;
    this.running = true;
    this.tick();
    return true;
  }

  /**
   * Stop the loop and wait up to `timeoutMs` for the in-flight run.
   * @returns true if no run was left in flight
   */
  async stop(timeoutMs: number): Promise<boolean> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    const pending = this.inFlight;
    if (!pending) return true;

    let timeoutId: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>(resolve => {
      timeoutId = setTimeout(() => resolve(false), timeoutMs);
      timeoutId.unref();
    });

    const settled = await Promise.race([pending.then(() => true), timedOut]);
    clearTimeout(timeoutId);
    if (!settled) {
      this.deps.logger?.warn(`${this.name} loop did not finish its iteration before stop timeout`, {
        timeoutMs,
      });
    }
    return settled;
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): PollingLoopStats {
    return {
      name: this.name,
      running: this.running,
      iterations: this.iterations,
      failures: this.failures,
    };
  }

  private tick(): void {
    this.timer = null;
    if (!this.running) return;

    const run: Promise<void> = this.runOnce().finally(() => {
      // A run abandoned by stop() must not touch a restarted loop
      if (this.inFlight !== run) return;
      this.inFlight = null;
      if (this.running) {
        this.timer = setTimeout(() => this.tick(), this.intervalMs());
        this.timer.unref();
      }
    });
    this.inFlight = run;
  }

  private async runOnce(): Promise<void> {
    this.iterations++;
    try {
      await this.task();
    } catch (error) {
      this.failures++;
      this.deps.logger?.error(`${this.name} loop iteration failed`, { error: formatErrorForLog(error) });
    }
  }
}
