/**
 * Operator notification adapters.
 *
 * The failover manager talks to a single Notifier. Delivery to real channels
 * (chat bots, pagers) is the owner's concern; these adapters cover the
 * default (log only) and fan-out to several targets.
 */

import type { Notifier } from '@tradeguard/types';
import { getErrorMessage } from '../error-handling';
import { createLogger, ServiceLogger } from '../logging';

export interface NotificationRecord {
  message: string;
  timestamp: number;
  delivered: number;
  failed: number;
}

/**
 * Writes every notification to the log at warn level.
 */
export class LoggingNotifier implements Notifier {
  private readonly logger: ServiceLogger;

  constructor(deps: { logger?: ServiceLogger } = {}) {
    this.logger = deps.logger ?? createLogger('notifier');
  }

  notify(message: string): void {
    this.logger.warn('Operator notification', { notification: message });
  }
}

/**
 * Sends each notification to all targets in parallel. A failing target is
 * logged and does not affect the others; notify() itself never rejects.
 */
export class CompositeNotifier implements Notifier {
  private readonly logger: ServiceLogger;
  private readonly history: NotificationRecord[] = [];
  private readonly maxHistorySize: number;

  constructor(
    private readonly targets: ReadonlyArray<{ name: string; notifier: Notifier }>,
    deps: { logger?: ServiceLogger; maxHistorySize?: number } = {}
  ) {
    this.logger = deps.logger ?? createLogger('notifier');
    this.maxHistorySize = deps.maxHistorySize ?? 100;
  }

  async notify(message: string): Promise<void> {
    const results = await Promise.allSettled(
      this.targets.map(async target => target.notifier.notify(message))
    );

    let failed = 0;
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        failed++;
        this.logger.error('Notification delivery failed', {
          target: this.targets[index]?.name ?? 'unknown',
          error: getErrorMessage(result.reason),
        });
      }
    });

    this.history.push({ message, timestamp: Date.now(), delivered: results.length - failed, failed });
    if (this.history.length > this.maxHistorySize) {
      this.history.splice(0, this.history.length - this.maxHistorySize);
    }
  }

  /** Most recent first. */
  getHistory(limit = 20): NotificationRecord[] {
    return this.history.slice(-limit).reverse();
  }
}
