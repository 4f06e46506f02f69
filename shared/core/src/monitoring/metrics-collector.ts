/**
 * Metrics Collector
 *
 * Samples the resilience components on a fixed interval and keeps:
 * - the latest value of every `category.name` series
 * - a bounded in-memory history per series (maxPoints, retentionMs)
 *
 * Points recorded since the last flush are written to the injected
 * MetricsSink as one batch at the end of every collection. A sink failure is
 * logged and the batch is dropped; the in-memory series are unaffected.
 */

import { RESILIENCE_DEFAULTS, MetricsSettings } from '@tradeguard/config';
import {
  ComponentStatus,
  FailoverState,
  MetricPoint,
  MetricsSink,
  MetricTags,
} from '@tradeguard/types';
import { PollingLoop } from '../async/polling-loop';
import { Clock, systemClock } from '../async/clock';
import { formatErrorForLog } from '../error-handling';
import { createLogger, ILogger } from '../logging';
import type { GuardedClientStats } from '../exchange/guarded-client';
import type { RateLimiter } from '../rate-limit';
import { CircuitBreakerRegistry, CircuitState } from '../resilience/circuit-breaker';
import type { FailoverManager } from '../resilience/failover-manager';

/** Numeric encoding of the failover state for time-series storage */
export const FAILOVER_STATE_LEVEL: Record<FailoverState, number> = {
  [FailoverState.NORMAL]: 0,
  [FailoverState.DEGRADED]: 1,
  [FailoverState.RECOVERY]: 2,
  [FailoverState.FAILOVER]: 3,
  [FailoverState.EMERGENCY]: 4,
};

const BYTES_PER_MB = 1024 * 1024;

export interface MetricsSources {
  rateLimiter?: RateLimiter;
  registry?: CircuitBreakerRegistry;
  failover?: FailoverManager;
  client?: { getStats(): GuardedClientStats };
}

export interface MetricsCollectorDeps {
  logger?: ILogger;
  clock?: Clock;
  sink?: MetricsSink;
  sources?: MetricsSources;
  /** Process memory reader; defaults to process.memoryUsage */
  memoryUsage?: () => NodeJS.MemoryUsage;
}

export interface MetricStatistics {
  /** null when no point falls inside the period */
  min: number | null;
  max: number | null;
  avg: number | null;
  count: number;
  periodMs: number;
}

export class MetricsCollector {
  private readonly config: MetricsSettings;
  private readonly logger: ILogger;
  private readonly clock: Clock;
  private readonly sources: MetricsSources;
  private readonly latest = new Map<string, Map<string, number>>();
  private readonly history = new Map<string, MetricPoint[]>();
  private pending: MetricPoint[] = [];
  private readonly loop: PollingLoop;

  constructor(config: Partial<MetricsSettings> = {}, private readonly deps: MetricsCollectorDeps = {}) {
    this.config = { ...RESILIENCE_DEFAULTS.metrics, ...config };
    this.logger = deps.logger ?? createLogger('metrics-collector');
    this.clock = deps.clock ?? systemClock;
    this.sources = deps.sources ?? {};
    this.loop = new PollingLoop('metrics', () => this.collect(), () => this.config.collectionIntervalMs, {
      logger: this.logger,
    });
  }

  start(): boolean {
    if (!this.config.enabled) {
      this.logger.info('Metrics collection is disabled in configuration');
      return false;
    }
    if (!this.loop.start()) {
      this.logger.warn('Metrics collector already running');
      return false;
    }
    this.logger.info('Metrics collector started', { intervalMs: this.config.collectionIntervalMs });
    return true;
  }

  async stop(timeoutMs = 1000): Promise<void> {
    await this.loop.stop(timeoutMs);
    await this.flush();
    this.logger.info('Metrics collector stopped');
  }

  isRunning(): boolean {
    return this.loop.isRunning();
  }

  /**
   * One collection pass: sample every source, prune expired points, flush.
   */
  async collect(): Promise<void> {
    this.collectSystemMetrics();
    this.collectRateLimitMetrics();
    this.collectCircuitMetrics();
    this.collectFailoverMetrics();
    this.collectClientMetrics();
    this.pruneExpired();
    await this.flush();
  }

  /**
   * Record a point. It reaches the sink with the next flush.
   */
  updateMetric(category: string, name: string, value: number, tags?: MetricTags): void {
    if (!Number.isFinite(value)) {
      this.logger.warn(`Ignoring non-finite value for metric ${category}.${name}`, { value });
      return;
    }

    let values = this.latest.get(category);
    if (!values) {
      values = new Map();
      this.latest.set(category, values);
    }
    values.set(name, value);

    const point: MetricPoint = { category, name, value, timestamp: this.clock.now(), tags };
    const key = seriesKey(category, name);
    const series = this.history.get(key) ?? [];
    series.push(point);
    if (series.length > this.config.maxPoints) {
      series.splice(0, series.length - this.config.maxPoints);
    }
    this.history.set(key, series);
    this.pending.push(point);
  }

  /**
   * Write pending points to the sink.
   */
  async flush(): Promise<void> {
    if (this.pending.length === 0) return;
    const batch = this.pending;
    this.pending = [];

    if (!this.deps.sink) return;
    try {
      await this.deps.sink.write(batch);
    } catch (error) {
      this.logger.error('Failed to write metrics batch', {
        points: batch.length,
        error: formatErrorForLog(error),
      });
    }
  }

  getMetrics(): Record<string, Record<string, number>>;
  getMetrics(category: string): Record<string, number>;
  getMetrics(category?: string): Record<string, Record<string, number>> | Record<string, number> {
    if (category !== undefined) {
      return Object.fromEntries(this.latest.get(category) ?? []);
    }
    const all: Record<string, Record<string, number>> = {};
    for (const [name, values] of this.latest) {
      all[name] = Object.fromEntries(values);
    }
    return all;
  }

  /** Oldest first, at most `limit` most recent points. */
  getMetricHistory(category: string, name: string, limit = 100): MetricPoint[] {
    const series = this.history.get(seriesKey(category, name)) ?? [];
    return limit > 0 ? series.slice(-limit) : [...series];
  }

  getMetricStatistics(category: string, name: string, periodMs = 24 * 60 * 60 * 1000): MetricStatistics {
    const since = this.clock.now() - periodMs;
    const values = (this.history.get(seriesKey(category, name)) ?? [])
      .filter(p => p.timestamp >= since)
      .map(p => p.value);

    if (values.length === 0) {
      return { min: null, max: null, avg: null, count: 0, periodMs };
    }
    const sum = values.reduce((acc, v) => acc + v, 0);
    return {
      min: Math.min(...values),
      max: Math.max(...values),
      avg: sum / values.length,
      count: values.length,
      periodMs,
    };
  }

  // ===========================================================================
  // Collection
  // ===========================================================================

  private collectSystemMetrics(): void {
    const usage = this.deps.memoryUsage ? this.deps.memoryUsage() : process.memoryUsage();
    this.updateMetric('system', 'memory_rss_mb', toMegabytes(usage.rss));
    this.updateMetric('system', 'heap_used_mb', toMegabytes(usage.heapUsed));
  }

  private collectRateLimitMetrics(): void {
    const limiter = this.sources.rateLimiter;
    if (!limiter) return;
    this.updateMetric('api', 'calls_total', sumValues(limiter.getStats()));
    this.updateMetric('api', 'rate_limit_hits', sumValues(limiter.getRejections()));
  }

  private collectCircuitMetrics(): void {
    const registry = this.sources.registry;
    if (!registry) return;
    this.updateMetric('api', 'open_circuits', registry.getBreakersInState(CircuitState.OPEN).length);
    this.updateMetric('api', 'half_open_circuits', registry.getBreakersInState(CircuitState.HALF_OPEN).length);
  }

  private collectFailoverMetrics(): void {
    const failover = this.sources.failover;
    if (!failover) return;
    const status = failover.getFailoverStatus();
    const unhealthy = Object.values(status.components).filter(c => c.status !== ComponentStatus.HEALTHY).length;
    this.updateMetric('failover', 'state_level', FAILOVER_STATE_LEVEL[status.state]);
    this.updateMetric('failover', 'unhealthy_components', unhealthy);
  }

  private collectClientMetrics(): void {
    const client = this.sources.client;
    if (!client) return;
    const stats = client.getStats();
    this.updateMetric('client', 'calls', stats.calls);
    this.updateMetric('client', 'successes', stats.successes);
    this.updateMetric('client', 'failures', stats.failures);
    this.updateMetric('client', 'rejected_by_limiter', stats.rejectedByLimiter);
    this.updateMetric('client', 'rejected_by_circuit', stats.rejectedByCircuit);
    this.updateMetric('client', 'latency_avg_ms', stats.avgLatencyMs);
    this.updateMetric('client', 'latency_max_ms', stats.maxLatencyMs);
  }

  private pruneExpired(): void {
    const cutoff = this.clock.now() - this.config.retentionMs;
    for (const [key, series] of this.history) {
      const firstKept = series.findIndex(p => p.timestamp >= cutoff);
      if (firstKept === -1) {
        this.history.delete(key);
      } else if (firstKept > 0) {
        series.splice(0, firstKept);
      }
    }
  }
}

function seriesKey(category: string, name: string): string {
  return `${category}.${name}`;
}

function sumValues(record: Record<string, number>): number {
  return Object.values(record).reduce((acc, v) => acc + v, 0);
}

function toMegabytes(bytes: number): number {
  return Math.round((bytes / BYTES_PER_MB) * 100) / 100;
}
