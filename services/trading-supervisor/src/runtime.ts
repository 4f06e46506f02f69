/**
 * Resilience Runtime
 *
 * Builds the whole control plane for one trading client from a validated
 * ResilienceConfig and the owner's collaborators:
 *
 *   transport -> GuardedExchangeClient (RateLimiter + CircuitBreakerRegistry + retry)
 *   probes    -> standard health checks -> FailoverManager
 *   all above -> MetricsCollector
 *
 * Owner-supplied health checks and recoveries take precedence over the
 * standard checks built from probes.
 */

import type { ResilienceConfig } from '@tradeguard/config';
import {
  apiClientCheck,
  CircuitBreakerRegistry,
  dataStreamCheck,
  FailoverManager,
  GuardedExchangeClient,
  LoggingNotifier,
  MetricsCollector,
  orderEngineCheck,
  persistenceCheck,
  RateLimiter,
  strategyEngineCheck,
} from '@tradeguard/core';
import type {
  ApiClientProbe,
  Clock,
  ComponentRegistration,
  GuardedClientStats,
  ILogger,
  DataStreamProbe,
  OrderEngineProbe,
  PersistenceProbe,
  StrategyEngineProbe,
} from '@tradeguard/core';
import {
  COMPONENT_NAMES,
  ComponentName,
  ExchangeTransport,
  FailoverStatusSnapshot,
  HealthCheckFn,
  MetricsSink,
  Notifier,
  RateLimitInfo,
  RecoveryFn,
  ShutdownHandler,
} from '@tradeguard/types';

export interface ComponentProbes {
  apiClient?: ApiClientProbe;
  dataStream?: DataStreamProbe;
  strategyEngine?: StrategyEngineProbe;
  orderEngine?: OrderEngineProbe;
  persistence?: PersistenceProbe;
}

export interface RuntimeCollaborators {
  transport: ExchangeTransport;
  probes?: ComponentProbes;
  healthChecks?: Partial<Record<ComponentName, HealthCheckFn>>;
  recoveries?: Partial<Record<ComponentName, RecoveryFn>>;
  notifier?: Notifier;
  shutdownHandler?: ShutdownHandler;
  metricsSink?: MetricsSink;
  logger?: ILogger;
  /** Shared by every component; each uses its own default when omitted */
  clock?: Clock;
}

export interface RuntimeSnapshot {
  /** ISO-8601 */
  timestamp: string;
  running: boolean;
  failover: FailoverStatusSnapshot;
  rateLimits: Record<string, RateLimitInfo>;
  rateLimitStats: Record<string, number>;
  rateLimitRejections: Record<string, number>;
  circuits: Record<string, string>;
  client: GuardedClientStats;
  metrics: Record<string, Record<string, number>>;
}

export class ResilienceRuntime {
  readonly rateLimiter: RateLimiter;
  readonly registry: CircuitBreakerRegistry;
  readonly client: GuardedExchangeClient;
  readonly failover: FailoverManager;
  readonly metrics: MetricsCollector;
  private running = false;
  private readonly logger?: ILogger;

  constructor(readonly config: ResilienceConfig, collaborators: RuntimeCollaborators) {
    const { logger, clock } = collaborators;
    this.logger = logger;

    this.rateLimiter = new RateLimiter(config.rateLimits, { logger, clock });
    this.registry = new CircuitBreakerRegistry(config.circuitBreaker, { logger, clock });
    this.client = new GuardedExchangeClient(collaborators.transport, {
      rateLimiter: this.rateLimiter,
      registry: this.registry,
      retry: config.retry,
      logger,
      clock,
    });

    this.failover = new FailoverManager(config.failover, {
      logger,
      clock,
      notifier: collaborators.notifier ?? new LoggingNotifier({ logger }),
      shutdownHandler: collaborators.shutdownHandler,
      components: this.buildRegistrations(collaborators),
    });

    this.metrics = new MetricsCollector(config.metrics, {
      logger,
      clock,
      sink: collaborators.metricsSink,
      sources: {
        rateLimiter: this.rateLimiter,
        registry: this.registry,
        failover: this.failover,
        client: this.client,
      },
    });
  }

  /**
   * Start supervision and metrics collection.
   * @returns false if already running
   */
  start(): boolean {
    if (this.running) {
      this.logger?.warn('Resilience runtime already running');
      return false;
    }
    this.running = true;
    this.failover.start();
    this.metrics.start();
    this.logger?.info('Resilience runtime started', {
      failover: this.failover.isRunning(),
      metrics: this.metrics.isRunning(),
    });
    return true;
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.failover.isRunning()) {
      await this.failover.stop();
    }
    await this.metrics.stop(this.config.failover.stopTimeoutMs);
    this.logger?.info('Resilience runtime stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getSnapshot(): RuntimeSnapshot {
    return {
      timestamp: new Date().toISOString(),
      running: this.running,
      failover: this.failover.getFailoverStatus(),
      rateLimits: this.rateLimiter.getLimits(),
      rateLimitStats: this.rateLimiter.getStats(),
      rateLimitRejections: this.rateLimiter.getRejections(),
      circuits: this.registry.getAllStates(),
      client: this.client.getStats(),
      metrics: this.metrics.getMetrics(),
    };
  }

  private buildRegistrations(
    collaborators: RuntimeCollaborators
  ): Partial<Record<ComponentName, ComponentRegistration>> {
    const { probes = {}, logger, clock } = collaborators;
    const deps = { logger, clock };
    const thresholds = this.config.healthChecks;

    const standard: Partial<Record<ComponentName, HealthCheckFn>> = {};
    if (probes.apiClient) {
      standard['api-client'] = apiClientCheck(probes.apiClient, this.registry, deps);
    }
    if (probes.dataStream) {
      standard['data-stream'] = dataStreamCheck(probes.dataStream, { staleAfterMs: thresholds.streamStaleAfterMs }, deps);
    }
    if (probes.strategyEngine) {
      standard['strategy-engine'] = strategyEngineCheck(
        probes.strategyEngine,
        { signalTimeoutMs: thresholds.strategySignalTimeoutMs },
        deps
      );
    }
    if (probes.orderEngine) {
      standard['order-engine'] = orderEngineCheck(probes.orderEngine, deps);
    }
    if (probes.persistence) {
      standard.persistence = persistenceCheck(probes.persistence, deps);
    }

    const registrations: Partial<Record<ComponentName, ComponentRegistration>> = {};
    for (const name of COMPONENT_NAMES) {
      registrations[name] = {
        healthCheck: collaborators.healthChecks?.[name] ?? standard[name],
        recovery: collaborators.recoveries?.[name],
      };
    }
    return registrations;
  }
}

export function createResilienceRuntime(
  config: ResilienceConfig,
  collaborators: RuntimeCollaborators
): ResilienceRuntime {
  return new ResilienceRuntime(config, collaborators);
}
