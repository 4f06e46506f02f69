// Shared types for the exchange resilience control plane

// =============================================================================
// Component health
// =============================================================================

/**
 * Health status reported for a supervised component.
 */
export enum ComponentStatus {
  HEALTHY = 'HEALTHY',
  WARNING = 'WARNING',
  CRITICAL = 'CRITICAL',
  FAILED = 'FAILED',
  RECOVERING = 'RECOVERING'
}

/**
 * Global state derived by the failover manager from all component statuses.
 *
 * FAILOVER is reserved: the state derivation never produces it.
 */
export enum FailoverState {
  NORMAL = 'NORMAL',
  DEGRADED = 'DEGRADED',
  FAILOVER = 'FAILOVER',
  RECOVERY = 'RECOVERY',
  EMERGENCY = 'EMERGENCY'
}

/**
 * The five components supervised by the failover manager.
 */
export type ComponentName =
  | 'api-client'
  | 'data-stream'
  | 'strategy-engine'
  | 'order-engine'
  | 'persistence';

export const COMPONENT_NAMES: readonly ComponentName[] = [
  'api-client',
  'data-stream',
  'strategy-engine',
  'order-engine',
  'persistence'
];

/**
 * Components whose failure alone forces the EMERGENCY state.
 */
export const CRITICAL_COMPONENTS: ReadonlySet<ComponentName> = new Set<ComponentName>([
  'api-client',
  'strategy-engine',
  'order-engine'
]);

export function isComponentName(value: string): value is ComponentName {
  return COMPONENT_NAMES.some(name => name === value);
}

/**
 * Build a record with one entry per supervised component.
 */
export function mapComponents<T>(fn: (name: ComponentName) => T): Record<ComponentName, T> {
  return {
    'api-client': fn('api-client'),
    'data-stream': fn('data-stream'),
    'strategy-engine': fn('strategy-engine'),
    'order-engine': fn('order-engine'),
    persistence: fn('persistence')
  };
}

// =============================================================================
// Owner-supplied collaborators
// =============================================================================

/** Probes one component. Should not block longer than the failover check interval. */
export type HealthCheckFn = () => ComponentStatus | Promise<ComponentStatus>;

/** Tries to bring a component back. May be called repeatedly on the backoff schedule. */
export type RecoveryFn = () => boolean | Promise<boolean>;

/** Invoked at most once per sustained emergency with exhausted recovery. */
export type ShutdownHandler = () => void | Promise<void>;

/** Best-effort operator notification channel (chat bot, pager, ...). */
export interface Notifier {
  notify(message: string): void | Promise<void>;
}

/**
 * Opaque remote exchange API. The resilience layer never interprets
 * responses beyond optional schema validation by the caller.
 */
export interface ExchangeTransport {
  call(method: string, params?: Record<string, unknown>): Promise<unknown>;
}

// =============================================================================
// Metrics
// =============================================================================

export type MetricTags = Record<string, string>;

export interface MetricPoint {
  category: string;
  name: string;
  value: number;
  /** Epoch milliseconds */
  timestamp: number;
  tags?: MetricTags;
}

/**
 * Time-series sink (database, file, remote collector).
 */
export interface MetricsSink {
  write(points: readonly MetricPoint[]): void | Promise<void>;
}

// =============================================================================
// Observability snapshots
// =============================================================================

export interface RateLimitInfo {
  maxTokens: number;
  /** Tokens per second */
  refillRate: number;
  currentTokens: number;
}

export interface ComponentStatusSnapshot {
  status: ComponentStatus;
  critical: boolean;
  failureCount: number;
  /** ISO-8601 */
  lastCheck: string | null;
  /** ISO-8601 */
  lastFailure: string | null;
  recoveryAttempts: number;
}

export interface FailoverConfig {
  enabled: boolean;
  autoRecovery: boolean;
  maxRecoveryAttempts: number;
  recoveryBackoffMs: number;
  emergencyShutdown: boolean;
  notificationEnabled: boolean;
  checkIntervalMs: number;
  /** Bounded wait for the in-flight iteration on stop() */
  stopTimeoutMs: number;
}

export interface FailoverStatusSnapshot {
  state: FailoverState;
  running: boolean;
  components: Record<ComponentName, ComponentStatusSnapshot>;
  recoveryAttempts: Record<ComponentName, number>;
  emergencyShutdownTriggered: boolean;
  config: FailoverConfig;
}
