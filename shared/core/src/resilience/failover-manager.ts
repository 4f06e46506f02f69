// Failover Manager
// Supervises the trading client's components, derives a global health state
// and drives recovery or emergency shutdown.
//
// Each iteration: checkComponents -> updateState -> handleFailover, then a
// pause of checkIntervalMs. Iterations and operator mutations share one mutex,
// so they never interleave.

import { FailoverConfigSchema, FailoverSettings, RESILIENCE_DEFAULTS, validateWithDetails } from '@tradeguard/config';
import {
  COMPONENT_NAMES,
  CRITICAL_COMPONENTS,
  ComponentName,
  ComponentStatus,
  ComponentStatusSnapshot,
  FailoverState,
  FailoverStatusSnapshot,
  HealthCheckFn,
  Notifier,
  RecoveryFn,
  ShutdownHandler,
  isComponentName,
  mapComponents,
} from '@tradeguard/types';
import { AsyncMutex } from '../async/async-mutex';
import { Clock, systemClock } from '../async/clock';
import { PollingLoop } from '../async/polling-loop';
import { ConfigurationError, formatErrorForLog, getErrorMessage } from '../error-handling';
import { createLogger, ILogger } from '../logging';

// =============================================================================
// Types
// =============================================================================

export interface ComponentRegistration {
  healthCheck?: HealthCheckFn;
  recovery?: RecoveryFn;
}

export interface FailoverManagerDeps {
  logger?: ILogger;
  /** Wall clock: timestamps in snapshots are shown as ISO dates */
  clock?: Clock;
  notifier?: Notifier;
  shutdownHandler?: ShutdownHandler;
  components?: Partial<Record<ComponentName, ComponentRegistration>>;
}

interface ComponentRecord {
  status: ComponentStatus;
  readonly critical: boolean;
  lastCheck: number | null;
  lastFailure: number | null;
  failureCount: number;
  recoveryAttempts: number;
  /** null until the first attempt, so the first attempt is never gated by backoff */
  lastRecoveryTime: number | null;
  healthCheck?: HealthCheckFn;
  recovery?: RecoveryFn;
}

const UNHEALTHY_CRITICAL: ReadonlySet<ComponentStatus> = new Set([ComponentStatus.CRITICAL, ComponentStatus.FAILED]);

function toIso(timestamp: number | null): string | null {
  return timestamp === null ? null : new Date(timestamp).toISOString();
}

// =============================================================================
// FailoverManager
// =============================================================================

export class FailoverManager {
  private state: FailoverState = FailoverState.NORMAL;
  private config: FailoverSettings;
  private readonly components: Record<ComponentName, ComponentRecord>;
  private readonly mutex = new AsyncMutex();
  private readonly loop: PollingLoop;
  private emergencyShutdownTriggered = false;
  private readonly logger: ILogger;
  private readonly clock: Clock;
  private readonly notifier?: Notifier;
  private readonly shutdownHandler?: ShutdownHandler;

  constructor(config: Partial<FailoverSettings> = {}, deps: FailoverManagerDeps = {}) {
    this.config = FailoverManager.validate({ ...RESILIENCE_DEFAULTS.failover, ...config });
    this.logger = deps.logger ?? createLogger('failover-manager');
    this.clock = deps.clock ?? systemClock;
    this.notifier = deps.notifier;
    this.shutdownHandler = deps.shutdownHandler;

    this.components = mapComponents(name => ({
      status: ComponentStatus.HEALTHY,
      critical: CRITICAL_COMPONENTS.has(name),
      lastCheck: null,
      lastFailure: null,
      failureCount: 0,
      recoveryAttempts: 0,
      lastRecoveryTime: null,
      healthCheck: deps.components?.[name]?.healthCheck,
      recovery: deps.components?.[name]?.recovery,
    }));

    this.loop = new PollingLoop('failover', () => this.runCycle(), () => this.config.checkIntervalMs, {
      logger: this.logger,
    });

    this.logger.info('Failover manager initialized', { config: this.config });
  }

  private static validate(candidate: FailoverSettings): FailoverSettings {
    const result = validateWithDetails(FailoverConfigSchema, candidate);
    if (!result.success || !result.data) {
      const issues = (result.errors ?? []).map(e => `${e.path}: ${e.message}`).join('; ');
      throw new ConfigurationError(`Invalid failover configuration: ${issues}`, { field: 'failover' });
    }
    return result.data;
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  registerHealthCheck(name: ComponentName, healthCheck: HealthCheckFn): void {
    this.components[name].healthCheck = healthCheck;
  }

  registerRecovery(name: ComponentName, recovery: RecoveryFn): void {
    this.components[name].recovery = recovery;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start the supervision loop. No-op when disabled or already running.
   * @returns true if the loop was started
   */
  start(): boolean {
    if (!this.config.enabled) {
      this.logger.info('Failover manager is disabled in configuration');
      return false;
    }
    if (this.loop.isRunning()) {
      this.logger.warn('Failover manager already running');
      return false;
    }
    this.loop.start();
    this.logger.info('Failover manager started', { checkIntervalMs: this.config.checkIntervalMs });
    return true;
  }

  /**
   * Stop the loop, waiting at most `stopTimeoutMs` for the in-flight iteration.
   */
  async stop(): Promise<void> {
    if (!this.loop.isRunning()) {
      this.logger.warn('Failover manager not running');
      return;
    }
    await this.loop.stop(this.config.stopTimeoutMs);
    this.logger.info('Failover manager stopped');
  }

  isRunning(): boolean {
    return this.loop.isRunning();
  }

  /**
   * One supervision iteration.
   */
  async runCycle(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.checkComponents();
      await this.updateState();
      await this.handleFailover();
    });
  }

  // ===========================================================================
  // Iteration steps
  // ===========================================================================

  private entries(): Array<[ComponentName, ComponentRecord]> {
    return COMPONENT_NAMES.map((name): [ComponentName, ComponentRecord] => [name, this.components[name]]);
  }

  private async checkComponents(): Promise<void> {
    for (const [name, record] of this.entries()) {
      if (!record.healthCheck) continue;

      let status: ComponentStatus;
      try {
        status = await record.healthCheck();
        this.logger.debug(`Component ${name} status: ${status}`);
      } catch (error) {
        this.logger.error(`Error checking component ${name}`, { error: formatErrorForLog(error) });
        status = ComponentStatus.FAILED;
      }

      this.applyCheckResult(record, status);
    }
  }

  private applyCheckResult(record: ComponentRecord, status: ComponentStatus): void {
    const now = this.clock.now();
    record.status = status;
    record.lastCheck = now;

    if (status === ComponentStatus.HEALTHY) {
      record.failureCount = 0;
      record.lastFailure = null;
    } else {
      record.failureCount++;
      record.lastFailure ??= now;
    }
  }

  /**
   * Precedence: critical CRITICAL/FAILED > any RECOVERING > any WARNING > NORMAL.
   * FAILOVER is never derived.
   */
  private deriveState(): FailoverState {
    const records = Object.values(this.components);

    if (records.some(r => r.critical && UNHEALTHY_CRITICAL.has(r.status))) {
      return FailoverState.EMERGENCY;
    }
    if (records.some(r => r.status === ComponentStatus.RECOVERING)) {
      return FailoverState.RECOVERY;
    }
    if (records.some(r => r.status === ComponentStatus.WARNING)) {
      return FailoverState.DEGRADED;
    }
    return FailoverState.NORMAL;
  }

  private async updateState(): Promise<void> {
    const next = this.deriveState();
    if (next === this.state) return;

    const previous = this.state;
    this.state = next;

    if (next !== FailoverState.EMERGENCY) {
      this.emergencyShutdownTriggered = false;
    }

    const message = `Failover state changed from ${previous} to ${next}`;
    this.logger.info(message, { previous, next });
    if (this.config.notificationEnabled) {
      await this.sendNotification(message);
    }
  }

  private async handleFailover(): Promise<void> {
    switch (this.state) {
      case FailoverState.DEGRADED:
        await this.handleDegraded();
        break;
      case FailoverState.RECOVERY:
        await this.handleRecovery();
        break;
      case FailoverState.EMERGENCY:
        await this.handleEmergency();
        break;
      case FailoverState.NORMAL:
      case FailoverState.FAILOVER:
        break;
    }
  }

  private async handleDegraded(): Promise<void> {
    for (const [name, record] of this.entries()) {
      if (record.status === ComponentStatus.WARNING) {
        await this.tryRecover(name, record);
      }
    }
  }

  private async handleRecovery(): Promise<void> {
    for (const [name, record] of this.entries()) {
      if (record.status !== ComponentStatus.RECOVERING) continue;

      let status = ComponentStatus.FAILED;
      if (record.healthCheck) {
        try {
          status = await record.healthCheck();
        } catch (error) {
          this.logger.error(`Error re-checking recovering component ${name}`, { error: formatErrorForLog(error) });
        }
      }

      if (status === ComponentStatus.HEALTHY) {
        this.logger.info(`Component ${name} has recovered`);
        this.markRecovered(record);
      } else {
        await this.tryRecover(name, record);
      }
    }
  }

  private async handleEmergency(): Promise<void> {
    this.logger.fatal('System in EMERGENCY state - critical components have failed');

    const failing = this.entries()
      .filter(([, r]) => r.critical && UNHEALTHY_CRITICAL.has(r.status));

    for (const [name, record] of failing) {
      await this.tryRecover(name, record);
    }

    const exhausted = failing.length > 0
      && failing.every(([, r]) => r.recoveryAttempts >= this.config.maxRecoveryAttempts);

    if (this.config.emergencyShutdown && exhausted && !this.emergencyShutdownTriggered) {
      await this.triggerEmergencyShutdown(failing.map(([name]) => name));
    }
  }

  private async triggerEmergencyShutdown(components: ComponentName[]): Promise<void> {
    this.emergencyShutdownTriggered = true;
    this.logger.fatal('Emergency shutdown initiated - critical components could not be recovered', { components });

    if (this.config.notificationEnabled) {
      await this.sendNotification('EMERGENCY: Trading client shutting down due to critical component failures');
    }

    if (!this.shutdownHandler) {
      this.logger.warn('No shutdown handler registered');
      return;
    }
    try {
      await this.shutdownHandler();
    } catch (error) {
      this.logger.error('Emergency shutdown handler failed', { error: formatErrorForLog(error) });
    }
  }

  // ===========================================================================
  // Recovery
  // ===========================================================================

  /**
   * Attempt recovery of one component, subject to the same gates as the loop
   * (auto recovery enabled, recovery function present, attempts left,
   * backoff elapsed).
   *
   * @returns true if the recovery function ran and did not throw
   */
  async attemptRecovery(name: ComponentName): Promise<boolean> {
    return this.mutex.runExclusive(() => this.tryRecover(name, this.components[name]));
  }

  private async tryRecover(name: ComponentName, record: ComponentRecord): Promise<boolean> {
    if (!this.config.autoRecovery) {
      this.logger.warn(`Auto recovery disabled - not attempting recovery for ${name}`);
      return false;
    }
    const recovery = record.recovery;
    if (!recovery) {
      this.logger.warn(`No recovery function for component ${name}`);
      return false;
    }
    if (record.recoveryAttempts >= this.config.maxRecoveryAttempts) {
      this.logger.warn(`Max recovery attempts reached for component ${name}`, {
        attempts: record.recoveryAttempts,
      });
      return false;
    }

    const now = this.clock.now();
    if (record.lastRecoveryTime !== null && now - record.lastRecoveryTime < this.config.recoveryBackoffMs) {
      this.logger.debug(`Recovery backoff time not elapsed for component ${name}`);
      return false;
    }

    this.logger.info(`Attempting recovery for component ${name}`, { attempt: record.recoveryAttempts + 1 });
    record.status = ComponentStatus.RECOVERING;
    record.recoveryAttempts++;
    record.lastRecoveryTime = now;

    try {
      const recovered = await recovery();
      if (recovered) {
        this.logger.info(`Recovery successful for component ${name}`);
        this.markRecovered(record);
      } else {
        this.logger.warn(`Recovery failed for component ${name}`);
        record.status = ComponentStatus.FAILED;
      }
      return true;
    } catch (error) {
      this.logger.error(`Error during recovery for component ${name}`, { error: formatErrorForLog(error) });
      record.status = ComponentStatus.FAILED;
      return false;
    }
  }

  private markRecovered(record: ComponentRecord): void {
    record.status = ComponentStatus.HEALTHY;
    record.recoveryAttempts = 0;
    record.failureCount = 0;
    record.lastFailure = null;
  }

  private async sendNotification(message: string): Promise<void> {
    this.logger.info(`Notification: ${message}`);
    if (!this.notifier) return;
    try {
      await this.notifier.notify(message);
    } catch (error) {
      this.logger.error('Error sending notification', { error: getErrorMessage(error) });
    }
  }

  // ===========================================================================
  // Operator surface
  // ===========================================================================

  getState(): FailoverState {
    return this.state;
  }

  isEmergencyShutdownTriggered(): boolean {
    return this.emergencyShutdownTriggered;
  }

  getFailoverStatus(): FailoverStatusSnapshot {
    return {
      state: this.state,
      running: this.loop.isRunning(),
      components: mapComponents(name => this.toSnapshot(this.components[name])),
      recoveryAttempts: mapComponents(name => this.components[name].recoveryAttempts),
      emergencyShutdownTriggered: this.emergencyShutdownTriggered,
      config: { ...this.config },
    };
  }

  /** null for names that are not supervised components. */
  getComponentStatus(name: string): ComponentStatusSnapshot | null {
    const record = this.findRecord(name);
    return record ? this.toSnapshot(record) : null;
  }

  /**
   * Force a component back to HEALTHY with counters cleared.
   * The global state is re-derived on the next iteration.
   */
  async resetComponent(name: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const record = this.findRecord(name);
      if (!record) {
        this.logger.warn(`Cannot reset unknown component ${name}`);
        return false;
      }
      this.markRecovered(record);
      this.logger.info(`Component ${name} reset`);
      return true;
    });
  }

  /**
   * Merge `partial` into the active configuration.
   * @returns false (configuration unchanged) when the result is invalid
   */
  async updateFailoverConfig(partial: Partial<FailoverSettings>): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const candidate = { ...this.config, ...partial };
      const result = validateWithDetails(FailoverConfigSchema, candidate);
      if (!result.success || !result.data) {
        this.logger.error('Rejected failover configuration update', { errors: result.errors });
        return false;
      }
      this.config = result.data;
      this.logger.info('Failover configuration updated', { config: this.config });
      return true;
    });
  }

  private toSnapshot(record: ComponentRecord): ComponentStatusSnapshot {
    return {
      status: record.status,
      critical: record.critical,
      failureCount: record.failureCount,
      lastCheck: toIso(record.lastCheck),
      lastFailure: toIso(record.lastFailure),
      recoveryAttempts: record.recoveryAttempts,
    };
  }

  private findRecord(name: string): ComponentRecord | undefined {
    return isComponentName(name) ? this.components[name] : undefined;
  }
}
