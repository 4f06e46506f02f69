/**
 * Trading Supervisor Entry Point & Public API
 *
 * The trading bot calls runSupervisor() with its exchange transport and
 * component probes; the supervisor owns the resilience runtime and the
 * health endpoint for the life of the process.
 *
 * Environment Variables:
 * - HEALTH_CHECK_PORT: Health server port (default: 3100, 0 picks a free port)
 * - HEALTH_SERVER_ENABLED: Set to false to skip the health server
 * - HEALTH_AUTH_TOKEN: Bearer token required for /stats
 * - HEALTH_BIND_ADDRESS: Interface to bind (default: 127.0.0.1)
 * - plus every variable read by loadResilienceConfig()
 */

import type { Server } from 'http';
import { loadResilienceConfig, parseBoolean, ResilienceConfig, safeParseInt } from '@tradeguard/config';
import { createLogger, getErrorMessage } from '@tradeguard/core';
import { createSupervisorHealthServer, SERVICE_NAME } from './health-server';
import { createResilienceRuntime, ResilienceRuntime, RuntimeCollaborators } from './runtime';

export { createResilienceRuntime, ResilienceRuntime } from './runtime';
export type { ComponentProbes, RuntimeCollaborators, RuntimeSnapshot } from './runtime';
export { createSupervisorHealthServer, createHealthRequestHandler, SERVICE_NAME } from './health-server';
export type { SupervisorHealthServerOptions } from './health-server';

const DEFAULT_HEALTH_PORT = 3100;

export interface SupervisorOptions extends RuntimeCollaborators {
  env?: Record<string, string | undefined>;
  configOverrides?: Partial<ResilienceConfig>;
  /** Register SIGINT/SIGTERM handlers that stop the supervisor (default true) */
  handleSignals?: boolean;
  /** Called after a signal-triggered stop completes */
  onSignalStop?: (signal: NodeJS.Signals) => void;
}

export interface SupervisorHandle {
  runtime: ResilienceRuntime;
  server: Server | null;
  stop(): Promise<void>;
}

function waitForListening(server: Server): Promise<void> {
  if (server.listening) return Promise.resolve();
  return new Promise((resolve, reject) => {
    server.once('listening', () => resolve());
    server.once('error', reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

/**
 * Load config, build and start the runtime and the health server.
 *
 * @throws ConfigValidationError when the environment holds invalid settings
 */
export async function runSupervisor(options: SupervisorOptions): Promise<SupervisorHandle> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger(SERVICE_NAME);
  const config = loadResilienceConfig(env, options.configOverrides);

  const runtime = createResilienceRuntime(config, { ...options, logger });
  runtime.start();

  const server = parseBoolean(env.HEALTH_SERVER_ENABLED, true)
    ? createSupervisorHealthServer({
        runtime,
        port: safeParseInt(env.HEALTH_CHECK_PORT, DEFAULT_HEALTH_PORT),
        authToken: env.HEALTH_AUTH_TOKEN || undefined,
        bindAddress: env.HEALTH_BIND_ADDRESS || undefined,
        logger,
      })
    : null;
  if (server) {
    try {
      await waitForListening(server);
    } catch (error) {
      await runtime.stop();
      throw error;
    }
  }

  let stopping: Promise<void> | null = null;
  const signalHandlers = new Map<NodeJS.Signals, () => void>();

  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      for (const [signal, handler] of signalHandlers) {
        process.off(signal, handler);
      }
      signalHandlers.clear();

      await runtime.stop();
      if (server?.listening) {
        await closeServer(server);
      }
      logger.info('Trading supervisor stopped');
    })();
    return stopping;
  };

  if (options.handleSignals ?? true) {
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      const handler = (): void => {
        logger.info(`Received ${signal}, stopping trading supervisor`);
        stop()
          .then(() => options.onSignalStop?.(signal))
          .catch(error => {
            logger.error('Error during trading supervisor shutdown', { error: getErrorMessage(error) });
          });
      };
      signalHandlers.set(signal, handler);
      process.on(signal, handler);
    }
  }

  logger.info('Trading supervisor is running', {
    failoverEnabled: config.failover.enabled,
    metricsEnabled: config.metrics.enabled,
    healthServer: server !== null,
  });

  return { runtime, server, stop };
}
