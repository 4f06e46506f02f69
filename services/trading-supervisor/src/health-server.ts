/**
 * Supervisor Health Server
 *
 * Endpoints (GET only):
 * - GET /        - Service info
 * - GET /health  - 503 while the failover state is EMERGENCY, else 200
 * - GET /ready   - 200 once the runtime is running
 * - GET /stats   - Full runtime snapshot (Bearer token when configured)
 */

import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { timingSafeEqual } from 'crypto';
import { createLogger, formatErrorForLog, ILogger } from '@tradeguard/core';
import { FailoverState } from '@tradeguard/types';
import type { ResilienceRuntime } from './runtime';

export const SERVICE_NAME = 'trading-supervisor';

export interface SupervisorHealthServerOptions {
  runtime: ResilienceRuntime;
  port: number;
  /** When set, /stats requires `Authorization: Bearer <token>` */
  authToken?: string;
  bindAddress?: string;
  logger?: ILogger;
}

function sendJson(res: ServerResponse, statusCode: number, body: unknown, headers: Record<string, string> = {}): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json', ...headers });
  res.end(JSON.stringify(body));
}

function isAuthorized(req: IncomingMessage, authToken: string): boolean {
  const header = req.headers['authorization'];
  if (!header) return false;
  const expected = Buffer.from(`Bearer ${authToken}`);
  const actual = Buffer.from(header);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

/**
 * Request handler for the supervisor endpoints.
 */
export function createHealthRequestHandler(
  options: Omit<SupervisorHealthServerOptions, 'port' | 'bindAddress'>
): (req: IncomingMessage, res: ServerResponse) => void {
  const { runtime, authToken } = options;
  const logger = options.logger ?? createLogger(SERVICE_NAME);

  return (req, res) => {
    if (req.method !== 'GET') {
      sendJson(res, 405, { error: 'Method Not Allowed' }, { Allow: 'GET' });
      return;
    }

    const [path = '/'] = (req.url ?? '/').split('?');

    try {
      switch (path) {
        case '/health': {
          const status = runtime.failover.getFailoverStatus();
          const emergency = status.state === FailoverState.EMERGENCY;
          sendJson(res, emergency ? 503 : 200, {
            service: SERVICE_NAME,
            status: emergency ? 'unhealthy' : status.state === FailoverState.NORMAL ? 'healthy' : 'degraded',
            failoverState: status.state,
            components: Object.fromEntries(
              Object.entries(status.components).map(([name, component]) => [name, component.status])
            ),
            emergencyShutdownTriggered: status.emergencyShutdownTriggered,
            uptime: process.uptime(),
            timestamp: Date.now(),
          });
          return;
        }

        case '/ready': {
          const ready = runtime.isRunning();
          sendJson(res, ready ? 200 : 503, { service: SERVICE_NAME, ready });
          return;
        }

        case '/stats':
          if (authToken && !isAuthorized(req, authToken)) {
            sendJson(res, 401, { error: 'Unauthorized' });
            return;
          }
          sendJson(res, 200, { service: SERVICE_NAME, ...runtime.getSnapshot() });
          return;

        case '/':
          sendJson(res, 200, {
            service: SERVICE_NAME,
            description: 'Exchange resilience supervisor',
            endpoints: ['/health', '/ready', '/stats'],
          });
          return;

        default:
          sendJson(res, 404, { error: 'Not found' });
      }
    } catch (error) {
      logger.error('Health endpoint failed', { path, error: formatErrorForLog(error) });
      sendJson(res, 500, { service: SERVICE_NAME, status: 'error', error: 'Internal health check failed' });
    }
  };
}

/**
 * Create and start the HTTP health server.
 */
export function createSupervisorHealthServer(options: SupervisorHealthServerOptions): Server {
  const logger = options.logger ?? createLogger(SERVICE_NAME);
  const bindAddress = options.bindAddress ?? '127.0.0.1';
  const server = createServer(createHealthRequestHandler({ ...options, logger }));

  server.requestTimeout = 5000;
  server.headersTimeout = 3000;
  server.keepAliveTimeout = 5000;
  server.maxConnections = 100;

  const isPublicBind = bindAddress === '0.0.0.0' || bindAddress === '::';
  if (isPublicBind && !options.authToken) {
    logger.warn('Health server bound to all interfaces without auth token', {
      bindAddress,
      hint: 'Set HEALTH_AUTH_TOKEN or HEALTH_BIND_ADDRESS=127.0.0.1',
    });
  }

  server.on('error', (error: NodeJS.ErrnoException) => {
    logger.error('Health server error', { port: options.port, code: error.code, error: error.message });
  });

  server.listen(options.port, bindAddress, () => {
    logger.info(`Health server listening on ${bindAddress}:${options.port}`);
  });

  return server;
}
