/**
 * Supervisor Health Server Unit Tests
 *
 * Runs the real HTTP server on an ephemeral loopback port.
 */

import http from 'http';
import type { AddressInfo } from 'net';
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { loadResilienceConfig } from '@tradeguard/config';
import { RecordingLogger } from '@tradeguard/core';
import { ManualClock, StubExchangeTransport } from '@tradeguard/test-utils';
import { createSupervisorHealthServer, SERVICE_NAME } from '../../src/health-server';
import { createResilienceRuntime, ResilienceRuntime, RuntimeCollaborators } from '../../src/runtime';

interface HttpResult {
  statusCode: number;
  headers: http.IncomingHttpHeaders;
  body: unknown;
}

function request(
  port: number,
  path: string,
  options: { method?: string; headers?: Record<string, string> } = {}
): Promise<HttpResult> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      { hostname: '127.0.0.1', port, path, method: options.method ?? 'GET', headers: options.headers },
      res => {
        let body = '';
        res.on('data', (chunk: Buffer) => {
          body += chunk.toString();
        });
        res.on('end', () => {
          resolve({ statusCode: res.statusCode ?? 0, headers: res.headers, body: JSON.parse(body) });
        });
      }
    );
    req.on('error', reject);
    req.end();
  });
}

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    const resolvePort = () => {
      const address: AddressInfo | string | null = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server has no TCP address'));
        return;
      }
      resolve(address.port);
    };
    if (server.listening) resolvePort();
    else server.once('listening', resolvePort);
  });
}

function close(server: http.Server): Promise<void> {
  return new Promise(resolve => server.close(() => resolve()));
}

describe('createSupervisorHealthServer', () => {
  let logger: RecordingLogger;
  let runtime: ResilienceRuntime;
  let server: http.Server | undefined;

  const start = async (
    collaborators: Partial<RuntimeCollaborators> = {},
    authToken?: string
  ): Promise<number> => {
    runtime = createResilienceRuntime(loadResilienceConfig({}), {
      transport: new StubExchangeTransport(),
      logger,
      clock: new ManualClock(Date.UTC(2026, 3, 1)),
      ...collaborators,
    });
    server = createSupervisorHealthServer({ runtime, port: 0, authToken, logger });
    return listen(server);
  };

  beforeEach(() => {
    logger = new RecordingLogger();
    server = undefined;
  });

  afterEach(async () => {
    await runtime.stop();
    if (server) await close(server);
  });

  describe('GET /health', () => {
    it('reports healthy in NORMAL', async () => {
      const port = await start();

      const res = await request(port, '/health');

      expect(res.statusCode).toBe(200);
      expect(res.body).toMatchObject({
        service: SERVICE_NAME,
        status: 'healthy',
        failoverState: 'NORMAL',
        components: {
          'api-client': 'HEALTHY',
          'data-stream': 'HEALTHY',
          'strategy-engine': 'HEALTHY',
          'order-engine': 'HEALTHY',
          persistence: 'HEALTHY',
        },
        emergencyShutdownTriggered: false,
      });
    });

    it('reports degraded with 200 outside EMERGENCY', async () => {
      const port = await start({ probes: { persistence: { ping: () => false } } });
      await runtime.failover.runCycle();

      const res = await request(port, '/health');

      expect(res.statusCode).toBe(200);
      expect(res.body).toMatchObject({ status: 'degraded', failoverState: 'DEGRADED' });
    });

    it('returns 503 in EMERGENCY', async () => {
      const port = await start({ probes: { orderEngine: { canPlaceOrders: () => false } } });
      await runtime.failover.runCycle();

      const res = await request(port, '/health');

      expect(res.statusCode).toBe(503);
      expect(res.body).toMatchObject({ status: 'unhealthy', failoverState: 'EMERGENCY' });
    });

    it('ignores the query string', async () => {
      const port = await start();

      expect((await request(port, '/health?verbose=1')).statusCode).toBe(200);
    });
  });

  it('GET /ready follows the runtime lifecycle', async () => {
    const port = await start();

    expect(await request(port, '/ready')).toMatchObject({ statusCode: 503, body: { ready: false } });

    runtime.start();

    expect(await request(port, '/ready')).toMatchObject({ statusCode: 200, body: { ready: true } });
  });

  describe('GET /stats', () => {
    it('returns the snapshot without a configured token', async () => {
      const port = await start();

      const res = await request(port, '/stats');

      expect(res.statusCode).toBe(200);
      expect(res.body).toMatchObject({
        service: SERVICE_NAME,
        running: false,
        client: { calls: 0 },
        rateLimits: { default: { maxTokens: 100, refillRate: 10 } },
      });
    });

    it('requires the bearer token when configured', async () => {
      const port = await start({}, 'test-token');

      expect((await request(port, '/stats')).statusCode).toBe(401);
      expect(
        (await request(port, '/stats', { headers: { Authorization: 'Bearer wrong-token' } })).statusCode
      ).toBe(401);

      const res = await request(port, '/stats', { headers: { Authorization: 'Bearer test-token' } });
      expect(res.statusCode).toBe(200);
    });

    it('returns 500 when the snapshot fails', async () => {
      const port = await start();
      jest.spyOn(runtime, 'getSnapshot').mockImplementation(() => {
        throw new Error('snapshot unavailable');
      });

      const res = await request(port, '/stats');

      expect(res.statusCode).toBe(500);
      expect(res.body).toEqual({ service: SERVICE_NAME, status: 'error', error: 'Internal health check failed' });
      expect(logger.hasLogMatching('error', 'Health endpoint failed')).toBe(true);
    });
  });

  it('GET / describes the service', async () => {
    const port = await start();

    const res = await request(port, '/');

    expect(res.body).toEqual({
      service: SERVICE_NAME,
      description: 'Exchange resilience supervisor',
      endpoints: ['/health', '/ready', '/stats'],
    });
  });

  it('returns 404 for unknown paths', async () => {
    const port = await start();

    expect(await request(port, '/metrics')).toMatchObject({ statusCode: 404, body: { error: 'Not found' } });
  });

  it('returns 405 for non-GET methods', async () => {
    const port = await start();

    const res = await request(port, '/health', { method: 'POST' });

    expect(res.statusCode).toBe(405);
    expect(res.headers.allow).toBe('GET');
  });

  it('warns when bound to all interfaces without a token', async () => {
    runtime = createResilienceRuntime(loadResilienceConfig({}), {
      transport: new StubExchangeTransport(),
      logger,
    });
    server = createSupervisorHealthServer({ runtime, port: 0, bindAddress: '0.0.0.0', logger });
    await listen(server);

    expect(logger.hasLogMatching('warn', 'Health server bound to all interfaces without auth token')).toBe(true);
  });
});
