/**
 * Logging Module Tests
 *
 * Pino factory, options and the in-memory loggers used by every other test.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import pino from 'pino';
import {
  buildPinoOptions,
  createPinoLogger,
  getLogger,
  isLogLevel,
  NullLogger,
  PinoLoggerWrapper,
  RecordingLogger,
  resetLoggerCache,
} from '../../src/logging';
import { withEnv } from '@tradeguard/test-utils';

describe('Logging Module', () => {
  beforeEach(() => {
    resetLoggerCache();
  });

  afterEach(() => {
    resetLoggerCache();
  });

  describe('createPinoLogger', () => {
    it('caches loggers by name', () => {
      const first = createPinoLogger('rate-limiter');

      expect(createPinoLogger({ name: 'rate-limiter' })).toBe(first);
      expect(getLogger('rate-limiter')).toBe(first);
      expect(createPinoLogger('circuit-breaker')).not.toBe(first);
    });

    it('returns an uncached child when bindings are given', () => {
      const base = createPinoLogger('guarded-client');
      const child = createPinoLogger({ name: 'guarded-client', bindings: { exchange: 'testnet' } });

      expect(child).not.toBe(base);
      expect(createPinoLogger('guarded-client')).toBe(base);
    });

    it('starts afresh after resetLoggerCache()', () => {
      const first = createPinoLogger('metrics-collector');

      resetLoggerCache();

      expect(createPinoLogger('metrics-collector')).not.toBe(first);
    });
  });

  describe('buildPinoOptions', () => {
    it('uses the explicit level and tags entries with the service name', () => {
      const options = buildPinoOptions({ name: 'failover-manager', level: 'debug' });

      expect(options.level).toBe('debug');
      expect(options.base).toEqual({ service: 'failover-manager', pid: process.pid });
      expect(options.transport).toBeUndefined();
    });

    it('reads LOG_LEVEL and falls back to info for unknown values', async () => {
      await withEnv({ LOG_LEVEL: 'warn' }, () => {
        expect(buildPinoOptions({ name: 'x' }).level).toBe('warn');
      });
      await withEnv({ LOG_LEVEL: 'verbose' }, () => {
        expect(buildPinoOptions({ name: 'x' }).level).toBe('info');
      });
    });

    it('uses pino-pretty in development unless LOG_FORMAT=json', async () => {
      await withEnv({ NODE_ENV: 'development', LOG_FORMAT: undefined }, () => {
        expect(buildPinoOptions({ name: 'x' }).transport).toMatchObject({ target: 'pino-pretty' });
      });
      await withEnv({ NODE_ENV: 'development', LOG_FORMAT: 'json' }, () => {
        expect(buildPinoOptions({ name: 'x' }).transport).toBeUndefined();
      });
    });
  });

  describe('PinoLoggerWrapper', () => {
    const capture = () => {
      const lines: string[] = [];
      const logger = new PinoLoggerWrapper(
        pino(buildPinoOptions({ name: 'guarded-client', level: 'info' }), {
          write: (line: string) => {
            lines.push(line);
          },
        })
      );
      const entries = (): unknown[] => lines.map(line => JSON.parse(line));
      return { logger, entries };
    };

    it('writes message and metadata as one JSON entry', () => {
      const { logger, entries } = capture();

      logger.warn('Exchange call rejected by rate limiter', { method: 'placeOrder', limitKey: 'order' });

      expect(entries()).toEqual([
        expect.objectContaining({
          level: 'warn',
          service: 'guarded-client',
          msg: 'Exchange call rejected by rate limiter',
          method: 'placeOrder',
          limitKey: 'order',
        }),
      ]);
    });

    it('redacts credentials', () => {
      const { logger, entries } = capture();

      logger.info('Client configured', { apiKey: 'test-key', auth: { secret: 'test-secret' } });

      expect(entries()[0]).toMatchObject({ apiKey: '[REDACTED]', auth: { secret: '[REDACTED]' } });
    });

    it('respects the level and never reports silent as enabled', () => {
      const { logger, entries } = capture();

      logger.debug('hidden');

      expect(entries()).toEqual([]);
      expect(logger.isLevelEnabled('info')).toBe(true);
      expect(logger.isLevelEnabled('debug')).toBe(false);
      expect(logger.isLevelEnabled('silent')).toBe(false);
    });

    it('carries child bindings', () => {
      const { logger, entries } = capture();

      logger.child({ operation: 'getPositions' }).error('Exchange call failed');

      expect(entries()[0]).toMatchObject({ level: 'error', operation: 'getPositions' });
    });
  });

  describe('RecordingLogger', () => {
    it('records entries with metadata', () => {
      const logger = new RecordingLogger();

      logger.info('Failover manager started', { checkIntervalMs: 30_000 });
      logger.warn('Metrics collector already running');

      expect(logger.count).toBe(2);
      expect(logger.hasLogMatching('info', 'started')).toBe(true);
      expect(logger.hasLogMatching('warn', /already running$/)).toBe(true);
      expect(logger.hasLogWithMeta('info', { checkIntervalMs: 30_000 })).toBe(true);
      expect(logger.getLastLogAt('warn')?.msg).toBe('Metrics collector already running');
    });

    it('shares entries with children and keeps their bindings', () => {
      const logger = new RecordingLogger();

      logger.child({ component: 'order-engine' }).error('Recovery failed');

      expect(logger.getErrors()).toHaveLength(1);
      expect(logger.getErrors()[0]?.bindings).toEqual({ component: 'order-engine' });
    });

    it('clear() empties the log', () => {
      const logger = new RecordingLogger();
      logger.fatal('EMERGENCY');

      logger.clear();

      expect(logger.getAllLogs()).toEqual([]);
    });
  });

  describe('NullLogger', () => {
    it('discards everything', () => {
      const logger = new NullLogger();

      logger.error('ignored');

      expect(logger.child({ a: 1 })).toBe(logger);
      expect(logger.isLevelEnabled('fatal')).toBe(false);
    });
  });

  it('isLogLevel() accepts only known levels', () => {
    expect(isLogLevel('trace')).toBe(true);
    expect(isLogLevel('silent')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
