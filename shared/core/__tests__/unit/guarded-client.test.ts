/**
 * GuardedExchangeClient Unit Tests
 *
 * Exercises the full admission pipeline (rate limiter -> circuit breaker ->
 * retry -> schema) against an in-process transport stub.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { z } from 'zod';
import {
  CircuitBreakerRegistry,
  CircuitOpenError,
  CircuitState,
  ErrorCode,
  ExchangeCallError,
  GuardedExchangeClient,
  RateLimitedError,
  RateLimiter,
  RecordingLogger,
  ResilienceError,
  resolveLimitKey,
} from '@tradeguard/core';
import { ManualClock, StubExchangeTransport } from '@tradeguard/test-utils';

describe('resolveLimitKey', () => {
  it.each([
    ['getTickers', 'market'],
    ['getOrderbook', 'market'],
    ['get_server_time', 'market'],
    ['getKline', 'market'],
    ['getPositions', 'position'],
    ['setLeverage', 'position'],
    ['placeOrder', 'order'],
    ['cancelAllOrders', 'order'],
    ['getWalletBalance', 'account'],
    ['getFundingRate', 'default'],
  ])('%s -> %s', (method, key) => {
    expect(resolveLimitKey(method)).toBe(key);
  });
});

describe('GuardedExchangeClient', () => {
  let clock: ManualClock;
  let logger: RecordingLogger;
  let transport: StubExchangeTransport;
  let rateLimiter: RateLimiter;
  let registry: CircuitBreakerRegistry;
  let client: GuardedExchangeClient;

  beforeEach(() => {
    clock = new ManualClock();
    logger = new RecordingLogger();
    transport = new StubExchangeTransport();
    rateLimiter = new RateLimiter(
      {
        order: { maxTokens: 2, intervalMs: 1000 },
        position: { maxTokens: 100, intervalMs: 1000 },
        market: { maxTokens: 100, intervalMs: 1000 },
        account: { maxTokens: 100, intervalMs: 1000 },
      },
      { clock, logger }
    );
    registry = new CircuitBreakerRegistry(
      { errorThreshold: 2, errorTimeoutMs: 60_000, circuitTimeoutMs: 1000 },
      { clock, logger }
    );
    client = new GuardedExchangeClient(transport, {
      rateLimiter,
      registry,
      retry: { maxAttempts: 3, initialDelayMs: 100, maxDelayMs: 1000, backoffMultiplier: 2 },
      logger,
      clock,
    });
  });

  describe('successful calls', () => {
    it('passes the call through and counts it against the resolved bucket', async () => {
      transport.respond('getTickers', { lastPrice: '64000.5' });

      const result = await client.callSafe('getTickers', { symbol: 'BTCUSDT' });

      expect(result).toEqual({ success: true, data: { lastPrice: '64000.5' } });
      expect(transport.calls).toEqual([{ method: 'getTickers', params: { symbol: 'BTCUSDT' } }]);
      expect(rateLimiter.getStats()).toEqual({ market: 1 });
      expect(registry.getCircuitBreaker('getTickers').getStats().totalSuccesses).toBe(1);
      expect(client.getStats()).toEqual({
        calls: 1,
        successes: 1,
        failures: 0,
        rejectedByLimiter: 0,
        rejectedByCircuit: 0,
        avgLatencyMs: 0,
        maxLatencyMs: 0,
      });
    });

    it('retries transient failures and reports one success to the breaker', async () => {
      transport.fail('placeOrder', new Error('connection reset')).respond('placeOrder', { orderId: 'o-1' });

      await expect(client.call('placeOrder', { qty: '0.01' })).resolves.toEqual({ orderId: 'o-1' });

      expect(clock.sleeps).toEqual([100]);
      expect(registry.getCircuitBreaker('placeOrder').getStats()).toMatchObject({ errorCount: 0, totalSuccesses: 1 });
      expect(client.getStats()).toMatchObject({ calls: 1, successes: 1, avgLatencyMs: 100, maxLatencyMs: 100 });
    });

    it('honours explicit limit key and operation name', async () => {
      transport.respond('getTickers', []);

      await client.callSafe('getTickers', {}, { limitKey: 'account', operation: 'market-data' });

      expect(rateLimiter.getStats()).toEqual({ account: 1 });
      expect(registry.has('market-data')).toBe(true);
      expect(registry.has('getTickers')).toBe(false);
    });
  });

  describe('failed calls', () => {
    it('wraps the last error after retries and records one breaker error', async () => {
      transport.on('getPositions', () => {
        throw new Error('timeout');
      });

      const result = await client.callSafe('getPositions');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ExchangeCallError);
      expect(result.error.message).toBe('getPositions failed: timeout');
      expect(result.error.code).toBe(ErrorCode.EXCHANGE_CALL_FAILED);
      expect(result.error.context).toEqual({ method: 'getPositions', attempts: 3 });
      expect(clock.sleeps).toEqual([100, 200]);
      expect(transport.callCount('getPositions')).toBe(3);
      expect(registry.getCircuitBreaker('getPositions').getStats().errorCount).toBe(1);
      expect(client.getStats()).toMatchObject({ calls: 1, failures: 1, avgLatencyMs: 300 });
    });

    it('does not retry authentication failures', async () => {
      transport.fail('getWalletBalance', new Error('Invalid API key'));

      const result = await client.callSafe('getWalletBalance');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe(ErrorCode.AUTHENTICATION_FAILED);
      expect(transport.callCount('getWalletBalance')).toBe(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('throws from call()', async () => {
      transport.on('getPositions', () => {
        throw new Error('socket hang up');
      });

      await expect(client.call('getPositions')).rejects.toThrow('getPositions failed: socket hang up');
    });
  });

  describe('circuit breaker', () => {
    beforeEach(async () => {
      transport.on('getPositions', () => {
        throw new Error('HTTP 503');
      });
      await client.callSafe('getPositions');
      await client.callSafe('getPositions');
    });

    it('rejects without touching the transport once the circuit is open', async () => {
      expect(registry.getCircuitBreaker('getPositions').getState()).toBe(CircuitState.OPEN);

      const result = await client.callSafe('getPositions');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(CircuitOpenError);
      expect(result.error.message).toBe('Circuit breaker is open for getPositions');
      expect(transport.callCount('getPositions')).toBe(6);
      expect(client.getStats()).toMatchObject({ calls: 3, failures: 2, rejectedByCircuit: 1 });
    });

    it('closes again after a successful probe', async () => {
      transport.on('getPositions', () => [{ symbol: 'BTCUSDT', size: '0.01' }]);
      clock.advance(1001);

      const result = await client.callSafe('getPositions');

      expect(result.success).toBe(true);
      expect(registry.getCircuitBreaker('getPositions').getState()).toBe(CircuitState.CLOSED);
    });
  });

  describe('rate limiting', () => {
    it('rejects a non-blocking call when the bucket is empty', async () => {
      transport.on('placeOrder', () => ({ orderId: 'o-1' }));
      await client.call('placeOrder');
      await client.call('placeOrder');

      const result = await client.callSafe('placeOrder', {}, { block: false });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(RateLimitedError);
      expect(result.error.message).toBe('Rate limit exceeded for placeOrder (limit "order")');
      expect(transport.callCount('placeOrder')).toBe(2);
      expect(rateLimiter.getRejections()).toEqual({ order: 1 });
      expect(client.getStats().rejectedByLimiter).toBe(1);
      expect(logger.hasLogMatching('warn', 'Exchange call rejected by rate limiter')).toBe(true);
    });

    it.each([0, -1, Number.NaN])('returns a failure for a token request of %p', async tokens => {
      transport.on('placeOrder', () => ({ orderId: 'o-1' }));

      const result = await client.callSafe('placeOrder', {}, { tokens });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ResilienceError);
      expect(result.error.code).toBe(ErrorCode.INVALID_ARGUMENT);
      expect(transport.callCount('placeOrder')).toBe(0);
      expect(rateLimiter.getStats()).toEqual({});
      expect(client.getStats()).toMatchObject({ calls: 1, failures: 1 });
    });

    it('waits for tokens when blocking', async () => {
      transport.on('placeOrder', () => ({ orderId: 'o-1' }));
      await client.call('placeOrder');
      await client.call('placeOrder');

      await client.call('placeOrder');

      expect(clock.sleeps).toEqual([500]);
    });
  });

  describe('response validation', () => {
    const BalanceResponse = z.object({
      retCode: z.literal(0),
      result: z.object({ totalEquity: z.string() }),
    });

    it('returns the parsed body', async () => {
      transport.respond('getWalletBalance', { retCode: 0, result: { totalEquity: '1500.25' }, time: 1 });

      const balance = await client.call('getWalletBalance', {}, { schema: BalanceResponse });

      expect(balance.result.totalEquity).toBe('1500.25');
      expect(balance).toEqual({ retCode: 0, result: { totalEquity: '1500.25' } });
    });

    it('fails the call but not the breaker on a malformed body', async () => {
      transport.respond('getWalletBalance', { retCode: 10001, result: {} });

      const result = await client.callSafe('getWalletBalance', {}, { schema: BalanceResponse });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ResilienceError);
      expect(result.error.code).toBe(ErrorCode.RESPONSE_VALIDATION_FAILED);
      expect(result.error.message).toBe('getWalletBalance returned an unexpected response');
      expect(registry.getCircuitBreaker('getWalletBalance').getStats()).toMatchObject({
        errorCount: 0,
        totalSuccesses: 1,
      });
      expect(client.getStats()).toMatchObject({ successes: 0, failures: 1 });
    });
  });

  it('resetStats() clears counters and latency', async () => {
    transport.fail('placeOrder', new Error('timeout')).respond('placeOrder', {});
    await client.call('placeOrder');

    client.resetStats();

    expect(client.getStats()).toEqual({
      calls: 0,
      successes: 0,
      failures: 0,
      rejectedByLimiter: 0,
      rejectedByCircuit: 0,
      avgLatencyMs: 0,
      maxLatencyMs: 0,
    });
  });
});
