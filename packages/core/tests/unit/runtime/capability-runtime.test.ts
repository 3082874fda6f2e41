import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { createRequestCtx } from '../../../src/context/request-ctx.js';
import { CancellationToken } from '../../../src/engine/cancellation.js';
import { capability } from '../../../src/runtime/capability.js';
import { CapabilityRegistry } from '../../../src/runtime/capability-registry.js';
import type { CapabilityRuntimeOptions } from '../../../src/runtime/capability-runtime.js';
import { CapabilityRuntime } from '../../../src/runtime/capability-runtime.js';
import { CircuitBreaker } from '../../../src/runtime/circuit-breaker.js';
import { RequestCache } from '../../../src/runtime/request-cache.js';
import type { CallContext, CapabilityTable } from '../../../src/types/capability.js';
import type { RunState } from '../../../src/types/context.js';
import { NonRetryableHandlerError, RetryableHandlerError } from '../../../src/utils/errors.js';

const ctx = createRequestCtx({ pricingSnapshotId: 'PP_1', ledgerReference: 'L_1' });

function runtimeWith(table: CapabilityTable, options: CapabilityRuntimeOptions = {}) {
  const registry = new CapabilityRegistry();
  registry.register('test', table);
  return new CapabilityRuntime(registry, { retry: { baseDelayMs: 1, maxDelayMs: 4 }, ...options });
}

function freshState(): RunState {
  return { inputs: {} };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('CapabilityRuntime.invoke', () => {
  it('returns the handler payload untouched with invocation meta', async () => {
    const payload = { value: 5 };
    const runtime = runtimeWith({ 'echo.value': capability({ run: () => payload }) });

    const outcome = await runtime.invoke('echo.value', ctx, freshState(), { x: 5 });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.payload).toBe(payload);
    expect(outcome.meta).toMatchObject({
      capability: 'echo.value',
      handlerId: 'test',
      attempts: 1,
      cached: false,
    });
  });

  it('passes ctx, run state, args and call info to the handler', async () => {
    const seen = vi.fn();
    const runtime = runtimeWith({
      'probe.call': capability({
        run: (c, state, args, call: CallContext) => {
          seen(c, state, args, call.capability, call.handlerId, call.attempt);
          return null;
        },
      }),
    });
    const state = freshState();

    await runtime.invoke('probe.call', ctx, state, { a: 1 });

    expect(seen).toHaveBeenCalledWith(ctx, state, { a: 1 }, 'probe.call', 'test', 1);
    expect(seen.mock.calls[0][0]).toBe(ctx);
    expect(seen.mock.calls[0][1]).toBe(state);
  });

  it('fails with CapabilityNotFound without retrying', async () => {
    const runtime = runtimeWith({ 'echo.value': capability({ run: () => 1 }) });

    const outcome = await runtime.invoke('missing.op', ctx, freshState(), {});

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.code).toBe('CapabilityNotFound');
    expect(outcome.meta.handlerId).toBeNull();
    expect(outcome.meta.attempts).toBe(0);
  });

  it('calls an always-retryable handler exactly maxAttempts times', async () => {
    const handler = vi.fn(() => {
      throw new RetryableHandlerError('upstream timeout');
    });
    const runtime = runtimeWith({ 'flaky.op': capability({ run: handler }) });

    const outcome = await runtime.invoke('flaky.op', ctx, freshState(), {});

    expect(handler).toHaveBeenCalledTimes(3);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.code).toBe('RetryExhausted');
    expect(outcome.failure.message).toBe('Gave up after 3 attempts: upstream timeout');
    expect(outcome.meta.attempts).toBe(3);
  });

  it('waits 1s then 2s between attempts by default', async () => {
    vi.useFakeTimers();
    const registry = new CapabilityRegistry();
    const handler = vi.fn(() => {
      throw new RetryableHandlerError('busy');
    });
    registry.register('test', { 'flaky.op': capability({ run: handler }) });
    const runtime = new CapabilityRuntime(registry);
    const delays: number[] = [];

    const pending = runtime.invoke('flaky.op', ctx, freshState(), {}, {
      onRetry: (_attempt, _error, delayMs) => delays.push(delayMs),
    });
    await vi.advanceTimersByTimeAsync(3000);
    const outcome = await pending;

    expect(delays).toEqual([1000, 2000]);
    expect(handler).toHaveBeenCalledTimes(3);
    expect(outcome.ok).toBe(false);
  });

  it('succeeds when a retry succeeds', async () => {
    let calls = 0;
    const runtime = runtimeWith({
      'flaky.op': capability({
        run: () => {
          calls++;
          if (calls === 1) throw new RetryableHandlerError('once');
          return 'ok';
        },
      }),
    });

    const outcome = await runtime.invoke('flaky.op', ctx, freshState(), {});

    expect(outcome).toMatchObject({ ok: true, payload: 'ok', meta: { attempts: 2 } });
  });

  it('does not retry other errors', async () => {
    const handler = vi.fn(() => {
      throw new Error('bad input row');
    });
    const runtime = runtimeWith({ 'broken.op': capability({ run: handler }) });

    const outcome = await runtime.invoke('broken.op', ctx, freshState(), {});

    expect(handler).toHaveBeenCalledTimes(1);
    expect(outcome).toMatchObject({
      ok: false,
      failure: { code: 'NonRetryableHandlerError', message: 'bad input row' },
    });
  });

  it('wraps other errors in a NonRetryableHandlerError naming the capability', async () => {
    const original = new TypeError('row.qty is undefined');
    const runtime = runtimeWith({
      'broken.op': capability({
        run: () => {
          throw original;
        },
      }),
    });

    const outcome = await runtime.invoke('broken.op', ctx, freshState(), {});

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    const { cause } = outcome.failure;
    expect(cause).toBeInstanceOf(NonRetryableHandlerError);
    expect(cause).toMatchObject({ capability: 'broken.op', message: 'row.qty is undefined', cause: original });
  });

  it('keeps a NonRetryableHandlerError the handler raised itself', async () => {
    const raised = new NonRetryableHandlerError('account closed', 'ledger.post');
    const handler = vi.fn(() => {
      throw raised;
    });
    const runtime = runtimeWith({ 'ledger.post': capability({ run: handler }) });

    const outcome = await runtime.invoke('ledger.post', ctx, freshState(), {});

    expect(handler).toHaveBeenCalledTimes(1);
    expect(outcome).toMatchObject({
      ok: false,
      failure: { code: 'NonRetryableHandlerError', message: 'account closed', cause: raised },
    });
  });

  it('rejects arguments that fail the schema without calling the handler', async () => {
    const handler = vi.fn((_c: unknown, _s: unknown, args: { n: number }) => args.n * 2);
    const runtime = runtimeWith({
      'calc.double': capability({ args: z.object({ n: z.number() }), run: handler }),
    });

    const outcome = await runtime.invoke('calc.double', ctx, freshState(), { n: 'two' });

    expect(handler).not.toHaveBeenCalled();
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.code).toBe('InvalidArguments');
    expect(outcome.meta.attempts).toBe(1);
  });

  describe('circuit breaker', () => {
    it('blocks a handler after consecutive failures, then lets a trial through', async () => {
      let now = 10_000;
      const breaker = new CircuitBreaker({ failureThreshold: 2, cooldownMs: 1000 }, () => now);
      const handler = vi.fn(() => {
        throw new Error('down');
      });
      const runtime = runtimeWith({ 'svc.call': capability({ run: handler }) }, { circuitBreaker: breaker });

      await runtime.invoke('svc.call', ctx, freshState(), {});
      await runtime.invoke('svc.call', ctx, freshState(), {});
      const blocked = await runtime.invoke('svc.call', ctx, freshState(), {});

      expect(handler).toHaveBeenCalledTimes(2);
      expect(blocked).toMatchObject({ ok: false, failure: { code: 'CircuitOpen' } });

      now += 1000;
      await runtime.invoke('svc.call', ctx, freshState(), {});
      expect(handler).toHaveBeenCalledTimes(3);
    });
  });

  describe('request cache', () => {
    it('serves identical calls from the cache', async () => {
      const handler = vi.fn(() => ({ price: 101 }));
      const runtime = runtimeWith({ 'pricing.quote': capability({ run: handler }) });
      const cache = new RequestCache(ctx.requestId);

      await runtime.invoke('pricing.quote', ctx, freshState(), { symbol: 'ACME' }, { cache });
      const second = await runtime.invoke('pricing.quote', ctx, freshState(), { symbol: 'ACME' }, { cache });

      expect(handler).toHaveBeenCalledTimes(1);
      expect(second).toMatchObject({ ok: true, payload: { price: 101 }, meta: { cached: true } });
      expect(cache.stats()).toEqual({ hits: 1, misses: 1, total: 2, hitRate: 0.5 });
    });

    it('calls the handler every time without a cache', async () => {
      const handler = vi.fn(() => 1);
      const runtime = runtimeWith({ 'pricing.quote': capability({ run: handler }) });

      await runtime.invoke('pricing.quote', ctx, freshState(), {});
      await runtime.invoke('pricing.quote', ctx, freshState(), {});

      expect(handler).toHaveBeenCalledTimes(2);
    });
  });

  describe('cancellation', () => {
    it('does not call the handler when already cancelled', async () => {
      const handler = vi.fn(() => 1);
      const runtime = runtimeWith({ 'svc.call': capability({ run: handler }) });
      const token = new CancellationToken();
      token.cancel();

      const outcome = await runtime.invoke('svc.call', ctx, freshState(), {}, { cancellation: token });

      expect(handler).not.toHaveBeenCalled();
      expect(outcome).toMatchObject({ ok: false, failure: { code: 'Cancelled' } });
    });

    it('interrupts the backoff wait when the deadline passes', async () => {
      const handler = vi.fn(() => {
        throw new RetryableHandlerError('slow');
      });
      const registry = new CapabilityRegistry();
      registry.register('test', { 'svc.call': capability({ run: handler }) });
      const runtime = new CapabilityRuntime(registry, { retry: { baseDelayMs: 60_000, maxDelayMs: 60_000 } });
      const token = CancellationToken.withDeadline(5);

      const outcome = await runtime.invoke('svc.call', ctx, freshState(), {}, { cancellation: token });

      expect(handler).toHaveBeenCalledTimes(1);
      expect(outcome).toMatchObject({ ok: false, failure: { code: 'DeadlineExceeded' } });
    });

    it('abandons an in-flight call and aborts its signal', async () => {
      let signal: AbortSignal | undefined;
      const runtime = runtimeWith({
        'svc.hang': capability({
          run: (_c, _s, _a, call) => {
            signal = call.signal;
            return new Promise(() => {});
          },
        }),
      });
      const token = new CancellationToken();

      const pending = runtime.invoke('svc.hang', ctx, freshState(), {}, { cancellation: token });
      token.cancel();
      const outcome = await pending;

      expect(outcome).toMatchObject({ ok: false, failure: { code: 'Cancelled' } });
      expect(signal?.aborted).toBe(true);
    });
  });
});
