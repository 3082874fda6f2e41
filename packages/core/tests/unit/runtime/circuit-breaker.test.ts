import { describe, expect, it } from 'vitest';
import { CircuitBreaker } from '../../../src/runtime/circuit-breaker.js';

function clock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('CircuitBreaker', () => {
  it('stays closed below the failure threshold', () => {
    const time = clock();
    const breaker = new CircuitBreaker({ failureThreshold: 3, cooldownMs: 500 }, time.now);

    breaker.recordFailure('pricing');
    breaker.recordFailure('pricing');

    expect(breaker.state('pricing')).toBe('closed');
    expect(breaker.blockedUntil('pricing')).toBeNull();
  });

  it('opens at the threshold and blocks until the cooldown ends', () => {
    const time = clock();
    const breaker = new CircuitBreaker({ failureThreshold: 2, cooldownMs: 500 }, time.now);

    breaker.recordFailure('pricing');
    breaker.recordFailure('pricing');

    expect(breaker.state('pricing')).toBe('open');
    expect(breaker.blockedUntil('pricing')).toBe(1_500);

    time.advance(500);
    expect(breaker.state('pricing')).toBe('half-open');
    expect(breaker.blockedUntil('pricing')).toBeNull();
  });

  it('reopens when the half-open trial fails', () => {
    const time = clock();
    const breaker = new CircuitBreaker({ failureThreshold: 2, cooldownMs: 500 }, time.now);
    breaker.recordFailure('pricing');
    breaker.recordFailure('pricing');
    time.advance(500);

    breaker.recordFailure('pricing');

    expect(breaker.state('pricing')).toBe('open');
    expect(breaker.blockedUntil('pricing')).toBe(2_000);
  });

  it('closes after a success', () => {
    const time = clock();
    const breaker = new CircuitBreaker({ failureThreshold: 1, cooldownMs: 500 }, time.now);
    breaker.recordFailure('pricing');
    time.advance(500);

    breaker.recordSuccess('pricing');

    expect(breaker.state('pricing')).toBe('closed');
  });

  it('tracks handlers independently', () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1 }, clock().now);

    breaker.recordFailure('pricing');

    expect(breaker.state('pricing')).toBe('open');
    expect(breaker.state('ledger')).toBe('closed');
  });

  it('never blocks when disabled', () => {
    const breaker = new CircuitBreaker({ enabled: false, failureThreshold: 1 }, clock().now);

    breaker.recordFailure('pricing');

    expect(breaker.blockedUntil('pricing')).toBeNull();
  });

  it('reset clears one handler or all of them', () => {
    const breaker = new CircuitBreaker({ failureThreshold: 1 }, clock().now);
    breaker.recordFailure('pricing');
    breaker.recordFailure('ledger');

    breaker.reset('pricing');
    expect(breaker.state('pricing')).toBe('closed');
    expect(breaker.state('ledger')).toBe('open');

    breaker.reset();
    expect(breaker.state('ledger')).toBe('closed');
  });
});
