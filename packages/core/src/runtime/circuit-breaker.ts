// packages/core/src/runtime/circuit-breaker.ts — Per-handler failure isolation

import type { CircuitBreakerConfig } from '../types/config.js';
import { CIRCUIT_COOLDOWN_MS, CIRCUIT_FAILURE_THRESHOLD } from '../utils/constants.js';

export type CircuitState = 'closed' | 'open' | 'half-open';

interface CircuitEntry {
  failures: number;
  openedAt: number | null;
}

/**
 * Opens a handler's circuit after `failureThreshold` consecutive failed invocations.
 * After `cooldownMs` one trial call is let through (half-open); its failure reopens
 * the circuit and its success closes it.
 */
export class CircuitBreaker {
  private entries = new Map<string, CircuitEntry>();
  private readonly config: CircuitBreakerConfig;

  constructor(
    config: Partial<CircuitBreakerConfig> = {},
    private now: () => number = Date.now,
  ) {
    this.config = {
      enabled: config.enabled ?? true,
      failureThreshold: config.failureThreshold ?? CIRCUIT_FAILURE_THRESHOLD,
      cooldownMs: config.cooldownMs ?? CIRCUIT_COOLDOWN_MS,
    };
  }

  state(handlerId: string): CircuitState {
    const entry = this.entries.get(handlerId);
    if (!entry || entry.openedAt === null) return 'closed';
    return this.now() - entry.openedAt < this.config.cooldownMs ? 'open' : 'half-open';
  }

  /** Epoch ms until which calls are blocked, or null when a call may proceed. */
  blockedUntil(handlerId: string): number | null {
    if (!this.config.enabled) return null;
    const entry = this.entries.get(handlerId);
    if (!entry || entry.openedAt === null) return null;
    const until = entry.openedAt + this.config.cooldownMs;
    return this.now() < until ? until : null;
  }

  recordSuccess(handlerId: string): void {
    this.entries.delete(handlerId);
  }

  recordFailure(handlerId: string): void {
    if (!this.config.enabled) return;
    const entry = this.entries.get(handlerId) ?? { failures: 0, openedAt: null };
    entry.failures++;
    // A failed half-open trial reopens immediately.
    if (entry.openedAt !== null || entry.failures >= this.config.failureThreshold) {
      entry.openedAt = this.now();
    }
    this.entries.set(handlerId, entry);
  }

  reset(handlerId?: string): void {
    if (handlerId === undefined) {
      this.entries.clear();
    } else {
      this.entries.delete(handlerId);
    }
  }
}
