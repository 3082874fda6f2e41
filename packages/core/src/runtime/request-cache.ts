// packages/core/src/runtime/request-cache.ts — Capability result memo for one invocation

import type { CapabilityArgs } from '../types/capability.js';
import type { CacheStats } from '../types/trace.js';
import { stableStringify } from '../utils/objects.js';

export type CacheLookup = { hit: true; value: unknown } | { hit: false };

/**
 * Memoizes capability results by name and arguments. One instance per pattern run,
 * so results never leak between requests.
 */
export class RequestCache {
  private entries = new Map<string, unknown>();
  private hits = 0;
  private misses = 0;

  constructor(readonly requestId: string) {}

  lookup(capability: string, args: CapabilityArgs): CacheLookup {
    const key = cacheKey(capability, args);
    if (this.entries.has(key)) {
      this.hits++;
      return { hit: true, value: this.entries.get(key) };
    }
    this.misses++;
    return { hit: false };
  }

  store(capability: string, args: CapabilityArgs, value: unknown): void {
    this.entries.set(cacheKey(capability, args), value);
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      total,
      hitRate: total === 0 ? 0 : this.hits / total,
    };
  }
}

export function cacheKey(capability: string, args: CapabilityArgs): string {
  return `${capability}:${stableStringify(args)}`;
}
