// packages/core/src/types/context.ts

/**
 * Immutable per-invocation reproducibility token.
 * Same ctx + same inputs should give the same outputs for side-effect-free patterns.
 */
export interface RequestCtx {
  /** Pricing / version snapshot the invocation reads against */
  readonly pricingSnapshotId?: string;
  /** Ledger commit or version reference */
  readonly ledgerReference?: string;
  readonly traceId: string;
  /** Idempotency key; also scopes the per-request capability cache */
  readonly requestId: string;
  /** ISO-8601 creation time */
  readonly createdAt: string;
  readonly userId?: string;
  readonly portfolioId?: string;
  readonly asOfDate?: string;
  readonly baseCurrency: string;
  /** Free-form pass-through values, reachable in templates as ctx.attributes.* */
  readonly attributes: Readonly<Record<string, unknown>>;
}

export interface RequestCtxInit {
  pricingSnapshotId?: string;
  ledgerReference?: string;
  traceId?: string;
  requestId?: string;
  createdAt?: string | Date;
  userId?: string;
  portfolioId?: string;
  asOfDate?: string;
  baseCurrency?: string;
  attributes?: Record<string, unknown>;
}

/** Caller-supplied pattern inputs. */
export type PatternInputs = Record<string, unknown>;

/**
 * Mutable key/value store for one pattern execution.
 * Seeded with `inputs`; each executed step writes its result under its `as` key.
 */
export interface RunState {
  inputs: PatternInputs;
  [key: string]: unknown;
}
