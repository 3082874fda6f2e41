// packages/core/src/utils/constants.ts — Shared magic number constants

/** Default attempts per capability call (first call included) */
export const DEFAULT_RETRY_ATTEMPTS = 3;

/** Base delay for exponential backoff in milliseconds (1s, 2s, 4s, ...) */
export const DEFAULT_RETRY_BASE_DELAY_MS = 1000;

/** Upper bound for a single backoff delay in milliseconds */
export const DEFAULT_RETRY_MAX_DELAY_MS = 30_000;

/** Consecutive failures before a handler's circuit opens */
export const CIRCUIT_FAILURE_THRESHOLD = 5;

/** How long an open circuit blocks calls, in milliseconds */
export const CIRCUIT_COOLDOWN_MS = 60_000;

/** Max string length kept for an argument in the trace */
export const TRACE_MAX_STRING_LENGTH = 2000;

/** Step result key used when a step declares no `as` */
export const DEFAULT_RESULT_KEY = 'last';

/** Run state keys that steps may not overwrite */
export const RESERVED_STATE_KEYS = ['ctx', 'inputs'] as const;

/** Context paths that must resolve to a value wherever a template references them */
export const REQUIRED_CONTEXT_PATHS = ['ctx.pricingSnapshotId', 'ctx.ledgerReference'] as const;

/** Default history list size */
export const DEFAULT_HISTORY_LIMIT = 20;
