// packages/core/src/types/run.ts

import type { CancellationToken } from '../engine/cancellation.js';
import type { FailureCode } from '../utils/errors.js';
import type { TraceSnapshot } from './trace.js';
import type { ValidationMode } from './validation.js';

/** Invocation lifecycle. ABORTED is reachable from VALIDATING and EXECUTING. */
export type RunPhase = 'loaded' | 'validating' | 'executing' | 'extracting' | 'done' | 'aborted';

export interface RunError {
  /** Index of the failing step; null when the run failed before any step */
  step: number | null;
  capability: string | null;
  code: FailureCode;
  /** The failure code again, so callers matching on `message` see the taxonomy name */
  message: FailureCode;
  /** Human-readable description of the failure */
  detail: string;
}

export type RunResult =
  | { status: 'completed'; outputs: Record<string, unknown>; trace: TraceSnapshot }
  | { status: 'aborted'; error: RunError; trace: TraceSnapshot };

export interface RunOptions {
  /** Overall invocation deadline in milliseconds */
  deadlineMs?: number;
  /** Caller-owned cancellation; combined with the deadline */
  cancellation?: CancellationToken;
  /** Reject references to `as` keys not produced by an earlier step */
  strictDependencies?: boolean;
  validationMode?: ValidationMode;
}
