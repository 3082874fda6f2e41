// packages/core/src/types/history.ts

import type { FailureCode } from '../utils/errors.js';
import type { PatternInputs } from './context.js';
import type { TraceSnapshot } from './trace.js';

export type RecordedRunStatus = 'completed' | 'aborted';

export interface RunRecord {
  id: string;
  patternId: string;
  traceId: string;
  requestId: string;
  status: RecordedRunStatus;
  error: { step: number | null; code: FailureCode; message: FailureCode; detail: string } | null;
  inputs: PatternInputs;
  outputs: Record<string, unknown> | null;
  trace: TraceSnapshot;
  durationMs: number;
  cacheHits: number;
  createdAt: number;
}

export interface RunSummaryRecord {
  id: string;
  patternId: string;
  status: RecordedRunStatus;
  errorCode: FailureCode | null;
  durationMs: number;
  stepCount: number;
  createdAt: number;
}

export interface RunListFilter {
  patternId?: string;
  status?: RecordedRunStatus;
  limit?: number;
}

export interface CapabilityStats {
  capability: string;
  succeeded: number;
  failed: number;
  skipped: number;
  avgDurationMs: number;
}
