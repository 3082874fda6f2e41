// packages/core/src/types/trace.ts

import type { FailureCode } from '../utils/errors.js';

/** `_metadata` block a handler may attach to an object payload. */
export interface ResultMetadata {
  agentName?: string;
  source?: string;
  asof?: string;
  ttl?: number;
  confidence?: number;
  [key: string]: unknown;
}

/** `_provenance` block a handler may attach to an object payload. */
export interface ResultProvenance {
  type?: string;
  warnings?: string[];
  [key: string]: unknown;
}

interface TraceStepBase {
  index: number;
  capability: string;
  as: string;
}

export interface SucceededTraceStep extends TraceStepBase {
  status: 'succeeded';
  handlerId: string | null;
  args: Record<string, unknown>;
  durationMs: number;
  attempts: number;
  cached: boolean;
  metadata?: ResultMetadata;
  provenance?: ResultProvenance;
}

export interface FailedTraceStep extends TraceStepBase {
  status: 'failed';
  handlerId: string | null;
  args?: Record<string, unknown>;
  durationMs: number;
  attempts: number;
  error: { code: FailureCode; message: string };
}

export interface SkippedTraceStep extends TraceStepBase {
  status: 'skipped';
  reason: 'condition_not_met';
}

export type TraceStep = SucceededTraceStep | FailedTraceStep | SkippedTraceStep;

export interface StalenessEntry {
  capability: string;
  asof: string;
  ttl: number | null;
}

export type ProvenanceOverall = 'real' | 'stub' | 'mixed' | 'cached' | 'computed' | 'unknown';

export interface ProvenanceSummary {
  overall: ProvenanceOverall;
  typesUsed: string[];
  warnings: string[];
}

export interface CacheStats {
  hits: number;
  misses: number;
  total: number;
  hitRate: number;
}

export interface TraceSnapshot {
  patternId: string;
  traceId: string;
  requestId: string;
  pricingSnapshotId: string | null;
  ledgerReference: string | null;
  status: 'completed' | 'aborted';
  startedAt: string;
  durationMs: number;
  steps: readonly TraceStep[];
  handlersUsed: string[];
  capabilitiesUsed: string[];
  sources: string[];
  staleness: StalenessEntry[];
  provenance: ProvenanceSummary;
  cache: CacheStats;
}
