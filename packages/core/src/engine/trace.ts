// packages/core/src/engine/trace.ts — Append-only execution trace for one pattern run

import type { InvocationFailure, InvocationMeta } from '../types/capability.js';
import type { RequestCtx } from '../types/context.js';
import type {
  CacheStats,
  ProvenanceOverall,
  ProvenanceSummary,
  ResultMetadata,
  ResultProvenance,
  StalenessEntry,
  TraceSnapshot,
  TraceStep,
} from '../types/trace.js';
import type { StepSpec } from '../types/workflow.js';
import { TRACE_MAX_STRING_LENGTH } from '../utils/constants.js';
import { deepFreeze, isPlainObject, toPlainData } from '../utils/objects.js';

export const REDACTED = '[REDACTED]';

export interface TraceBuilderOptions {
  redactKeys?: readonly string[];
  maxStringLength?: number;
  now?: () => number;
}

const EMPTY_CACHE: CacheStats = { hits: 0, misses: 0, total: 0, hitRate: 0 };

export class TraceBuilder {
  private readonly entries: TraceStep[] = [];
  private readonly handlers = new Set<string>();
  private readonly capabilities = new Set<string>();
  private readonly sources = new Set<string>();
  private readonly staleness: StalenessEntry[] = [];
  private readonly redactKeys: Set<string>;
  private readonly maxStringLength: number;
  private readonly now: () => number;
  private readonly startedAt: number;

  constructor(
    readonly patternId: string,
    private ctx: RequestCtx,
    options: TraceBuilderOptions = {},
  ) {
    this.redactKeys = new Set((options.redactKeys ?? []).map((key) => key.toLowerCase()));
    this.maxStringLength = options.maxStringLength ?? TRACE_MAX_STRING_LENGTH;
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
  }

  get steps(): readonly TraceStep[] {
    return this.entries;
  }

  /**
   * Record a successful step and return the value to store in run state:
   * the payload itself, or a shallow copy without its `_metadata` block.
   */
  recordSuccess(
    index: number,
    step: StepSpec,
    args: Record<string, unknown>,
    payload: unknown,
    meta: InvocationMeta,
  ): unknown {
    const { value, metadata } = stripMetadata(payload);
    const provenance = readProvenance(payload);

    this.capabilities.add(step.capability);
    if (meta.handlerId) this.handlers.add(meta.handlerId);
    if (metadata) this.absorbMetadata(step.capability, metadata);

    this.entries.push({
      status: 'succeeded',
      index,
      capability: step.capability,
      as: step.as,
      handlerId: meta.handlerId,
      args: this.redact(args),
      durationMs: meta.elapsedMs,
      attempts: meta.attempts,
      cached: meta.cached,
      ...(metadata ? { metadata } : {}),
      ...(provenance ? { provenance } : {}),
    });
    return value;
  }

  recordFailure(
    index: number,
    step: StepSpec,
    failure: Pick<InvocationFailure, 'code' | 'message'>,
    meta?: InvocationMeta,
    args?: Record<string, unknown>,
  ): void {
    this.capabilities.add(step.capability);
    this.entries.push({
      status: 'failed',
      index,
      capability: step.capability,
      as: step.as,
      handlerId: meta?.handlerId ?? null,
      ...(args ? { args: this.redact(args) } : {}),
      durationMs: meta?.elapsedMs ?? 0,
      attempts: meta?.attempts ?? 0,
      error: { code: failure.code, message: failure.message },
    });
  }

  recordSkip(index: number, step: StepSpec): void {
    this.entries.push({
      status: 'skipped',
      index,
      capability: step.capability,
      as: step.as,
      reason: 'condition_not_met',
    });
  }

  snapshot(status: TraceSnapshot['status'], cache: CacheStats = EMPTY_CACHE): TraceSnapshot {
    return deepFreeze({
      patternId: this.patternId,
      traceId: this.ctx.traceId,
      requestId: this.ctx.requestId,
      pricingSnapshotId: this.ctx.pricingSnapshotId ?? null,
      ledgerReference: this.ctx.ledgerReference ?? null,
      status,
      startedAt: new Date(this.startedAt).toISOString(),
      durationMs: this.now() - this.startedAt,
      steps: this.entries.map((entry) => ({ ...entry })),
      handlersUsed: [...this.handlers].sort(),
      capabilitiesUsed: [...this.capabilities].sort(),
      sources: [...this.sources].sort(),
      staleness: this.staleness.map((entry) => ({ ...entry })),
      provenance: summarizeProvenance(this.entries),
      cache: { ...cache },
    });
  }

  private absorbMetadata(capability: string, metadata: ResultMetadata): void {
    if (typeof metadata.agentName === 'string' && metadata.agentName) {
      this.handlers.add(metadata.agentName);
    }
    if (typeof metadata.source === 'string' && metadata.source) {
      this.sources.add(metadata.source);
    }
    if (metadata.asof !== undefined && metadata.asof !== '') {
      this.staleness.push({
        capability,
        asof: String(metadata.asof),
        ttl: typeof metadata.ttl === 'number' ? metadata.ttl : null,
      });
    }
  }

  private redact(args: Record<string, unknown>, ancestors = new Set<object>()): Record<string, unknown> {
    ancestors.add(args);
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(args)) {
      out[key] = this.redactKeys.has(key.toLowerCase()) ? REDACTED : this.redactValue(value, ancestors);
    }
    ancestors.delete(args);
    return out;
  }

  // The trace is frozen on snapshot, so nothing the caller owns may end up in it.
  private redactValue(value: unknown, ancestors: Set<object>): unknown {
    if (typeof value === 'string') {
      return value.length > this.maxStringLength
        ? `${value.slice(0, this.maxStringLength)}…[truncated ${value.length - this.maxStringLength} chars]`
        : value;
    }
    if (value !== null && typeof value === 'object' && ancestors.has(value)) return '[Circular]';
    if (Array.isArray(value)) {
      ancestors.add(value);
      const out = value.map((item: unknown) => this.redactValue(item, ancestors));
      ancestors.delete(value);
      return out;
    }
    if (isPlainObject(value)) return this.redact(value, ancestors);
    return toPlainData(value);
  }
}

/**
 * Split a payload's `_metadata` block from the data. The handler's object is
 * not modified and the returned metadata is a deep copy.
 */
export function stripMetadata(payload: unknown): { value: unknown; metadata?: ResultMetadata } {
  if (!isPlainObject(payload) || !Object.hasOwn(payload, '_metadata')) {
    return { value: payload };
  }
  const { _metadata: raw, ...rest } = payload;
  return { value: rest, metadata: isPlainObject(raw) ? copyRecord(raw) : undefined };
}

function readProvenance(payload: unknown): ResultProvenance | undefined {
  if (!isPlainObject(payload)) return undefined;
  const raw = payload._provenance;
  if (!isPlainObject(raw)) return undefined;
  const provenance: ResultProvenance = copyRecord(raw);
  if (Array.isArray(raw.warnings)) {
    provenance.warnings = raw.warnings.map(String);
  } else {
    delete provenance.warnings;
  }
  return provenance;
}

function copyRecord(raw: Record<string, unknown>): Record<string, unknown> {
  const copy = toPlainData(raw);
  return isPlainObject(copy) ? copy : {};
}

/**
 * Overall data provenance across steps: any stub makes the run "stub" (alone) or
 * "mixed"; otherwise the first of real, cached, computed seen; else "unknown".
 */
export function summarizeProvenance(steps: readonly TraceStep[]): ProvenanceSummary {
  const types = new Set<string>();
  const warnings = new Set<string>();
  for (const step of steps) {
    if (step.status !== 'succeeded' || !step.provenance) continue;
    if (typeof step.provenance.type === 'string') types.add(step.provenance.type);
    for (const warning of step.provenance.warnings ?? []) warnings.add(warning);
  }

  let overall: ProvenanceOverall = 'unknown';
  if (types.has('stub')) {
    overall = types.size > 1 ? 'mixed' : 'stub';
  } else if (types.has('real')) {
    overall = 'real';
  } else if (types.has('cached')) {
    overall = 'cached';
  } else if (types.has('computed')) {
    overall = 'computed';
  }

  return { overall, typesUsed: [...types].sort(), warnings: [...warnings] };
}
