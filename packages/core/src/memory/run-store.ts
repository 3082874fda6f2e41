// packages/core/src/memory/run-store.ts — SQLite-backed history of pattern runs

import type Database from 'better-sqlite3';
import type { PatternInputs } from '../types/context.js';
import type {
  CapabilityStats,
  RecordedRunStatus,
  RunListFilter,
  RunRecord,
  RunSummaryRecord,
} from '../types/history.js';
import type { RunResult } from '../types/run.js';
import { DEFAULT_HISTORY_LIMIT } from '../utils/constants.js';
import type { FailureCode } from '../utils/errors.js';
import { generateId } from '../utils/id.js';
import { stableStringify } from '../utils/objects.js';

interface RunRow {
  id: string;
  pattern_id: string;
  trace_id: string;
  request_id: string;
  status: RecordedRunStatus;
  error_code: FailureCode | null;
  error_message: string | null;
  error_step: number | null;
  inputs_json: string;
  outputs_json: string | null;
  trace_json: string;
  duration_ms: number;
  cache_hits: number;
  created_at: number;
}

export class RunStore {
  constructor(private db: Database.Database) {}

  /** Persist a finished run with its trace. Returns the run id. */
  record(result: RunResult, meta: { patternId: string; inputs: PatternInputs }): string {
    const id = generateId('run');
    const { trace } = result;
    const error = result.status === 'aborted' ? result.error : null;

    const insertRun = this.db.prepare(
      `INSERT INTO runs (id, pattern_id, trace_id, request_id, status, error_code, error_message, error_step,
                         inputs_json, outputs_json, trace_json, duration_ms, cache_hits, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    );
    const insertStep = this.db.prepare(
      `INSERT INTO run_steps (run_id, idx, capability, status, handler_id, attempts, duration_ms)
       VALUES (?, ?, ?, ?, ?, ?, ?)`,
    );

    this.db.transaction(() => {
      insertRun.run(
        id,
        meta.patternId,
        trace.traceId,
        trace.requestId,
        result.status,
        error?.code ?? null,
        error?.detail ?? null,
        error?.step ?? null,
        stableStringify(meta.inputs),
        result.status === 'completed' ? stableStringify(result.outputs) : null,
        JSON.stringify(trace),
        trace.durationMs,
        trace.cache.hits,
        Date.now(),
      );
      for (const step of trace.steps) {
        insertStep.run(
          id,
          step.index,
          step.capability,
          step.status,
          step.status === 'skipped' ? null : step.handlerId,
          step.status === 'skipped' ? 0 : step.attempts,
          step.status === 'skipped' ? 0 : step.durationMs,
        );
      }
    })();
    return id;
  }

  get(id: string): RunRecord | null {
    const row = this.db.prepare('SELECT * FROM runs WHERE id = ?').get(id) as RunRow | undefined;
    return row ? toRecord(row) : null;
  }

  /** Most recent runs first. */
  list(filter: RunListFilter = {}): RunSummaryRecord[] {
    const clauses: string[] = [];
    const params: (string | number)[] = [];
    if (filter.patternId) {
      clauses.push('r.pattern_id = ?');
      params.push(filter.patternId);
    }
    if (filter.status) {
      clauses.push('r.status = ?');
      params.push(filter.status);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(filter.limit ?? DEFAULT_HISTORY_LIMIT);

    const rows = this.db
      .prepare(
        `SELECT r.id, r.pattern_id, r.status, r.error_code, r.duration_ms, r.created_at,
                (SELECT COUNT(*) FROM run_steps s WHERE s.run_id = r.id) AS step_count
         FROM runs r ${where}
         ORDER BY r.created_at DESC, r.rowid DESC
         LIMIT ?`,
      )
      .all(...params) as Array<
      Pick<RunRow, 'id' | 'pattern_id' | 'status' | 'error_code' | 'duration_ms' | 'created_at'> & {
        step_count: number;
      }
    >;

    return rows.map((row) => ({
      id: row.id,
      patternId: row.pattern_id,
      status: row.status,
      errorCode: row.error_code,
      durationMs: row.duration_ms,
      stepCount: row.step_count,
      createdAt: row.created_at,
    }));
  }

  /** Per-capability outcome counts across all recorded runs. */
  capabilityStats(): CapabilityStats[] {
    const rows = this.db
      .prepare(
        `SELECT capability,
                SUM(CASE WHEN status = 'succeeded' THEN 1 ELSE 0 END) AS succeeded,
                SUM(CASE WHEN status = 'failed' THEN 1 ELSE 0 END) AS failed,
                SUM(CASE WHEN status = 'skipped' THEN 1 ELSE 0 END) AS skipped,
                AVG(CASE WHEN status = 'skipped' THEN NULL ELSE duration_ms END) AS avg_duration_ms
         FROM run_steps
         GROUP BY capability
         ORDER BY capability`,
      )
      .all() as Array<{
      capability: string;
      succeeded: number;
      failed: number;
      skipped: number;
      avg_duration_ms: number | null;
    }>;

    return rows.map((row) => ({
      capability: row.capability,
      succeeded: row.succeeded,
      failed: row.failed,
      skipped: row.skipped,
      avgDurationMs: Math.round(row.avg_duration_ms ?? 0),
    }));
  }

  /** Delete runs recorded more than `olderThanMs` ago. Returns how many were removed. */
  prune(olderThanMs: number): number {
    const cutoff = Date.now() - olderThanMs;
    const result = this.db.prepare('DELETE FROM runs WHERE created_at < ?').run(cutoff);
    return result.changes;
  }
}

function toRecord(row: RunRow): RunRecord {
  return {
    id: row.id,
    patternId: row.pattern_id,
    traceId: row.trace_id,
    requestId: row.request_id,
    status: row.status,
    error:
      row.error_code !== null
        ? {
            step: row.error_step,
            code: row.error_code,
            message: row.error_code,
            detail: row.error_message ?? '',
          }
        : null,
    inputs: JSON.parse(row.inputs_json),
    outputs: row.outputs_json !== null ? JSON.parse(row.outputs_json) : null,
    trace: JSON.parse(row.trace_json),
    durationMs: row.duration_ms,
    cacheHits: row.cache_hits,
    createdAt: row.created_at,
  };
}
