// packages/cli/src/commands/runs.ts — Recorded run history

import { RunStore } from '@patternflow/core';
import type { RecordedRunStatus } from '@patternflow/core';
import chalk from 'chalk';

import { formatRunSummary, printRunRecord } from '../render.js';
import { loadProjectConfig, openHistory, reportError } from '../utils.js';
import type { GlobalOptions } from '../utils.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function withStore(globals: GlobalOptions, fn: (store: RunStore) => void): void {
  let db: ReturnType<typeof openHistory> | undefined;
  try {
    db = openHistory(loadProjectConfig(globals));
    fn(new RunStore(db));
  } catch (error) {
    reportError(error);
  } finally {
    db?.close();
  }
}

// ── patternflow runs list ──

interface ListOptions {
  pattern?: string;
  status?: RecordedRunStatus;
  limit?: number;
  json?: boolean;
}

export function runsListCommand(options: ListOptions, globals: GlobalOptions): void {
  withStore(globals, (store) => {
    const runs = store.list({ patternId: options.pattern, status: options.status, limit: options.limit });
    if (options.json) {
      console.log(JSON.stringify(runs, null, 2));
      return;
    }
    if (runs.length === 0) {
      console.log(chalk.yellow('No recorded runs.'));
      return;
    }
    for (const run of runs) {
      console.log(formatRunSummary(run));
    }
  });
}

// ── patternflow runs show ──

export function runsShowCommand(runId: string, options: { json?: boolean }, globals: GlobalOptions): void {
  withStore(globals, (store) => {
    const run = store.get(runId);
    if (!run) {
      console.error(chalk.red(`No run found with ID: ${runId}`));
      process.exitCode = 1;
      return;
    }
    if (options.json) {
      console.log(JSON.stringify(run, null, 2));
    } else {
      printRunRecord(run);
    }
  });
}

// ── patternflow runs stats ──

export function runsStatsCommand(globals: GlobalOptions): void {
  withStore(globals, (store) => {
    console.log(JSON.stringify(store.capabilityStats(), null, 2));
  });
}

// ── patternflow runs prune ──

export function runsPruneCommand(options: { olderThan: number }, globals: GlobalOptions): void {
  withStore(globals, (store) => {
    const removed = store.prune(options.olderThan * DAY_MS);
    console.log(chalk.green(`Removed ${removed} run${removed === 1 ? '' : 's'} older than ${options.olderThan} days.`));
  });
}
