// packages/cli/src/render.ts — Terminal rendering for engine events and run results

import type {
  EngineEvent,
  RunRecord,
  RunResult,
  RunSummaryRecord,
  TraceStep,
  ValidationResult,
} from '@patternflow/core';
import chalk from 'chalk';
import ora from 'ora';

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

/**
 * One line for an engine event, or null for events that only drive the spinner
 * or are too chatty to print.
 */
export function formatEvent(event: EngineEvent): string | null {
  switch (event.type) {
    case 'run.started':
      return chalk.gray(`━━━ ${event.patternId} (${event.stepCount} steps, trace ${event.traceId}) ━━━`);
    case 'validation.issue': {
      const color = event.issue.severity === 'error' ? chalk.yellow : chalk.gray;
      return color(`  ! ${event.issue.code}: ${event.issue.message}`);
    }
    case 'step.completed': {
      const via = event.cached ? 'cache' : (event.handlerId ?? '?');
      const retries = event.attempts > 1 ? `, ${event.attempts} attempts` : '';
      return chalk.green(`  ✓ [${event.index}] ${event.capability} → ${event.as} (${via}, ${seconds(event.durationMs)}${retries})`);
    }
    case 'step.skipped':
      return chalk.gray(`  - [${event.index}] ${event.capability} skipped (condition not met)`);
    case 'step.retry':
      return chalk.yellow(`  ↻ [${event.index}] ${event.capability} attempt ${event.attempt} failed: ${event.error}; retrying in ${event.delayMs}ms`);
    case 'step.failed':
      return chalk.red(`  ✗ [${event.index}] ${event.capability}: ${event.code}: ${event.error}`);
    case 'run.completed':
      return chalk.green(`━━━ Completed in ${seconds(event.durationMs)} ━━━`);
    case 'run.aborted': {
      const where = event.error.step !== null ? ` at step ${event.error.step}` : '';
      return chalk.red(`━━━ Aborted${where}: ${event.error.code} ━━━`);
    }
    case 'step.started':
    case 'run.phase':
      return null;
  }
}

/** Prints events as they arrive, with a spinner while a step is running. */
export class RunRenderer {
  private spinner: ReturnType<typeof ora> | null = null;

  constructor(private enabled = true) {}

  handle(event: EngineEvent): void {
    if (!this.enabled) return;
    if (event.type === 'step.started') {
      this.spinner = ora({ text: `[${event.index}] ${event.capability}`, color: 'cyan' }).start();
      return;
    }
    const line = formatEvent(event);
    if (line === null) return;
    if (this.spinner && event.type.startsWith('step.') && event.type !== 'step.retry') {
      this.spinner.stopAndPersist({ symbol: '', text: line });
      this.spinner = null;
      return;
    }
    if (this.spinner) {
      this.spinner.clear();
      console.log(line);
      this.spinner.render();
      return;
    }
    console.log(line);
  }

  stop(): void {
    this.spinner?.stop();
    this.spinner = null;
  }
}

export function formatTraceStep(step: TraceStep): string {
  switch (step.status) {
    case 'succeeded':
      return `${chalk.green('✓')} ${step.index} ${step.capability} → ${step.as} (${step.handlerId ?? '?'}, ${step.attempts} attempt${step.attempts === 1 ? '' : 's'}${step.cached ? ', cached' : ''})`;
    case 'failed':
      return `${chalk.red('✗')} ${step.index} ${step.capability}: ${step.error.code}: ${step.error.message}`;
    case 'skipped':
      return `${chalk.gray('-')} ${step.index} ${step.capability} (skipped)`;
  }
}

export function printRunResult(result: RunResult): void {
  console.log(chalk.bold('\nRun Summary'));
  console.log(chalk.gray('-'.repeat(40)));
  console.log(`  Pattern:  ${chalk.white(result.trace.patternId)}`);
  console.log(`  Trace:    ${chalk.white(result.trace.traceId)}`);
  console.log(
    `  Status:   ${result.status === 'completed' ? chalk.green('completed') : chalk.red('aborted')}`,
  );
  console.log(`  Duration: ${chalk.cyan(seconds(result.trace.durationMs))}`);
  if (result.trace.cache.total > 0) {
    console.log(`  Cache:    ${chalk.cyan(`${result.trace.cache.hits}/${result.trace.cache.total} hits`)}`);
  }
  if (result.status === 'aborted') {
    console.log(`  Error:    ${chalk.red(`${result.error.code}: ${result.error.detail}`)}`);
  }
  console.log(chalk.gray('-'.repeat(40)));
  if (result.status === 'completed') {
    console.log(JSON.stringify(result.outputs, null, 2));
  }
}

export function printValidation(result: ValidationResult): void {
  const status = result.valid ? chalk.green('valid') : chalk.red('invalid');
  console.log(`${chalk.bold(result.pattern.id)}: ${status} (${result.pattern.steps} steps)`);
  for (const issue of result.errors) {
    console.log(chalk.red(`  ✗ ${issue.code}: ${issue.message}`));
  }
  for (const issue of result.warnings) {
    console.log(chalk.yellow(`  ! ${issue.code}: ${issue.message}`));
  }
}

export function formatRunSummary(run: RunSummaryRecord): string {
  const status = run.status === 'completed' ? chalk.green(run.status) : chalk.red(run.status);
  const error = run.errorCode ? ` ${chalk.red(run.errorCode)}` : '';
  return `${run.id}  ${new Date(run.createdAt).toISOString()}  ${run.patternId}  ${status}${error}  ${run.stepCount} steps  ${seconds(run.durationMs)}`;
}

export function printRunRecord(run: RunRecord): void {
  console.log(chalk.bold(`${run.id} (${run.patternId})`));
  console.log(chalk.gray(`  trace ${run.traceId}, request ${run.requestId}, ${new Date(run.createdAt).toISOString()}`));
  for (const step of run.trace.steps) {
    console.log(`  ${formatTraceStep(step)}`);
  }
  if (run.error) {
    console.log(chalk.red(`  ${run.error.code}: ${run.error.detail}`));
  }
  if (run.outputs) {
    console.log(JSON.stringify(run.outputs, null, 2));
  }
}
