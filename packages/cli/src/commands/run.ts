// packages/cli/src/commands/run.ts — Execute one pattern

import { CancellationToken, RunStore, createRequestCtx } from '@patternflow/core';
import type { PatternInputs } from '@patternflow/core';
import chalk from 'chalk';

import { RunRenderer, printRunResult } from '../render.js';
import { loadEngine, openHistory, reportError } from '../utils.js';
import type { GlobalOptions } from '../utils.js';

interface RunOptions {
  inputs?: PatternInputs;
  pricingSnapshot?: string;
  ledgerRef?: string;
  user?: string;
  portfolio?: string;
  asOf?: string;
  currency?: string;
  deadline?: number;
  strict?: boolean;
  enforce?: boolean;
  history?: boolean;
  handlers?: string[];
  json?: boolean;
}

export async function runCommand(patternId: string, options: RunOptions, globals: GlobalOptions): Promise<void> {
  let db: ReturnType<typeof openHistory> | undefined;
  const cancellation = new CancellationToken();
  const onInterrupt = () => {
    console.error(chalk.yellow('\nCancelling run...'));
    cancellation.cancel();
  };

  try {
    const { config, orchestrator } = await loadEngine(globals, options.handlers);

    const renderer = new RunRenderer(!options.json);
    orchestrator.on('event', (event) => renderer.handle(event));

    const ctx = createRequestCtx({
      pricingSnapshotId: options.pricingSnapshot,
      ledgerReference: options.ledgerRef,
      userId: options.user,
      portfolioId: options.portfolio,
      asOfDate: options.asOf,
      baseCurrency: options.currency,
    });

    process.once('SIGINT', onInterrupt);
    const result = await orchestrator.run(patternId, options.inputs ?? {}, ctx, {
      deadlineMs: options.deadline,
      cancellation,
      strictDependencies: options.strict,
      validationMode: options.enforce ? 'enforce' : undefined,
    });
    renderer.stop();

    if (config.history.enabled && options.history !== false) {
      db = openHistory(config);
      const runId = new RunStore(db).record(result, { patternId, inputs: options.inputs ?? {} });
      if (!options.json) console.log(chalk.gray(`Recorded as ${runId}`));
    }

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printRunResult(result);
    }

    if (result.status === 'aborted') process.exitCode = 2;
  } catch (error) {
    reportError(error);
  } finally {
    process.off('SIGINT', onInterrupt);
    cancellation.dispose();
    db?.close();
  }
}
