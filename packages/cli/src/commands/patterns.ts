// packages/cli/src/commands/patterns.ts — Pattern catalog listing

import chalk from 'chalk';

import { loadEngine, reportError } from '../utils.js';
import type { GlobalOptions } from '../utils.js';

// ── patternflow patterns list ──

interface ListOptions {
  json?: boolean;
}

export async function patternsListCommand(options: ListOptions, globals: GlobalOptions): Promise<void> {
  try {
    const { orchestrator } = await loadEngine(globals);
    const patterns = orchestrator.listPatterns();

    if (options.json) {
      console.log(JSON.stringify(patterns, null, 2));
      return;
    }
    if (patterns.length === 0) {
      console.log(chalk.yellow('No patterns found.'));
      return;
    }
    for (const pattern of patterns) {
      const category = pattern.category ? chalk.gray(` [${pattern.category}]`) : '';
      console.log(`${chalk.bold(pattern.id)}${category}  ${pattern.description || pattern.name}`);
    }
  } catch (error) {
    reportError(error);
  }
}

// ── patternflow patterns show ──

export async function patternsShowCommand(patternId: string, globals: GlobalOptions): Promise<void> {
  try {
    const { orchestrator } = await loadEngine(globals);
    const metadata = orchestrator.getPatternMetadata(patternId);
    if (!metadata) {
      console.error(chalk.red(`Pattern not found: ${patternId}`));
      process.exitCode = 1;
      return;
    }
    console.log(JSON.stringify(metadata, null, 2));
  } catch (error) {
    reportError(error);
  }
}
