// packages/cli/src/commands/validate.ts — Static pattern checks without execution

import type { PatternInputs } from '@patternflow/core';
import chalk from 'chalk';

import { printValidation } from '../render.js';
import { loadEngine, reportError } from '../utils.js';
import type { GlobalOptions } from '../utils.js';

interface ValidateOptions {
  inputs?: PatternInputs;
  strict?: boolean;
  handlers?: string[];
  json?: boolean;
}

export async function validateCommand(
  patternId: string,
  options: ValidateOptions,
  globals: GlobalOptions,
): Promise<void> {
  try {
    const { orchestrator } = await loadEngine(globals, options.handlers);
    const result = orchestrator.validate(patternId, options.inputs, {
      strictDependencies: options.strict,
    });
    if (!result) {
      console.error(chalk.red(`Pattern not found: ${patternId}`));
      process.exitCode = 1;
      return;
    }

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      printValidation(result);
    }
    if (!result.valid) process.exitCode = 2;
  } catch (error) {
    reportError(error);
  }
}
