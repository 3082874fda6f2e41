// packages/cli/src/program.ts — Command tree

import { VERSION } from '@patternflow/core';
import { Command } from 'commander';

import { capabilitiesCommand } from './commands/capabilities.js';
import { patternsListCommand, patternsShowCommand } from './commands/patterns.js';
import { runCommand } from './commands/run.js';
import { runsListCommand, runsPruneCommand, runsShowCommand, runsStatsCommand } from './commands/runs.js';
import { validateCommand } from './commands/validate.js';
import { parseInputs, parsePositiveInt, parseRunStatus } from './utils.js';
import type { GlobalOptions } from './utils.js';

const HANDLERS_HELP = 'Handler modules to register (default export or "handlers")';

export function buildProgram(): Command {
  const program = new Command();
  const globals = () => program.opts<GlobalOptions>();

  program
    .name('patternflow')
    .description('Run declarative capability patterns')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging')
    .option('--project <dir>', 'Project directory holding .patternflow.yml');

  const patterns = program.command('patterns').description('Browse the pattern catalog');

  patterns
    .command('list')
    .description('List loaded patterns')
    .option('--json', 'Print JSON')
    .action((options) => patternsListCommand(options, globals()));

  patterns
    .command('show')
    .description('Show pattern metadata')
    .argument('<pattern-id>', 'Pattern ID')
    .action((patternId: string) => patternsShowCommand(patternId, globals()));

  program
    .command('capabilities')
    .description('List registered capabilities and their handlers')
    .option('--handlers <modules...>', HANDLERS_HELP)
    .option('--json', 'Print JSON')
    .action((options) => capabilitiesCommand(options, globals()));

  program
    .command('validate')
    .description('Check a pattern against the registry without running it')
    .argument('<pattern-id>', 'Pattern ID')
    .option('--inputs <json>', 'Pattern inputs as a JSON object', parseInputs)
    .option('--strict', 'Treat forward references as errors')
    .option('--handlers <modules...>', HANDLERS_HELP)
    .option('--json', 'Print JSON')
    .action((patternId: string, options) => validateCommand(patternId, options, globals()));

  program
    .command('run')
    .description('Execute a pattern')
    .argument('<pattern-id>', 'Pattern ID')
    .option('--inputs <json>', 'Pattern inputs as a JSON object', parseInputs)
    .option('--pricing-snapshot <id>', 'Pricing snapshot ID for the request context')
    .option('--ledger-ref <ref>', 'Ledger reference for the request context')
    .option('--user <id>', 'User ID for the request context')
    .option('--portfolio <id>', 'Portfolio ID for the request context')
    .option('--as-of <date>', 'As-of date for the request context')
    .option('--currency <code>', 'Base currency for the request context')
    .option('--deadline <ms>', 'Overall deadline in milliseconds', parsePositiveInt)
    .option('--strict', 'Abort on forward references')
    .option('--enforce', 'Abort on any validation error')
    .option('--no-history', 'Do not record the run')
    .option('--handlers <modules...>', HANDLERS_HELP)
    .option('--json', 'Print the result as JSON')
    .action((patternId: string, options) => runCommand(patternId, options, globals()));

  const runs = program.command('runs').description('Recorded run history');

  runs
    .command('list')
    .description('List recorded runs, newest first')
    .option('--pattern <id>', 'Filter by pattern')
    .option('--status <status>', 'Filter by status (completed|aborted)', parseRunStatus)
    .option('--limit <n>', 'Max results', parsePositiveInt, 20)
    .option('--json', 'Print JSON')
    .action((options) => runsListCommand(options, globals()));

  runs
    .command('show')
    .description('Show one recorded run with its trace')
    .argument('<run-id>', 'Run ID')
    .option('--json', 'Print JSON')
    .action((runId: string, options) => runsShowCommand(runId, options, globals()));

  runs
    .command('stats')
    .description('Per-capability outcome counts across recorded runs')
    .action(() => runsStatsCommand(globals()));

  runs
    .command('prune')
    .description('Delete old runs')
    .requiredOption('--older-than <days>', 'Age in days', parsePositiveInt)
    .action((options) => runsPruneCommand(options, globals()));

  return program;
}
