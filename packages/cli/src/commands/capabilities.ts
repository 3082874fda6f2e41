// packages/cli/src/commands/capabilities.ts — Registered capability listing

import type { CapabilityParam } from '@patternflow/core';
import chalk from 'chalk';

import { loadEngine, reportError } from '../utils.js';
import type { GlobalOptions } from '../utils.js';

interface CapabilitiesOptions {
  handlers?: string[];
  json?: boolean;
}

export async function capabilitiesCommand(options: CapabilitiesOptions, globals: GlobalOptions): Promise<void> {
  try {
    const { registry } = await loadEngine(globals, options.handlers);
    const bindings = registry.listBindings().filter((binding) => binding.active);

    if (options.json) {
      const output = bindings.map((binding) => ({
        capability: binding.capability,
        handler: binding.handlerId,
        description: binding.method.description ?? null,
        params: binding.method.params ?? [],
      }));
      console.log(JSON.stringify(output, null, 2));
      return;
    }

    for (const binding of bindings) {
      const params = formatParams(binding.method.params);
      console.log(
        `${chalk.bold(binding.capability)} ${chalk.gray(`(${binding.handlerId})`)}${params ? ` ${params}` : ''}`,
      );
      if (binding.method.description) {
        console.log(chalk.gray(`  ${binding.method.description}`));
      }
    }
  } catch (error) {
    reportError(error);
  }
}

function formatParams(params: readonly CapabilityParam[] | undefined): string {
  if (!params || params.length === 0) return '';
  return `(${params.map((p) => (p.required ? p.name : `${p.name}?`)).join(', ')})`;
}
