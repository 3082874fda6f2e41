// packages/cli/src/utils.ts — Engine wiring and option parsers shared by commands

import {
  CapabilityRegistry,
  CapabilityRuntime,
  ConfigError,
  PatternCatalog,
  PatternOrchestrator,
  createLogger,
  diagnosticsHandler,
  errorMessage,
  isPlainObject,
  loadConfig,
  openDatabase,
} from '@patternflow/core';
import type {
  CapabilityHandler,
  EngineConfig,
  Logger,
  PatternInputs,
  RecordedRunStatus,
} from '@patternflow/core';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

export interface GlobalOptions {
  verbose?: boolean;
  project?: string;
}

export interface Engine {
  config: EngineConfig;
  logger: Logger;
  registry: CapabilityRegistry;
  catalog: PatternCatalog;
  runtime: CapabilityRuntime;
  orchestrator: PatternOrchestrator;
}

export function loadProjectConfig(globals: GlobalOptions): EngineConfig {
  return loadConfig({
    projectDir: resolve(globals.project ?? process.cwd()),
    overrides: globals.verbose ? { logLevel: 'debug' } : undefined,
  });
}

/**
 * Wire config, registry, handler modules, pattern catalog and orchestrator
 * the same way for every command.
 */
export async function loadEngine(globals: GlobalOptions, handlerModules: string[] = []): Promise<Engine> {
  const config = loadProjectConfig(globals);
  const logger = createLogger(config.logLevel, 'patternflow');

  const registry = new CapabilityRegistry(logger);
  registry.registerHandler(diagnosticsHandler);
  for (const handler of await loadHandlerModules(handlerModules, globals.project)) {
    registry.registerHandler(handler);
  }

  const catalog = new PatternCatalog(config.patternsDir, logger);
  catalog.loadAll();

  const runtime = CapabilityRuntime.fromConfig(registry, config, logger);
  const orchestrator = new PatternOrchestrator({ runtime, catalog, config, logger });
  return { config, logger, registry, catalog, runtime, orchestrator };
}

/**
 * Import handler modules. Each module's default export, or its named `handlers`
 * export, must be one handler or an array of them.
 */
export async function loadHandlerModules(paths: string[], baseDir?: string): Promise<CapabilityHandler[]> {
  const handlers: CapabilityHandler[] = [];
  for (const path of paths) {
    const file = resolve(baseDir ?? process.cwd(), path);
    let mod: unknown;
    try {
      mod = await import(pathToFileURL(file).href);
    } catch (error) {
      throw new ConfigError(`Cannot load handler module ${path}: ${errorMessage(error)}`, 'handlers');
    }
    const exported = readExport(mod, 'default') ?? readExport(mod, 'handlers');
    const candidates: unknown[] = Array.isArray(exported) ? exported : [exported];
    if (exported === undefined || !candidates.every(isCapabilityHandler)) {
      throw new ConfigError(
        `Handler module ${path} must export a handler or an array of handlers (default or "handlers")`,
        'handlers',
      );
    }
    handlers.push(...candidates.filter(isCapabilityHandler));
  }
  return handlers;
}

function readExport(mod: unknown, name: string): unknown {
  return typeof mod === 'object' && mod !== null ? Reflect.get(mod, name) : undefined;
}

export function isCapabilityHandler(value: unknown): value is CapabilityHandler {
  return (
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'id') === 'string' &&
    typeof Reflect.get(value, 'capabilities') === 'function'
  );
}

/** Commander parser for `--inputs '{"x": 5}'`. */
export function parseInputs(value: string): PatternInputs {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new InvalidArgumentError(`Inputs must be JSON: ${errorMessage(error)}`);
  }
  if (!isPlainObject(parsed)) {
    throw new InvalidArgumentError('Inputs must be a JSON object');
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value)) throw new InvalidArgumentError('Must be a positive integer');
  const n = Number.parseInt(value, 10);
  if (n <= 0) throw new InvalidArgumentError('Must be a positive integer');
  return n;
}

/** Open the run history database named by config, creating its directory. */
export function openHistory(config: EngineConfig): ReturnType<typeof openDatabase> {
  const dbPath = config.history.dbPath;
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  return openDatabase(dbPath);
}

/** Print an error and set a failing exit code. */
export function reportError(error: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exitCode = 1;
}

const RUN_STATUSES: readonly RecordedRunStatus[] = ['completed', 'aborted'];

export function parseRunStatus(value: string): RecordedRunStatus {
  const status = RUN_STATUSES.find((s) => s === value);
  if (!status) throw new InvalidArgumentError(`Must be one of: ${RUN_STATUSES.join(', ')}`);
  return status;
}
