// packages/core/src/config/loader.ts

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { EngineConfig } from '../types/config.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { isPlainObject } from '../utils/objects.js';
import { DEFAULT_CONFIG } from './defaults.js';
import type { EngineConfigInput } from './schema.js';
import { validateConfig } from './schema.js';

export const CONFIG_FILENAME = '.patternflow.yml';

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };
  for (const key of Object.keys(source)) {
    const srcVal = source[key];
    const tgtVal = result[key];
    if (isPlainObject(srcVal) && isPlainObject(tgtVal)) {
      result[key] = deepMerge(tgtVal, srcVal);
    } else if (srcVal !== undefined) {
      result[key] = srcVal;
    }
  }
  return result;
}

/**
 * Load config with precedence: overrides > .patternflow.yml > defaults.
 *
 * Relative `patternsDir` and `history.dbPath` are resolved against projectDir.
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: EngineConfigInput;
  skipFile?: boolean;
}): EngineConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: Record<string, unknown> = { ...structuredClone(DEFAULT_CONFIG) };

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${CONFIG_FILENAME}: ${errorMessage(err)}`);
    }
    if (fileConfig !== null && fileConfig !== undefined) {
      if (!isPlainObject(fileConfig)) {
        throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
      }
      merged = deepMerge(merged, fileConfig);
    }
  }

  if (options?.overrides) {
    merged = deepMerge(merged, { ...options.overrides });
  }

  const config = validateConfig(merged);
  return {
    ...config,
    patternsDir: resolveFrom(projectDir, config.patternsDir),
    history: { ...config.history, dbPath: resolveFrom(projectDir, config.history.dbPath) },
  };
}

/**
 * Write a config to .patternflow.yml in the given directory, creating the
 * directory for the run history database alongside it.
 */
export function writeConfig(config: EngineConfigInput, dir: string): string {
  const configPath = join(dir, CONFIG_FILENAME);
  writeFileSync(configPath, stringifyYaml(config, { lineWidth: 100 }), 'utf-8');
  const dbPath = config.history?.dbPath ?? DEFAULT_CONFIG.history.dbPath;
  mkdirSync(dirname(resolveFrom(dir, dbPath)), { recursive: true });
  return configPath;
}

function resolveFrom(base: string, path: string): string {
  return isAbsolute(path) || path === ':memory:' ? path : resolve(base, path);
}

export { deepMerge };
