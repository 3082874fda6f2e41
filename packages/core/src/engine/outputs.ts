// packages/core/src/engine/outputs.ts — Output declaration shapes and extraction

import type { RunState } from '../types/context.js';
import type { OutputSpec, PanelDeclaration } from '../types/workflow.js';
import { PatternError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { isPlainObject } from '../utils/objects.js';

/**
 * Classify a raw `outputs` declaration:
 *   ["a", "b"]              → keys
 *   { panels: [{ id }, …] } → panels
 *   { a: {…}, b: {…} }      → keyed
 */
export function detectOutputSpec(raw: unknown, patternId?: string): OutputSpec {
  if (Array.isArray(raw)) {
    const keys = raw.filter((key): key is string => typeof key === 'string');
    if (keys.length !== raw.length) {
      throw new PatternError('outputs list must contain only step keys', patternId);
    }
    return { kind: 'keys', keys };
  }
  if (isPlainObject(raw)) {
    if ('panels' in raw) {
      return { kind: 'panels', panels: toPanels(raw.panels, patternId) };
    }
    return { kind: 'keyed', keys: Object.keys(raw), metadata: raw };
  }
  throw new PatternError('outputs must be a list of keys or an object', patternId);
}

function toPanels(raw: unknown, patternId?: string): PanelDeclaration[] {
  if (!Array.isArray(raw)) {
    throw new PatternError('outputs.panels must be a list', patternId);
  }
  return raw.map((panel, index) => {
    const id: unknown = isPlainObject(panel) ? panel.id : undefined;
    if (!isPlainObject(panel) || typeof id !== 'string') {
      throw new PatternError(`outputs.panels[${index}] needs a string id`, patternId);
    }
    return { ...panel, id };
  });
}

/** Keys a declaration reads from run state (none for panels). */
export function outputKeys(spec: OutputSpec): string[] {
  return spec.kind === 'panels' ? [] : [...spec.keys];
}

export interface ExtractedOutputs {
  outputs: Record<string, unknown>;
  /** Declared keys that were absent from run state and emitted as null */
  missing: string[];
}

/**
 * Build the caller-facing outputs. Only declared keys are copied; panels are returned
 * as declared.
 */
export function extractOutputs(
  spec: OutputSpec,
  state: RunState,
  logger: Logger = silentLogger,
): ExtractedOutputs {
  if (spec.kind === 'panels') {
    return { outputs: { panels: spec.panels }, missing: [] };
  }

  const outputs: Record<string, unknown> = {};
  const missing: string[] = [];
  for (const key of spec.keys) {
    if (Object.hasOwn(state, key) && state[key] !== undefined) {
      outputs[key] = state[key];
    } else {
      outputs[key] = null;
      missing.push(key);
    }
  }
  if (missing.length > 0) {
    logger.warn(`Declared outputs missing from run state: ${missing.join(', ')}`);
  }
  return { outputs, missing };
}
