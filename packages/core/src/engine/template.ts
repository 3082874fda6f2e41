// packages/core/src/engine/template.ts — {{path}} resolution against ctx and run state

import type { RequestCtx, RunState } from '../types/context.js';
import { REQUIRED_CONTEXT_PATHS } from '../utils/constants.js';
import { RequiredContextMissingError } from '../utils/errors.js';
import { isPlainObject, stableStringify } from '../utils/objects.js';

const WHOLE_TEMPLATE = /^\s*\{\{\s*([^{}]+?)\s*\}\}\s*$/;
const EMBEDDED_TEMPLATE = /\{\{\s*([^{}]+?)\s*\}\}/g;

export interface TemplateScope {
  ctx: RequestCtx;
  state: RunState;
  /** Paths that must not resolve to absent; defaults to the reproducibility fields */
  requiredPaths?: readonly string[];
}

export function isTemplate(value: unknown): value is string {
  return typeof value === 'string' && value.includes('{{') && value.includes('}}');
}

/**
 * Resolve templates in `value` recursively.
 * A string that is one whole `{{path}}` becomes the raw value at `path` (possibly undefined);
 * templates inside other text are interpolated.
 */
export function resolveValue(value: unknown, scope: TemplateScope): unknown {
  if (typeof value === 'string') {
    return resolveString(value, scope);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveValue(item, scope));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      out[key] = resolveValue(child, scope);
    }
    return out;
  }
  return value;
}

/** Resolve a step's `args` block into a fresh object. */
export function resolveArgs(
  args: Readonly<Record<string, unknown>>,
  scope: TemplateScope,
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args)) {
    out[key] = resolveValue(value, scope);
  }
  return out;
}

function resolveString(value: string, scope: TemplateScope): unknown {
  const whole = WHOLE_TEMPLATE.exec(value);
  if (whole) {
    return resolvePath(whole[1], scope);
  }
  if (!isTemplate(value)) return value;
  return value.replace(EMBEDDED_TEMPLATE, (_match, path: string) =>
    stringifyInterpolated(resolvePath(path, scope)),
  );
}

function stringifyInterpolated(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'object') return stableStringify(value);
  return String(value);
}

/**
 * Walk a dotted path. `ctx.*` reads the request context; any other root reads run state.
 * A missing segment yields undefined, except for required paths, which throw.
 */
export function resolvePath(path: string, scope: TemplateScope): unknown {
  const trimmed = path.trim();
  const segments = splitPath(trimmed);
  const [root, ...rest] = segments;
  if (root === undefined) return undefined;
  const base: unknown =
    root === 'ctx' ? scope.ctx : Object.hasOwn(scope.state, root) ? scope.state[root] : undefined;
  const value = walk(base, rest);

  const required: readonly string[] = scope.requiredPaths ?? REQUIRED_CONTEXT_PATHS;
  if (isAbsent(value) && required.includes(trimmed)) {
    throw new RequiredContextMissingError(trimmed);
  }
  return value;
}

export function walk(base: unknown, segments: readonly string[]): unknown {
  let current = base;
  for (const segment of segments) {
    if (current === undefined || current === null) return undefined;
    if (Array.isArray(current)) {
      if (segment === 'length') {
        current = current.length;
      } else if (/^\d+$/.test(segment)) {
        current = current[Number(segment)];
      } else {
        return undefined;
      }
    } else if (typeof current === 'string') {
      if (segment !== 'length') return undefined;
      current = current.length;
    } else if (typeof current === 'object') {
      if (!Object.prototype.hasOwnProperty.call(current, segment)) return undefined;
      current = Reflect.get(current, segment);
    } else {
      return undefined;
    }
  }
  return current;
}

/** Split `a.b[0].c` or `a.b.0.c` into segments. */
export function splitPath(path: string): string[] {
  return path
    .replace(/\[(\d+)\]/g, '.$1')
    .split('.')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/** Every `{{path}}` referenced anywhere inside `value`, in encounter order. */
export function extractTemplateReferences(value: unknown): string[] {
  const refs: string[] = [];
  collect(value, refs);
  return refs;
}

function collect(value: unknown, refs: string[]): void {
  if (typeof value === 'string') {
    for (const match of value.matchAll(EMBEDDED_TEMPLATE)) {
      refs.push(match[1].trim());
    }
  } else if (Array.isArray(value)) {
    for (const item of value) collect(item, refs);
  } else if (isPlainObject(value)) {
    for (const child of Object.values(value)) collect(child, refs);
  }
}

/** Root segment of a reference path (`positions.0.qty` → `positions`). */
export function referenceRoot(path: string): string {
  return splitPath(path)[0] ?? '';
}
