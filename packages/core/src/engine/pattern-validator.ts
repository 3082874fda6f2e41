// packages/core/src/engine/pattern-validator.ts — Static checks run before a pattern executes

import { requiredParams } from '../runtime/capability.js';
import type { CapabilityRegistry } from '../runtime/capability-registry.js';
import type { PatternInputs } from '../types/context.js';
import type {
  CapabilityCheck,
  ValidationIssue,
  ValidationIssueCode,
  ValidationResult,
} from '../types/validation.js';
import type { InputType, WorkflowSpec } from '../types/workflow.js';
import { DEFAULT_RESULT_KEY } from '../utils/constants.js';
import { isPlainObject } from '../utils/objects.js';
import { conditionReferences } from './condition.js';
import { extractTemplateReferences, referenceRoot } from './template.js';

export interface ValidateOptions {
  /** Check required inputs and declared input types against these values */
  inputs?: PatternInputs;
  /** Report references to keys no earlier step produces as errors instead of warnings */
  strictDependencies?: boolean;
}

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Roots every template may read regardless of step order. */
const AMBIENT_ROOTS = new Set(['ctx', 'inputs']);

export function validatePattern(
  spec: WorkflowSpec,
  registry: CapabilityRegistry,
  options: ValidateOptions = {},
): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];
  const capabilities: Record<string, CapabilityCheck> = {};

  const report = (
    code: ValidationIssueCode,
    severity: 'error' | 'warning',
    message: string,
    at?: { step: number; capability: string },
  ) => {
    const issue: ValidationIssue = { code, severity, message, ...at };
    (severity === 'error' ? errors : warnings).push(issue);
  };

  const producedBy = new Map<string, number>();
  spec.steps.forEach((step, index) => {
    if (!producedBy.has(step.as)) producedBy.set(step.as, index);
  });

  const defined = new Set<string>();
  spec.steps.forEach((step, index) => {
    const at = { step: index, capability: step.capability };

    const binding = registry.lookup(step.capability);
    const required = binding ? requiredParams(binding.method) : [];
    const missing = required.filter((name) => !Object.hasOwn(step.args, name));
    const previous = capabilities[step.capability];
    capabilities[step.capability] = {
      exists: binding !== undefined,
      handlerId: binding?.handlerId ?? null,
      requiredArgs: required,
      missingArgs: [...new Set([...(previous?.missingArgs ?? []), ...missing])],
    };

    if (!binding) {
      report(
        'UnknownCapability',
        'error',
        `Step ${index} uses capability "${step.capability}", which no handler provides`,
        at,
      );
    }
    for (const name of missing) {
      report(
        'MissingRequiredArg',
        'error',
        `Step ${index} (${step.capability}) is missing required argument "${name}"`,
        at,
      );
    }

    const refs = [...extractTemplateReferences(step.args), ...conditionReferences(step.condition)];
    for (const ref of new Set(refs)) {
      const root = referenceRoot(ref);
      if (AMBIENT_ROOTS.has(root) || defined.has(root)) continue;
      const severity = options.strictDependencies ? 'error' : 'warning';
      const laterStep = producedBy.get(root);
      if (laterStep !== undefined) {
        report(
          'ForwardReference',
          severity,
          `Step ${index} reads "${ref}" but "${root}" is produced later, by step ${laterStep}`,
          at,
        );
      } else {
        report('UnknownReference', severity, `Step ${index} reads "${ref}", which no step produces`, at);
      }
    }

    if (defined.has(step.as) && step.as !== DEFAULT_RESULT_KEY) {
      report(
        'DuplicateStepKey',
        'warning',
        `Step ${index} overwrites "${step.as}" written by an earlier step`,
        at,
      );
    }
    defined.add(step.as);
  });

  if (options.inputs) {
    for (const issue of checkInputs(spec, options.inputs)) {
      (issue.severity === 'error' ? errors : warnings).push(issue);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    capabilities,
    pattern: { id: spec.id, name: spec.name, steps: spec.steps.length },
  };
}

function checkInputs(spec: WorkflowSpec, inputs: PatternInputs): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  for (const [name, declaration] of Object.entries(spec.inputSchema)) {
    const value = inputs[name];
    if (value === undefined) {
      if (declaration.required && declaration.default === undefined) {
        issues.push({
          code: 'MissingRequiredInput',
          severity: 'error',
          message: `Required input "${name}" was not supplied`,
        });
      }
      continue;
    }
    if (declaration.type && !matchesInputType(declaration.type, value)) {
      issues.push({
        code: 'InputTypeMismatch',
        severity: 'warning',
        message: `Input "${name}" should be ${declaration.type}, got ${describeType(value)}`,
      });
    }
  }
  return issues;
}

export function matchesInputType(type: InputType, value: unknown): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'object':
      return isPlainObject(value);
    case 'array':
      return Array.isArray(value);
    case 'date':
      return (
        (typeof value === 'string' && !Number.isNaN(Date.parse(value))) ||
        (value instanceof Date && !Number.isNaN(value.getTime()))
      );
    case 'uuid':
      return typeof value === 'string' && UUID.test(value);
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/** Caller inputs with declared defaults filled in for anything not supplied. */
export function applyInputDefaults(spec: WorkflowSpec, inputs: PatternInputs): PatternInputs {
  const merged: PatternInputs = { ...inputs };
  for (const [name, declaration] of Object.entries(spec.inputSchema)) {
    if (merged[name] === undefined && declaration.default !== undefined) {
      merged[name] = structuredClone(declaration.default);
    }
  }
  return merged;
}
