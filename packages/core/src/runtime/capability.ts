// packages/core/src/runtime/capability.ts — Typed capability method definitions

import { z } from 'zod';
import type {
  CapabilityArgs,
  CapabilityMethod,
  CapabilityParam,
  CapabilityRun,
} from '../types/capability.js';
import { InvalidArgumentsError } from '../utils/errors.js';

const looseArgs = z.record(z.string(), z.unknown());

export interface CapabilityDefinition<S extends z.ZodTypeAny> {
  description?: string;
  /** Argument schema. Object schemas also declare the method's parameters for validation. */
  args?: S;
  run: CapabilityRun<z.output<S>>;
}

/**
 * Define a capability method. The zod schema types `run`'s arguments and checks
 * them at call time; a failed check is reported as InvalidArguments and never retried.
 *
 * @example
 * const table = {
 *   'echo.value': capability({
 *     args: z.object({ x: z.unknown() }),
 *     run: (_ctx, _state, { x }) => ({ value: x }),
 *   }),
 * };
 */
export function capability<S extends z.ZodTypeAny = typeof looseArgs>(
  definition: CapabilityDefinition<S>,
): CapabilityMethod {
  const schema: z.ZodTypeAny = definition.args ?? looseArgs;
  return {
    description: definition.description,
    params: describeParams(schema),
    async execute(ctx, state, args: CapabilityArgs, call) {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        throw new InvalidArgumentsError(
          call.capability,
          parsed.error.issues.map((issue) => {
            const where = issue.path.length > 0 ? issue.path.join('.') : 'args';
            return `${where}: ${issue.message}`;
          }),
        );
      }
      return await definition.run(ctx, state, parsed.data, call);
    },
  };
}

/** Parameter list for object schemas (optional and defaulted fields are not required). */
export function describeParams(schema: z.ZodTypeAny): CapabilityParam[] | undefined {
  const inner = schema instanceof z.ZodEffects ? schema.innerType() : schema;
  if (!(inner instanceof z.ZodObject)) return undefined;
  const shape: Record<string, z.ZodTypeAny> = inner.shape;
  return Object.entries(shape).map(([name, field]) => ({
    name,
    required: !field.isOptional(),
  }));
}

/** Names of required parameters, or [] when the method declares none. */
export function requiredParams(method: CapabilityMethod): string[] {
  return (method.params ?? []).filter((p) => p.required).map((p) => p.name);
}
