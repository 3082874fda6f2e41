// packages/core/src/config/schema.ts

import { z } from 'zod';
import type { EngineConfig } from '../types/config.js';
import {
  CIRCUIT_COOLDOWN_MS,
  CIRCUIT_FAILURE_THRESHOLD,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  TRACE_MAX_STRING_LENGTH,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';

const validationIssueCodeSchema = z.enum([
  'UnknownCapability',
  'MissingRequiredArg',
  'MissingRequiredInput',
  'InputTypeMismatch',
  'DuplicateStepKey',
  'ForwardReference',
  'UnknownReference',
]);

const retryConfigSchema = z.object({
  maxAttempts: z.number().int().positive().max(10).default(DEFAULT_RETRY_ATTEMPTS),
  baseDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_BASE_DELAY_MS),
  maxDelayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_MAX_DELAY_MS),
});

const circuitBreakerConfigSchema = z.object({
  enabled: z.boolean().default(true),
  failureThreshold: z.number().int().positive().default(CIRCUIT_FAILURE_THRESHOLD),
  cooldownMs: z.number().int().nonnegative().default(CIRCUIT_COOLDOWN_MS),
});

const validationConfigSchema = z.object({
  mode: z.enum(['warn', 'enforce']).default('warn'),
  blockingCodes: z.array(validationIssueCodeSchema).default([]),
  strictDependencies: z.boolean().default(false),
});

const templateConfigSchema = z.object({
  additionalRequiredPaths: z
    .array(z.string().regex(/^[A-Za-z_][\w-]*(\.[\w-]+)*$/, 'must be a dotted path'))
    .default([]),
});

const traceConfigSchema = z.object({
  redactKeys: z
    .array(z.string().min(1))
    .default(['password', 'secret', 'token', 'apiKey', 'authorization']),
  maxStringLength: z.number().int().positive().default(TRACE_MAX_STRING_LENGTH),
});

export const engineConfigSchema = z
  .object({
    configVersion: z.number().int().positive().optional(),
    patternsDir: z.string().min(1).default('patterns'),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    retry: retryConfigSchema.default({}),
    circuitBreaker: circuitBreakerConfigSchema.default({}),
    cache: z.object({ enabled: z.boolean().default(false) }).default({}),
    validation: validationConfigSchema.default({}),
    templates: templateConfigSchema.default({}),
    trace: traceConfigSchema.default({}),
    execution: z
      .object({ deadlineMs: z.number().int().positive().optional() })
      .default({}),
    history: z
      .object({
        enabled: z.boolean().default(true),
        dbPath: z.string().min(1).default('.patternflow/db/runs.db'),
      })
      .default({}),
  })
  .superRefine((data, ctx) => {
    if (data.retry.maxDelayMs < data.retry.baseDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['retry', 'maxDelayMs'],
        message: `maxDelayMs (${data.retry.maxDelayMs}) must be >= baseDelayMs (${data.retry.baseDelayMs})`,
      });
    }
  });

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): EngineConfig {
  const result = engineConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
