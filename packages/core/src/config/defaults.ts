// packages/core/src/config/defaults.ts

import type { EngineConfig } from '../types/config.js';
import {
  CIRCUIT_COOLDOWN_MS,
  CIRCUIT_FAILURE_THRESHOLD,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  TRACE_MAX_STRING_LENGTH,
} from '../utils/constants.js';

export const DEFAULT_CONFIG: EngineConfig = {
  configVersion: 1,
  patternsDir: 'patterns',
  logLevel: 'info',
  retry: {
    maxAttempts: DEFAULT_RETRY_ATTEMPTS,
    baseDelayMs: DEFAULT_RETRY_BASE_DELAY_MS,
    maxDelayMs: DEFAULT_RETRY_MAX_DELAY_MS,
  },
  circuitBreaker: {
    enabled: true,
    failureThreshold: CIRCUIT_FAILURE_THRESHOLD,
    cooldownMs: CIRCUIT_COOLDOWN_MS,
  },
  cache: {
    enabled: false,
  },
  validation: {
    mode: 'warn',
    blockingCodes: [],
    strictDependencies: false,
  },
  templates: {
    additionalRequiredPaths: [],
  },
  trace: {
    redactKeys: ['password', 'secret', 'token', 'apiKey', 'authorization'],
    maxStringLength: TRACE_MAX_STRING_LENGTH,
  },
  execution: {},
  history: {
    enabled: true,
    dbPath: '.patternflow/db/runs.db',
  },
};
