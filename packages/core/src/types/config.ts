// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';
import type { ValidationIssueCode, ValidationMode } from './validation.js';

export interface RetryConfig {
  /** Attempts per capability call, first call included */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface CircuitBreakerConfig {
  enabled: boolean;
  failureThreshold: number;
  cooldownMs: number;
}

export interface CacheConfig {
  /** Memoize identical capability calls within one request */
  enabled: boolean;
}

export interface ValidationConfig {
  mode: ValidationMode;
  /** Issue codes that block execution even in warn mode */
  blockingCodes: ValidationIssueCode[];
  strictDependencies: boolean;
}

export interface TemplateConfig {
  /** Paths treated like ctx.pricingSnapshotId: absent is an error */
  additionalRequiredPaths: string[];
}

export interface TraceConfig {
  redactKeys: string[];
  maxStringLength: number;
}

export interface ExecutionConfig {
  deadlineMs?: number;
}

export interface HistoryConfig {
  enabled: boolean;
  dbPath: string;
}

export interface EngineConfig {
  configVersion?: number;
  patternsDir: string;
  logLevel: LogLevel;
  retry: RetryConfig;
  circuitBreaker: CircuitBreakerConfig;
  cache: CacheConfig;
  validation: ValidationConfig;
  templates: TemplateConfig;
  trace: TraceConfig;
  execution: ExecutionConfig;
  history: HistoryConfig;
}
