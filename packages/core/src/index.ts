// @patternflow/core - Declarative pattern orchestration engine

export const VERSION = '0.3.0';

// Type definitions
export type * from './types/index.js';

// Utilities
export {
  generateTraceId,
  generateRequestId,
  generateId,
  ConfigError,
  PatternError,
  CapabilityConflictError,
  CapabilityNameError,
  RegistrationClosedError,
  CapabilityNotFoundError,
  RetryableHandlerError,
  NonRetryableHandlerError,
  InvalidArgumentsError,
  RequiredContextMissingError,
  CircuitOpenError,
  DatabaseError,
  errorMessage,
  withRetry,
  backoffDelay,
  createLogger,
  silentLogger,
  sleep,
  deepFreeze,
  isPlainObject,
  stableStringify,
} from './utils/index.js';
export type { FailureCode, RetryOptions, Logger, LogLevel } from './utils/index.js';
export {
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
  CIRCUIT_FAILURE_THRESHOLD,
  CIRCUIT_COOLDOWN_MS,
  DEFAULT_RESULT_KEY,
  RESERVED_STATE_KEYS,
  REQUIRED_CONTEXT_PATHS,
  DEFAULT_HISTORY_LIMIT,
} from './utils/constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  engineConfigSchema,
  validateConfig,
  CONFIG_FILENAME,
  loadConfig,
  writeConfig,
} from './config/index.js';
export type { EngineConfigInput } from './config/index.js';

// Request context
export { createRequestCtx, deriveRequestCtx, describeRequestCtx } from './context/index.js';

// Capability registry + runtime
export {
  capability,
  describeParams,
  requiredParams,
  CapabilityRegistry,
  CapabilityRuntime,
  CircuitBreaker,
  RequestCache,
} from './runtime/index.js';
export type {
  CapabilityDefinition,
  CapabilityRuntimeOptions,
  InvokeOptions,
  CircuitState,
} from './runtime/index.js';

// Engine
export {
  EventBus,
  CancellationToken,
  CancellationError,
  PatternOrchestrator,
  PatternCatalog,
  parsePatternDocument,
  readPatternFile,
  validatePattern,
  applyInputDefaults,
  resolveValue,
  resolveArgs,
  resolvePath,
  extractTemplateReferences,
  evaluateCondition,
  parseCondition,
  ConditionSyntaxError,
  detectOutputSpec,
  extractOutputs,
  TraceBuilder,
  RunLifecycle,
  PhaseTransitionError,
} from './engine/index.js';
export type {
  CancellationReason,
  PatternOrchestratorOptions,
  LoadReport,
  PatternDocument,
  ValidateOptions,
  TemplateScope,
  ConditionNode,
  TraceBuilderOptions,
} from './engine/index.js';

// Built-in handlers
export { DIAGNOSTICS_HANDLER_ID, diagnosticsHandler } from './handlers/index.js';

// Run history
export { openDatabase, runMigrations, getSchemaVersion, RunStore } from './memory/index.js';
