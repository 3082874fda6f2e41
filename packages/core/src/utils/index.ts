// packages/core/src/utils/index.ts -- barrel re-export

export { generateTraceId, generateRequestId, generateId } from './id.js';
export {
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
} from './errors.js';
export type { FailureCode } from './errors.js';
export { withRetry, backoffDelay, sleep } from './retry.js';
export type { RetryOptions } from './retry.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { deepFreeze, isPlainObject, stableStringify } from './objects.js';
export * from './constants.js';
