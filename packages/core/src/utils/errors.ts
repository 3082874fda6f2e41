// packages/core/src/utils/errors.ts

/** Machine-readable failure codes surfaced in run results and traces. */
export type FailureCode =
  | 'PatternNotFound'
  | 'ValidationFailed'
  | 'CapabilityNotFound'
  | 'RetryExhausted'
  | 'NonRetryableHandlerError'
  | 'InvalidArguments'
  | 'CircuitOpen'
  | 'RequiredContextMissing'
  | 'UnresolvedDependency'
  | 'Cancelled'
  | 'DeadlineExceeded'
  | 'InternalError';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class PatternError extends Error {
  constructor(
    message: string,
    public readonly patternId?: string,
    public readonly source?: string,
  ) {
    super(message);
    this.name = 'PatternError';
  }
}

export class CapabilityConflictError extends Error {
  constructor(
    public readonly capability: string,
    public readonly existingHandlerId: string,
    public readonly handlerId: string,
  ) {
    super(
      `Capability ${capability} already registered by ${existingHandlerId}, cannot register for ${handlerId}`,
    );
    this.name = 'CapabilityConflictError';
  }
}

export class CapabilityNameError extends Error {
  constructor(
    public readonly capability: string,
    public readonly handlerId: string,
  ) {
    super(`Invalid capability name "${capability}" from ${handlerId}: expected "category.operation"`);
    this.name = 'CapabilityNameError';
  }
}

export class RegistrationClosedError extends Error {
  constructor(handlerId: string) {
    super(`Registry is sealed; cannot register handler ${handlerId} after execution has started`);
    this.name = 'RegistrationClosedError';
  }
}

export class CapabilityNotFoundError extends Error {
  readonly code = 'CapabilityNotFound' as const;

  constructor(
    public readonly capability: string,
    available: string[] = [],
  ) {
    super(
      available.length > 0
        ? `No handler registered for capability ${capability}. Available: ${available.join(', ')}`
        : `No handler registered for capability ${capability}`,
    );
    this.name = 'CapabilityNotFoundError';
  }
}

/**
 * Thrown by a handler to signal a transient failure.
 * The runtime retries these with exponential backoff; anything else fails the step at once.
 */
export class RetryableHandlerError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'RetryableHandlerError';
  }
}

export class NonRetryableHandlerError extends Error {
  readonly code = 'NonRetryableHandlerError' as const;

  constructor(
    message: string,
    public readonly capability?: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'NonRetryableHandlerError';
  }
}

export class InvalidArgumentsError extends Error {
  readonly code = 'InvalidArguments' as const;

  constructor(
    public readonly capability: string,
    public readonly issues: string[],
  ) {
    super(`Invalid arguments for ${capability}: ${issues.join('; ')}`);
    this.name = 'InvalidArgumentsError';
  }
}

export class RequiredContextMissingError extends Error {
  readonly code = 'RequiredContextMissing' as const;

  constructor(public readonly path: string) {
    super(
      `Required template variable '${path}' resolved to an absent value. Must be set in request context before pattern execution.`,
    );
    this.name = 'RequiredContextMissingError';
  }
}

export class CircuitOpenError extends Error {
  readonly code = 'CircuitOpen' as const;

  constructor(
    public readonly handlerId: string,
    public readonly openUntil: number,
  ) {
    super(`Circuit breaker for handler ${handlerId} is open until ${new Date(openUntil).toISOString()}`);
    this.name = 'CircuitOpenError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

/** Render any thrown value as a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
