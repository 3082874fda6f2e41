// packages/core/src/runtime/capability-runtime.ts — Executes single capability calls

import { CancellationError, CancellationToken } from '../engine/cancellation.js';
import type {
  CapabilityArgs,
  InvocationFailure,
  InvocationMeta,
  InvocationOutcome,
} from '../types/capability.js';
import type { EngineConfig, RetryConfig } from '../types/config.js';
import type { RequestCtx, RunState } from '../types/context.js';
import {
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_BASE_DELAY_MS,
  DEFAULT_RETRY_MAX_DELAY_MS,
} from '../utils/constants.js';
import {
  CapabilityNotFoundError,
  CircuitOpenError,
  InvalidArgumentsError,
  NonRetryableHandlerError,
  RetryableHandlerError,
  errorMessage,
} from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { silentLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { CircuitBreaker } from './circuit-breaker.js';
import type { CapabilityRegistry } from './capability-registry.js';
import type { RequestCache } from './request-cache.js';

export interface CapabilityRuntimeOptions {
  retry?: Partial<RetryConfig>;
  circuitBreaker?: CircuitBreaker;
  logger?: Logger;
}

export interface InvokeOptions {
  /** Invocation token; cancelling it interrupts backoff sleeps and in-flight calls */
  cancellation?: CancellationToken;
  /** Per-request memo; omitted means every call reaches the handler */
  cache?: RequestCache;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

/**
 * Uniform capability execution: lookup, circuit check, cache, retry with exponential
 * backoff, cancellation and error normalization. `invoke` never throws.
 */
export class CapabilityRuntime {
  readonly retry: RetryConfig;
  readonly breaker: CircuitBreaker;
  private logger: Logger;

  constructor(
    readonly registry: CapabilityRegistry,
    options: CapabilityRuntimeOptions = {},
  ) {
    this.retry = {
      maxAttempts: options.retry?.maxAttempts ?? DEFAULT_RETRY_ATTEMPTS,
      baseDelayMs: options.retry?.baseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS,
      maxDelayMs: options.retry?.maxDelayMs ?? DEFAULT_RETRY_MAX_DELAY_MS,
    };
    this.breaker = options.circuitBreaker ?? new CircuitBreaker();
    this.logger = options.logger ?? silentLogger;
  }

  static fromConfig(
    registry: CapabilityRegistry,
    config: EngineConfig,
    logger: Logger = silentLogger,
  ): CapabilityRuntime {
    return new CapabilityRuntime(registry, {
      retry: config.retry,
      circuitBreaker: new CircuitBreaker(config.circuitBreaker),
      logger,
    });
  }

  async invoke(
    name: string,
    ctx: RequestCtx,
    state: RunState,
    args: CapabilityArgs,
    options: InvokeOptions = {},
  ): Promise<InvocationOutcome> {
    const start = Date.now();
    const meta = (handlerId: string | null, attempts: number, cached = false): InvocationMeta => ({
      capability: name,
      handlerId,
      elapsedMs: Date.now() - start,
      attempts,
      cached,
    });
    const fail = (failure: InvocationFailure, handlerId: string | null, attempts: number) => {
      this.logger.debug(`${name} failed with ${failure.code}: ${failure.message}`);
      const outcome: InvocationOutcome = { ok: false, failure, meta: meta(handlerId, attempts) };
      return outcome;
    };

    const binding = this.registry.lookup(name);
    if (!binding) {
      const error = new CapabilityNotFoundError(name, this.registry.listCapabilities());
      return fail({ code: 'CapabilityNotFound', message: error.message, cause: error }, null, 0);
    }
    const { handlerId, method } = binding;

    const token = options.cancellation ?? new CancellationToken();
    if (token.isCancelled) {
      return fail(cancellationFailure(token), handlerId, 0);
    }

    const openUntil = this.breaker.blockedUntil(handlerId);
    if (openUntil !== null) {
      const error = new CircuitOpenError(handlerId, openUntil);
      return fail({ code: 'CircuitOpen', message: error.message, cause: error }, handlerId, 0);
    }

    if (options.cache) {
      const cached = options.cache.lookup(name, args);
      if (cached.hit) {
        this.logger.debug(`${name} served from request cache`);
        return { ok: true, payload: cached.value, meta: meta(handlerId, 0, true) };
      }
    }

    let attempts = 0;
    try {
      const payload = await withRetry(
        async (attempt) => {
          attempts = attempt;
          token.throwIfCancelled();
          return token.race(
            method.execute(ctx, state, args, {
              capability: name,
              handlerId,
              attempt,
              cancellation: token,
              signal: token.signal,
            }),
          );
        },
        {
          attempts: this.retry.maxAttempts,
          backoff: this.retry.baseDelayMs,
          maxDelay: this.retry.maxDelayMs,
          retryOn: (error) => error instanceof RetryableHandlerError,
          onRetry: (attempt, error, delayMs) => {
            this.logger.warn(
              `${name} attempt ${attempt}/${this.retry.maxAttempts} failed: ${errorMessage(error)}. Retrying in ${delayMs}ms`,
            );
            options.onRetry?.(attempt, error, delayMs);
          },
          wait: (ms) => token.sleep(ms),
        },
      );

      this.breaker.recordSuccess(handlerId);
      options.cache?.store(name, args, payload);
      return { ok: true, payload, meta: meta(handlerId, attempts) };
    } catch (error) {
      const failure = this.classify(error, name, token, attempts);
      if (failure.code === 'RetryExhausted' || failure.code === 'NonRetryableHandlerError') {
        this.breaker.recordFailure(handlerId);
      }
      return fail(failure, handlerId, attempts);
    }
  }

  private classify(error: unknown, name: string, token: CancellationToken, attempts: number): InvocationFailure {
    if (error instanceof CancellationError || token.isCancelled) {
      return { ...cancellationFailure(token), cause: error };
    }
    if (error instanceof InvalidArgumentsError) {
      return { code: 'InvalidArguments', message: error.message, cause: error };
    }
    if (error instanceof RetryableHandlerError) {
      return {
        code: 'RetryExhausted',
        message: `Gave up after ${attempts} attempts: ${error.message}`,
        cause: error,
      };
    }
    // Handler-raised errors that already name their capability pass through as they are.
    const cause =
      error instanceof NonRetryableHandlerError && error.capability !== undefined
        ? error
        : new NonRetryableHandlerError(errorMessage(error), name, error);
    return { code: 'NonRetryableHandlerError', message: cause.message, cause };
  }
}

function cancellationFailure(token: CancellationToken): InvocationFailure {
  return token.reason === 'deadline'
    ? { code: 'DeadlineExceeded', message: 'Invocation deadline exceeded' }
    : { code: 'Cancelled', message: 'Invocation was cancelled' };
}
