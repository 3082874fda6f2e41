// packages/core/src/utils/retry.ts

export interface RetryOptions {
  attempts: number;
  backoff: number;
  maxDelay?: number;
  retryOn?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Custom delay, e.g. a cancellable sleep. Resolving false stops retrying. */
  wait?: (ms: number) => Promise<boolean | void>;
}

/** Plain timer delay; the default `wait`. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const defaultOptions: RetryOptions = {
  attempts: 3,
  backoff: 1000,
};

/** Delay before the retry that follows `attempt` (1-based): backoff * 2^(attempt-1). */
export function backoffDelay(attempt: number, backoff: number, maxDelay?: number): number {
  const delay = backoff * 2 ** (attempt - 1);
  return maxDelay !== undefined ? Math.min(delay, maxDelay) : delay;
}

/**
 * Retry an async function with exponential backoff.
 * Returns the result on success, throws the last error after all attempts exhausted.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: Partial<RetryOptions>,
): Promise<T> {
  const opts = { ...defaultOptions, ...options };
  const wait = opts.wait ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (opts.retryOn && !opts.retryOn(error)) {
        throw error;
      }

      if (attempt < opts.attempts) {
        const delay = backoffDelay(attempt, opts.backoff, opts.maxDelay);
        opts.onRetry?.(attempt, error, delay);
        const proceeded = await wait(delay);
        if (proceeded === false) {
          throw error;
        }
      }
    }
  }

  throw lastError;
}
