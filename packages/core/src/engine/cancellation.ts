// packages/core/src/engine/cancellation.ts — Invocation cancellation and deadlines

export type CancellationReason = 'cancelled' | 'deadline';

export class CancellationToken {
  private cancelled = false;
  private cancelReason: CancellationReason | undefined;
  private callbacks = new Set<() => void>();
  private readonly controller = new AbortController();
  private deadlineTimer: ReturnType<typeof setTimeout> | undefined;
  private unlinkParent: (() => void) | undefined;

  /**
   * Token that cancels itself with reason "deadline" after `ms`.
   * If `parent` is given, cancelling the parent cancels this token too.
   */
  static withDeadline(ms: number | undefined, parent?: CancellationToken): CancellationToken {
    const token = new CancellationToken();
    if (parent) {
      const relay = () => token.cancel(parent.reason ?? 'cancelled');
      parent.onCancel(relay);
      token.unlinkParent = () => parent.offCancel(relay);
    }
    if (ms !== undefined) {
      token.deadlineTimer = setTimeout(() => token.cancel('deadline'), ms);
      token.deadlineTimer.unref?.();
    }
    return token;
  }

  /** Signal cancellation. Idempotent. */
  cancel(reason: CancellationReason = 'cancelled'): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason;
    this.clearDeadline();
    this.controller.abort(new CancellationError(describe(reason), reason));
    for (const cb of this.callbacks) {
      cb();
    }
    this.callbacks.clear();
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): CancellationReason | undefined {
    return this.cancelReason;
  }

  /** AbortSignal view for handlers that call fetch or other signal-aware APIs. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /** Throw if already cancelled. Call before starting expensive work. */
  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new CancellationError(describe(this.cancelReason ?? 'cancelled'), this.cancelReason ?? 'cancelled');
    }
  }

  /**
   * Register a callback to run on cancellation.
   * Deduplicated by reference.
   * If already cancelled, callback fires immediately.
   */
  onCancel(callback: () => void): void {
    if (this.cancelled) {
      callback();
      return;
    }
    this.callbacks.add(callback);
  }

  /** Remove a previously registered callback. */
  offCancel(callback: () => void): void {
    this.callbacks.delete(callback);
  }

  /** Stop the deadline timer once the invocation has finished. */
  dispose(): void {
    this.clearDeadline();
    this.callbacks.clear();
    this.unlinkParent?.();
    this.unlinkParent = undefined;
  }

  /**
   * Create a promise that resolves after `ms` but can be interrupted by cancellation.
   * Returns true if sleep completed, false if cancelled.
   */
  sleep(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      if (this.cancelled) {
        resolve(false);
        return;
      }

      const onCancelHandler = () => {
        clearTimeout(timer);
        resolve(false);
      };

      const timer = setTimeout(() => {
        this.callbacks.delete(onCancelHandler);
        resolve(true);
      }, ms);

      this.onCancel(onCancelHandler);
    });
  }

  /**
   * Settle with the work's outcome, or reject with CancellationError as soon as
   * the token is cancelled, whichever comes first.
   */
  race<T>(work: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onCancelHandler = () => {
        const reason = this.cancelReason ?? 'cancelled';
        reject(new CancellationError(describe(reason), reason));
      };
      this.onCancel(onCancelHandler);
      work.then(
        (value) => {
          this.offCancel(onCancelHandler);
          resolve(value);
        },
        (error: unknown) => {
          this.offCancel(onCancelHandler);
          reject(error);
        },
      );
    });
  }

  private clearDeadline(): void {
    if (this.deadlineTimer !== undefined) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = undefined;
    }
  }
}

export class CancellationError extends Error {
  constructor(
    message: string,
    public readonly reason: CancellationReason = 'cancelled',
  ) {
    super(message);
    this.name = 'CancellationError';
  }
}

function describe(reason: CancellationReason): string {
  return reason === 'deadline' ? 'Invocation deadline exceeded' : 'Operation was cancelled';
}
