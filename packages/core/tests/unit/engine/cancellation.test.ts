import { describe, expect, it, vi } from 'vitest';
import { CancellationError, CancellationToken } from '../../../src/engine/cancellation.js';

describe('CancellationToken', () => {
  it('starts as not cancelled', () => {
    const token = new CancellationToken();
    expect(token.isCancelled).toBe(false);
  });

  it('becomes cancelled after cancel()', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(token.isCancelled).toBe(true);
  });

  it('cancel() is idempotent', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.cancel();
    token.cancel();
    // Callback only fires once
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('throwIfCancelled does nothing when not cancelled', () => {
    const token = new CancellationToken();
    expect(() => token.throwIfCancelled()).not.toThrow();
  });

  it('throwIfCancelled throws CancellationError when cancelled', () => {
    const token = new CancellationToken();
    token.cancel();
    expect(() => token.throwIfCancelled()).toThrow(CancellationError);
    expect(() => token.throwIfCancelled()).toThrow('Operation was cancelled');
  });

  it('onCancel fires callback on cancel', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.cancel();
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('onCancel fires immediately if already cancelled', () => {
    const token = new CancellationToken();
    token.cancel();
    const callback = vi.fn();
    token.onCancel(callback);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('onCancel deduplicates same callback reference', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.onCancel(callback); // Same reference
    token.cancel();
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it('onCancel supports multiple different callbacks', () => {
    const token = new CancellationToken();
    const cb1 = vi.fn();
    const cb2 = vi.fn();
    token.onCancel(cb1);
    token.onCancel(cb2);
    token.cancel();
    expect(cb1).toHaveBeenCalledTimes(1);
    expect(cb2).toHaveBeenCalledTimes(1);
  });

  it('offCancel removes callback so it does not fire', () => {
    const token = new CancellationToken();
    const callback = vi.fn();
    token.onCancel(callback);
    token.offCancel(callback);
    token.cancel();
    expect(callback).not.toHaveBeenCalled();
  });

  it('exposes the reason and aborts the signal', () => {
    const token = new CancellationToken();
    token.cancel('deadline');
    expect(token.reason).toBe('deadline');
    expect(token.signal.aborted).toBe(true);
    expect(() => token.throwIfCancelled()).toThrow('Invocation deadline exceeded');
  });
});

describe('CancellationToken.sleep()', () => {
  it('resolves true after sleep completes', async () => {
    const token = new CancellationToken();
    const result = await token.sleep(10);
    expect(result).toBe(true);
  });

  it('resolves false immediately if already cancelled', async () => {
    const token = new CancellationToken();
    token.cancel();
    const start = Date.now();
    const result = await token.sleep(10_000);
    const elapsed = Date.now() - start;
    expect(result).toBe(false);
    expect(elapsed).toBeLessThan(100);
  });

  it('resolves false when cancelled during sleep', async () => {
    const token = new CancellationToken();
    const promise = token.sleep(10_000);
    // Cancel after a short delay
    setTimeout(() => token.cancel(), 20);
    const start = Date.now();
    const result = await promise;
    const elapsed = Date.now() - start;
    expect(result).toBe(false);
    expect(elapsed).toBeLessThan(5_000);
  });
});

describe('CancellationToken.withDeadline()', () => {
  it('cancels with reason "deadline" when the timer fires', async () => {
    vi.useFakeTimers();
    const token = CancellationToken.withDeadline(50);
    await vi.advanceTimersByTimeAsync(49);
    expect(token.isCancelled).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    expect(token.isCancelled).toBe(true);
    expect(token.reason).toBe('deadline');
    vi.useRealTimers();
  });

  it('follows the parent token', () => {
    const parent = new CancellationToken();
    const child = CancellationToken.withDeadline(undefined, parent);
    parent.cancel();
    expect(child.isCancelled).toBe(true);
    expect(child.reason).toBe('cancelled');
  });

  it('dispose() stops the deadline and detaches from the parent', async () => {
    vi.useFakeTimers();
    const parent = new CancellationToken();
    const child = CancellationToken.withDeadline(10, parent);
    child.dispose();
    await vi.advanceTimersByTimeAsync(20);
    parent.cancel();
    expect(child.isCancelled).toBe(false);
    vi.useRealTimers();
  });
});

describe('CancellationToken.race()', () => {
  it('settles with the work when it finishes first', async () => {
    const token = new CancellationToken();
    await expect(token.race(Promise.resolve(42))).resolves.toBe(42);
  });

  it('rejects with CancellationError when cancelled first', async () => {
    const token = new CancellationToken();
    const pending = token.race(new Promise<never>(() => {}));
    token.cancel();
    await expect(pending).rejects.toBeInstanceOf(CancellationError);
  });
});

describe('CancellationError', () => {
  it('has correct name', () => {
    const err = new CancellationError('test');
    expect(err.name).toBe('CancellationError');
    expect(err.message).toBe('test');
    expect(err).toBeInstanceOf(Error);
  });
});
