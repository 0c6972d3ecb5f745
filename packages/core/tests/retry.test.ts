import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { backoffDelay, retryWithBackoff, DEFAULT_RETRY_OPTIONS } from '../src/utils/retry';

class TransientError extends Error {}
class FatalError extends Error {}

const isTransient = (error: unknown) => error instanceof TransientError;

describe('backoffDelay', () => {
  it('grows geometrically from the base delay', () => {
    const options = { baseDelayMs: 1000, factor: 2, maxDelayMs: Number.POSITIVE_INFINITY };
    expect([0, 1, 2, 3].map(retry => backoffDelay(retry, options))).toEqual([1000, 2000, 4000, 8000]);
  });

  it('caps each wait at maxDelayMs', () => {
    expect(backoffDelay(5, { baseDelayMs: 100, factor: 3, maxDelayMs: 2500 })).toBe(2500);
  });

  it('defaults to a five second budget starting at one second', () => {
    expect(DEFAULT_RETRY_OPTIONS.maxTimeMs).toBe(5000);
    expect(DEFAULT_RETRY_OPTIONS.baseDelayMs).toBe(1000);
    expect(DEFAULT_RETRY_OPTIONS.jitter).toBe('full');
  });
});

describe('retryWithBackoff', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the first successful result without waiting', async () => {
    const fn = vi.fn(async () => 'ok');

    await expect(retryWithBackoff(fn, { isRetryable: isTransient })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('re-throws a non-retryable failure immediately', async () => {
    const fatal = new FatalError('no');
    const fn = vi.fn(async () => {
      throw fatal;
    });

    await expect(retryWithBackoff(fn, { isRetryable: isTransient })).rejects.toBe(fatal);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('retries transient failures until one succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new TransientError('first'))
      .mockRejectedValueOnce(new TransientError('second'))
      .mockResolvedValueOnce('done');

    const outcome = retryWithBackoff(fn, { isRetryable: isTransient, jitter: 'none' });
    await vi.advanceTimersByTimeAsync(3000);

    await expect(outcome).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('clamps the last wait to the remaining budget and re-throws the last failure', async () => {
    const failures: TransientError[] = [];
    const fn = vi.fn(async () => {
      const failure = new TransientError(`attempt ${failures.length + 1}`);
      failures.push(failure);
      throw failure;
    });
    const onRetry = vi.fn();

    const outcome = retryWithBackoff(fn, {
      isRetryable: isTransient,
      jitter: 'none',
      onRetry,
    }).catch((error: unknown) => error);
    await vi.advanceTimersByTimeAsync(5000);

    expect(await outcome).toBe(failures[3]);
    expect(fn).toHaveBeenCalledTimes(4);
    expect(onRetry.mock.calls.map(([, attempt, delay]) => [attempt, delay])).toEqual([
      [1, 1000],
      [2, 2000],
      [3, 2000],
    ]);
  });

  it('gives up without waiting when the budget is zero', async () => {
    const transient = new TransientError('once');
    const fn = vi.fn(async () => {
      throw transient;
    });

    await expect(retryWithBackoff(fn, { isRetryable: isTransient, maxTimeMs: 0 })).rejects.toBe(transient);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('draws jittered waits below the exponential delay', async () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.5);
    const fn = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new TransientError('first'))
      .mockResolvedValueOnce(42);
    const onRetry = vi.fn();

    const outcome = retryWithBackoff(fn, { isRetryable: isTransient, onRetry });
    await vi.advanceTimersByTimeAsync(500);

    await expect(outcome).resolves.toBe(42);
    expect(onRetry).toHaveBeenCalledWith(expect.any(TransientError), 1, 500);
  });
});
