import { Logger } from './logger';

export type JitterMode = 'full' | 'none';

/**
 * Expiring exponential backoff policy
 */
export interface RetryOptions {
  /** Which failures are worth another attempt */
  isRetryable: (error: unknown) => boolean;
  /** Budget in ms measured from the first attempt; once spent the last failure is re-thrown */
  maxTimeMs: number;
  /** Wait before the first retry */
  baseDelayMs: number;
  /** Growth factor between consecutive waits */
  factor: number;
  /** Upper bound for a single wait */
  maxDelayMs: number;
  /** 'full' draws each wait uniformly from [0, delay) */
  jitter: JitterMode;
  /** Label used in log lines */
  context: string;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY_OPTIONS: Omit<RetryOptions, 'isRetryable'> = {
  maxTimeMs: 5000,
  baseDelayMs: 1000,
  factor: 2,
  maxDelayMs: Number.POSITIVE_INFINITY,
  jitter: 'full',
  context: 'Request',
};

/**
 * Wait before retry number `retry` (0-based), before jitter and budget clamping
 */
export function backoffDelay(
  retry: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'factor' | 'maxDelayMs'>
): number {
  return Math.min(options.baseDelayMs * Math.pow(options.factor, retry), options.maxDelayMs);
}

function applyJitter(delay: number, mode: JitterMode): number {
  return mode === 'full' ? Math.random() * delay : delay;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function, retrying failures accepted by `isRetryable` with
 * exponential backoff until it succeeds or `maxTimeMs` has elapsed.
 *
 * Failures that are not retryable, and the last failure once the budget is
 * spent, are re-thrown unchanged. The budget does not cancel an attempt that
 * is already in flight.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> & Pick<RetryOptions, 'isRetryable'>
): Promise<T> {
  const policy: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const startedAt = Date.now();

  for (let retry = 0; ; retry++) {
    try {
      return await fn();
    } catch (error) {
      if (!policy.isRetryable(error)) {
        throw error;
      }

      const elapsed = Date.now() - startedAt;
      if (elapsed >= policy.maxTimeMs) {
        Logger.debug(
          `[${policy.context}] Retry budget of ${policy.maxTimeMs}ms spent after ${retry + 1} attempts`
        );
        throw error;
      }

      const delay = Math.min(
        applyJitter(backoffDelay(retry, policy), policy.jitter),
        policy.maxTimeMs - elapsed
      );

      Logger.debug(
        `[${policy.context}] Attempt ${retry + 1} failed (${describe(error)}), retrying in ${Math.round(delay)}ms`
      );
      policy.onRetry?.(error, retry + 1, delay);

      await sleep(delay);
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.name : String(error);
}
