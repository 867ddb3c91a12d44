import { isTransientError } from '@/lib/errors';

export interface RetryPolicy {
  /** Total attempts including the first call. */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
}

export interface RetryOptions extends Partial<RetryPolicy> {
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const DEFAULT_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 8_000,
  backoffFactor: 2
};

export function computeBackoffDelay(attempt: number, policy: RetryPolicy): number {
  const delay = policy.initialDelayMs * policy.backoffFactor ** (attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or attempts run out.
 * The last error is rethrown unchanged so callers keep its code.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const policy: RetryPolicy = {
    maxAttempts: options.maxAttempts ?? DEFAULT_POLICY.maxAttempts,
    initialDelayMs: options.initialDelayMs ?? DEFAULT_POLICY.initialDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_POLICY.maxDelayMs,
    backoffFactor: options.backoffFactor ?? DEFAULT_POLICY.backoffFactor
  };
  const isRetryable = options.isRetryable ?? isTransientError;
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (
        attempt >= policy.maxAttempts ||
        !isRetryable(error) ||
        options.signal?.aborted
      ) {
        throw error;
      }

      const delay = computeBackoffDelay(attempt, policy);
      options.onRetry?.(attempt, error, delay);
      await wait(delay, options.signal);
    }
  }

  throw lastError;
}
