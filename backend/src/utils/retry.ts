import { RetryExhaustedError, isRetryable } from './errors';

export interface RetryOptions {
  label: string;
  maxAttempts: number;
  delayMs: number;
  // Runs before attempt 2..N, e.g. to switch proxy
  onRetry?: (attempt: number, error: unknown) => Promise<void> | void;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Try `fn` up to `maxAttempts` times. Non-retryable errors are rethrown as they are;
 * running out of attempts throws RetryExhaustedError with the last failure as cause.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (attempt > 1) {
      await wait(options.delayMs);
      if (options.onRetry) await options.onRetry(attempt, lastError);
    }

    try {
      return await fn(attempt);
    } catch (error) {
      if (!shouldRetry(error)) throw error;
      lastError = error;
    }
  }

  throw new RetryExhaustedError(options.label, maxAttempts, lastError);
}
