export interface RetryOptions {
  /** Retries after the first attempt; total attempts = retries + 1. */
  retries: number;
  baseDelayMs: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

function retryAfterOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('retryAfterMs' in error)) return undefined;
  const value = error.retryAfterMs;
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : undefined;
}

/**
 * Runs `fn` with exponential backoff. A `retryAfterMs` on the thrown error overrides the
 * computed delay. Non-retryable errors are rethrown immediately.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 0; attempt <= options.retries; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === options.retries) break;
      if (options.isRetryable && !options.isRetryable(error)) throw error;

      const delayMs = retryAfterOf(error) ?? options.baseDelayMs * Math.pow(2, attempt);
      options.onRetry?.({ attempt: attempt + 1, delayMs, error });
      await wait(delayMs);
    }
  }

  throw lastError;
}
