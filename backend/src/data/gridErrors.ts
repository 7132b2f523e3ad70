export class GridRateLimitError extends Error {
  retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super(message);
    this.name = 'GridRateLimitError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class GridRequestError extends Error {
  /** HTTP status; undefined for network failures and GraphQL-level errors. */
  status?: number;
  network: boolean;

  constructor(message: string, opts: { status?: number; network?: boolean; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'GridRequestError';
    this.status = opts.status;
    this.network = opts.network ?? false;
  }
}

export function isGridRateLimitError(err: unknown): err is GridRateLimitError {
  return err instanceof GridRateLimitError;
}

export function isGridRequestError(err: unknown): err is GridRequestError {
  return err instanceof GridRequestError;
}

/**
 * 429, 5xx and network failures are worth another attempt; everything else is not.
 */
export function isRetryableGridError(err: unknown): boolean {
  if (isGridRateLimitError(err)) return true;
  if (!isGridRequestError(err)) return false;
  if (err.network) return true;
  return err.status !== undefined && err.status >= 500;
}

/**
 * `Retry-After` as milliseconds. Accepts delta-seconds or an HTTP date; capped at 10 minutes.
 */
export function parseRetryAfterMs(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const max = 10 * 60 * 1000;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.min(max, Math.max(0, seconds * 1000));
  const dateMs = Date.parse(value);
  if (Number.isFinite(dateMs)) return Math.min(max, Math.max(0, dateMs - now));
  return undefined;
}
