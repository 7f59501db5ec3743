/**
 * Retry policy for VTN requests
 * Exponential backoff with jitter; the caller decides which failures are worth another attempt.
 */

export interface RetryPolicy {
  /** Attempts after the first one */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
};

/** Request timeout, rate limiting and the gateway/server family */
export const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([408, 429, 500, 502, 503, 504]);

const CONNECTION_FAILURE = /fetch failed|network|timeout|timed out|econnreset|econnrefused|enotfound|socket hang up/i;

export interface RetryOptions extends Partial<RetryPolicy> {
  /** Called with the failure and the attempt that produced it (1-based) */
  shouldRetry: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

/**
 * Thrown once the retries are used up on a failure that was still retryable
 */
export class RetryExhaustedError extends Error {
  readonly lastError: unknown;
  readonly attempts: number;

  constructor(lastError: unknown, attempts: number) {
    super(`Still failing after ${attempts} attempts`);
    this.name = 'RetryExhaustedError';
    this.lastError = lastError;
    this.attempts = attempts;
  }
}

/**
 * Delay before the retry that follows `attempt`: base * 2^(attempt-1), capped, plus up to 10% of
 * the base as jitter.
 */
export function backoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>,
  random: () => number = Math.random
): number {
  if (policy.baseDelayMs <= 0) {
    return 0;
  }
  const exponent = Math.max(1, attempt) - 1;
  const delay = Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs);
  return delay + random() * policy.baseDelayMs * 0.1;
}

export function isTransientStatus(status: number): boolean {
  return TRANSIENT_STATUSES.has(status);
}

/**
 * Whether an error looks like a dropped, refused or timed out connection
 */
export function isConnectionFailure(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }
  return CONNECTION_FAILURE.test(error.message);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `operation` until it succeeds, fails with an error `shouldRetry` rejects, or the retries
 * run out. A non-retryable failure is rethrown as is.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const policy: RetryPolicy = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
  };
  const attempts = policy.maxRetries + 1;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!options.shouldRetry(error, attempt)) {
        throw error;
      }
      if (attempt >= attempts) {
        throw policy.maxRetries > 0 ? new RetryExhaustedError(error, attempt) : error;
      }
      options.onRetry?.(error, attempt);
      await sleep(backoffDelay(attempt, policy));
    }
  }
}
