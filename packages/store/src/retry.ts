/**
 * @coffer/store — Retry with exponential backoff.
 *
 * Re-runs a unit of work that lost an optimistic-concurrency race.
 *
 * Backoff: min(baseDelayMs * 2^attempt + jitter, maxDelayMs)
 * where jitter = random(0, jitterMs)
 */

export interface RetryConfig {
  /** Maximum number of attempts, the first try included. Default: 3 */
  readonly maxAttempts: number;
  /** Delay before the first retry in ms. Default: 5 */
  readonly baseDelayMs: number;
  /** Upper bound on any single delay in ms. Default: 100 */
  readonly maxDelayMs: number;
  /** Maximum random jitter in ms added to each delay. Default: 5 */
  readonly jitterMs: number;
}

/** Contention in memory clears quickly, so delays stay short. */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 5,
  maxDelayMs: 100,
  jitterMs: 5,
};

export class RetryExhaustedError extends Error {
  constructor(
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${String(attempts)} attempts exhausted. Last error: ${msg}`);
    this.name = "RetryExhaustedError";
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * @param attempt - Zero-based retry index (0 = first retry)
 */
export function computeDelay(attempt: number, config: RetryConfig): number {
  const exponential = config.baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * config.jitterMs;
  return Math.min(exponential + jitter, config.maxDelayMs);
}

/**
 * Execute `fn`, retrying while `shouldRetry` accepts the error.
 *
 * @throws RetryExhaustedError when every attempt failed with a retryable error
 * @throws the original error when it is not retryable
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (err: unknown) => boolean = () => true,
  sleepFn: (ms: number) => Promise<void> = sleep,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (!shouldRetry(err)) {
        throw err;
      }

      if (attempt < config.maxAttempts - 1) {
        await sleepFn(computeDelay(attempt, config));
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}
