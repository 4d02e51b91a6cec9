/**
 * @coffer/store — Transaction runner.
 *
 * Wraps a unit of work: begin (taking locks), run the body, commit.
 * Any error from the body rolls the unit back and propagates. A commit
 * that loses a version race is re-run from scratch with a fresh unit.
 */

import type { InMemoryStore } from "./in-memory-store.js";
import type { BeginOptions, Tables, UnitOfWork } from "./types.js";
import { StoreError } from "./types.js";
import { DEFAULT_RETRY_CONFIG, RetryExhaustedError, sleep, withRetry } from "./retry.js";
import type { RetryConfig } from "./retry.js";

export interface TransactionOptions extends BeginOptions {
  readonly retry?: RetryConfig | undefined;
  /** Injectable for tests */
  readonly sleepFn?: ((ms: number) => Promise<void>) | undefined;
}

export function isConcurrencyConflict(err: unknown): boolean {
  return err instanceof StoreError && err.code === "CONCURRENCY_CONFLICT";
}

/**
 * Run `fn` inside a unit of work and commit its writes.
 *
 * The body may be async, but it should not await anything slow: the
 * unit's locks stay held until it returns.
 *
 * @throws StoreError LOCK_TIMEOUT when the locks cannot be taken in time
 * @throws StoreError CONCURRENCY_CONFLICT when every retry lost the race
 */
export async function runInTransaction<T extends Tables<T>, R>(
  store: InMemoryStore<T>,
  fn: (uow: UnitOfWork<T>) => R | Promise<R>,
  options: TransactionOptions = {},
): Promise<R> {
  const attempt = async (): Promise<R> => {
    const uow = await store.begin(options);
    try {
      const result = await fn(uow);
      uow.commit();
      return result;
    } finally {
      uow.rollback();
    }
  };

  try {
    return await withRetry(
      attempt,
      options.retry ?? DEFAULT_RETRY_CONFIG,
      isConcurrencyConflict,
      options.sleepFn ?? sleep,
    );
  } catch (err: unknown) {
    if (err instanceof RetryExhaustedError) {
      throw err.lastError;
    }
    throw err;
  }
}
