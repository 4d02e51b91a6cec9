/**
 * @coffer/store
 *
 * Transactional in-memory row store: units of work with all-or-nothing
 * commit, optimistic version checks, FIFO row locks with a bounded wait,
 * and hash-verified snapshot files.
 */

export type {
  Row,
  Tables,
  TableName,
  TableRows,
  UnitOfWork,
  UnitOfWorkState,
  BeginOptions,
  StoreOptions,
  StoreSnapshot,
  StoreErrorCode,
} from "./types.js";
export { StoreError } from "./types.js";

export { RowLockManager } from "./lock-manager.js";
export type { LockHandle } from "./lock-manager.js";

export { InMemoryStore } from "./in-memory-store.js";

export {
  withRetry,
  computeDelay,
  sleep,
  RetryExhaustedError,
  DEFAULT_RETRY_CONFIG,
} from "./retry.js";
export type { RetryConfig } from "./retry.js";

export { runInTransaction, isConcurrencyConflict } from "./transaction.js";
export type { TransactionOptions } from "./transaction.js";

export { FileSnapshotStore, computeSnapshotHash } from "./snapshot-store.js";
export type { StoredSnapshot, SnapshotParser } from "./snapshot-store.js";
