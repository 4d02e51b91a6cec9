/**
 * @coffer/store — Core types.
 *
 * Defines the unit of work that wraps every multi-row mutation.
 *
 * Design principles:
 * - A unit of work either commits every buffered write or none of them
 * - Writes are invisible to other readers until commit
 * - Rows carry a version; commit fails if a row read by the unit changed
 *   underneath it (optimistic concurrency)
 * - Row locks named at begin() are held until commit or rollback
 */

import { DomainError } from "@coffer/types";
import type { ErrorDetails } from "@coffer/types";

// =============================================================================
// Tables
// =============================================================================

/** Every row is addressed by a string id. */
export interface Row {
  readonly id: string;
}

/**
 * A table map: table name → row type.
 *
 * @example
 * interface MyTables { accounts: Account; budgets: Budget }
 */
export type Tables<T> = { [K in keyof T]: Row };

export type TableName<T> = keyof T & string;

/** Rows of every table, keyed by table name. */
export type TableRows<T> = { [K in keyof T]?: readonly T[K][] };

// =============================================================================
// Unit of Work
// =============================================================================

export type UnitOfWorkState = "open" | "committed" | "rolled_back";

/**
 * A transaction over the store.
 *
 * Reads see the unit's own pending writes first, then committed state.
 * Every row read is remembered with its version for the commit check.
 */
export interface UnitOfWork<T extends Tables<T>> {
  readonly id: string;
  readonly state: UnitOfWorkState;

  get<K extends TableName<T>>(table: K, id: string): T[K] | undefined;
  list<K extends TableName<T>>(
    table: K,
    predicate?: (row: T[K]) => boolean,
  ): readonly T[K][];

  /** @throws StoreError DUPLICATE_ROW if the id is already taken */
  insert<K extends TableName<T>>(table: K, row: T[K]): void;
  /** @throws StoreError ROW_NOT_FOUND if there is nothing to replace */
  update<K extends TableName<T>>(table: K, row: T[K]): void;
  /** @throws StoreError ROW_NOT_FOUND if there is nothing to delete */
  delete<K extends TableName<T>>(table: K, id: string): void;

  /**
   * Apply every buffered write atomically and release locks.
   * @throws StoreError CONCURRENCY_CONFLICT if a row read by this unit changed
   */
  commit(): void;

  /** Discard buffered writes and release locks. */
  rollback(): void;
}

export interface BeginOptions {
  /** Row locks to hold for the lifetime of the unit */
  readonly lockKeys?: readonly string[] | undefined;
  /** Bound on lock acquisition. Default: the store's lockTimeoutMs */
  readonly lockTimeoutMs?: number | undefined;
}

export interface StoreOptions {
  /** Default bound on lock acquisition in ms. Default: 5000 */
  readonly lockTimeoutMs?: number | undefined;
}

// =============================================================================
// Snapshots
// =============================================================================

/**
 * Serializable copy of every committed row.
 */
export interface StoreSnapshot<T> {
  readonly version: 1;
  readonly tables: TableRows<T>;
  readonly createdAt: string;
}

// =============================================================================
// Errors
// =============================================================================

export type StoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "LOCK_TIMEOUT"
  | "TRANSACTION_CLOSED"
  | "DUPLICATE_ROW"
  | "ROW_NOT_FOUND"
  | "SNAPSHOT_CORRUPT";

export class StoreError extends DomainError<StoreErrorCode> {
  constructor(code: StoreErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = "StoreError";
  }
}
