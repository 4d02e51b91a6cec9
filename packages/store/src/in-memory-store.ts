/**
 * @coffer/store — In-memory row store with units of work.
 *
 * Rows live in per-table Maps. Every committed write stamps the row
 * with a store-wide, monotonically increasing version, so a reader can
 * tell whether a row changed since it looked (deleted and re-created
 * rows never reuse a version).
 *
 * Properties:
 * - Commit is synchronous: all writes of a unit land in one tick, so no
 *   reader ever observes half of a unit
 * - Row locks (see RowLockManager) serialize units touching the same keys
 * - Rows read without a lock are still protected by the version check
 * - No durability on its own; see FileSnapshotStore
 */

import type {
  BeginOptions,
  StoreOptions,
  StoreSnapshot,
  TableName,
  TableRows,
  Tables,
  UnitOfWork,
  UnitOfWorkState,
} from "./types.js";
import { StoreError } from "./types.js";
import { RowLockManager } from "./lock-manager.js";
import type { LockHandle } from "./lock-manager.js";

// =============================================================================
// Internal structures
// =============================================================================

interface VersionedRow<R> {
  readonly row: R;
  readonly version: number;
}

type TableData<T> = { [K in keyof T]?: Map<string, VersionedRow<T[K]>> };

type PendingWrites<T> = { [K in keyof T]?: Map<string, T[K] | null> };

interface ReadMark {
  readonly table: string;
  readonly id: string;
  /** 0 when the row did not exist */
  readonly version: number;
  readonly current: () => number;
}

interface Committed<T> {
  readonly data: TableData<T>;
  nextVersion(): number;
}

function tableOf<T, K extends keyof T>(
  data: TableData<T>,
  name: K,
): Map<string, VersionedRow<T[K]>> {
  let table: Map<string, VersionedRow<T[K]>> | undefined = data[name];
  if (table === undefined) {
    table = new Map();
    data[name] = table;
  }
  return table;
}

function pendingOf<T, K extends keyof T>(
  writes: PendingWrites<T>,
  name: K,
): Map<string, T[K] | null> {
  let pending: Map<string, T[K] | null> | undefined = writes[name];
  if (pending === undefined) {
    pending = new Map();
    writes[name] = pending;
  }
  return pending;
}

// =============================================================================
// Store
// =============================================================================

export class InMemoryStore<T extends Tables<T>> {
  private readonly _data: TableData<T> = {};
  private readonly _tableNames: readonly TableName<T>[];
  private readonly _locks = new RowLockManager();
  private readonly _lockTimeoutMs: number;
  private _version = 0;
  private _nextUnitId = 1;

  constructor(tableNames: readonly TableName<T>[], options?: StoreOptions) {
    this._tableNames = [...tableNames];
    this._lockTimeoutMs = options?.lockTimeoutMs ?? 5000;
  }

  /** The lock manager shared by every unit of this store. */
  get locks(): RowLockManager {
    return this._locks;
  }

  get tableNames(): readonly TableName<T>[] {
    return this._tableNames;
  }

  // ─── Units of work ──────────────────────────────────────────────────

  /**
   * Start a unit of work, first acquiring the requested row locks.
   *
   * @throws StoreError LOCK_TIMEOUT
   */
  async begin(options?: BeginOptions): Promise<UnitOfWork<T>> {
    const lock = await this._locks.acquire(
      options?.lockKeys ?? [],
      options?.lockTimeoutMs ?? this._lockTimeoutMs,
    );

    const committed: Committed<T> = {
      data: this._data,
      nextVersion: () => ++this._version,
    };

    return new InMemoryUnitOfWork<T>(`uow-${String(this._nextUnitId++)}`, committed, lock);
  }

  // ─── Committed reads ────────────────────────────────────────────────

  get<K extends TableName<T>>(table: K, id: string): T[K] | undefined {
    return this._data[table]?.get(id)?.row;
  }

  list<K extends TableName<T>>(
    table: K,
    predicate?: (row: T[K]) => boolean,
  ): readonly T[K][] {
    const rows: T[K][] = [];
    const data = this._data[table];
    if (data === undefined) return rows;
    for (const { row } of data.values()) {
      if (predicate === undefined || predicate(row)) {
        rows.push(row);
      }
    }
    return rows;
  }

  /** Current version of a row, 0 when absent. */
  versionOf<K extends TableName<T>>(table: K, id: string): number {
    return this._data[table]?.get(id)?.version ?? 0;
  }

  count<K extends TableName<T>>(table: K): number {
    return this._data[table]?.size ?? 0;
  }

  // ─── Snapshot ───────────────────────────────────────────────────────

  snapshot(): StoreSnapshot<T> {
    const tables: TableRows<T> = {};
    for (const name of this._tableNames) {
      this._copyTable(name, tables);
    }
    return { version: 1, tables, createdAt: new Date().toISOString() };
  }

  /**
   * Replace all committed rows with the snapshot's rows.
   * Must not be called while units are in flight.
   */
  restore(snapshot: StoreSnapshot<T>): void {
    for (const name of this._tableNames) {
      this._restoreTable(name, snapshot.tables);
    }
  }

  private _copyTable<K extends TableName<T>>(name: K, into: TableRows<T>): void {
    into[name] = this.list(name);
  }

  private _restoreTable<K extends TableName<T>>(name: K, from: TableRows<T>): void {
    const table = tableOf(this._data, name);
    table.clear();
    for (const row of from[name] ?? []) {
      table.set(row.id, { row, version: ++this._version });
    }
  }
}

// =============================================================================
// Unit of Work
// =============================================================================

class InMemoryUnitOfWork<T extends Tables<T>> implements UnitOfWork<T> {
  readonly id: string;
  private _state: UnitOfWorkState = "open";
  private readonly _committed: Committed<T>;
  private readonly _lock: LockHandle;
  private readonly _writes: PendingWrites<T> = {};
  private readonly _touched = new Set<TableName<T>>();
  private readonly _reads = new Map<string, ReadMark>();

  constructor(id: string, committed: Committed<T>, lock: LockHandle) {
    this.id = id;
    this._committed = committed;
    this._lock = lock;
  }

  get state(): UnitOfWorkState {
    return this._state;
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  get<K extends TableName<T>>(table: K, id: string): T[K] | undefined {
    this._assertOpen();
    const pending = this._writes[table];
    if (pending !== undefined && pending.has(id)) {
      return pending.get(id) ?? undefined;
    }
    return this._readCommitted(table, id);
  }

  list<K extends TableName<T>>(
    table: K,
    predicate?: (row: T[K]) => boolean,
  ): readonly T[K][] {
    this._assertOpen();
    const pending = this._writes[table];
    const rows: T[K][] = [];
    const committed = this._committed.data[table];

    if (committed !== undefined) {
      for (const [id, entry] of committed) {
        if (pending !== undefined && pending.has(id)) continue;
        // only rows the unit actually sees take part in the commit check
        if (predicate === undefined || predicate(entry.row)) {
          this._mark(table, id, entry.version);
          rows.push(entry.row);
        }
      }
    }

    if (pending !== undefined) {
      for (const row of pending.values()) {
        if (row !== null && (predicate === undefined || predicate(row))) {
          rows.push(row);
        }
      }
    }

    return rows;
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  insert<K extends TableName<T>>(table: K, row: T[K]): void {
    this._assertOpen();
    if (this.get(table, row.id) !== undefined) {
      throw new StoreError("DUPLICATE_ROW", `Row '${row.id}' already exists in '${table}'`, {
        table,
        id: row.id,
      });
    }
    this._stage(table, row.id, row);
  }

  update<K extends TableName<T>>(table: K, row: T[K]): void {
    this._assertOpen();
    if (this.get(table, row.id) === undefined) {
      throw new StoreError("ROW_NOT_FOUND", `No row '${row.id}' in '${table}' to update`, {
        table,
        id: row.id,
      });
    }
    this._stage(table, row.id, row);
  }

  delete<K extends TableName<T>>(table: K, id: string): void {
    this._assertOpen();
    if (this.get(table, id) === undefined) {
      throw new StoreError("ROW_NOT_FOUND", `No row '${id}' in '${table}' to delete`, {
        table,
        id,
      });
    }
    this._stage(table, id, null);
  }

  // ─── Completion ─────────────────────────────────────────────────────

  commit(): void {
    this._assertOpen();

    for (const mark of this._reads.values()) {
      if (mark.current() !== mark.version) {
        this.rollback();
        throw new StoreError(
          "CONCURRENCY_CONFLICT",
          `Row '${mark.id}' in '${mark.table}' changed during the unit of work`,
          { table: mark.table, id: mark.id },
        );
      }
    }

    for (const table of this._touched) {
      this._flush(table);
    }

    this._state = "committed";
    this._lock.release();
  }

  rollback(): void {
    if (this._state !== "open") return;
    this._state = "rolled_back";
    this._lock.release();
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _assertOpen(): void {
    if (this._state !== "open") {
      throw new StoreError("TRANSACTION_CLOSED", `Unit of work ${this.id} is ${this._state}`);
    }
  }

  private _readCommitted<K extends TableName<T>>(table: K, id: string): T[K] | undefined {
    const entry = this._committed.data[table]?.get(id);
    this._mark(table, id, entry?.version ?? 0);
    return entry?.row;
  }

  private _mark<K extends TableName<T>>(table: K, id: string, version: number): void {
    const key = `${table}\u0000${id}`;
    if (!this._reads.has(key)) {
      const data = this._committed.data;
      this._reads.set(key, {
        table,
        id,
        version,
        current: () => data[table]?.get(id)?.version ?? 0,
      });
    }
  }

  private _stage<K extends TableName<T>>(table: K, id: string, row: T[K] | null): void {
    // make sure the committed version is remembered before overwriting
    if (!this._reads.has(`${table}\u0000${id}`)) {
      this._readCommitted(table, id);
    }
    pendingOf(this._writes, table).set(id, row);
    this._touched.add(table);
  }

  private _flush<K extends TableName<T>>(table: K): void {
    const pending = this._writes[table];
    if (pending === undefined) return;
    const committed = tableOf(this._committed.data, table);
    for (const [id, row] of pending) {
      if (row === null) {
        committed.delete(id);
      } else {
        committed.set(id, { row, version: this._committed.nextVersion() });
      }
    }
  }
}
