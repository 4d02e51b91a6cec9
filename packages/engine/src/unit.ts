/**
 * @coffer/engine — Coffer unit of work.
 *
 * Typed face of one store unit of work for the orchestrator: lookups
 * that fail with the right NOT_FOUND code, writes that remember which
 * aggregates were touched, journal appends chained onto the account's
 * latest entry, and the invariant pass run before commit.
 */

import { createEntry } from "@coffer/ledger";
import type { CashFlowDraft } from "@coffer/ledger";
import type { UnitOfWork } from "@coffer/store";
import type {
  Account,
  Budget,
  CashFlowEntry,
  Expense,
  Holding,
  Income,
  InvestmentTrade,
  Liability,
  LiabilityPayment,
  Transfer,
} from "@coffer/types";
import {
  accountViolations,
  budgetViolations,
  holdingViolations,
  liabilityViolations,
} from "./invariants.js";
import type { CofferTables, EngineErrorCode } from "./types.js";
import { EngineError, IntegrityError } from "./types.js";

// ─── Lock names ──────────────────────────────────────────────────────────

export const accountLock = (id: string): string => `account:${id}`;
export const budgetLock = (id: string): string => `budget:${id}`;
export const liabilityLock = (id: string): string => `liability:${id}`;
/** Serializes the rows that settle a currency's scale */
export const currencyLock = (currency: string): string => `currency:${currency}`;
/** Keyed by holdingKey(), so a holding that does not exist yet can be locked */
export const holdingLock = (key: string): string => `holding:${key}`;

/** Journal fields the caller decides; the unit fills in the rest. */
export type JournalDraft = Omit<CashFlowDraft, "id" | "accountId" | "currency" | "occurredAt">;

export interface TouchedIds {
  readonly accounts: readonly string[];
  readonly budgets: readonly string[];
  readonly holdings: readonly string[];
  readonly liabilities: readonly string[];
}

type Tracked = "accounts" | "budgets" | "holdings" | "liabilities";

export class CofferUnit {
  /** ISO timestamp fixed for the whole unit */
  readonly now: string;
  /** YYYY-MM-DD part of now */
  readonly today: string;

  private readonly _uow: UnitOfWork<CofferTables>;
  private readonly _ids: () => string;
  private readonly _latest = new Map<string, CashFlowEntry>();
  private readonly _touched: Record<Tracked, Set<string>> = {
    accounts: new Set(),
    budgets: new Set(),
    holdings: new Set(),
    liabilities: new Set(),
  };

  constructor(uow: UnitOfWork<CofferTables>, ids: () => string, now: Date) {
    this._uow = uow;
    this._ids = ids;
    this.now = now.toISOString();
    this.today = this.now.slice(0, 10);
  }

  nextId(): string {
    return this._ids();
  }

  // ─── Lookups ────────────────────────────────────────────────────────

  account(id: string): Account {
    return this._require("accounts", id, "ACCOUNT_NOT_FOUND", "Account");
  }

  /** Inactive accounts take no new records. */
  activeAccount(id: string): Account {
    const account = this.account(id);
    if (!account.isActive) {
      throw new EngineError("ACCOUNT_NOT_FOUND", `Account '${id}' is inactive`, {
        accountId: id,
        inactive: true,
      });
    }
    return account;
  }

  budget(id: string): Budget {
    return this._require("budgets", id, "BUDGET_NOT_FOUND", "Budget");
  }

  expense(id: string): Expense {
    return this._require("expenses", id, "EXPENSE_NOT_FOUND", "Expense");
  }

  income(id: string): Income {
    return this._require("incomes", id, "INCOME_NOT_FOUND", "Income");
  }

  trade(id: string): InvestmentTrade {
    return this._require("trades", id, "TRADE_NOT_FOUND", "Trade");
  }

  transfer(id: string): Transfer {
    return this._require("transfers", id, "TRANSFER_NOT_FOUND", "Transfer");
  }

  liability(id: string): Liability {
    return this._require("liabilities", id, "LIABILITY_NOT_FOUND", "Liability");
  }

  payment(id: string): LiabilityPayment {
    return this._require("payments", id, "PAYMENT_NOT_FOUND", "Payment");
  }

  holding(id: string): Holding {
    return this._require("holdings", id, "HOLDING_NOT_FOUND", "Holding");
  }

  /**
   * Decimal scale already in use for `currency` by an account, budget
   * or liability, if any.
   */
  currencyScale(currency: string): number | undefined {
    for (const table of ["accounts", "budgets", "liabilities"] as const) {
      const row = this._uow.list(table, (r) => r.currency === currency)[0];
      if (row !== undefined) return row.decimals;
    }
    return undefined;
  }

  list<K extends keyof CofferTables>(
    table: K,
    predicate?: (row: CofferTables[K]) => boolean,
  ): readonly CofferTables[K][] {
    return this._uow.list(table, predicate);
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  /** Insert or replace a row. */
  put<K extends keyof CofferTables>(table: K, row: CofferTables[K]): void {
    if (this._uow.get(table, row.id) === undefined) {
      this._uow.insert(table, row);
    } else {
      this._uow.update(table, row);
    }
    this._track(table, row.id);
  }

  remove<K extends keyof CofferTables>(table: K, id: string): void {
    this._uow.delete(table, id);
    this._track(table, id);
  }

  /**
   * Append the next journal entry of an account. `account` must already
   * carry the balance the entry moves it to.
   */
  journal(account: Account, draft: JournalDraft): CashFlowEntry {
    const entry = createEntry(
      this.latestEntry(account.id),
      {
        ...draft,
        id: this.nextId(),
        accountId: account.id,
        currency: account.currency,
        occurredAt: this.now,
      },
      account.decimals,
    );
    this._uow.insert("cashFlows", entry);
    this._latest.set(account.id, entry);
    this._touched.accounts.add(account.id);
    return entry;
  }

  latestEntry(accountId: string): CashFlowEntry | undefined {
    const cached = this._latest.get(accountId);
    if (cached !== undefined) return cached;

    let latest: CashFlowEntry | undefined;
    for (const entry of this._uow.list("cashFlows", (e) => e.accountId === accountId)) {
      if (latest === undefined || entry.sequence > latest.sequence) latest = entry;
    }
    if (latest !== undefined) this._latest.set(accountId, latest);
    return latest;
  }

  // ─── Invariants ─────────────────────────────────────────────────────

  get touched(): TouchedIds {
    return {
      accounts: [...this._touched.accounts],
      budgets: [...this._touched.budgets],
      holdings: [...this._touched.holdings],
      liabilities: [...this._touched.liabilities],
    };
  }

  /**
   * @throws IntegrityError listing every broken invariant
   */
  verify(): void {
    const violations: string[] = [];

    for (const id of this._touched.accounts) {
      const account = this._uow.get("accounts", id);
      if (account !== undefined) {
        violations.push(...accountViolations(account, this.latestEntry(id)));
      }
    }
    for (const id of this._touched.budgets) {
      const budget = this._uow.get("budgets", id);
      if (budget !== undefined) violations.push(...budgetViolations(budget));
    }
    for (const id of this._touched.holdings) {
      const holding = this._uow.get("holdings", id);
      if (holding !== undefined) violations.push(...holdingViolations(holding));
    }
    for (const id of this._touched.liabilities) {
      const liability = this._uow.get("liabilities", id);
      if (liability !== undefined) violations.push(...liabilityViolations(liability));
    }

    if (violations.length > 0) {
      throw new IntegrityError(`Invariant check failed: ${violations.join("; ")}`, {
        violations,
      });
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _require<K extends keyof CofferTables>(
    table: K,
    id: string,
    code: EngineErrorCode,
    label: string,
  ): CofferTables[K] {
    const row = this._uow.get(table, id);
    if (row === undefined) {
      throw new EngineError(code, `${label} '${id}' not found`, { id });
    }
    return row;
  }

  private _track(table: keyof CofferTables, id: string): void {
    if (
      table === "accounts" ||
      table === "budgets" ||
      table === "holdings" ||
      table === "liabilities"
    ) {
      this._touched[table].add(id);
    }
  }
}
