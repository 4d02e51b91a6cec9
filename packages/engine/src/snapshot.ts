/**
 * @coffer/engine — Snapshot parsing.
 *
 * Turns the JSON state of a snapshot file back into typed tables.
 * Every row is checked against the shape of its table; a single bad
 * row rejects the whole snapshot.
 */

import type { StoreSnapshot, TableRows } from "@coffer/store";
import {
  isAccountKind,
  isAssetKind,
  isBudgetKind,
  isBudgetStatus,
  isCashFlowEntry,
  isDecimalString,
  isTradeKind,
} from "@coffer/types";
import type {
  Account,
  Budget,
  Expense,
  Holding,
  Income,
  InvestmentTrade,
  Liability,
  LiabilityPayment,
  MarketSyncLog,
  Transfer,
} from "@coffer/types";
import type { CofferTables } from "./types.js";

// ─── Row guards ──────────────────────────────────────────────────────────

function record(value: unknown): Record<string, unknown> | undefined {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : undefined;
}

function hasId(v: Record<string, unknown>): boolean {
  return typeof v["id"] === "string" && typeof v["createdAt"] === "string";
}

function isAccount(value: unknown): value is Account {
  const v = record(value);
  return v !== undefined && hasId(v) &&
    isAccountKind(v["kind"]) &&
    typeof v["currency"] === "string" &&
    typeof v["decimals"] === "number" &&
    isDecimalString(v["balance"]) &&
    isDecimalString(v["holdingsValue"]) &&
    typeof v["balanceEnforced"] === "boolean" &&
    typeof v["isActive"] === "boolean";
}

function isHolding(value: unknown): value is Holding {
  const v = record(value);
  return v !== undefined && hasId(v) &&
    typeof v["accountId"] === "string" &&
    typeof v["symbol"] === "string" &&
    isAssetKind(v["assetKind"]) &&
    typeof v["market"] === "string" &&
    isDecimalString(v["quantity"]) &&
    isDecimalString(v["averageCost"]) &&
    isDecimalString(v["currentPrice"]) &&
    isDecimalString(v["currentValue"]) &&
    typeof v["isLiquid"] === "boolean" &&
    typeof v["isActive"] === "boolean";
}

function isTrade(value: unknown): value is InvestmentTrade {
  const v = record(value);
  return v !== undefined && hasId(v) &&
    typeof v["accountId"] === "string" &&
    (v["holdingId"] === null || typeof v["holdingId"] === "string") &&
    isTradeKind(v["kind"]) &&
    isAssetKind(v["assetKind"]) &&
    isDecimalString(v["quantity"]) &&
    isDecimalString(v["price"]) &&
    isDecimalString(v["fees"]) &&
    isDecimalString(v["cashAmount"]) &&
    typeof v["sequence"] === "number" &&
    typeof v["cashFlowId"] === "string";
}

function isBudget(value: unknown): value is Budget {
  const v = record(value);
  return v !== undefined && hasId(v) &&
    isBudgetKind(v["kind"]) &&
    isBudgetStatus(v["status"]) &&
    isDecimalString(v["allocated"]) &&
    isDecimalString(v["spent"]) &&
    isDecimalString(v["remaining"]) &&
    Array.isArray(v["eligibleAccountIds"]);
}

function isExpense(value: unknown): value is Expense {
  const v = record(value);
  return v !== undefined && hasId(v) &&
    typeof v["accountId"] === "string" &&
    (v["budgetId"] === null || typeof v["budgetId"] === "string") &&
    isDecimalString(v["amount"]) &&
    typeof v["category"] === "string" &&
    typeof v["cashFlowId"] === "string";
}

function isIncome(value: unknown): value is Income {
  const v = record(value);
  return v !== undefined && hasId(v) &&
    typeof v["accountId"] === "string" &&
    isDecimalString(v["amount"]) &&
    typeof v["cashFlowId"] === "string";
}

function isLiability(value: unknown): value is Liability {
  const v = record(value);
  return v !== undefined && hasId(v) &&
    isDecimalString(v["principal"]) &&
    isDecimalString(v["outstanding"]) &&
    typeof v["decimals"] === "number";
}

function isPayment(value: unknown): value is LiabilityPayment {
  const v = record(value);
  return v !== undefined && hasId(v) &&
    typeof v["liabilityId"] === "string" &&
    typeof v["accountId"] === "string" &&
    isDecimalString(v["applied"]) &&
    typeof v["cashFlowId"] === "string";
}

function isTransfer(value: unknown): value is Transfer {
  const v = record(value);
  return v !== undefined && hasId(v) &&
    typeof v["fromAccountId"] === "string" &&
    typeof v["toAccountId"] === "string" &&
    isDecimalString(v["amount"]) &&
    typeof v["debitFlowId"] === "string" &&
    typeof v["creditFlowId"] === "string";
}

function isSyncLog(value: unknown): value is MarketSyncLog {
  const v = record(value);
  return v !== undefined &&
    typeof v["id"] === "string" &&
    typeof v["status"] === "string" &&
    Array.isArray(v["failures"]) &&
    typeof v["startedAt"] === "string";
}

// ─── Parser ──────────────────────────────────────────────────────────────

function rowsOf<R>(
  tables: Record<string, unknown>,
  name: keyof CofferTables,
  guard: (value: unknown) => value is R,
): R[] {
  const rows = tables[name] ?? [];
  if (!Array.isArray(rows)) {
    throw new Error(`table '${name}' is not an array`);
  }
  const parsed: R[] = [];
  rows.forEach((row: unknown, index) => {
    if (!guard(row)) {
      throw new Error(`table '${name}' row ${String(index)} is malformed`);
    }
    parsed.push(row);
  });
  return parsed;
}

/**
 * @throws Error naming the first malformed table or row
 */
export function parseCofferSnapshot(state: unknown): StoreSnapshot<CofferTables> {
  const v = record(state);
  const createdAt = v?.["createdAt"];
  if (v === undefined || v["version"] !== 1 || typeof createdAt !== "string") {
    throw new Error("not a version 1 snapshot");
  }
  const raw = record(v["tables"]);
  if (raw === undefined) {
    throw new Error("snapshot has no tables");
  }

  const tables: TableRows<CofferTables> = {
    accounts: rowsOf(raw, "accounts", isAccount),
    holdings: rowsOf(raw, "holdings", isHolding),
    trades: rowsOf(raw, "trades", isTrade),
    budgets: rowsOf(raw, "budgets", isBudget),
    expenses: rowsOf(raw, "expenses", isExpense),
    incomes: rowsOf(raw, "incomes", isIncome),
    liabilities: rowsOf(raw, "liabilities", isLiability),
    payments: rowsOf(raw, "payments", isPayment),
    transfers: rowsOf(raw, "transfers", isTransfer),
    cashFlows: rowsOf(raw, "cashFlows", isCashFlowEntry),
    syncLogs: rowsOf(raw, "syncLogs", isSyncLog),
  };

  return { version: 1, tables, createdAt };
}
