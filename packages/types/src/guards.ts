/**
 * Runtime Type Guards
 *
 * Narrowing functions for domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, restored snapshots, oracle responses).
 */

import type {
  Money,
  AccountKind,
  AssetKind,
  TradeKind,
  BudgetKind,
  BudgetStatus,
  CashFlowKind,
  CashFlowEntry,
} from "./financial.js";

// =============================================================================
// Scalar guards
// =============================================================================

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

const ACCOUNT_KINDS = new Set<string>(["cash", "investment"]);
const ASSET_KINDS = new Set<string>(["stock", "fund", "bond", "crypto", "money_market"]);
const TRADE_KINDS = new Set<string>(["buy", "sell", "dividend", "interest"]);
const BUDGET_KINDS = new Set<string>(["periodic", "project"]);
const BUDGET_STATUSES = new Set<string>(["active", "completed", "cancelled"]);
const CASH_FLOW_KINDS = new Set<string>([
  "opening", "income", "expense", "transfer", "investment", "payment",
]);

/** A plain decimal string: optional minus, digits, optional fraction. */
export function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && DECIMAL_PATTERN.test(value);
}

export function isAccountKind(value: unknown): value is AccountKind {
  return typeof value === "string" && ACCOUNT_KINDS.has(value);
}

export function isAssetKind(value: unknown): value is AssetKind {
  return typeof value === "string" && ASSET_KINDS.has(value);
}

export function isTradeKind(value: unknown): value is TradeKind {
  return typeof value === "string" && TRADE_KINDS.has(value);
}

export function isBudgetKind(value: unknown): value is BudgetKind {
  return typeof value === "string" && BUDGET_KINDS.has(value);
}

export function isBudgetStatus(value: unknown): value is BudgetStatus {
  return typeof value === "string" && BUDGET_STATUSES.has(value);
}

export function isCashFlowKind(value: unknown): value is CashFlowKind {
  return typeof value === "string" && CASH_FLOW_KINDS.has(value);
}

// =============================================================================
// Record guards
// =============================================================================

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isDecimalString(v.amount) &&
    typeof v.currency === "string" &&
    v.currency.length > 0 &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0
  );
}

export function isCashFlowEntry(value: unknown): value is CashFlowEntry {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.accountId === "string" &&
    typeof v.sequence === "number" &&
    Number.isInteger(v.sequence) &&
    v.sequence >= 1 &&
    isCashFlowKind(v.kind) &&
    isDecimalString(v.amount) &&
    isDecimalString(v.balanceAfter) &&
    typeof v.currency === "string" &&
    typeof v.occurredAt === "string" &&
    typeof v.previousHash === "string" &&
    typeof v.hash === "string"
  );
}
