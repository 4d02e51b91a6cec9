/**
 * @coffer/types — Shared domain types for the coffer stack.
 *
 * These types are used across all packages:
 * - Financial records (accounts, holdings, budgets, liabilities)
 * - Transactional events (expenses, incomes, trades, transfers, payments)
 * - The cash-flow journal
 * - The error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  Money,
  Currency,
  AccountKind,
  Account,
  ProjectedValues,
  AssetKind,
  TradeKind,
  Holding,
  HoldingPosition,
  InvestmentTrade,
  BudgetKind,
  BudgetStatus,
  BudgetFinalSnapshot,
  Budget,
  Expense,
  Income,
  Liability,
  LiabilityPayment,
  TransferKind,
  Transfer,
  CashFlowKind,
  CashFlowLinkType,
  CashFlowLink,
  CashFlowEntry,
  SyncStatus,
  SyncFailure,
  SyncedAccountValue,
  MarketSyncLog,
} from "./financial.js";

// Errors
export {
  DomainError,
  ERROR_CATEGORIES,
  categoryOf,
  isErrorCode,
  isDomainError,
} from "./errors.js";
export type { ErrorCategory, ErrorCode, ErrorDetails } from "./errors.js";

// Runtime type guards
export {
  isDecimalString,
  isAccountKind,
  isAssetKind,
  isTradeKind,
  isBudgetKind,
  isBudgetStatus,
  isCashFlowKind,
  isMoney,
  isCashFlowEntry,
} from "./guards.js";
