/**
 * @coffer/engine — Types.
 *
 * Table layout, configuration, operation inputs and read models of
 * the transaction orchestrator.
 */

import { DomainError } from "@coffer/types";
import type {
  Account,
  AccountKind,
  AssetKind,
  Budget,
  BudgetKind,
  CashFlowEntry,
  Currency,
  ErrorDetails,
  Expense,
  Holding,
  Income,
  InvestmentTrade,
  Liability,
  LiabilityPayment,
  MarketSyncLog,
  ProjectedValues,
  TradeKind,
  Transfer,
} from "@coffer/types";
import type { ReconciliationResult } from "@coffer/ledger";
import type { InMemoryStore, RetryConfig } from "@coffer/store";
import type {
  OverpaymentPolicy,
  OverspendPolicy,
  PriceLookup,
  TerminalUnlinkPolicy,
} from "@coffer/vault";
import type { Logger } from "pino";

// =============================================================================
// Tables
// =============================================================================

export interface CofferTables {
  accounts: Account;
  holdings: Holding;
  trades: InvestmentTrade;
  budgets: Budget;
  expenses: Expense;
  incomes: Income;
  liabilities: Liability;
  payments: LiabilityPayment;
  transfers: Transfer;
  cashFlows: CashFlowEntry;
  syncLogs: MarketSyncLog;
}

export const TABLE_NAMES = [
  "accounts",
  "holdings",
  "trades",
  "budgets",
  "expenses",
  "incomes",
  "liabilities",
  "payments",
  "transfers",
  "cashFlows",
  "syncLogs",
] as const satisfies readonly (keyof CofferTables)[];

export type CofferStore = InMemoryStore<CofferTables>;

// =============================================================================
// Errors
// =============================================================================

export type EngineErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_INPUT"
  | "INVALID_TRANSFER"
  | "INVALID_ACCOUNT_KIND"
  | "CURRENCY_MISMATCH"
  | "ACCOUNT_NOT_FOUND"
  | "BUDGET_NOT_FOUND"
  | "EXPENSE_NOT_FOUND"
  | "INCOME_NOT_FOUND"
  | "TRADE_NOT_FOUND"
  | "TRANSFER_NOT_FOUND"
  | "LIABILITY_NOT_FOUND"
  | "PAYMENT_NOT_FOUND"
  | "HOLDING_NOT_FOUND"
  | "BUDGET_IN_USE"
  | "LIABILITY_IN_USE";

export class EngineError extends DomainError<EngineErrorCode> {
  constructor(code: EngineErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = "EngineError";
  }
}

/**
 * A post-mutation invariant failed. Always aborts the unit of work;
 * it points at a bug, not at bad input.
 */
export class IntegrityError extends DomainError<"INTEGRITY_VIOLATION"> {
  constructor(message: string, details?: ErrorDetails) {
    super("INTEGRITY_VIOLATION", message, details);
    this.name = "IntegrityError";
  }
}

// =============================================================================
// Configuration
// =============================================================================

export interface EngineOptions {
  readonly store?: CofferStore | undefined;
  /** Default: () => new Date() */
  readonly clock?: (() => Date) | undefined;
  /** Default: crypto.randomUUID */
  readonly ids?: (() => string) | undefined;
  /** Default: a silent pino logger */
  readonly logger?: Logger | undefined;
  /** Currency of new accounts, budgets and liabilities. Default: CNY */
  readonly defaultCurrency?: Currency | undefined;
  /** Default: 2 */
  readonly defaultDecimals?: number | undefined;
  /** Default: allow */
  readonly overspendPolicy?: OverspendPolicy | undefined;
  /** Default: reject */
  readonly overpaymentPolicy?: OverpaymentPolicy | undefined;
  /** Default: adjust */
  readonly terminalUnlinkPolicy?: TerminalUnlinkPolicy | undefined;
  /** Default: bond, money_market, crypto */
  readonly syncExcludedAssetKinds?: readonly AssetKind[] | undefined;
  /** Default: 5000 */
  readonly priceLookupTimeoutMs?: number | undefined;
  /** Default: 5000 */
  readonly lockTimeoutMs?: number | undefined;
  /** Retry of units that lose a version race */
  readonly retry?: RetryConfig | undefined;
}

export interface EngineSettings {
  readonly defaultCurrency: Currency;
  readonly defaultDecimals: number;
  readonly overspendPolicy: OverspendPolicy;
  readonly overpaymentPolicy: OverpaymentPolicy;
  readonly terminalUnlinkPolicy: TerminalUnlinkPolicy;
  readonly syncExcludedAssetKinds: readonly AssetKind[];
  readonly priceLookupTimeoutMs: number;
  readonly lockTimeoutMs: number;
}

// =============================================================================
// Inputs
// =============================================================================

export interface CreateAccountInput {
  readonly name: string;
  readonly kind: AccountKind;
  readonly currency?: Currency | undefined;
  readonly decimals?: number | undefined;
  readonly openingBalance?: string | undefined;
  readonly balanceEnforced?: boolean | undefined;
  readonly institution?: string | undefined;
  readonly notes?: string | undefined;
}

/** Descriptive fields only; null clears an optional one. */
export interface UpdateAccountInput {
  readonly name?: string | undefined;
  readonly institution?: string | null | undefined;
  readonly notes?: string | null | undefined;
}

export interface ListAccountsFilter {
  readonly kind?: AccountKind | undefined;
  readonly includeInactive?: boolean | undefined;
}

export interface RecordIncomeInput {
  readonly accountId: string;
  readonly amount: string;
  readonly source: string;
  /** YYYY-MM-DD. Default: today */
  readonly receivedAt?: string | undefined;
  readonly notes?: string | undefined;
}

export interface RecordExpenseInput {
  readonly accountId: string;
  readonly amount: string;
  readonly category: string;
  readonly budgetId?: string | undefined;
  readonly subcategory?: string | undefined;
  /** ISO date. Default: today */
  readonly expenseDate?: string | undefined;
  readonly merchant?: string | undefined;
  readonly paymentMethod?: string | undefined;
  readonly isShared?: boolean | undefined;
  readonly participants?: readonly string[] | undefined;
  readonly tags?: readonly string[] | undefined;
  readonly notes?: string | undefined;
}

export interface ExpenseFilter {
  readonly accountId?: string | undefined;
  readonly budgetId?: string | undefined;
  readonly category?: string | undefined;
  /** Inclusive ISO date */
  readonly from?: string | undefined;
  /** Inclusive ISO date */
  readonly to?: string | undefined;
}

export interface CreateTransferInput {
  readonly fromAccountId: string;
  readonly toAccountId: string;
  readonly amount: string;
  readonly transferDate?: string | undefined;
  readonly notes?: string | undefined;
}

export interface RecordTradeInput {
  readonly accountId: string;
  readonly symbol: string;
  readonly assetKind: AssetKind;
  /** Default: "default" */
  readonly market?: string | undefined;
  readonly kind: TradeKind;
  readonly quantity: string;
  readonly price: string;
  /** Default: 0 */
  readonly fees?: string | undefined;
  readonly tradeDate?: string | undefined;
  readonly name?: string | undefined;
  readonly isLiquid?: boolean | undefined;
  readonly notes?: string | undefined;
}

export interface HoldingFilter {
  readonly accountId?: string | undefined;
  readonly includeInactive?: boolean | undefined;
}

export interface CreateBudgetInput {
  readonly name: string;
  readonly kind: BudgetKind;
  readonly allocated: string;
  readonly periodStart: string;
  readonly periodEnd: string;
  readonly currency?: Currency | undefined;
  readonly eligibleAccountIds?: readonly string[] | undefined;
  readonly category?: string | undefined;
}

export interface CreateLiabilityInput {
  readonly name: string;
  readonly principal: string;
  readonly currency?: Currency | undefined;
  readonly notes?: string | undefined;
}

export interface RecordPaymentInput {
  readonly liabilityId: string;
  readonly accountId: string;
  readonly amount: string;
  readonly paidAt?: string | undefined;
  readonly notes?: string | undefined;
}

export interface SyncOptions {
  readonly lookup: PriceLookup;
  /** Restrict the refresh to one account */
  readonly accountId?: string | undefined;
}

// =============================================================================
// Read models
// =============================================================================

export interface AccountView extends Account, ProjectedValues {}

export interface BudgetFunds {
  readonly budgetId: string;
  readonly currency: Currency;
  readonly availableFunds: string;
  readonly accounts: readonly { readonly accountId: string; readonly availableCash: string }[];
}

export interface CurrencyTotals {
  readonly currency: Currency;
  readonly totalAssets: string;
  readonly availableCash: string;
  readonly investmentValue: string;
  readonly liabilitiesOutstanding: string;
  readonly netWorth: string;
}

export interface Dashboard {
  readonly asOf: string;
  readonly accountCount: number;
  readonly totals: readonly CurrencyTotals[];
  /** Active budgets, soonest period end first */
  readonly activeBudgets: readonly Budget[];
}

export interface JournalReport {
  readonly checkedAt: string;
  readonly valid: boolean;
  readonly accounts: readonly ReconciliationResult[];
}
