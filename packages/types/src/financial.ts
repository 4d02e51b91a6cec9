/**
 * Financial Types
 *
 * Core records for personal financial state: accounts, holdings,
 * budgets, liabilities and the transactional events that move money
 * between them.
 *
 * Rules:
 * - All amounts are decimal strings to avoid floating-point errors
 * - Currency and decimals are always explicit on money-bearing records
 * - Records are immutable; state changes produce new records
 */

/**
 * Supported currency identifiers (ISO 4217 codes, e.g. "CNY", "USD").
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "1000") */
  readonly amount: string;

  readonly currency: Currency;

  /** Number of decimal places for this currency (CNY = 2, JPY = 0). */
  readonly decimals: number;
}

// =============================================================================
// Accounts
// =============================================================================

export type AccountKind = "cash" | "investment";

export interface Account {
  readonly id: string;
  readonly name: string;
  readonly kind: AccountKind;
  readonly currency: Currency;
  readonly decimals: number;

  /** Uninvested cash. For investment accounts, cash not yet put into holdings. */
  readonly balance: string;

  /**
   * Cached market value of active, non-liquid holdings.
   * Written only by price sync; projections are computed from holdings.
   */
  readonly holdingsValue: string;

  /** When true, debits that would take the balance below zero are rejected. */
  readonly balanceEnforced: boolean;

  readonly isActive: boolean;
  readonly institution?: string | undefined;
  readonly notes?: string | undefined;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/**
 * Values derived from an account's balance and its active holdings.
 */
export interface ProjectedValues {
  /** balance + every active holding's current value */
  readonly totalValue: string;
  /** balance + active liquid holdings */
  readonly availableCash: string;
  /** active non-liquid holdings */
  readonly investmentValue: string;
}

// =============================================================================
// Holdings & Trades
// =============================================================================

export type AssetKind = "stock" | "fund" | "bond" | "crypto" | "money_market";

export type TradeKind = "buy" | "sell" | "dividend" | "interest";

export interface Holding {
  readonly id: string;
  readonly accountId: string;
  /** Always upper-cased */
  readonly symbol: string;
  readonly assetKind: AssetKind;
  readonly market: string;
  readonly name?: string | undefined;

  readonly quantity: string;
  readonly averageCost: string;
  readonly currentPrice: string;
  /** quantity × currentPrice, at the account's decimals */
  readonly currentValue: string;

  /** T+0 cash equivalent, counted in available cash */
  readonly isLiquid: boolean;
  readonly isActive: boolean;

  readonly lastSyncAt?: string | undefined;
  readonly createdAt: string;
  readonly updatedAt: string;
}

/**
 * The quantity-bearing part of a holding, captured before each trade so
 * that deleting the trade can restore it exactly.
 */
export interface HoldingPosition {
  readonly quantity: string;
  readonly averageCost: string;
}

export interface InvestmentTrade {
  readonly id: string;
  readonly accountId: string;
  /** Null for income trades on a symbol the account never held */
  readonly holdingId: string | null;
  readonly symbol: string;
  readonly assetKind: AssetKind;
  readonly market: string;
  readonly kind: TradeKind;
  readonly quantity: string;
  readonly price: string;
  readonly fees: string;
  /** Signed effect on the account balance: negative for buys */
  readonly cashAmount: string;
  readonly tradeDate: string;
  /** Ordering of quantity-affecting trades within one holding */
  readonly sequence: number;
  /** Position before this trade; null when the trade opened the holding */
  readonly before: HoldingPosition | null;
  readonly cashFlowId: string;
  readonly notes?: string | undefined;
  readonly createdAt: string;
}

// =============================================================================
// Budgets & Expenses
// =============================================================================

export type BudgetKind = "periodic" | "project";

export type BudgetStatus = "active" | "completed" | "cancelled";

/**
 * Figures frozen when a budget is completed.
 */
export interface BudgetFinalSnapshot {
  readonly allocated: string;
  readonly spent: string;
  readonly remaining: string;
  readonly closedAt: string;
}

export interface Budget {
  readonly id: string;
  readonly name: string;
  readonly kind: BudgetKind;
  readonly currency: Currency;
  readonly decimals: number;
  readonly allocated: string;
  readonly spent: string;
  /** Always allocated − spent; may be negative after overspend */
  readonly remaining: string;
  readonly periodStart: string;
  readonly periodEnd: string;
  readonly status: BudgetStatus;
  /** Empty means every account may spend against this budget */
  readonly eligibleAccountIds: readonly string[];
  readonly category?: string | undefined;
  readonly finalSnapshot?: BudgetFinalSnapshot | undefined;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface Expense {
  readonly id: string;
  readonly accountId: string;
  readonly budgetId: string | null;
  readonly amount: string;
  readonly currency: Currency;
  readonly category: string;
  readonly subcategory?: string | undefined;
  readonly expenseDate: string;
  readonly merchant?: string | undefined;
  readonly paymentMethod?: string | undefined;
  readonly isShared: boolean;
  readonly participants: readonly string[];
  readonly tags: readonly string[];
  readonly notes?: string | undefined;
  readonly cashFlowId: string;
  readonly createdAt: string;
}

export interface Income {
  readonly id: string;
  readonly accountId: string;
  readonly amount: string;
  readonly currency: Currency;
  readonly source: string;
  readonly receivedAt: string;
  readonly notes?: string | undefined;
  readonly cashFlowId: string;
  readonly createdAt: string;
}

// =============================================================================
// Liabilities
// =============================================================================

export interface Liability {
  readonly id: string;
  readonly name: string;
  readonly currency: Currency;
  readonly decimals: number;
  /** Principal at creation */
  readonly principal: string;
  readonly outstanding: string;
  readonly notes?: string | undefined;
  readonly createdAt: string;
  readonly updatedAt: string;
}

export interface LiabilityPayment {
  readonly id: string;
  readonly liabilityId: string;
  readonly accountId: string;
  /** Amount the caller asked to pay */
  readonly requested: string;
  /** Amount debited and taken off the principal (differs only when clamped) */
  readonly applied: string;
  readonly paidAt: string;
  readonly cashFlowId: string;
  readonly notes?: string | undefined;
  readonly createdAt: string;
}

// =============================================================================
// Transfers
// =============================================================================

export type TransferKind =
  | "cash_to_cash"
  | "cash_to_investment"
  | "investment_to_cash"
  | "investment_to_investment";

export interface Transfer {
  readonly id: string;
  readonly kind: TransferKind;
  readonly fromAccountId: string;
  readonly toAccountId: string;
  readonly amount: string;
  readonly currency: Currency;
  readonly transferDate: string;
  readonly debitFlowId: string;
  readonly creditFlowId: string;
  readonly notes?: string | undefined;
  readonly createdAt: string;
}

// =============================================================================
// Cash-flow journal
// =============================================================================

export type CashFlowKind =
  | "opening"
  | "income"
  | "expense"
  | "transfer"
  | "investment"
  | "payment";

export type CashFlowLinkType = "expense" | "income" | "trade" | "transfer" | "payment";

export interface CashFlowLink {
  readonly type: CashFlowLinkType;
  readonly id: string;
}

/**
 * One balance-affecting event. Append-only; compensations are new entries.
 */
export interface CashFlowEntry {
  readonly id: string;
  readonly accountId: string;
  /** 1-based, contiguous per account */
  readonly sequence: number;
  readonly kind: CashFlowKind;
  /** Signed delta applied to the balance */
  readonly amount: string;
  readonly balanceAfter: string;
  readonly currency: Currency;
  readonly occurredAt: string;
  readonly description: string;
  readonly link?: CashFlowLink | undefined;
  /** Id of the entry this one compensates */
  readonly reversalOf?: string | undefined;
  readonly previousHash: string;
  readonly hash: string;
}

// =============================================================================
// Market sync
// =============================================================================

export type SyncStatus = "success" | "partial" | "failed";

export interface SyncFailure {
  readonly holdingId: string;
  readonly accountId: string;
  readonly symbol: string;
  readonly code: string;
  readonly reason: string;
}

export interface SyncedAccountValue {
  readonly accountId: string;
  readonly currency: Currency;
  readonly holdingsValue: string;
}

export interface MarketSyncLog {
  readonly id: string;
  readonly accountId: string | null;
  readonly status: SyncStatus;
  readonly holdingsUpdated: number;
  readonly holdingsFailed: number;
  readonly holdingsSkipped: number;
  readonly failures: readonly SyncFailure[];
  /** holdingsValue of each synced account after the run */
  readonly accountValues: readonly SyncedAccountValue[];
  readonly startedAt: string;
  readonly finishedAt: string;
}
