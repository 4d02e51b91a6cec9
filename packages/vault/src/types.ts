/**
 * @coffer/vault — Types.
 *
 * Inputs, policies and results of the pure trackers. Records themselves
 * (Holding, Budget, Liability, ...) live in @coffer/types.
 */

import { DomainError } from "@coffer/types";
import type {
  AssetKind,
  BudgetKind,
  Currency,
  ErrorDetails,
  HoldingPosition,
  Liability,
  TradeKind,
} from "@coffer/types";

// =============================================================================
// Errors
// =============================================================================

export type VaultErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_INPUT"
  | "CURRENCY_MISMATCH"
  | "INSUFFICIENT_HOLDING_QUANTITY"
  | "BUDGET_NOT_ACTIVE"
  | "BUDGET_NOT_ELIGIBLE"
  | "UNDERFUNDED_BUDGET"
  | "INVALID_TRANSITION"
  | "OVERPAYMENT_REJECTED"
  | "PRICE_LOOKUP_FAILED"
  | "PRICE_LOOKUP_TIMEOUT"
  | "INTEGRITY_VIOLATION";

export class VaultError extends DomainError<VaultErrorCode> {
  constructor(code: VaultErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = "VaultError";
  }
}

// =============================================================================
// Policies
// =============================================================================

/** Whether an expense may push a budget's remaining below zero. */
export type OverspendPolicy = "allow" | "reject";

/** What a payment larger than the outstanding principal does. */
export type OverpaymentPolicy = "reject" | "clamp";

/**
 * Whether deleting an expense still adjusts `spent` on a completed or
 * cancelled budget.
 */
export type TerminalUnlinkPolicy = "adjust" | "reject";

export interface BudgetPolicies {
  readonly overspend: OverspendPolicy;
  readonly terminalUnlink: TerminalUnlinkPolicy;
}

export const DEFAULT_BUDGET_POLICIES: BudgetPolicies = {
  overspend: "allow",
  terminalUnlink: "adjust",
};

// =============================================================================
// Holdings
// =============================================================================

export interface TradeRequest {
  readonly kind: TradeKind;
  /** Units, up to 8 decimals */
  readonly quantity: string;
  /** Per-unit price, up to 8 decimals */
  readonly price: string;
  /** In the account's currency */
  readonly fees: string;
}

export interface TradeEffect {
  /** Position after the trade; unchanged for dividends and interest */
  readonly position: HoldingPosition;
  /** Signed change to the account's cash, at the account's decimals */
  readonly cashAmount: string;
}

export interface NewHoldingParams {
  readonly id: string;
  readonly accountId: string;
  readonly symbol: string;
  readonly assetKind: AssetKind;
  readonly market: string;
  readonly name?: string | undefined;
  readonly isLiquid?: boolean | undefined;
  readonly price: string;
  readonly now: string;
}

// =============================================================================
// Budgets
// =============================================================================

export interface CreateBudgetParams {
  readonly id: string;
  readonly name: string;
  readonly kind: BudgetKind;
  readonly currency: Currency;
  readonly decimals: number;
  readonly allocated: string;
  /** ISO date (YYYY-MM-DD) */
  readonly periodStart: string;
  /** ISO date (YYYY-MM-DD), not before periodStart */
  readonly periodEnd: string;
  readonly eligibleAccountIds?: readonly string[] | undefined;
  readonly category?: string | undefined;
  readonly now: string;
}

/** The paying side of an expense, as assertCanLink sees it. */
export interface LinkingAccount {
  readonly id: string;
  readonly currency: Currency;
  readonly decimals: number;
}

// =============================================================================
// Liabilities
// =============================================================================

export interface CreateLiabilityParams {
  readonly id: string;
  readonly name: string;
  readonly currency: Currency;
  readonly decimals: number;
  readonly principal: string;
  readonly notes?: string | undefined;
  readonly now: string;
}

export interface PaymentEffect {
  readonly liability: Liability;
  /** Amount actually taken off the principal (and off the paying account) */
  readonly applied: string;
}

// =============================================================================
// Price sync
// =============================================================================

export type PriceQuote =
  | { readonly ok: true; readonly price: string | number }
  | { readonly ok: false; readonly reason: string };

export interface PriceLookupContext {
  readonly assetKind: AssetKind;
  readonly market: string;
}

/**
 * External price oracle. May answer synchronously or asynchronously,
 * may throw; every failure mode is turned into a per-symbol result.
 */
export type PriceLookup = (
  symbol: string,
  context: PriceLookupContext,
) => PriceQuote | Promise<PriceQuote>;

export type PriceResult =
  | { readonly ok: true; readonly price: string }
  | {
      readonly ok: false;
      readonly code: "PRICE_LOOKUP_FAILED" | "PRICE_LOOKUP_TIMEOUT";
      readonly reason: string;
    };

export interface PriceRequest {
  readonly symbol: string;
  readonly assetKind: AssetKind;
  readonly market: string;
}

// =============================================================================
// Portfolio
// =============================================================================

export interface HoldingPerformance {
  readonly holdingId: string;
  readonly symbol: string;
  readonly assetKind: AssetKind;
  readonly market: string;
  readonly quantity: string;
  readonly averageCost: string;
  readonly currentPrice: string;
  /** quantity × averageCost, at the account's decimals */
  readonly costBasis: string;
  readonly marketValue: string;
  readonly unrealizedPnl: string;
  /** Percent with 2 decimals; null when the cost basis is zero */
  readonly unrealizedPnlPercent: string | null;
  readonly isLiquid: boolean;
}

export interface PortfolioSummary {
  readonly accountId: string;
  readonly currency: Currency;
  readonly holdings: readonly HoldingPerformance[];
  readonly totalCostBasis: string;
  readonly totalMarketValue: string;
  readonly totalUnrealizedPnl: string;
  readonly cashBalance: string;
  readonly totalValue: string;
  readonly availableCash: string;
  readonly investmentValue: string;
}
