/**
 * @coffer/vault — Position, budget and debt trackers.
 *
 * Pure state transitions over the records in @coffer/types:
 * - Holdings: moving-average cost, trade cash effects, replay
 * - Budgets: spend tracking and the active → completed / cancelled lifecycle
 * - Liabilities: payments against outstanding principal
 * - Price sync: planning and time-bounded oracle calls
 * - Portfolio: cost basis and unrealized profit/loss
 *
 * Nothing here performs I/O or keeps state between calls; the engine
 * persists what these functions return.
 */

// Holdings
export {
  EMPTY_POSITION,
  normalizeSymbol,
  holdingKey,
  defaultIsLiquid,
  positionValue,
  applyTrade,
  replayTrades,
  positionOf,
  openHolding,
  withPosition,
  repriceHolding,
} from "./holdings.js";

// Budgets
export { BudgetTracker, budgetArithmeticHolds } from "./budget.js";

// Liabilities
export { LiabilityTracker } from "./liability.js";

// Price sync
export {
  DEFAULT_SYNC_EXCLUDED_ASSET_KINDS,
  DEFAULT_PRICE_LOOKUP_TIMEOUT_MS,
  planSync,
  priceRequestKey,
  uniquePriceRequests,
  fetchPrice,
  fetchPrices,
  priceLookupFromMap,
} from "./price-sync.js";
export type { SyncPlan } from "./price-sync.js";

// Portfolio
export { holdingPerformance, summarizePortfolio } from "./portfolio.js";

// Types
export { VaultError, DEFAULT_BUDGET_POLICIES } from "./types.js";
export type {
  VaultErrorCode,
  OverspendPolicy,
  OverpaymentPolicy,
  TerminalUnlinkPolicy,
  BudgetPolicies,
  TradeRequest,
  TradeEffect,
  NewHoldingParams,
  CreateBudgetParams,
  LinkingAccount,
  CreateLiabilityParams,
  PaymentEffect,
  PriceQuote,
  PriceLookupContext,
  PriceLookup,
  PriceResult,
  PriceRequest,
  HoldingPerformance,
  PortfolioSummary,
} from "./types.js";
