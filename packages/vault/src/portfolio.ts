/**
 * @coffer/vault — Portfolio summary.
 *
 * Cost basis, market value and unrealized profit/loss per holding of
 * one investment account, plus the account's value projections.
 *
 * Rules:
 * - Read-only: derived entirely from the account and its holdings
 * - Only active holdings of the account are listed
 * - Amounts use the account's decimals
 */

import {
  PRICE_DECIMALS,
  QUANTITY_DECIMALS,
  divideScaled,
  formatAmount,
  multiplyScaled,
  parseAmount,
  projectedValues,
} from "@coffer/ledger";
import type { Account, Holding } from "@coffer/types";
import type { HoldingPerformance, PortfolioSummary } from "./types.js";

/** Percent values carry two decimals. */
const PERCENT_DECIMALS = 2;

export function holdingPerformance(holding: Holding, decimals: number): HoldingPerformance {
  const quantity = parseAmount(holding.quantity, QUANTITY_DECIMALS);
  const cost = multiplyScaled(
    quantity,
    QUANTITY_DECIMALS,
    parseAmount(holding.averageCost, PRICE_DECIMALS),
    PRICE_DECIMALS,
    decimals,
  );
  const value = parseAmount(holding.currentValue, decimals);
  const pnl = value - cost;

  const percent = cost === 0n
    ? null
    : formatAmount(
        divideScaled(pnl * 100n, decimals, cost, decimals, PERCENT_DECIMALS),
        PERCENT_DECIMALS,
      );

  return {
    holdingId: holding.id,
    symbol: holding.symbol,
    assetKind: holding.assetKind,
    market: holding.market,
    quantity: holding.quantity,
    averageCost: holding.averageCost,
    currentPrice: holding.currentPrice,
    costBasis: formatAmount(cost, decimals),
    marketValue: formatAmount(value, decimals),
    unrealizedPnl: formatAmount(pnl, decimals),
    unrealizedPnlPercent: percent,
    isLiquid: holding.isLiquid,
  };
}

export function summarizePortfolio(
  account: Account,
  holdings: readonly Holding[],
): PortfolioSummary {
  const own = holdings
    .filter((h) => h.accountId === account.id && h.isActive)
    .sort((a, b) => a.symbol.localeCompare(b.symbol));

  const rows = own.map((h) => holdingPerformance(h, account.decimals));

  let cost = 0n;
  let value = 0n;
  for (const row of rows) {
    cost += parseAmount(row.costBasis, account.decimals);
    value += parseAmount(row.marketValue, account.decimals);
  }

  const projections = projectedValues(account, own);

  return {
    accountId: account.id,
    currency: account.currency,
    holdings: rows,
    totalCostBasis: formatAmount(cost, account.decimals),
    totalMarketValue: formatAmount(value, account.decimals),
    totalUnrealizedPnl: formatAmount(value - cost, account.decimals),
    cashBalance: account.balance,
    totalValue: projections.totalValue,
    availableCash: projections.availableCash,
    investmentValue: projections.investmentValue,
  };
}
