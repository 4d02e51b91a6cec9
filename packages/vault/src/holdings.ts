/**
 * @coffer/vault — Holding Store.
 *
 * Quantity, moving-average cost and market value of one position.
 *
 * Rules:
 * - Quantities, prices and average cost carry 8 decimals
 * - Buy: avg = (oldQ × oldAvg + q × p + fees) / (oldQ + q), rounded half-up
 * - Sell never touches the average cost and never exceeds the quantity
 * - Dividend and interest move cash only
 * - Cash effects are rounded to the account's decimals before fees apply
 */

import {
  PRICE_DECIMALS,
  QUANTITY_DECIMALS,
  divideScaled,
  formatAmount,
  multiplyScaled,
  parseAmount,
  rescale,
} from "@coffer/ledger";
import type { AssetKind, Holding, HoldingPosition } from "@coffer/types";
import type { NewHoldingParams, TradeEffect, TradeRequest } from "./types.js";
import { VaultError } from "./types.js";

/** Scale of quantity × price products before rounding. */
const PRODUCT_DECIMALS = QUANTITY_DECIMALS + PRICE_DECIMALS;

export const EMPTY_POSITION: HoldingPosition = {
  quantity: formatAmount(0n, QUANTITY_DECIMALS),
  averageCost: formatAmount(0n, PRICE_DECIMALS),
};

// ─── Identity ────────────────────────────────────────────────────────────

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * A position is unique per (account, symbol, asset kind, market).
 * Also used as the row-lock name for the holding.
 */
export function holdingKey(
  accountId: string,
  symbol: string,
  assetKind: AssetKind,
  market: string,
): string {
  return `${accountId}/${normalizeSymbol(symbol)}/${assetKind}/${market}`;
}

/** Money-market funds settle T+0 and count as available cash. */
export function defaultIsLiquid(assetKind: AssetKind): boolean {
  return assetKind === "money_market";
}

// ─── Valuation ───────────────────────────────────────────────────────────

/**
 * quantity × price rounded to the account's decimals.
 */
export function positionValue(quantity: string, price: string, decimals: number): string {
  const value = multiplyScaled(
    parseAmount(quantity, QUANTITY_DECIMALS),
    QUANTITY_DECIMALS,
    parseAmount(price, PRICE_DECIMALS),
    PRICE_DECIMALS,
    decimals,
  );
  return formatAmount(value, decimals);
}

// ─── Trades ──────────────────────────────────────────────────────────────

function parseTrade(request: TradeRequest, decimals: number) {
  const quantity = parseAmount(request.quantity, QUANTITY_DECIMALS);
  const price = parseAmount(request.price, PRICE_DECIMALS);
  const fees = parseAmount(request.fees, decimals);

  if (quantity <= 0n) {
    throw new VaultError("INVALID_AMOUNT", `Trade quantity must be positive, got '${request.quantity}'`);
  }
  if (price <= 0n) {
    throw new VaultError("INVALID_AMOUNT", `Trade price must be positive, got '${request.price}'`);
  }
  if (fees < 0n) {
    throw new VaultError("INVALID_AMOUNT", `Fees cannot be negative, got '${request.fees}'`);
  }

  return { quantity, price, fees };
}

/**
 * Apply one trade to a position.
 *
 * @param before - The position before the trade; null for a holding
 *   that does not exist yet
 * @param decimals - The account currency's decimals
 * @throws VaultError INSUFFICIENT_HOLDING_QUANTITY when selling more than held
 * @throws VaultError INVALID_AMOUNT for non-positive inputs, or fees that
 *   consume a sale, dividend or interest entirely
 */
export function applyTrade(
  before: HoldingPosition | null,
  request: TradeRequest,
  decimals: number,
): TradeEffect {
  const position = before ?? EMPTY_POSITION;
  const { quantity, price, fees } = parseTrade(request, decimals);
  const heldQuantity = parseAmount(position.quantity, QUANTITY_DECIMALS);
  const heldAverage = parseAmount(position.averageCost, PRICE_DECIMALS);
  const gross = multiplyScaled(quantity, QUANTITY_DECIMALS, price, PRICE_DECIMALS, decimals);

  switch (request.kind) {
    case "buy": {
      const newQuantity = heldQuantity + quantity;
      const totalCost =
        heldQuantity * heldAverage +
        quantity * price +
        rescale(fees, decimals, PRODUCT_DECIMALS);
      const average = divideScaled(
        totalCost,
        PRODUCT_DECIMALS,
        newQuantity,
        QUANTITY_DECIMALS,
        PRICE_DECIMALS,
      );
      return {
        position: {
          quantity: formatAmount(newQuantity, QUANTITY_DECIMALS),
          averageCost: formatAmount(average, PRICE_DECIMALS),
        },
        cashAmount: formatAmount(-(gross + fees), decimals),
      };
    }

    case "sell": {
      if (quantity > heldQuantity) {
        throw new VaultError(
          "INSUFFICIENT_HOLDING_QUANTITY",
          `Cannot sell ${request.quantity}: only ${position.quantity} held`,
          { held: position.quantity, requested: request.quantity },
        );
      }
      return {
        position: {
          quantity: formatAmount(heldQuantity - quantity, QUANTITY_DECIMALS),
          averageCost: position.averageCost,
        },
        cashAmount: netProceeds(gross, fees, decimals, request.kind),
      };
    }

    case "dividend":
    case "interest":
      return {
        position,
        cashAmount: netProceeds(gross, fees, decimals, request.kind),
      };
  }
}

function netProceeds(gross: bigint, fees: bigint, decimals: number, kind: string): string {
  const net = gross - fees;
  if (net <= 0n) {
    throw new VaultError(
      "INVALID_AMOUNT",
      `Fees ${formatAmount(fees, decimals)} leave nothing of the ${kind} proceeds ${formatAmount(gross, decimals)}`,
    );
  }
  return formatAmount(net, decimals);
}

/**
 * Re-apply a sequence of trades on top of a starting position.
 * Used to rebuild a holding after an earlier trade is removed.
 *
 * @returns the position before each trade, and the final position
 */
export function replayTrades(
  start: HoldingPosition | null,
  requests: readonly TradeRequest[],
  decimals: number,
): { readonly befores: readonly HoldingPosition[]; readonly final: HoldingPosition } {
  let position = start ?? EMPTY_POSITION;
  const befores: HoldingPosition[] = [];
  for (const request of requests) {
    befores.push(position);
    position = applyTrade(position, request, decimals).position;
  }
  return { befores, final: position };
}

// ─── Holding records ─────────────────────────────────────────────────────

export function positionOf(holding: Holding): HoldingPosition {
  return { quantity: holding.quantity, averageCost: holding.averageCost };
}

export function openHolding(params: NewHoldingParams, decimals: number): Holding {
  const price = formatAmount(parseAmount(params.price, PRICE_DECIMALS), PRICE_DECIMALS);
  return {
    id: params.id,
    accountId: params.accountId,
    symbol: normalizeSymbol(params.symbol),
    assetKind: params.assetKind,
    market: params.market,
    ...(params.name !== undefined ? { name: params.name } : {}),
    quantity: EMPTY_POSITION.quantity,
    averageCost: EMPTY_POSITION.averageCost,
    currentPrice: price,
    currentValue: formatAmount(0n, decimals),
    isLiquid: params.isLiquid ?? defaultIsLiquid(params.assetKind),
    isActive: true,
    createdAt: params.now,
    updatedAt: params.now,
  };
}

/**
 * Set a new position and recompute the market value. A position at
 * zero quantity deactivates the holding; a positive one reactivates it.
 */
export function withPosition(
  holding: Holding,
  position: HoldingPosition,
  decimals: number,
  now: string,
): Holding {
  const quantity = parseAmount(position.quantity, QUANTITY_DECIMALS);
  if (quantity < 0n) {
    throw new VaultError("INTEGRITY_VIOLATION", `Holding '${holding.id}' quantity would be negative`);
  }
  return {
    ...holding,
    quantity: position.quantity,
    averageCost: position.averageCost,
    currentValue: positionValue(position.quantity, holding.currentPrice, decimals),
    isActive: quantity > 0n,
    updatedAt: now,
  };
}

/**
 * Apply a price from the oracle. Only the price fields change.
 */
export function repriceHolding(
  holding: Holding,
  price: string,
  decimals: number,
  now: string,
): Holding {
  return {
    ...holding,
    currentPrice: price,
    currentValue: positionValue(holding.quantity, price, decimals),
    lastSyncAt: now,
    updatedAt: now,
  };
}
