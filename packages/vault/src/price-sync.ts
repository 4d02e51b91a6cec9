/**
 * @coffer/vault — Price sync.
 *
 * Decides which holdings a price refresh touches and turns oracle
 * answers into canonical prices. Every oracle call is time-bounded;
 * a timeout, a thrown error, a failure answer or an unusable price all
 * become a per-symbol failure result and never abort the batch.
 */

import { PRICE_DECIMALS, canonicalizeDecimal, formatAmount } from "@coffer/ledger";
import type { AssetKind, Holding } from "@coffer/types";
import type {
  PriceLookup,
  PriceLookupContext,
  PriceQuote,
  PriceRequest,
  PriceResult,
} from "./types.js";

/** Asset kinds whose prices are not refreshed by default. */
export const DEFAULT_SYNC_EXCLUDED_ASSET_KINDS: readonly AssetKind[] = [
  "bond",
  "money_market",
  "crypto",
];

export const DEFAULT_PRICE_LOOKUP_TIMEOUT_MS = 5000;

// ─── Planning ────────────────────────────────────────────────────────────

export interface SyncPlan {
  /** Active holdings whose price will be looked up */
  readonly eligible: readonly Holding[];
  /** Active holdings of an excluded asset kind */
  readonly skipped: readonly Holding[];
}

export function planSync(
  holdings: readonly Holding[],
  excluded: readonly AssetKind[] = DEFAULT_SYNC_EXCLUDED_ASSET_KINDS,
): SyncPlan {
  const eligible: Holding[] = [];
  const skipped: Holding[] = [];
  for (const holding of holdings) {
    if (!holding.isActive) continue;
    if (excluded.includes(holding.assetKind)) {
      skipped.push(holding);
    } else {
      eligible.push(holding);
    }
  }
  return { eligible, skipped };
}

/** One oracle call per (symbol, asset kind, market). */
export function priceRequestKey(request: PriceRequest): string {
  return `${request.symbol}/${request.assetKind}/${request.market}`;
}

export function uniquePriceRequests(holdings: readonly Holding[]): readonly PriceRequest[] {
  const requests = new Map<string, PriceRequest>();
  for (const h of holdings) {
    const request = { symbol: h.symbol, assetKind: h.assetKind, market: h.market };
    requests.set(priceRequestKey(request), request);
  }
  return [...requests.values()];
}

// ─── Oracle calls ────────────────────────────────────────────────────────

const TIMED_OUT = Symbol("timed-out");

/**
 * Call the oracle once, bounded by `timeoutMs`, and canonicalize the price.
 */
export async function fetchPrice(
  lookup: PriceLookup,
  symbol: string,
  context: PriceLookupContext,
  timeoutMs: number = DEFAULT_PRICE_LOOKUP_TIMEOUT_MS,
): Promise<PriceResult> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
    timer = setTimeout(() => resolve(TIMED_OUT), timeoutMs);
  });

  let quote: PriceQuote | typeof TIMED_OUT;
  try {
    quote = await Promise.race([Promise.resolve().then(() => lookup(symbol, context)), deadline]);
  } catch (err: unknown) {
    return failed(`Price lookup for ${symbol} threw: ${err instanceof Error ? err.message : String(err)}`);
  } finally {
    clearTimeout(timer);
  }

  if (quote === TIMED_OUT) {
    return {
      ok: false,
      code: "PRICE_LOOKUP_TIMEOUT",
      reason: `Price lookup for ${symbol} exceeded ${String(timeoutMs)}ms`,
    };
  }
  if (!quote.ok) {
    return failed(quote.reason);
  }

  let scaled: bigint;
  try {
    scaled = canonicalizeDecimal(quote.price, PRICE_DECIMALS);
  } catch (err: unknown) {
    return failed(err instanceof Error ? err.message : String(err));
  }
  if (scaled <= 0n) {
    return failed(`Price for ${symbol} must be positive, got ${String(quote.price)}`);
  }

  return { ok: true, price: formatAmount(scaled, PRICE_DECIMALS) };
}

/**
 * Fetch every request concurrently.
 *
 * @returns results keyed by priceRequestKey
 */
export async function fetchPrices(
  lookup: PriceLookup,
  requests: readonly PriceRequest[],
  timeoutMs: number = DEFAULT_PRICE_LOOKUP_TIMEOUT_MS,
): Promise<ReadonlyMap<string, PriceResult>> {
  const entries = await Promise.all(
    requests.map(async (request): Promise<[string, PriceResult]> => [
      priceRequestKey(request),
      await fetchPrice(
        lookup,
        request.symbol,
        { assetKind: request.assetKind, market: request.market },
        timeoutMs,
      ),
    ]),
  );
  return new Map(entries);
}

/**
 * An oracle backed by a fixed symbol → price table.
 * Symbols are matched case-insensitively.
 */
export function priceLookupFromMap(prices: Readonly<Record<string, string | number>>): PriceLookup {
  const table = new Map<string, string | number>();
  for (const [symbol, price] of Object.entries(prices)) {
    table.set(symbol.trim().toUpperCase(), price);
  }
  return (symbol) => {
    const price = table.get(symbol.toUpperCase());
    return price === undefined
      ? { ok: false, reason: `No price for ${symbol}` }
      : { ok: true, price };
  };
}

function failed(reason: string): PriceResult {
  return { ok: false, code: "PRICE_LOOKUP_FAILED", reason };
}
