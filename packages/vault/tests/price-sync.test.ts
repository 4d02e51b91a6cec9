/**
 * Tests for price sync planning and time-bounded oracle calls.
 */

import { describe, it, expect } from "vitest";
import type { AssetKind, Holding } from "@coffer/types";
import {
  fetchPrice,
  fetchPrices,
  planSync,
  priceLookupFromMap,
  priceRequestKey,
  uniquePriceRequests,
} from "../src/price-sync.js";
import type { PriceLookup } from "../src/types.js";

const CTX = { assetKind: "stock", market: "US" } as const;

function holding(id: string, symbol: string, assetKind: AssetKind, isActive = true): Holding {
  return {
    id,
    accountId: "acc",
    symbol,
    assetKind,
    market: "US",
    quantity: "1.00000000",
    averageCost: "1.00000000",
    currentPrice: "1.00000000",
    currentValue: "1.00",
    isLiquid: false,
    isActive,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
  };
}

describe("planSync", () => {
  const holdings = [
    holding("h1", "AAPL", "stock"),
    holding("h2", "TB10", "bond"),
    holding("h3", "MMF", "money_market"),
    holding("h4", "BTC", "crypto"),
    holding("h5", "OLD", "stock", false),
    holding("h6", "FUND", "fund"),
  ];

  it("skips excluded kinds and ignores inactive holdings", () => {
    const plan = planSync(holdings);
    expect(plan.eligible.map((h) => h.id)).toEqual(["h1", "h6"]);
    expect(plan.skipped.map((h) => h.id)).toEqual(["h2", "h3", "h4"]);
  });

  it("accepts a custom exclusion list", () => {
    const plan = planSync(holdings, []);
    expect(plan.eligible).toHaveLength(5);
    expect(plan.skipped).toHaveLength(0);
  });
});

describe("uniquePriceRequests", () => {
  it("asks once per symbol, kind and market", () => {
    const other = { ...holding("h9", "AAPL", "stock"), accountId: "acc-2" };
    const requests = uniquePriceRequests([holding("h1", "AAPL", "stock"), other]);
    expect(requests).toEqual([{ symbol: "AAPL", assetKind: "stock", market: "US" }]);
    expect(requests.map(priceRequestKey)).toEqual(["AAPL/stock/US"]);
  });
});

describe("fetchPrice", () => {
  it("canonicalizes a high-precision string price", async () => {
    const lookup: PriceLookup = () => ({ ok: true, price: "190.123456789" });
    await expect(fetchPrice(lookup, "AAPL", CTX)).resolves.toEqual({
      ok: true,
      price: "190.12345679",
    });
  });

  it("canonicalizes a number in exponent notation", async () => {
    const lookup: PriceLookup = async () => ({ ok: true, price: 1.5e-3 });
    await expect(fetchPrice(lookup, "X", CTX)).resolves.toEqual({ ok: true, price: "0.00150000" });
  });

  it("reports a failure answer", async () => {
    const lookup: PriceLookup = () => ({ ok: false, reason: "unknown symbol" });
    await expect(fetchPrice(lookup, "X", CTX)).resolves.toEqual({
      ok: false,
      code: "PRICE_LOOKUP_FAILED",
      reason: "unknown symbol",
    });
  });

  it("turns a thrown error into a failure", async () => {
    const lookup: PriceLookup = () => {
      throw new Error("boom");
    };
    await expect(fetchPrice(lookup, "AAPL", CTX)).resolves.toEqual({
      ok: false,
      code: "PRICE_LOOKUP_FAILED",
      reason: "Price lookup for AAPL threw: boom",
    });
  });

  it("times out a lookup that never answers", async () => {
    const lookup: PriceLookup = () => new Promise(() => undefined);
    await expect(fetchPrice(lookup, "AAPL", CTX, 10)).resolves.toEqual({
      ok: false,
      code: "PRICE_LOOKUP_TIMEOUT",
      reason: "Price lookup for AAPL exceeded 10ms",
    });
  });

  it("rejects unusable prices", async () => {
    for (const price of ["-1", "0", "abc", Number.NaN]) {
      const lookup: PriceLookup = () => ({ ok: true, price });
      const result = await fetchPrice(lookup, "X", CTX);
      expect(result.ok).toBe(false);
    }
  });
});

describe("fetchPrices", () => {
  it("returns one result per request, keyed", async () => {
    const lookup = priceLookupFromMap({ aapl: "190.5" });
    const results = await fetchPrices(lookup, [
      { symbol: "AAPL", assetKind: "stock", market: "US" },
      { symbol: "MSFT", assetKind: "stock", market: "US" },
    ]);

    expect(results.get("AAPL/stock/US")).toEqual({ ok: true, price: "190.50000000" });
    expect(results.get("MSFT/stock/US")).toEqual({
      ok: false,
      code: "PRICE_LOOKUP_FAILED",
      reason: "No price for MSFT",
    });
  });
});
