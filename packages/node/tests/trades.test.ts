/**
 * Tests for trade, holding, portfolio and sync routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { priceLookupFromMap } from "@coffer/vault";
import type { AppInstance } from "../src/app.js";
import { create, createTestApp, jsonRequest } from "./setup.js";
import type { DataBody, ErrorBody, PageBody } from "./setup.js";

interface TradeBody {
  id: string;
  symbol: string;
  cashAmount: string;
  holdingId: string | null;
}

interface HoldingBody {
  id: string;
  symbol: string;
  quantity: string;
  averageCost: string;
  currentPrice: string;
  currentValue: string;
  isActive: boolean;
}

interface SyncLogBody {
  id: string;
  status: string;
  holdingsUpdated: number;
  holdingsFailed: number;
  accountValues: { accountId: string; holdingsValue: string }[];
}

let instance: AppInstance;
let broker: { id: string };

async function buyApple(app: AppInstance = instance): Promise<TradeBody> {
  return create<TradeBody>(app, "/api/v1/trades", {
    accountId: broker.id,
    symbol: "aapl",
    assetKind: "stock",
    kind: "buy",
    quantity: "10",
    price: "100",
    fees: "5",
  });
}

beforeEach(async () => {
  instance = createTestApp();
  broker = await create(instance, "/api/v1/accounts", { name: "Broker", kind: "investment", openingBalance: "10000" });
});

// =============================================================================
// Trades & holdings
// =============================================================================

describe("trades", () => {
  it("records a buy and opens a holding", async () => {
    const trade = await buyApple();
    expect(trade).toMatchObject({ symbol: "AAPL", cashAmount: "-1005.00" });

    const res = await instance.app.request(`/api/v1/holdings?accountId=${broker.id}`);
    const body = (await res.json()) as PageBody<HoldingBody>;
    expect(body.data).toHaveLength(1);
    expect(body.data[0]).toMatchObject({
      id: trade.holdingId,
      quantity: "10.00000000",
      averageCost: "100.50000000",
      currentValue: "1000.00",
    });
  });

  it("returns 400 INVALID_ACCOUNT_KIND for a trade on a cash account", async () => {
    const wallet = await create(instance, "/api/v1/accounts", { name: "Wallet", kind: "cash", openingBalance: "100" });
    const res = await instance.app.request(
      jsonRequest("/api/v1/trades", "POST", {
        accountId: wallet.id, symbol: "AAPL", assetKind: "stock", kind: "buy", quantity: "1", price: "10",
      }),
    );
    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("INVALID_ACCOUNT_KIND");
  });

  it("returns 422 INSUFFICIENT_HOLDING_QUANTITY for an oversell", async () => {
    await buyApple();
    const res = await instance.app.request(
      jsonRequest("/api/v1/trades", "POST", {
        accountId: broker.id, symbol: "AAPL", assetKind: "stock", kind: "sell", quantity: "11", price: "100",
      }),
    );
    expect(res.status).toBe(422);
    expect(((await res.json()) as ErrorBody).error.code).toBe("INSUFFICIENT_HOLDING_QUANTITY");
  });

  it("deletes the only trade and deactivates its holding", async () => {
    const trade = await buyApple();
    const res = await instance.app.request(jsonRequest(`/api/v1/trades/${trade.id}`, "DELETE"));
    expect(res.status).toBe(204);

    const active = (await (await instance.app.request("/api/v1/holdings")).json()) as PageBody<HoldingBody>;
    expect(active.data).toEqual([]);
    const all = (await (
      await instance.app.request("/api/v1/holdings?includeInactive=true")
    ).json()) as PageBody<HoldingBody>;
    expect(all.data.map((h) => h.isActive)).toEqual([false]);

    const account = (await (
      await instance.app.request(`/api/v1/accounts/${broker.id}`)
    ).json()) as DataBody<{ balance: string }>;
    expect(account.data.balance).toBe("10000.00");
  });

  it("reports the portfolio of an account", async () => {
    await buyApple();
    const res = await instance.app.request(`/api/v1/accounts/${broker.id}/portfolio`);
    expect(res.status).toBe(200);
    const body = (await res.json()) as DataBody<{
      totalCostBasis: string;
      totalValue: string;
      holdings: { unrealizedPnl: string; unrealizedPnlPercent: string }[];
    }>;
    expect(body.data.totalCostBasis).toBe("1005.00");
    expect(body.data.totalValue).toBe("9995.00");
    expect(body.data.holdings[0]).toMatchObject({ unrealizedPnl: "-5.00", unrealizedPnlPercent: "-0.50" });
  });
});

// =============================================================================
// Sync
// =============================================================================

describe("POST /api/v1/sync", () => {
  it("reprices holdings from the prices in the request", async () => {
    await buyApple();
    const res = await instance.app.request(jsonRequest("/api/v1/sync", "POST", { prices: { AAPL: "150" } }));

    expect(res.status).toBe(200);
    const body = (await res.json()) as DataBody<SyncLogBody>;
    expect(body.data).toMatchObject({
      status: "success",
      holdingsUpdated: 1,
      holdingsFailed: 0,
      accountValues: [{ accountId: broker.id, holdingsValue: "1500.00" }],
    });
  });

  it("accepts numeric prices", async () => {
    await buyApple();
    const res = await instance.app.request(jsonRequest("/api/v1/sync", "POST", { prices: { AAPL: 120.5 } }));
    const body = (await res.json()) as DataBody<SyncLogBody>;
    expect(body.data.accountValues[0]?.holdingsValue).toBe("1205.00");
  });

  it("falls back to the configured price feed", async () => {
    const fed = createTestApp({ priceLookup: priceLookupFromMap({ AAPL: "140" }) });
    broker = await create(fed, "/api/v1/accounts", { name: "Broker", kind: "investment", openingBalance: "10000" });
    await buyApple(fed);

    const res = await fed.app.request(jsonRequest("/api/v1/sync", "POST", {}));
    const body = (await res.json()) as DataBody<SyncLogBody>;
    expect(body.data.accountValues).toEqual([{ accountId: broker.id, currency: "CNY", holdingsValue: "1400.00" }]);
  });

  it("returns 400 INVALID_INPUT when there is no price source", async () => {
    const res = await instance.app.request(jsonRequest("/api/v1/sync", "POST", {}));
    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("INVALID_INPUT");
  });

  it("reports a partial run without failing the request", async () => {
    await buyApple();
    await create(instance, "/api/v1/trades", {
      accountId: broker.id, symbol: "MSFT", assetKind: "stock", kind: "buy", quantity: "1", price: "200",
    });

    const res = await instance.app.request(jsonRequest("/api/v1/sync", "POST", { prices: { AAPL: "150" } }));
    expect(res.status).toBe(200);
    const body = (await res.json()) as DataBody<SyncLogBody>;
    expect(body.data).toMatchObject({ status: "partial", holdingsUpdated: 1, holdingsFailed: 1 });
  });

  it("returns 404 for an unknown account", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/sync", "POST", { prices: {}, accountId: "missing" }),
    );
    expect(res.status).toBe(404);
  });

  it("lists sync logs in the order they ran", async () => {
    await buyApple();
    const first = await instance.app.request(jsonRequest("/api/v1/sync", "POST", { prices: { AAPL: "150" } }));
    const second = await instance.app.request(jsonRequest("/api/v1/sync", "POST", { prices: { AAPL: "151" } }));
    const ids = [
      ((await first.json()) as DataBody<SyncLogBody>).data.id,
      ((await second.json()) as DataBody<SyncLogBody>).data.id,
    ];

    const res = await instance.app.request("/api/v1/sync/logs");
    const body = (await res.json()) as PageBody<SyncLogBody>;
    expect(body.data.map((l) => l.id)).toEqual(ids);
  });
});
