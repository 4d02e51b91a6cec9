/**
 * Tests for investment trades, holdings and the portfolio view.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { CofferEngine } from "../src/engine.js";
import type { AccountView, RecordTradeInput } from "../src/types.js";
import {
  cashAccount,
  createEngine,
  expectCode,
  expectRejection,
  investmentAccount,
} from "./helpers.js";

describe("trades", () => {
  let engine: CofferEngine;
  let broker: AccountView;

  const trade = (overrides: Partial<RecordTradeInput> = {}): RecordTradeInput => ({
    accountId: broker.id,
    symbol: "aapl",
    assetKind: "stock",
    kind: "buy",
    quantity: "10",
    price: "100",
    ...overrides,
  });

  beforeEach(async () => {
    engine = createEngine();
    broker = await investmentAccount(engine, "Broker", "10000");
  });

  // ─── recordTrade ────────────────────────────────────────────────────

  describe("buy", () => {
    it("opens a holding at the moving-average cost including fees", async () => {
      const recorded = await engine.recordTrade(trade({ fees: "5" }));

      expect(recorded).toMatchObject({
        symbol: "AAPL",
        market: "default",
        quantity: "10.00000000",
        price: "100.00000000",
        fees: "5.00",
        cashAmount: "-1005.00",
        sequence: 1,
        before: null,
      });

      const [holding] = engine.listHoldings({ accountId: broker.id });
      expect(holding).toMatchObject({
        id: recorded.holdingId,
        quantity: "10.00000000",
        averageCost: "100.50000000",
        currentPrice: "100.00000000",
        currentValue: "1000.00",
        isLiquid: false,
        isActive: true,
      });

      const account = engine.getAccount(broker.id);
      expect(account.balance).toBe("8995.00");
      expect(account.totalValue).toBe("9995.00");
      expect(account.availableCash).toBe("8995.00");
      expect(account.investmentValue).toBe("1000.00");
    });

    it("re-averages on a second buy", async () => {
      await engine.recordTrade(trade({ fees: "5" }));
      const second = await engine.recordTrade(trade({ price: "120" }));

      expect(second.sequence).toBe(2);
      expect(second.before).toEqual({ quantity: "10.00000000", averageCost: "100.50000000" });

      const [holding] = engine.listHoldings();
      expect(holding?.quantity).toBe("20.00000000");
      expect(holding?.averageCost).toBe("110.25000000");
      expect(engine.getAccount(broker.id).balance).toBe("7795.00");
    });

    it("journals the cash movement as an investment entry", async () => {
      const recorded = await engine.recordTrade(trade());
      const flows = engine.listCashFlows(broker.id);
      expect(flows[1]).toMatchObject({
        id: recorded.cashFlowId,
        kind: "investment",
        amount: "-1000.00",
        balanceAfter: "9000.00",
        link: { type: "trade", id: recorded.id },
      });
    });

    it("fails with INSUFFICIENT_FUNDS and opens no holding", async () => {
      await expectRejection(engine.recordTrade(trade({ quantity: "1000" })), "INSUFFICIENT_FUNDS");
      expect(engine.listHoldings({ includeInactive: true })).toEqual([]);
      expect(engine.getAccount(broker.id).balance).toBe("10000.00");
    });

    it("counts money-market holdings as available cash", async () => {
      await engine.recordTrade(trade({ symbol: "MMF", assetKind: "money_market", quantity: "500", price: "1" }));
      const account = engine.getAccount(broker.id);
      expect(account.availableCash).toBe("10000.00");
      expect(account.investmentValue).toBe("0.00");
    });

    it("keeps positions apart per market", async () => {
      await engine.recordTrade(trade({ market: "NASDAQ" }));
      await engine.recordTrade(trade({ market: "LSE" }));
      expect(engine.listHoldings()).toHaveLength(2);
    });
  });

  describe("sell", () => {
    beforeEach(async () => {
      await engine.recordTrade(trade({ fees: "5" }));
      await engine.recordTrade(trade({ price: "120" }));
    });

    it("credits net proceeds and keeps the average cost", async () => {
      const sold = await engine.recordTrade(trade({ kind: "sell", quantity: "5", price: "130", fees: "1" }));

      expect(sold.cashAmount).toBe("649.00");
      const [holding] = engine.listHoldings();
      expect(holding?.quantity).toBe("15.00000000");
      expect(holding?.averageCost).toBe("110.25000000");
      expect(engine.getAccount(broker.id).balance).toBe("8444.00");
    });

    it("rejects selling more than is held", async () => {
      await expectRejection(
        engine.recordTrade(trade({ kind: "sell", quantity: "21" })),
        "INSUFFICIENT_HOLDING_QUANTITY",
      );
      expect(engine.getAccount(broker.id).balance).toBe("7795.00");
      expect(engine.listTrades()).toHaveLength(2);
    });

    it("deactivates a holding that is sold out", async () => {
      await engine.recordTrade(trade({ kind: "sell", quantity: "20" }));

      expect(engine.listHoldings()).toEqual([]);
      const [closed] = engine.listHoldings({ includeInactive: true });
      expect(closed?.quantity).toBe("0.00000000");
      expect(closed?.isActive).toBe(false);
    });
  });

  describe("dividend", () => {
    it("moves cash only", async () => {
      const bought = await engine.recordTrade(trade());
      const dividend = await engine.recordTrade(trade({ kind: "dividend", quantity: "10", price: "0.5" }));

      expect(dividend.cashAmount).toBe("5.00");
      expect(dividend.holdingId).toBe(bought.holdingId);
      expect(engine.listHoldings()[0]?.quantity).toBe("10.00000000");
      expect(engine.getAccount(broker.id).balance).toBe("9005.00");
    });
  });

  it("refuses trades on a cash account", async () => {
    const wallet = await cashAccount(engine, "Wallet", "1000");
    await expectRejection(engine.recordTrade(trade({ accountId: wallet.id })), "INVALID_ACCOUNT_KIND");
  });

  it("rejects a non-positive price", async () => {
    await expectRejection(engine.recordTrade(trade({ price: "0" })), "INVALID_AMOUNT");
  });

  // ─── deleteTrade ────────────────────────────────────────────────────

  describe("deleteTrade", () => {
    it("replays later trades from the deleted trade's starting position", async () => {
      const first = await engine.recordTrade(trade());
      const second = await engine.recordTrade(trade({ price: "120" }));
      const third = await engine.recordTrade(trade({ kind: "sell", quantity: "5", price: "130" }));
      expect(engine.getAccount(broker.id).balance).toBe("8450.00");

      await engine.deleteTrade(first.id);

      const [holding] = engine.listHoldings();
      expect(holding?.quantity).toBe("5.00000000");
      expect(holding?.averageCost).toBe("120.00000000");
      expect(engine.getAccount(broker.id).balance).toBe("9450.00");

      const remaining = engine.listTrades(broker.id);
      expect(remaining.map((t) => t.id)).toEqual([second.id, third.id]);
      expect(remaining[0]?.before).toBeNull();
      expect(remaining[1]?.before).toEqual({ quantity: "10.00000000", averageCost: "120.00000000" });

      const flows = engine.listCashFlows(broker.id);
      expect(flows.at(-1)).toMatchObject({ amount: "1000.00", reversalOf: first.cashFlowId });
    });

    it("deactivates the holding when its only trade is deleted", async () => {
      const only = await engine.recordTrade(trade());
      await engine.deleteTrade(only.id);

      expect(engine.listHoldings()).toEqual([]);
      expect(engine.getAccount(broker.id).balance).toBe("10000.00");
    });

    it("rejects a deletion that would oversell a later trade", async () => {
      const first = await engine.recordTrade(trade());
      await engine.recordTrade(trade({ quantity: "5" }));
      await engine.recordTrade(trade({ kind: "sell", quantity: "12", price: "110" }));

      await expectRejection(engine.deleteTrade(first.id), "INSUFFICIENT_HOLDING_QUANTITY");
      expect(engine.listHoldings()[0]?.quantity).toBe("3.00000000");
      expect(engine.listTrades()).toHaveLength(3);
    });

    it("reverses a dividend without touching the position", async () => {
      await engine.recordTrade(trade());
      const dividend = await engine.recordTrade(trade({ kind: "dividend", quantity: "10", price: "0.5" }));

      await engine.deleteTrade(dividend.id);
      expect(engine.getAccount(broker.id).balance).toBe("9000.00");
      expect(engine.listHoldings()[0]?.quantity).toBe("10.00000000");
    });

    it("fails for an unknown trade", async () => {
      await expectRejection(engine.deleteTrade("missing"), "TRADE_NOT_FOUND");
    });
  });

  // ─── portfolio ──────────────────────────────────────────────────────

  describe("portfolio", () => {
    it("reports cost basis and unrealized profit/loss", async () => {
      await engine.recordTrade(trade({ fees: "5" }));
      const summary = engine.portfolio(broker.id);

      expect(summary.holdings).toHaveLength(1);
      expect(summary.holdings[0]).toMatchObject({
        symbol: "AAPL",
        costBasis: "1005.00",
        marketValue: "1000.00",
        unrealizedPnl: "-5.00",
        unrealizedPnlPercent: "-0.50",
      });
      expect(summary.totalCostBasis).toBe("1005.00");
      expect(summary.cashBalance).toBe("8995.00");
      expect(summary.totalValue).toBe("9995.00");
    });

    it("fails for an unknown account", () => {
      expectCode(() => engine.portfolio("missing"), "ACCOUNT_NOT_FOUND");
    });
  });
});
