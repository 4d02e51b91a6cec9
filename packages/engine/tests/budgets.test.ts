/**
 * Tests for the budget lifecycle and available funds.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { CofferEngine } from "../src/engine.js";
import type { CreateBudgetInput } from "../src/types.js";
import {
  NOW,
  cashAccount,
  createEngine,
  expectCode,
  expectRejection,
  investmentAccount,
} from "./helpers.js";

const TRIP: CreateBudgetInput = {
  name: "Summer trip",
  kind: "project",
  allocated: "3000",
  periodStart: "2026-06-01",
  periodEnd: "2026-08-31",
};

describe("budgets", () => {
  let engine: CofferEngine;

  beforeEach(() => {
    engine = createEngine();
  });

  describe("createBudget", () => {
    it("starts active with the full allocation remaining", async () => {
      const budget = await engine.createBudget(TRIP);
      expect(budget).toMatchObject({
        name: "Summer trip",
        kind: "project",
        currency: "CNY",
        decimals: 2,
        allocated: "3000.00",
        spent: "0.00",
        remaining: "3000.00",
        status: "active",
        eligibleAccountIds: [],
      });
      expect(engine.getBudget(budget.id)).toEqual(budget);
    });

    it("rejects an unknown eligible account", async () => {
      await expectRejection(
        engine.createBudget({ ...TRIP, eligibleAccountIds: ["missing"] }),
        "ACCOUNT_NOT_FOUND",
      );
      expect(engine.listBudgets()).toEqual([]);
    });

    it("rejects a period that ends before it starts", async () => {
      await expectRejection(
        engine.createBudget({ ...TRIP, periodEnd: "2026-05-01" }),
        "INVALID_INPUT",
      );
    });

    it("rejects a negative allocation", async () => {
      await expectRejection(engine.createBudget({ ...TRIP, allocated: "-1" }), "INVALID_AMOUNT");
    });
  });

  describe("reallocateBudget", () => {
    it("may drop the allocation below what is spent", async () => {
      const wallet = await cashAccount(engine, "Wallet", "1000");
      const budget = await engine.createBudget(TRIP);
      await engine.recordExpense({ accountId: wallet.id, amount: "200", category: "Hotel", budgetId: budget.id });

      const updated = await engine.reallocateBudget(budget.id, "150");
      expect(updated.allocated).toBe("150.00");
      expect(updated.spent).toBe("200.00");
      expect(updated.remaining).toBe("-50.00");
    });

    it("fails for an unknown budget", async () => {
      await expectRejection(engine.reallocateBudget("missing", "10"), "BUDGET_NOT_FOUND");
    });
  });

  describe("lifecycle", () => {
    it("completes with a frozen snapshot", async () => {
      const wallet = await cashAccount(engine, "Wallet", "1000");
      const budget = await engine.createBudget(TRIP);
      await engine.recordExpense({ accountId: wallet.id, amount: "450", category: "Flights", budgetId: budget.id });

      const snapshot = await engine.completeBudget(budget.id);
      expect(snapshot).toEqual({
        allocated: "3000.00",
        spent: "450.00",
        remaining: "2550.00",
        closedAt: NOW.toISOString(),
      });

      const closed = engine.getBudget(budget.id);
      expect(closed.status).toBe("completed");
      expect(closed.finalSnapshot).toEqual(snapshot);
    });

    it("allows no transition out of a terminal state", async () => {
      const budget = await engine.createBudget(TRIP);
      await engine.cancelBudget(budget.id);

      await expectRejection(engine.completeBudget(budget.id), "INVALID_TRANSITION");
      await expectRejection(engine.cancelBudget(budget.id), "INVALID_TRANSITION");
      await expectRejection(engine.reallocateBudget(budget.id, "10"), "BUDGET_NOT_ACTIVE");
      expect(engine.getBudget(budget.id).status).toBe("cancelled");
    });

    it("lists by status", async () => {
      const open = await engine.createBudget(TRIP);
      const done = await engine.createBudget({ ...TRIP, name: "Old trip" });
      await engine.completeBudget(done.id);

      expect(engine.listBudgets("active").map((b) => b.id)).toEqual([open.id]);
      expect(engine.listBudgets("completed").map((b) => b.id)).toEqual([done.id]);
      expect(engine.listBudgets()).toHaveLength(2);
    });
  });

  describe("deleteBudget", () => {
    it("refuses while expenses reference it", async () => {
      const wallet = await cashAccount(engine, "Wallet", "1000");
      const budget = await engine.createBudget(TRIP);
      const expense = await engine.recordExpense({
        accountId: wallet.id,
        amount: "10",
        category: "Food",
        budgetId: budget.id,
      });

      await expectRejection(engine.deleteBudget(budget.id), "BUDGET_IN_USE");

      await engine.deleteExpense(expense.id);
      await engine.deleteBudget(budget.id);
      expectCode(() => engine.getBudget(budget.id), "BUDGET_NOT_FOUND");
    });

    it("fails for an unknown budget", async () => {
      await expectRejection(engine.deleteBudget("missing"), "BUDGET_NOT_FOUND");
    });
  });

  describe("budgetAvailableFunds", () => {
    it("sums every active account in the budget currency when none are named", async () => {
      const a = await cashAccount(engine, "A", "800");
      const b = await cashAccount(engine, "B", "300");
      await engine.createAccount({ name: "Dollars", kind: "cash", currency: "USD", openingBalance: "100" });
      const closed = await cashAccount(engine, "Closed", "50");
      await engine.deactivateAccount(closed.id);
      const budget = await engine.createBudget(TRIP);

      const funds = engine.budgetAvailableFunds(budget.id);
      expect(funds.availableFunds).toBe("1100.00");
      expect(funds.accounts).toEqual([
        { accountId: a.id, availableCash: "800.00" },
        { accountId: b.id, availableCash: "300.00" },
      ]);
    });

    it("counts only the eligible accounts when some are named", async () => {
      const a = await cashAccount(engine, "A", "800");
      await cashAccount(engine, "B", "300");
      const budget = await engine.createBudget({ ...TRIP, eligibleAccountIds: [a.id] });

      expect(engine.budgetAvailableFunds(budget.id).availableFunds).toBe("800.00");
    });

    it("includes liquid holdings of investment accounts", async () => {
      const broker = await investmentAccount(engine, "Broker", "1000");
      await engine.recordTrade({
        accountId: broker.id,
        symbol: "MMF",
        assetKind: "money_market",
        kind: "buy",
        quantity: "400",
        price: "1",
      });
      await engine.recordTrade({
        accountId: broker.id,
        symbol: "AAPL",
        assetKind: "stock",
        kind: "buy",
        quantity: "1",
        price: "100",
      });
      const budget = await engine.createBudget(TRIP);

      expect(engine.budgetAvailableFunds(budget.id).availableFunds).toBe("900.00");
    });

    it("fails for an unknown budget", () => {
      expectCode(() => engine.budgetAvailableFunds("missing"), "BUDGET_NOT_FOUND");
    });
  });
});
