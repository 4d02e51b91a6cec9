/**
 * Tests for accounts, income and the cash-flow journal.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { CofferEngine } from "../src/engine.js";
import {
  NOW,
  TODAY,
  cashAccount,
  createEngine,
  expectCode,
  expectRejection,
} from "./helpers.js";

describe("accounts", () => {
  let engine: CofferEngine;

  beforeEach(() => {
    engine = createEngine();
  });

  // ─── createAccount ──────────────────────────────────────────────────

  describe("createAccount", () => {
    it("journals a non-zero opening balance", async () => {
      const account = await cashAccount(engine, "Wallet", "1000");

      expect(account.balance).toBe("1000.00");
      expect(account.currency).toBe("CNY");
      expect(account.decimals).toBe(2);
      expect(account.isActive).toBe(true);
      expect(account.balanceEnforced).toBe(true);
      expect(account.createdAt).toBe(NOW.toISOString());

      const flows = engine.listCashFlows(account.id);
      expect(flows).toHaveLength(1);
      expect(flows[0]).toMatchObject({
        kind: "opening",
        amount: "1000.00",
        balanceAfter: "1000.00",
        sequence: 1,
        previousHash: "genesis",
      });
    });

    it("writes no journal entry for a zero opening balance", async () => {
      const account = await cashAccount(engine, "Empty");
      expect(account.balance).toBe("0.00");
      expect(engine.listCashFlows(account.id)).toEqual([]);
    });

    it("projects values for a cash account from the balance alone", async () => {
      const account = await cashAccount(engine, "Wallet", "42.5");
      expect(account.totalValue).toBe("42.50");
      expect(account.availableCash).toBe("42.50");
      expect(account.investmentValue).toBe("0.00");
      expect(account.holdingsValue).toBe("0.00");
    });

    it("honors currency and decimals", async () => {
      const account = await engine.createAccount({
        name: "Yen",
        kind: "cash",
        currency: "JPY",
        decimals: 0,
        openingBalance: "5000",
      });
      expect(account.currency).toBe("JPY");
      expect(account.balance).toBe("5000");
    });

    it("rejects a negative opening balance on an enforced account", async () => {
      await expectRejection(
        engine.createAccount({ name: "Bad", kind: "cash", openingBalance: "-1" }),
        "INVALID_AMOUNT",
      );
      expect(engine.listAccounts()).toEqual([]);
    });

    it("accepts a negative opening balance when the balance is not enforced", async () => {
      const account = await engine.createAccount({
        name: "Credit card",
        kind: "cash",
        openingBalance: "-50",
        balanceEnforced: false,
      });
      expect(account.balance).toBe("-50.00");
      expect(engine.listCashFlows(account.id)[0]?.balanceAfter).toBe("-50.00");
    });

    it("rejects an empty name", async () => {
      await expectRejection(engine.createAccount({ name: "   ", kind: "cash" }), "INVALID_INPUT");
    });

    it("rejects decimals outside [0, 8]", async () => {
      await expectRejection(
        engine.createAccount({ name: "Wide", kind: "cash", decimals: 9 }),
        "INVALID_INPUT",
      );
    });

    it("keeps one scale per currency", async () => {
      await cashAccount(engine, "Wallet", "10");
      await expectRejection(
        engine.createAccount({ name: "Fine", kind: "cash", decimals: 3 }),
        "CURRENCY_MISMATCH",
      );
      const same = await engine.createAccount({ name: "Same", kind: "cash", decimals: 2 });
      expect(same.decimals).toBe(2);
    });

    it("takes the scale of the currency's existing budgets", async () => {
      await engine.createBudget({
        name: "Trip", kind: "project", currency: "SEK", allocated: "1000",
        periodStart: "2026-03-01", periodEnd: "2026-03-31",
      });
      const kronor = await engine.createAccount({ name: "Kronor", kind: "cash", currency: "SEK" });
      expect(kronor.decimals).toBe(2);
    });

    it("rejects an opening balance finer than the account scale", async () => {
      await expectRejection(
        engine.createAccount({ name: "Fine", kind: "cash", openingBalance: "1.005" }),
        "INVALID_AMOUNT",
      );
    });
  });

  // ─── Lookup & listing ───────────────────────────────────────────────

  describe("getAccount / listAccounts", () => {
    it("fails with ACCOUNT_NOT_FOUND for an unknown id", () => {
      expectCode(() => engine.getAccount("missing"), "ACCOUNT_NOT_FOUND");
    });

    it("lists in creation order and filters by kind", async () => {
      const wallet = await cashAccount(engine, "Wallet");
      const broker = await engine.createAccount({ name: "Broker", kind: "investment" });
      const bank = await cashAccount(engine, "Bank");

      expect(engine.listAccounts().map((a) => a.id)).toEqual([wallet.id, broker.id, bank.id]);
      expect(engine.listAccounts({ kind: "investment" }).map((a) => a.id)).toEqual([broker.id]);
    });
  });

  // ─── deactivateAccount ──────────────────────────────────────────────

  describe("updateAccount", () => {
    it("renames and re-describes without touching the balance or journal", async () => {
      const wallet = await engine.createAccount({
        name: "Wallet", kind: "cash", openingBalance: "100", institution: "Old bank", notes: "daily",
      });

      const updated = await engine.updateAccount(wallet.id, { name: "  Purse ", institution: "New bank", notes: null });

      expect(updated).toMatchObject({ name: "Purse", institution: "New bank", balance: "100.00", decimals: 2 });
      expect(updated.notes).toBeUndefined();
      expect(engine.listCashFlows(wallet.id)).toHaveLength(1);
    });

    it("leaves omitted fields as they were", async () => {
      const wallet = await engine.createAccount({ name: "Wallet", kind: "cash", institution: "Bank" });
      const updated = await engine.updateAccount(wallet.id, { notes: "kept for travel" });
      expect(updated).toMatchObject({ name: "Wallet", institution: "Bank", notes: "kept for travel" });
    });

    it("rejects an empty name and an unknown account", async () => {
      const wallet = await cashAccount(engine, "Wallet");
      await expectRejection(engine.updateAccount(wallet.id, { name: " " }), "INVALID_INPUT");
      await expectRejection(engine.updateAccount("missing", { name: "X" }), "ACCOUNT_NOT_FOUND");
    });
  });

  describe("deactivateAccount", () => {
    it("hides the account from default listings", async () => {
      const account = await cashAccount(engine, "Old", "10");
      const deactivated = await engine.deactivateAccount(account.id);

      expect(deactivated.isActive).toBe(false);
      expect(deactivated.balance).toBe("10.00");
      expect(engine.listAccounts()).toEqual([]);
      expect(engine.listAccounts({ includeInactive: true })).toHaveLength(1);
    });

    it("is idempotent", async () => {
      const account = await cashAccount(engine, "Old");
      await engine.deactivateAccount(account.id);
      const again = await engine.deactivateAccount(account.id);
      expect(again.isActive).toBe(false);
    });

    it("refuses new records on an inactive account", async () => {
      const account = await cashAccount(engine, "Old", "10");
      await engine.deactivateAccount(account.id);

      await expectRejection(
        engine.recordIncome({ accountId: account.id, amount: "1", source: "Salary" }),
        "ACCOUNT_NOT_FOUND",
      );
      expect(engine.getAccount(account.id).balance).toBe("10.00");
    });

    it("fails for an unknown account", async () => {
      await expectRejection(engine.deactivateAccount("missing"), "ACCOUNT_NOT_FOUND");
    });
  });

  // ─── Income ─────────────────────────────────────────────────────────

  describe("recordIncome", () => {
    it("credits the account and journals the income", async () => {
      const account = await cashAccount(engine, "Wallet", "1000");
      const income = await engine.recordIncome({
        accountId: account.id,
        amount: "250.5",
        source: "Salary",
      });

      expect(income.amount).toBe("250.50");
      expect(income.currency).toBe("CNY");
      expect(income.receivedAt).toBe(TODAY);
      expect(engine.getAccount(account.id).balance).toBe("1250.50");

      const flows = engine.listCashFlows(account.id);
      expect(flows).toHaveLength(2);
      expect(flows[1]).toMatchObject({
        id: income.cashFlowId,
        kind: "income",
        amount: "250.50",
        balanceAfter: "1250.50",
        sequence: 2,
        link: { type: "income", id: income.id },
      });
      expect(flows[1]?.previousHash).toBe(flows[0]?.hash);
    });

    it("rejects a non-positive amount before looking up the account", async () => {
      await expectRejection(
        engine.recordIncome({ accountId: "missing", amount: "0", source: "Salary" }),
        "INVALID_AMOUNT",
      );
    });

    it("rejects a malformed date", async () => {
      const account = await cashAccount(engine, "Wallet");
      await expectRejection(
        engine.recordIncome({
          accountId: account.id,
          amount: "10",
          source: "Salary",
          receivedAt: "15/03/2026",
        }),
        "INVALID_INPUT",
      );
    });

    it("fails for an unknown account", async () => {
      await expectRejection(
        engine.recordIncome({ accountId: "missing", amount: "10", source: "Salary" }),
        "ACCOUNT_NOT_FOUND",
      );
    });
  });

  describe("deleteIncome", () => {
    it("debits the account and appends a reversal", async () => {
      const account = await cashAccount(engine, "Wallet", "1000");
      const income = await engine.recordIncome({
        accountId: account.id,
        amount: "250.50",
        source: "Salary",
      });

      await engine.deleteIncome(income.id);

      expect(engine.getAccount(account.id).balance).toBe("1000.00");
      expect(engine.listIncomes(account.id)).toEqual([]);

      const flows = engine.listCashFlows(account.id);
      expect(flows).toHaveLength(3);
      expect(flows[2]).toMatchObject({
        kind: "income",
        amount: "-250.50",
        balanceAfter: "1000.00",
        reversalOf: income.cashFlowId,
      });
      expect(engine.verifyJournal(account.id).valid).toBe(true);
    });

    it("fails with INSUFFICIENT_FUNDS once the income has been spent", async () => {
      const account = await cashAccount(engine, "Wallet");
      const income = await engine.recordIncome({ accountId: account.id, amount: "100", source: "Gift" });
      await engine.recordExpense({ accountId: account.id, amount: "80", category: "Food" });

      await expectRejection(engine.deleteIncome(income.id), "INSUFFICIENT_FUNDS");
      expect(engine.getAccount(account.id).balance).toBe("20.00");
      expect(engine.listIncomes(account.id)).toHaveLength(1);
    });

    it("fails for an unknown income", async () => {
      await expectRejection(engine.deleteIncome("missing"), "INCOME_NOT_FOUND");
    });
  });

  describe("listCashFlows", () => {
    it("fails for an unknown account", () => {
      expectCode(() => engine.listCashFlows("missing"), "ACCOUNT_NOT_FOUND");
    });
  });
});
