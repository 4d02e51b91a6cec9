/**
 * Tests for dashboard, journal verification and category routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AppInstance } from "../src/app.js";
import { NOW, cashAccount, create, createTestApp } from "./setup.js";
import type { DataBody, ErrorBody } from "./setup.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

describe("GET /api/v1/dashboard", () => {
  it("returns totals per currency and net worth", async () => {
    await cashAccount(instance, "Wallet", "1000");
    await create(instance, "/api/v1/liabilities", { name: "Card", principal: "300" });

    const res = await instance.app.request("/api/v1/dashboard");
    expect(res.status).toBe(200);
    const body = (await res.json()) as DataBody<unknown>;
    expect(body.data).toEqual({
      asOf: NOW.toISOString(),
      accountCount: 1,
      totals: [
        {
          currency: "CNY",
          totalAssets: "1000.00",
          availableCash: "1000.00",
          investmentValue: "0.00",
          liabilitiesOutstanding: "300.00",
          netWorth: "700.00",
        },
      ],
      activeBudgets: [],
    });
  });
});

describe("GET /api/v1/journal/verify", () => {
  it("reports every account reconciled", async () => {
    const wallet = await cashAccount(instance, "Wallet", "100");
    const res = await instance.app.request("/api/v1/journal/verify");

    expect(res.status).toBe(200);
    const body = (await res.json()) as DataBody<{
      valid: boolean;
      accounts: { accountId: string; entryCount: number; reconciled: boolean }[];
    }>;
    expect(body.data.valid).toBe(true);
    expect(body.data.accounts).toMatchObject([{ accountId: wallet.id, entryCount: 1, reconciled: true }]);
  });

  it("returns 404 for an unknown account", async () => {
    const res = await instance.app.request("/api/v1/journal/verify?accountId=missing");
    expect(res.status).toBe(404);
    expect(((await res.json()) as ErrorBody).error.code).toBe("ACCOUNT_NOT_FOUND");
  });
});

describe("GET /api/v1/categories", () => {
  it("serves the category catalogue from the data file", async () => {
    const res = await instance.app.request("/api/v1/categories");
    expect(res.status).toBe(200);
    const body = (await res.json()) as DataBody<{ category: string; subcategories: string[] }[]>;
    expect(body.data[0]).toEqual({
      category: "Food",
      subcategories: ["Breakfast", "Lunch", "Dinner", "Coffee", "Eating out", "Groceries", "Other"],
    });
  });

  it("serves an injected catalogue", async () => {
    const custom = createTestApp({ categories: [{ category: "Pets", subcategories: ["Vet"] }] });
    const body = (await (await custom.app.request("/api/v1/categories")).json()) as DataBody<unknown>;
    expect(body.data).toEqual([{ category: "Pets", subcategories: ["Vet"] }]);
  });
});
