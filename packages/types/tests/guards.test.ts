/**
 * Runtime type guard tests for @coffer/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isDecimalString,
  isAccountKind,
  isAssetKind,
  isTradeKind,
  isBudgetKind,
  isBudgetStatus,
  isCashFlowKind,
  isMoney,
  isCashFlowEntry,
} from "../src/guards.js";

// =============================================================================
// Scalar guards
// =============================================================================

describe("isDecimalString", () => {
  it("accepts integers and fractions", () => {
    expect(isDecimalString("100")).toBe(true);
    expect(isDecimalString("100.50")).toBe(true);
    expect(isDecimalString("-0.01")).toBe(true);
  });

  it("rejects exponent notation and stray characters", () => {
    expect(isDecimalString("1e5")).toBe(false);
    expect(isDecimalString("1.")).toBe(false);
    expect(isDecimalString(".5")).toBe(false);
    expect(isDecimalString("1,000")).toBe(false);
    expect(isDecimalString("")).toBe(false);
  });

  it("rejects numbers (must be string)", () => {
    expect(isDecimalString(100)).toBe(false);
  });
});

describe("enum guards", () => {
  it("accepts every account kind", () => {
    expect(isAccountKind("cash")).toBe(true);
    expect(isAccountKind("investment")).toBe(true);
    expect(isAccountKind("credit")).toBe(false);
  });

  it("accepts every asset kind", () => {
    for (const kind of ["stock", "fund", "bond", "crypto", "money_market"]) {
      expect(isAssetKind(kind)).toBe(true);
    }
    expect(isAssetKind("option")).toBe(false);
  });

  it("accepts every trade kind", () => {
    for (const kind of ["buy", "sell", "dividend", "interest"]) {
      expect(isTradeKind(kind)).toBe(true);
    }
    expect(isTradeKind("split")).toBe(false);
  });

  it("accepts budget kinds and statuses", () => {
    expect(isBudgetKind("periodic")).toBe(true);
    expect(isBudgetKind("project")).toBe(true);
    expect(isBudgetKind("yearly")).toBe(false);
    expect(isBudgetStatus("active")).toBe(true);
    expect(isBudgetStatus("completed")).toBe(true);
    expect(isBudgetStatus("cancelled")).toBe(true);
    expect(isBudgetStatus("paused")).toBe(false);
  });

  it("accepts cash-flow kinds", () => {
    expect(isCashFlowKind("opening")).toBe(true);
    expect(isCashFlowKind("payment")).toBe(true);
    expect(isCashFlowKind("refund")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAccountKind(undefined)).toBe(false);
    expect(isAssetKind(null)).toBe(false);
    expect(isTradeKind(1)).toBe(false);
  });
});

// =============================================================================
// Record guards
// =============================================================================

describe("isMoney", () => {
  it("accepts valid Money", () => {
    expect(isMoney({ amount: "100.50", currency: "CNY", decimals: 2 })).toBe(true);
  });

  it("accepts zero decimals", () => {
    expect(isMoney({ amount: "1", currency: "JPY", decimals: 0 })).toBe(true);
  });

  it("rejects null and non-objects", () => {
    expect(isMoney(null)).toBe(false);
    expect(isMoney("100")).toBe(false);
    expect(isMoney(undefined)).toBe(false);
  });

  it("rejects numeric amount (must be string)", () => {
    expect(isMoney({ amount: 100, currency: "CNY", decimals: 2 })).toBe(false);
  });

  it("rejects empty currency", () => {
    expect(isMoney({ amount: "1", currency: "", decimals: 2 })).toBe(false);
  });

  it("rejects negative or fractional decimals", () => {
    expect(isMoney({ amount: "1", currency: "CNY", decimals: -1 })).toBe(false);
    expect(isMoney({ amount: "1", currency: "CNY", decimals: 1.5 })).toBe(false);
  });
});

describe("isCashFlowEntry", () => {
  const entry = {
    id: "cf-1",
    accountId: "acc-1",
    sequence: 1,
    kind: "opening",
    amount: "1000.00",
    balanceAfter: "1000.00",
    currency: "CNY",
    occurredAt: "2026-01-01T00:00:00.000Z",
    description: "Opening balance",
    previousHash: "genesis",
    hash: "abc",
  };

  it("accepts a well-formed entry", () => {
    expect(isCashFlowEntry(entry)).toBe(true);
  });

  it("rejects a zero sequence", () => {
    expect(isCashFlowEntry({ ...entry, sequence: 0 })).toBe(false);
  });

  it("rejects an unknown kind", () => {
    expect(isCashFlowEntry({ ...entry, kind: "refund" })).toBe(false);
  });

  it("rejects a missing hash", () => {
    const { hash: _hash, ...rest } = entry;
    expect(isCashFlowEntry(rest)).toBe(false);
  });
});
