/**
 * Tests for LiabilityTracker — payments and their reversal.
 */

import { describe, it, expect } from "vitest";
import { DomainError } from "@coffer/types";
import type { ErrorCode, Liability } from "@coffer/types";
import { LiabilityTracker } from "../src/liability.js";

const NOW = "2026-04-01T00:00:00.000Z";

function expectCode(fn: () => unknown, code: ErrorCode): void {
  try {
    fn();
    expect.fail(`expected ${code}`);
  } catch (err) {
    expect(err).toBeInstanceOf(DomainError);
    if (err instanceof DomainError) expect(err.code).toBe(code);
  }
}

function loan(tracker: LiabilityTracker, principal = "10000"): Liability {
  return tracker.create({
    id: "l1",
    name: "Car loan",
    currency: "CNY",
    decimals: 2,
    principal,
    now: NOW,
  });
}

describe("LiabilityTracker", () => {
  it("creates a liability with everything outstanding", () => {
    const l = loan(new LiabilityTracker());
    expect(l.principal).toBe("10000.00");
    expect(l.outstanding).toBe("10000.00");
  });

  it("rejects a non-positive principal", () => {
    expectCode(() => loan(new LiabilityTracker(), "0"), "INVALID_AMOUNT");
  });

  it("reduces outstanding by the payment", () => {
    const tracker = new LiabilityTracker();
    const { liability, applied } = tracker.applyPayment(loan(tracker), "2500.00", NOW);
    expect(applied).toBe("2500.00");
    expect(liability.outstanding).toBe("7500.00");
    expect(liability.principal).toBe("10000.00");
  });

  it("rejects an overpayment by default", () => {
    const tracker = new LiabilityTracker();
    expect(tracker.policy).toBe("reject");
    expectCode(() => tracker.applyPayment(loan(tracker), "10000.01", NOW), "OVERPAYMENT_REJECTED");
  });

  it("accepts a payment of exactly the outstanding amount", () => {
    const tracker = new LiabilityTracker();
    const { liability } = tracker.applyPayment(loan(tracker), "10000.00", NOW);
    expect(liability.outstanding).toBe("0.00");
  });

  it("clamps an overpayment under the clamp policy", () => {
    const tracker = new LiabilityTracker("clamp");
    const { liability, applied } = tracker.applyPayment(loan(tracker), "12000.00", NOW);
    expect(applied).toBe("10000.00");
    expect(liability.outstanding).toBe("0.00");
  });

  it("refuses any payment once fully repaid, whatever the policy", () => {
    const tracker = new LiabilityTracker("clamp");
    const { liability } = tracker.applyPayment(loan(tracker), "10000.00", NOW);
    expectCode(() => tracker.applyPayment(liability, "1.00", NOW), "OVERPAYMENT_REJECTED");
  });

  it("reversePayment restores exactly the applied amount", () => {
    const tracker = new LiabilityTracker();
    const original = loan(tracker);
    const { liability, applied } = tracker.applyPayment(original, "2500.00", NOW);
    expect(tracker.reversePayment(liability, applied, NOW).outstanding).toBe(original.outstanding);
  });

  it("reversePayment never exceeds the principal", () => {
    const tracker = new LiabilityTracker();
    expectCode(() => tracker.reversePayment(loan(tracker), "0.01", NOW), "INTEGRITY_VIOLATION");
  });
});
