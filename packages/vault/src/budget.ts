/**
 * @coffer/vault — Budget Tracker.
 *
 * Allocated / spent / remaining for one budget, and its lifecycle:
 *
 *   active ──complete──▶ completed
 *      └────cancel─────▶ cancelled
 *
 * Rules:
 * - All arithmetic uses bigint (via @coffer/ledger money-math)
 * - remaining is always recomputed as allocated − spent
 * - spent never goes below zero
 * - Only an active budget accepts new expenses or a new allocation
 * - Every method returns a new Budget; inputs are never mutated
 */

import { formatAmount, parseAmount, parsePositiveAmount } from "@coffer/ledger";
import type { Budget, BudgetFinalSnapshot } from "@coffer/types";
import type { BudgetPolicies, CreateBudgetParams, LinkingAccount } from "./types.js";
import { DEFAULT_BUDGET_POLICIES, VaultError } from "./types.js";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export class BudgetTracker {
  private readonly policies: BudgetPolicies;

  constructor(policies: Partial<BudgetPolicies> = {}) {
    this.policies = { ...DEFAULT_BUDGET_POLICIES, ...policies };
  }

  get overspendPolicy(): BudgetPolicies["overspend"] {
    return this.policies.overspend;
  }

  get terminalUnlinkPolicy(): BudgetPolicies["terminalUnlink"] {
    return this.policies.terminalUnlink;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Creation
  // ───────────────────────────────────────────────────────────────────────

  create(params: CreateBudgetParams): Budget {
    const allocated = parseAmount(params.allocated, params.decimals);
    if (allocated < 0n) {
      throw new VaultError("INVALID_AMOUNT", `Allocated amount cannot be negative, got '${params.allocated}'`);
    }
    if (!ISO_DATE.test(params.periodStart) || !ISO_DATE.test(params.periodEnd)) {
      throw new VaultError("INVALID_INPUT", "Budget period must be given as YYYY-MM-DD dates");
    }
    if (params.periodEnd < params.periodStart) {
      throw new VaultError(
        "INVALID_INPUT",
        `Budget period ends (${params.periodEnd}) before it starts (${params.periodStart})`,
      );
    }

    const zero = formatAmount(0n, params.decimals);
    return {
      id: params.id,
      name: params.name,
      kind: params.kind,
      currency: params.currency,
      decimals: params.decimals,
      allocated: formatAmount(allocated, params.decimals),
      spent: zero,
      remaining: formatAmount(allocated, params.decimals),
      periodStart: params.periodStart,
      periodEnd: params.periodEnd,
      status: "active",
      eligibleAccountIds: [...new Set(params.eligibleAccountIds ?? [])],
      ...(params.category !== undefined ? { category: params.category } : {}),
      createdAt: params.now,
      updatedAt: params.now,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Eligibility
  // ───────────────────────────────────────────────────────────────────────

  /**
   * An empty eligible set admits every account.
   */
  isEligible(budget: Budget, accountId: string): boolean {
    return budget.eligibleAccountIds.length === 0 || budget.eligibleAccountIds.includes(accountId);
  }

  /**
   * Everything recordExpense must know before it touches a balance:
   * status, eligibility, currency and scale, then the overspend policy.
   *
   * @throws VaultError UNDERFUNDED_BUDGET when the overspend policy is
   *   "reject" and amount exceeds remaining
   */
  assertCanLink(budget: Budget, account: LinkingAccount, amount: string): void {
    this.assertActive(budget);
    if (!this.isEligible(budget, account.id)) {
      throw new VaultError(
        "BUDGET_NOT_ELIGIBLE",
        `Account '${account.id}' is not eligible for budget '${budget.id}'`,
        { budgetId: budget.id, accountId: account.id },
      );
    }
    if (account.currency !== budget.currency || account.decimals !== budget.decimals) {
      throw new VaultError(
        "CURRENCY_MISMATCH",
        `Budget '${budget.id}' is in ${budget.currency} at ${String(budget.decimals)} decimals, ` +
          `account '${account.id}' in ${account.currency} at ${String(account.decimals)}`,
        { budgetId: budget.id, accountId: account.id },
      );
    }
    this.assertWithinRemaining(budget, parsePositiveAmount(amount, budget.decimals));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Spending
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Count an expense against the budget.
   *
   * @throws VaultError BUDGET_NOT_ACTIVE unless active
   * @throws VaultError UNDERFUNDED_BUDGET when the overspend policy is
   *   "reject" and amount exceeds remaining
   */
  linkExpense(budget: Budget, amount: string, now: string): Budget {
    this.assertActive(budget);
    const delta = parsePositiveAmount(amount, budget.decimals);
    this.assertWithinRemaining(budget, delta);
    return this.withSpent(budget, parseAmount(budget.spent, budget.decimals) + delta, now);
  }

  /**
   * Inverse of linkExpense, used when an expense is deleted.
   *
   * On a completed or cancelled budget this adjusts `spent` under the
   * "adjust" policy (the frozen final snapshot stays as it was), and
   * fails with BUDGET_NOT_ACTIVE under "reject".
   */
  unlinkExpense(budget: Budget, amount: string, now: string): Budget {
    if (budget.status !== "active" && this.policies.terminalUnlink === "reject") {
      throw new VaultError(
        "BUDGET_NOT_ACTIVE",
        `Budget '${budget.id}' is ${budget.status}; its expenses can no longer be removed`,
        { budgetId: budget.id, status: budget.status },
      );
    }

    const delta = parsePositiveAmount(amount, budget.decimals);
    const spent = parseAmount(budget.spent, budget.decimals) - delta;
    if (spent < 0n) {
      throw new VaultError(
        "INTEGRITY_VIOLATION",
        `Removing ${amount} would leave budget '${budget.id}' with negative spent`,
        { budgetId: budget.id, spent: budget.spent },
      );
    }

    return this.withSpent(budget, spent, now);
  }

  /**
   * Change the allocation of an active budget. The new allocation may
   * be below spent; remaining then goes negative.
   */
  reallocate(budget: Budget, allocated: string, now: string): Budget {
    this.assertActive(budget);
    const value = parseAmount(allocated, budget.decimals);
    if (value < 0n) {
      throw new VaultError("INVALID_AMOUNT", `Allocated amount cannot be negative, got '${allocated}'`);
    }
    const spent = parseAmount(budget.spent, budget.decimals);
    return {
      ...budget,
      allocated: formatAmount(value, budget.decimals),
      remaining: formatAmount(value - spent, budget.decimals),
      updatedAt: now,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * active → completed, freezing allocated / spent / remaining.
   */
  complete(budget: Budget, now: string): Budget {
    this.assertTransition(budget, "completed");
    const finalSnapshot: BudgetFinalSnapshot = {
      allocated: budget.allocated,
      spent: budget.spent,
      remaining: budget.remaining,
      closedAt: now,
    };
    return { ...budget, status: "completed", finalSnapshot, updatedAt: now };
  }

  /**
   * active → cancelled.
   */
  cancel(budget: Budget, now: string): Budget {
    this.assertTransition(budget, "cancelled");
    return { ...budget, status: "cancelled", updatedAt: now };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private helpers
  // ───────────────────────────────────────────────────────────────────────

  private withSpent(budget: Budget, spent: bigint, now: string): Budget {
    const allocated = parseAmount(budget.allocated, budget.decimals);
    return {
      ...budget,
      spent: formatAmount(spent, budget.decimals),
      remaining: formatAmount(allocated - spent, budget.decimals),
      updatedAt: now,
    };
  }

  private assertWithinRemaining(budget: Budget, delta: bigint): void {
    const remaining = parseAmount(budget.remaining, budget.decimals);
    if (this.policies.overspend === "reject" && delta > remaining) {
      throw new VaultError(
        "UNDERFUNDED_BUDGET",
        `Budget '${budget.id}' has ${budget.remaining} remaining, expense needs ${formatAmount(delta, budget.decimals)}`,
        { budgetId: budget.id, remaining: budget.remaining, requested: formatAmount(delta, budget.decimals) },
      );
    }
  }

  private assertActive(budget: Budget): void {
    if (budget.status !== "active") {
      throw new VaultError(
        "BUDGET_NOT_ACTIVE",
        `Budget '${budget.id}' is ${budget.status}`,
        { budgetId: budget.id, status: budget.status },
      );
    }
  }

  private assertTransition(budget: Budget, to: "completed" | "cancelled"): void {
    if (budget.status !== "active") {
      throw new VaultError(
        "INVALID_TRANSITION",
        `Budget '${budget.id}' cannot move from ${budget.status} to ${to}`,
        { budgetId: budget.id, from: budget.status, to },
      );
    }
  }
}

/**
 * remaining == allocated − spent and spent ≥ 0.
 */
export function budgetArithmeticHolds(budget: Budget): boolean {
  const allocated = parseAmount(budget.allocated, budget.decimals);
  const spent = parseAmount(budget.spent, budget.decimals);
  const remaining = parseAmount(budget.remaining, budget.decimals);
  return spent >= 0n && remaining === allocated - spent;
}
