/**
 * @coffer/engine — Budgets.
 *
 * Lifecycle and allocation changes go through the BudgetTracker under
 * the budget's row lock; spending is driven by ExpenseService.
 */

import { formatAmount, parseAmount, projectedValues, rescale } from "@coffer/ledger";
import { isBudgetKind } from "@coffer/types";
import type { Budget, BudgetFinalSnapshot, BudgetStatus } from "@coffer/types";
import type { EngineRuntime } from "./runtime.js";
import { byCreation } from "./rows.js";
import { budgetLock, currencyLock } from "./unit.js";
import type { BudgetFunds, CreateBudgetInput } from "./types.js";
import { EngineError } from "./types.js";

export class BudgetService {
  private readonly rt: EngineRuntime;

  constructor(runtime: EngineRuntime) {
    this.rt = runtime;
  }

  // ─── Mutations ──────────────────────────────────────────────────────

  /**
   * @throws EngineError ACCOUNT_NOT_FOUND for an unknown eligible account
   */
  async createBudget(input: CreateBudgetInput): Promise<Budget> {
    if (!isBudgetKind(input.kind)) {
      throw new EngineError("INVALID_INPUT", `Unknown budget kind '${String(input.kind)}'`);
    }
    const name = this.rt.requireText(input.name, "name");
    const currency = input.currency ?? this.rt.settings.defaultCurrency;

    return this.rt.run("createBudget", [currencyLock(currency)], (unit) => {
      for (const accountId of input.eligibleAccountIds ?? []) {
        unit.account(accountId);
      }
      const budget = this.rt.budgets.create({
        id: unit.nextId(),
        name,
        kind: input.kind,
        currency,
        decimals: this.rt.currencyScale(unit, currency),
        allocated: input.allocated,
        periodStart: input.periodStart,
        periodEnd: input.periodEnd,
        eligibleAccountIds: input.eligibleAccountIds,
        category: input.category,
        now: unit.now,
      });
      unit.put("budgets", budget);
      return budget;
    });
  }

  async reallocateBudget(id: string, allocated: string): Promise<Budget> {
    return this.rt.run("reallocateBudget", [budgetLock(id)], (unit) => {
      const budget = this.rt.budgets.reallocate(unit.budget(id), allocated, unit.now);
      unit.put("budgets", budget);
      return budget;
    });
  }

  /**
   * @returns the frozen allocated / spent / remaining figures
   */
  async completeBudget(id: string): Promise<BudgetFinalSnapshot> {
    return this.rt.run("completeBudget", [budgetLock(id)], (unit) => {
      const budget = this.rt.budgets.complete(unit.budget(id), unit.now);
      unit.put("budgets", budget);
      return {
        allocated: budget.allocated,
        spent: budget.spent,
        remaining: budget.remaining,
        closedAt: unit.now,
      };
    });
  }

  async cancelBudget(id: string): Promise<Budget> {
    return this.rt.run("cancelBudget", [budgetLock(id)], (unit) => {
      const budget = this.rt.budgets.cancel(unit.budget(id), unit.now);
      unit.put("budgets", budget);
      return budget;
    });
  }

  /**
   * @throws EngineError BUDGET_IN_USE while any expense still references it
   */
  async deleteBudget(id: string): Promise<void> {
    await this.rt.run("deleteBudget", [budgetLock(id)], (unit) => {
      unit.budget(id);
      const linked = unit.list("expenses", (e) => e.budgetId === id).length;
      if (linked > 0) {
        throw new EngineError(
          "BUDGET_IN_USE",
          `Budget '${id}' is referenced by ${String(linked)} expense(s)`,
          { budgetId: id, expenses: linked },
        );
      }
      unit.remove("budgets", id);
    });
  }

  // ─── Queries ────────────────────────────────────────────────────────

  getBudget(id: string): Budget {
    const budget = this.rt.store.get("budgets", id);
    if (budget === undefined) {
      throw new EngineError("BUDGET_NOT_FOUND", `Budget '${id}' not found`, { id });
    }
    return budget;
  }

  listBudgets(status?: BudgetStatus): readonly Budget[] {
    const rows = this.rt.store.list("budgets", (b) => status === undefined || b.status === status);
    return [...rows].sort(byCreation);
  }

  /**
   * Σ available cash of the accounts that may spend against the budget:
   * its eligible accounts, or every active account in the budget's
   * currency when the eligible set is empty.
   */
  availableFunds(id: string): BudgetFunds {
    const budget = this.getBudget(id);
    const open = budget.eligibleAccountIds.length === 0;
    const accounts = this.rt.store.list("accounts", (a) =>
      a.isActive &&
      a.currency === budget.currency &&
      (open || budget.eligibleAccountIds.includes(a.id)));

    let total = 0n;
    const rows = [...accounts].sort(byCreation).map((account) => {
      const { availableCash } = projectedValues(
        account,
        this.rt.store.list("holdings", (h) => h.accountId === account.id),
      );
      total += rescale(parseAmount(availableCash, account.decimals), account.decimals, budget.decimals);
      return { accountId: account.id, availableCash };
    });

    return {
      budgetId: budget.id,
      currency: budget.currency,
      availableFunds: formatAmount(total, budget.decimals),
      accounts: rows,
    };
  }
}
