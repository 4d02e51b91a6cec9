/**
 * @coffer/engine — Expenses.
 *
 * recordExpense checks, in order: amount > 0, account exists and is
 * active, budget (when given) exists / is active / admits the account
 * in its currency and scale / has room under the overspend policy,
 * funds suffice. Only then is anything written: account debit, budget
 * spend, the expense row and its journal entry, as one unit.
 *
 * deleteExpense undoes exactly those writes, so a record-then-delete
 * round trip leaves balance and budget spent where they started.
 */

import { credit, debit, formatAmount, parseAmount } from "@coffer/ledger";
import type { Expense } from "@coffer/types";
import type { EngineRuntime } from "./runtime.js";
import { byCreation, negate } from "./rows.js";
import { accountLock, budgetLock } from "./unit.js";
import type { ExpenseFilter, RecordExpenseInput } from "./types.js";

export class ExpenseService {
  private readonly rt: EngineRuntime;

  constructor(runtime: EngineRuntime) {
    this.rt = runtime;
  }

  async recordExpense(input: RecordExpenseInput): Promise<Expense> {
    this.rt.assertPositive(input.amount);
    const category = this.rt.requireText(input.category, "category");
    const expenseDate = this.rt.isoDate(input.expenseDate, "expenseDate");

    const locks = [accountLock(input.accountId)];
    if (input.budgetId !== undefined) locks.push(budgetLock(input.budgetId));

    return this.rt.run("recordExpense", locks, (unit) => {
      const source = unit.activeAccount(input.accountId);
      const budget = input.budgetId !== undefined ? unit.budget(input.budgetId) : undefined;
      if (budget !== undefined) {
        this.rt.budgets.assertCanLink(budget, source, input.amount);
      }

      const account = debit(source, input.amount);
      const amount = formatAmount(parseAmount(input.amount, account.decimals), account.decimals);
      const id = unit.nextId();

      unit.put("accounts", { ...account, updatedAt: unit.now });
      if (budget !== undefined) {
        unit.put("budgets", this.rt.budgets.linkExpense(budget, amount, unit.now));
      }
      const entry = unit.journal(account, {
        kind: "expense",
        amount: negate(amount, account.decimals),
        description: `Expense: ${category}`,
        link: { type: "expense", id },
      });

      const expense: Expense = {
        id,
        accountId: account.id,
        budgetId: budget?.id ?? null,
        amount,
        currency: account.currency,
        category,
        ...(input.subcategory !== undefined ? { subcategory: input.subcategory } : {}),
        expenseDate,
        ...(input.merchant !== undefined ? { merchant: input.merchant } : {}),
        ...(input.paymentMethod !== undefined ? { paymentMethod: input.paymentMethod } : {}),
        isShared: input.isShared ?? false,
        participants: [...(input.participants ?? [])],
        tags: [...(input.tags ?? [])],
        ...(input.notes !== undefined ? { notes: input.notes } : {}),
        cashFlowId: entry.id,
        createdAt: unit.now,
      };
      unit.put("expenses", expense);
      return expense;
    });
  }

  /**
   * @throws VaultError BUDGET_NOT_ACTIVE when the linked budget is
   *   closed and the terminal unlink policy is "reject"
   */
  async deleteExpense(id: string): Promise<void> {
    const committed = this.rt.store.get("expenses", id);
    const locks: string[] = [];
    if (committed !== undefined) {
      locks.push(accountLock(committed.accountId));
      if (committed.budgetId !== null) locks.push(budgetLock(committed.budgetId));
    }

    await this.rt.run("deleteExpense", locks, (unit) => {
      const expense = unit.expense(id);

      if (expense.budgetId !== null) {
        const budget = unit.budget(expense.budgetId);
        unit.put("budgets", this.rt.budgets.unlinkExpense(budget, expense.amount, unit.now));
      }

      const account = credit(unit.account(expense.accountId), expense.amount);
      unit.put("accounts", { ...account, updatedAt: unit.now });
      unit.journal(account, {
        kind: "expense",
        amount: expense.amount,
        description: `Reversal of expense: ${expense.category}`,
        link: { type: "expense", id },
        reversalOf: expense.cashFlowId,
      });
      unit.remove("expenses", id);
    });
  }

  getExpense(id: string): Expense | undefined {
    return this.rt.store.get("expenses", id);
  }

  /** Newest expense date first. */
  listExpenses(filter: ExpenseFilter = {}): readonly Expense[] {
    const rows = this.rt.store.list("expenses", (e) =>
      (filter.accountId === undefined || e.accountId === filter.accountId) &&
      (filter.budgetId === undefined || e.budgetId === filter.budgetId) &&
      (filter.category === undefined || e.category === filter.category) &&
      (filter.from === undefined || e.expenseDate >= filter.from) &&
      (filter.to === undefined || e.expenseDate <= filter.to));
    return [...rows].sort(
      (a, b) => b.expenseDate.localeCompare(a.expenseDate) || byCreation(b, a),
    );
  }
}
