/**
 * @coffer/engine — Accounts and income.
 *
 * Rules:
 * - A non-zero opening balance is journaled as an "opening" entry
 * - Balance-enforced accounts cannot open below zero
 * - Deactivation is a soft delete: no new records, reversals still apply
 */

import { credit, debit, formatAmount, parseAmount, projectedValues } from "@coffer/ledger";
import { isAccountKind } from "@coffer/types";
import type { Account, CashFlowEntry, Income } from "@coffer/types";
import type { EngineRuntime } from "./runtime.js";
import { byCreation, negate } from "./rows.js";
import { accountLock, currencyLock } from "./unit.js";
import type {
  AccountView,
  CreateAccountInput,
  ListAccountsFilter,
  RecordIncomeInput,
  UpdateAccountInput,
} from "./types.js";
import { EngineError } from "./types.js";

const MAX_DECIMALS = 8;

export class AccountService {
  private readonly rt: EngineRuntime;

  constructor(runtime: EngineRuntime) {
    this.rt = runtime;
  }

  // ─── Accounts ───────────────────────────────────────────────────────

  async createAccount(input: CreateAccountInput): Promise<AccountView> {
    if (!isAccountKind(input.kind)) {
      throw new EngineError("INVALID_ACCOUNT_KIND", `Unknown account kind '${String(input.kind)}'`);
    }
    const name = this.rt.requireText(input.name, "name");
    if (
      input.decimals !== undefined &&
      (!Number.isInteger(input.decimals) || input.decimals < 0 || input.decimals > MAX_DECIMALS)
    ) {
      throw new EngineError("INVALID_INPUT", `decimals must be an integer in [0, ${String(MAX_DECIMALS)}]`);
    }
    const currency = input.currency ?? this.rt.settings.defaultCurrency;
    const balanceEnforced = input.balanceEnforced ?? true;

    const account = await this.rt.run("createAccount", [currencyLock(currency)], (unit) => {
      const decimals = this.rt.currencyScale(unit, currency, input.decimals);
      const opening = parseAmount(input.openingBalance ?? "0", decimals);
      if (balanceEnforced && opening < 0n) {
        throw new EngineError("INVALID_AMOUNT", "Opening balance of a balance-enforced account cannot be negative", {
          openingBalance: input.openingBalance,
        });
      }

      const created: Account = {
        id: unit.nextId(),
        name,
        kind: input.kind,
        currency,
        decimals,
        balance: formatAmount(opening, decimals),
        holdingsValue: formatAmount(0n, decimals),
        balanceEnforced,
        isActive: true,
        ...(input.institution !== undefined ? { institution: input.institution } : {}),
        ...(input.notes !== undefined ? { notes: input.notes } : {}),
        createdAt: unit.now,
        updatedAt: unit.now,
      };
      unit.put("accounts", created);
      if (opening !== 0n) {
        unit.journal(created, {
          kind: "opening",
          amount: created.balance,
          description: "Opening balance",
        });
      }
      return created;
    });

    return this.view(account);
  }

  getAccount(id: string): AccountView {
    return this.view(this.committedAccount(id));
  }

  listAccounts(filter: ListAccountsFilter = {}): readonly AccountView[] {
    const accounts = this.rt.store.list("accounts", (a) =>
      (filter.includeInactive === true || a.isActive) &&
      (filter.kind === undefined || a.kind === filter.kind));
    return [...accounts].sort(byCreation).map((a) => this.view(a));
  }

  /**
   * Rename or re-describe an account. Balance, currency, scale and
   * kind never change here.
   */
  async updateAccount(id: string, input: UpdateAccountInput): Promise<AccountView> {
    const name = input.name !== undefined ? this.rt.requireText(input.name, "name") : undefined;

    const account = await this.rt.run("updateAccount", [accountLock(id)], (unit) => {
      const { institution, notes, ...rest } = unit.account(id);
      const nextInstitution = input.institution === undefined ? institution : input.institution ?? undefined;
      const nextNotes = input.notes === undefined ? notes : input.notes ?? undefined;

      const updated: Account = {
        ...rest,
        ...(name !== undefined ? { name } : {}),
        ...(nextInstitution !== undefined ? { institution: nextInstitution } : {}),
        ...(nextNotes !== undefined ? { notes: nextNotes } : {}),
        updatedAt: unit.now,
      };
      unit.put("accounts", updated);
      return updated;
    });
    return this.view(account);
  }

  async deactivateAccount(id: string): Promise<AccountView> {
    const account = await this.rt.run("deactivateAccount", [accountLock(id)], (unit) => {
      const current = unit.account(id);
      if (!current.isActive) return current;
      const updated: Account = { ...current, isActive: false, updatedAt: unit.now };
      unit.put("accounts", updated);
      return updated;
    });
    return this.view(account);
  }

  /** Committed account or ACCOUNT_NOT_FOUND. */
  committedAccount(id: string): Account {
    const account = this.rt.store.get("accounts", id);
    if (account === undefined) {
      throw new EngineError("ACCOUNT_NOT_FOUND", `Account '${id}' not found`, { id });
    }
    return account;
  }

  view(account: Account): AccountView {
    const holdings = this.rt.store.list("holdings", (h) => h.accountId === account.id);
    return { ...account, ...projectedValues(account, holdings) };
  }

  // ─── Income ─────────────────────────────────────────────────────────

  async recordIncome(input: RecordIncomeInput): Promise<Income> {
    this.rt.assertPositive(input.amount);
    const source = this.rt.requireText(input.source, "source");
    const receivedAt = this.rt.isoDate(input.receivedAt, "receivedAt");

    return this.rt.run("recordIncome", [accountLock(input.accountId)], (unit) => {
      const account = credit(unit.activeAccount(input.accountId), input.amount);
      const id = unit.nextId();
      const amount = formatAmount(parseAmount(input.amount, account.decimals), account.decimals);

      unit.put("accounts", { ...account, updatedAt: unit.now });
      const entry = unit.journal(account, {
        kind: "income",
        amount,
        description: `Income: ${source}`,
        link: { type: "income", id },
      });

      const income: Income = {
        id,
        accountId: account.id,
        amount,
        currency: account.currency,
        source,
        receivedAt,
        ...(input.notes !== undefined ? { notes: input.notes } : {}),
        cashFlowId: entry.id,
        createdAt: unit.now,
      };
      unit.put("incomes", income);
      return income;
    });
  }

  /**
   * @throws LedgerError INSUFFICIENT_FUNDS when the income was already spent
   */
  async deleteIncome(id: string): Promise<void> {
    const committed = this.rt.store.get("incomes", id);
    const locks = committed !== undefined ? [accountLock(committed.accountId)] : [];

    await this.rt.run("deleteIncome", locks, (unit) => {
      const income = unit.income(id);
      const account = debit(unit.account(income.accountId), income.amount);
      unit.put("accounts", { ...account, updatedAt: unit.now });
      unit.journal(account, {
        kind: "income",
        amount: negate(income.amount, account.decimals),
        description: `Reversal of income: ${income.source}`,
        link: { type: "income", id },
        reversalOf: income.cashFlowId,
      });
      unit.remove("incomes", id);
    });
  }

  listIncomes(accountId?: string): readonly Income[] {
    return [
      ...this.rt.store.list("incomes", (i) => accountId === undefined || i.accountId === accountId),
    ].sort(byCreation);
  }

  // ─── Journal ────────────────────────────────────────────────────────

  listCashFlows(accountId: string): readonly CashFlowEntry[] {
    this.committedAccount(accountId);
    return [...this.rt.store.list("cashFlows", (e) => e.accountId === accountId)]
      .sort((a, b) => a.sequence - b.sequence);
  }
}
