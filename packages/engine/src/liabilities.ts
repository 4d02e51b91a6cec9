/**
 * @coffer/engine — Liabilities and payments.
 *
 * A payment debits the paying account and takes the same (applied)
 * amount off the outstanding principal in one unit. Under the "clamp"
 * overpayment policy the applied amount may be less than requested;
 * only the applied amount ever moves.
 */

import { credit, debit, formatAmount, parseAmount } from "@coffer/ledger";
import type { Liability, LiabilityPayment } from "@coffer/types";
import type { EngineRuntime } from "./runtime.js";
import { byCreation, negate } from "./rows.js";
import { accountLock, currencyLock, liabilityLock } from "./unit.js";
import type { CreateLiabilityInput, RecordPaymentInput } from "./types.js";
import { EngineError } from "./types.js";

export class LiabilityService {
  private readonly rt: EngineRuntime;

  constructor(runtime: EngineRuntime) {
    this.rt = runtime;
  }

  async createLiability(input: CreateLiabilityInput): Promise<Liability> {
    const name = this.rt.requireText(input.name, "name");
    const currency = input.currency ?? this.rt.settings.defaultCurrency;
    return this.rt.run("createLiability", [currencyLock(currency)], (unit) => {
      const liability = this.rt.liabilities.create({
        id: unit.nextId(),
        name,
        currency,
        decimals: this.rt.currencyScale(unit, currency),
        principal: input.principal,
        notes: input.notes,
        now: unit.now,
      });
      unit.put("liabilities", liability);
      return liability;
    });
  }

  /**
   * @throws VaultError OVERPAYMENT_REJECTED per the overpayment policy
   * @throws LedgerError INSUFFICIENT_FUNDS when the account cannot cover it
   */
  async recordPayment(input: RecordPaymentInput): Promise<LiabilityPayment> {
    this.rt.assertPositive(input.amount);
    const paidAt = this.rt.isoDate(input.paidAt, "paidAt");

    return this.rt.run(
      "recordPayment",
      [liabilityLock(input.liabilityId), accountLock(input.accountId)],
      (unit) => {
        const liability = unit.liability(input.liabilityId);
        const source = unit.activeAccount(input.accountId);
        if (source.currency !== liability.currency || source.decimals !== liability.decimals) {
          throw new EngineError(
            "CURRENCY_MISMATCH",
            `Liability '${liability.id}' is in ${liability.currency} at ${String(liability.decimals)} decimals, ` +
              `account '${source.id}' in ${source.currency} at ${String(source.decimals)}`,
            { liabilityId: liability.id, accountId: source.id },
          );
        }

        const effect = this.rt.liabilities.applyPayment(liability, input.amount, unit.now);
        const account = debit(source, effect.applied);
        const id = unit.nextId();

        unit.put("liabilities", effect.liability);
        unit.put("accounts", { ...account, updatedAt: unit.now });
        const entry = unit.journal(account, {
          kind: "payment",
          amount: negate(effect.applied, account.decimals),
          description: `Payment: ${liability.name}`,
          link: { type: "payment", id },
        });

        const payment: LiabilityPayment = {
          id,
          liabilityId: liability.id,
          accountId: account.id,
          requested: formatAmount(parseAmount(input.amount, liability.decimals), liability.decimals),
          applied: effect.applied,
          paidAt,
          cashFlowId: entry.id,
          ...(input.notes !== undefined ? { notes: input.notes } : {}),
          createdAt: unit.now,
        };
        unit.put("payments", payment);
        return payment;
      },
    );
  }

  /**
   * Restores the principal by the applied amount and credits the
   * paying account back.
   */
  async deletePayment(id: string): Promise<void> {
    const committed = this.rt.store.get("payments", id);
    const locks = committed !== undefined
      ? [liabilityLock(committed.liabilityId), accountLock(committed.accountId)]
      : [];

    await this.rt.run("deletePayment", locks, (unit) => {
      const payment = unit.payment(id);
      const liability = this.rt.liabilities.reversePayment(
        unit.liability(payment.liabilityId),
        payment.applied,
        unit.now,
      );
      const account = credit(unit.account(payment.accountId), payment.applied);

      unit.put("liabilities", liability);
      unit.put("accounts", { ...account, updatedAt: unit.now });
      unit.journal(account, {
        kind: "payment",
        amount: payment.applied,
        description: `Reversal of payment: ${liability.name}`,
        link: { type: "payment", id },
        reversalOf: payment.cashFlowId,
      });
      unit.remove("payments", id);
    });
  }

  /**
   * @throws EngineError LIABILITY_IN_USE while any payment still references it
   */
  async deleteLiability(id: string): Promise<void> {
    await this.rt.run("deleteLiability", [liabilityLock(id)], (unit) => {
      unit.liability(id);
      const payments = unit.list("payments", (p) => p.liabilityId === id).length;
      if (payments > 0) {
        throw new EngineError(
          "LIABILITY_IN_USE",
          `Liability '${id}' is referenced by ${String(payments)} payment(s)`,
          { liabilityId: id, payments },
        );
      }
      unit.remove("liabilities", id);
    });
  }

  getLiability(id: string): Liability {
    const liability = this.rt.store.get("liabilities", id);
    if (liability === undefined) {
      throw new EngineError("LIABILITY_NOT_FOUND", `Liability '${id}' not found`, { id });
    }
    return liability;
  }

  listLiabilities(): readonly Liability[] {
    return [...this.rt.store.list("liabilities")].sort(byCreation);
  }

  listPayments(liabilityId?: string): readonly LiabilityPayment[] {
    const rows = this.rt.store.list("payments", (p) => liabilityId === undefined || p.liabilityId === liabilityId);
    return [...rows].sort(byCreation);
  }
}
