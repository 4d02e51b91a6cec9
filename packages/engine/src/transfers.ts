/**
 * @coffer/engine — Transfers.
 *
 * Both legs (source debit, destination credit) and both journal
 * entries commit together or not at all; no reader ever sees one leg
 * without the other.
 */

import { credit, debit, formatAmount, parseAmount } from "@coffer/ledger";
import type { Account, Transfer, TransferKind } from "@coffer/types";
import type { EngineRuntime } from "./runtime.js";
import { byCreation, negate } from "./rows.js";
import { accountLock } from "./unit.js";
import type { CreateTransferInput } from "./types.js";
import { EngineError } from "./types.js";

export function transferKind(from: Account, to: Account): TransferKind {
  return `${from.kind}_to_${to.kind}`;
}

export class TransferService {
  private readonly rt: EngineRuntime;

  constructor(runtime: EngineRuntime) {
    this.rt = runtime;
  }

  async createTransfer(input: CreateTransferInput): Promise<Transfer> {
    this.rt.assertPositive(input.amount);
    if (input.fromAccountId === input.toAccountId) {
      throw new EngineError("INVALID_TRANSFER", "Source and destination accounts must differ", {
        accountId: input.fromAccountId,
      });
    }
    const transferDate = this.rt.isoDate(input.transferDate, "transferDate");

    return this.rt.run(
      "createTransfer",
      [accountLock(input.fromAccountId), accountLock(input.toAccountId)],
      (unit) => {
        const from = unit.activeAccount(input.fromAccountId);
        const to = unit.activeAccount(input.toAccountId);
        if (from.currency !== to.currency || from.decimals !== to.decimals) {
          throw new EngineError(
            "CURRENCY_MISMATCH",
            `Cannot transfer ${from.currency} at ${String(from.decimals)} decimals into a ` +
              `${to.currency} account at ${String(to.decimals)}`,
            { from: from.currency, to: to.currency },
          );
        }

        const debited = debit(from, input.amount);
        const credited = credit(to, input.amount);
        const amount = formatAmount(parseAmount(input.amount, from.decimals), from.decimals);
        const id = unit.nextId();

        unit.put("accounts", { ...debited, updatedAt: unit.now });
        unit.put("accounts", { ...credited, updatedAt: unit.now });
        const debitEntry = unit.journal(debited, {
          kind: "transfer",
          amount: negate(amount, from.decimals),
          description: `Transfer to ${to.name}`,
          link: { type: "transfer", id },
        });
        const creditEntry = unit.journal(credited, {
          kind: "transfer",
          amount,
          description: `Transfer from ${from.name}`,
          link: { type: "transfer", id },
        });

        const transfer: Transfer = {
          id,
          kind: transferKind(from, to),
          fromAccountId: from.id,
          toAccountId: to.id,
          amount,
          currency: from.currency,
          transferDate,
          debitFlowId: debitEntry.id,
          creditFlowId: creditEntry.id,
          ...(input.notes !== undefined ? { notes: input.notes } : {}),
          createdAt: unit.now,
        };
        unit.put("transfers", transfer);
        return transfer;
      },
    );
  }

  /**
   * @throws LedgerError INSUFFICIENT_FUNDS when the destination no longer
   *   holds the transferred amount
   */
  async deleteTransfer(id: string): Promise<void> {
    const committed = this.rt.store.get("transfers", id);
    const locks = committed !== undefined
      ? [accountLock(committed.fromAccountId), accountLock(committed.toAccountId)]
      : [];

    await this.rt.run("deleteTransfer", locks, (unit) => {
      const transfer = unit.transfer(id);
      const to = debit(unit.account(transfer.toAccountId), transfer.amount);
      const from = credit(unit.account(transfer.fromAccountId), transfer.amount);

      unit.put("accounts", { ...to, updatedAt: unit.now });
      unit.put("accounts", { ...from, updatedAt: unit.now });
      unit.journal(to, {
        kind: "transfer",
        amount: negate(transfer.amount, to.decimals),
        description: "Reversal of incoming transfer",
        link: { type: "transfer", id },
        reversalOf: transfer.creditFlowId,
      });
      unit.journal(from, {
        kind: "transfer",
        amount: transfer.amount,
        description: "Reversal of outgoing transfer",
        link: { type: "transfer", id },
        reversalOf: transfer.debitFlowId,
      });
      unit.remove("transfers", id);
    });
  }

  listTransfers(accountId?: string): readonly Transfer[] {
    const rows = this.rt.store.list("transfers", (t) =>
      accountId === undefined || t.fromAccountId === accountId || t.toAccountId === accountId);
    return [...rows].sort(byCreation);
  }
}
