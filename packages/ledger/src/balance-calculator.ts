/**
 * @coffer/ledger — Journal replay and reconciliation.
 *
 * Rebuilds balances from the cash-flow journal and compares them with
 * the balances stored on the accounts.
 *
 * Rules:
 * - Entries are grouped per account and replayed in sequence order
 * - An account reconciles only when its chain verifies AND the replayed
 *   balance equals the stored balance
 */

import type { Account, CashFlowEntry } from "@coffer/types";
import { parseAmount } from "./money-math.js";
import { verifyJournal } from "./journal.js";
import type { ReconciliationResult } from "./types.js";

/**
 * Group entries by account, each group sorted by sequence.
 */
export function groupByAccount(
  entries: readonly CashFlowEntry[],
): Map<string, CashFlowEntry[]> {
  const groups = new Map<string, CashFlowEntry[]>();

  for (const entry of entries) {
    let group = groups.get(entry.accountId);
    if (group === undefined) {
      group = [];
      groups.set(entry.accountId, group);
    }
    group.push(entry);
  }

  for (const group of groups.values()) {
    group.sort((a, b) => a.sequence - b.sequence);
  }

  return groups;
}

/**
 * Replay one account's journal and compare it with the stored balance.
 * Entries of other accounts are ignored.
 */
export function reconcileAccount(
  account: Account,
  entries: readonly CashFlowEntry[],
): ReconciliationResult {
  const own = entries
    .filter((e) => e.accountId === account.id)
    .sort((a, b) => a.sequence - b.sequence);

  const verification = verifyJournal(account.id, own, account.decimals);
  const matches =
    parseAmount(verification.replayedBalance, account.decimals) ===
    parseAmount(account.balance, account.decimals);

  return {
    ...verification,
    storedBalance: account.balance,
    reconciled: verification.valid && matches,
  };
}

/**
 * Reconcile every account against the full journal.
 */
export function reconcileAll(
  accounts: readonly Account[],
  entries: readonly CashFlowEntry[],
): readonly ReconciliationResult[] {
  const groups = groupByAccount(entries);
  return accounts.map((account) =>
    reconcileAccount(account, groups.get(account.id) ?? []),
  );
}
