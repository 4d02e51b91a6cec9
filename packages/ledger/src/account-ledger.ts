/**
 * @coffer/ledger — Account Ledger.
 *
 * Owns an account's cash balance and the value projections derived
 * from it and the account's holdings.
 *
 * Rules:
 * - credit/debit return a new Account; the input is never mutated
 * - Balance-enforced accounts never go below zero
 * - Projections are pure and recomputed on every call; holdings are the
 *   single source of truth for market value
 * - Journal entries are the caller's responsibility
 */

import type { Account, Holding, ProjectedValues } from "@coffer/types";
import { formatAmount, parseAmount, parsePositiveAmount } from "./money-math.js";
import { LedgerError } from "./types.js";

// ─── Balance Mutation ────────────────────────────────────────────────────

/**
 * Increase the account balance by a positive amount.
 */
export function credit(account: Account, amount: string): Account {
  const delta = parsePositiveAmount(amount, account.decimals);
  const balance = parseAmount(account.balance, account.decimals) + delta;
  return { ...account, balance: formatAmount(balance, account.decimals) };
}

/**
 * Decrease the account balance by a positive amount.
 *
 * @throws LedgerError INSUFFICIENT_FUNDS when the account is
 *   balance-enforced and the result would be negative
 */
export function debit(account: Account, amount: string): Account {
  const delta = parsePositiveAmount(amount, account.decimals);
  const current = parseAmount(account.balance, account.decimals);
  const balance = current - delta;

  if (account.balanceEnforced && balance < 0n) {
    throw new LedgerError(
      "INSUFFICIENT_FUNDS",
      `Account '${account.id}' has ${account.balance} ${account.currency}, cannot debit ${formatAmount(delta, account.decimals)}`,
      {
        accountId: account.id,
        balance: account.balance,
        requested: formatAmount(delta, account.decimals),
      },
    );
  }

  return { ...account, balance: formatAmount(balance, account.decimals) };
}

/**
 * Apply a signed delta: positive credits, negative debits, zero is a no-op.
 */
export function applyDelta(account: Account, signedAmount: string): Account {
  const delta = parseAmount(signedAmount, account.decimals);
  if (delta === 0n) return account;
  const magnitude = formatAmount(delta < 0n ? -delta : delta, account.decimals);
  return delta > 0n ? credit(account, magnitude) : debit(account, magnitude);
}

// ─── Projections ─────────────────────────────────────────────────────────

/**
 * Derive (total value, available cash, investment value) from the
 * balance and the account's active holdings.
 *
 * Cash accounts ignore holdings entirely. Holdings belonging to
 * other accounts are ignored.
 */
export function projectedValues(
  account: Account,
  holdings: readonly Holding[],
): ProjectedValues {
  const balance = parseAmount(account.balance, account.decimals);

  if (account.kind !== "investment") {
    const formatted = formatAmount(balance, account.decimals);
    return {
      totalValue: formatted,
      availableCash: formatted,
      investmentValue: formatAmount(0n, account.decimals),
    };
  }

  let liquid = 0n;
  let illiquid = 0n;

  for (const holding of holdings) {
    if (holding.accountId !== account.id || !holding.isActive) continue;
    const value = parseAmount(holding.currentValue, account.decimals);
    if (holding.isLiquid) {
      liquid += value;
    } else {
      illiquid += value;
    }
  }

  return {
    totalValue: formatAmount(balance + liquid + illiquid, account.decimals),
    availableCash: formatAmount(balance + liquid, account.decimals),
    investmentValue: formatAmount(illiquid, account.decimals),
  };
}

/**
 * The cacheable holdings value: Σ current value of active,
 * non-liquid holdings of this account.
 */
export function holdingsValueOf(
  account: Account,
  holdings: readonly Holding[],
): string {
  return projectedValues(account, holdings).investmentValue;
}
