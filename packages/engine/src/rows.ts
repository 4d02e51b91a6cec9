/**
 * Small helpers over stored rows.
 */

import { formatAmount, parseAmount } from "@coffer/ledger";

export function negate(amount: string, decimals: number): string {
  return formatAmount(-parseAmount(amount, decimals), decimals);
}

/** Oldest first; ids break ties between rows created in the same instant. */
export function byCreation<R extends { readonly id: string; readonly createdAt: string }>(
  a: R,
  b: R,
): number {
  return a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id);
}
