/**
 * @coffer/engine — Post-mutation invariants.
 *
 * Checked against the unit's own view of every row it wrote, right
 * before commit. Any violation aborts the unit with an IntegrityError.
 *
 * Each check returns the list of broken rules (empty when the row is sound).
 */

import { PRICE_DECIMALS, QUANTITY_DECIMALS, parseAmount } from "@coffer/ledger";
import { budgetArithmeticHolds } from "@coffer/vault";
import type { Account, Budget, CashFlowEntry, Holding, Liability } from "@coffer/types";

export function accountViolations(
  account: Account,
  latest: CashFlowEntry | undefined,
): readonly string[] {
  const violations: string[] = [];
  const balance = parseAmount(account.balance, account.decimals);

  if (account.balanceEnforced && balance < 0n) {
    violations.push(`account ${account.id}: balance ${account.balance} is negative`);
  }

  // the journal must end exactly where the balance is
  if (latest === undefined) {
    if (balance !== 0n) {
      violations.push(`account ${account.id}: balance ${account.balance} with an empty journal`);
    }
  } else if (parseAmount(latest.balanceAfter, account.decimals) !== balance) {
    violations.push(
      `account ${account.id}: journal ends at ${latest.balanceAfter}, balance is ${account.balance}`,
    );
  }

  return violations;
}

export function budgetViolations(budget: Budget): readonly string[] {
  return budgetArithmeticHolds(budget)
    ? []
    : [`budget ${budget.id}: remaining ${budget.remaining} != ${budget.allocated} - ${budget.spent}`];
}

export function holdingViolations(holding: Holding): readonly string[] {
  const violations: string[] = [];
  const quantity = parseAmount(holding.quantity, QUANTITY_DECIMALS);
  if (quantity < 0n) {
    violations.push(`holding ${holding.id}: quantity ${holding.quantity} is negative`);
  }
  if (parseAmount(holding.averageCost, PRICE_DECIMALS) < 0n) {
    violations.push(`holding ${holding.id}: average cost ${holding.averageCost} is negative`);
  }
  if (holding.isActive !== quantity > 0n) {
    violations.push(`holding ${holding.id}: active flag disagrees with quantity ${holding.quantity}`);
  }
  return violations;
}

export function liabilityViolations(liability: Liability): readonly string[] {
  const outstanding = parseAmount(liability.outstanding, liability.decimals);
  const principal = parseAmount(liability.principal, liability.decimals);
  return outstanding < 0n || outstanding > principal
    ? [`liability ${liability.id}: outstanding ${liability.outstanding} outside [0, ${liability.principal}]`]
    : [];
}
