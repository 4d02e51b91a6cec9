/**
 * @coffer/vault — Liability Tracker.
 *
 * Outstanding principal of a debt. Payments reduce it; deleting a
 * payment restores exactly what that payment took off.
 *
 * Overpayment policy:
 * - "reject" (default): a payment above the outstanding principal fails
 * - "clamp": the payment is cut down to the outstanding principal
 * Either way a fully repaid liability accepts no further payments.
 */

import { formatAmount, parseAmount, parsePositiveAmount } from "@coffer/ledger";
import type { Liability } from "@coffer/types";
import type { CreateLiabilityParams, OverpaymentPolicy, PaymentEffect } from "./types.js";
import { VaultError } from "./types.js";

export class LiabilityTracker {
  private readonly _policy: OverpaymentPolicy;

  constructor(policy: OverpaymentPolicy = "reject") {
    this._policy = policy;
  }

  get policy(): OverpaymentPolicy {
    return this._policy;
  }

  create(params: CreateLiabilityParams): Liability {
    const principal = parsePositiveAmount(params.principal, params.decimals, "Principal");
    const formatted = formatAmount(principal, params.decimals);
    return {
      id: params.id,
      name: params.name,
      currency: params.currency,
      decimals: params.decimals,
      principal: formatted,
      outstanding: formatted,
      ...(params.notes !== undefined ? { notes: params.notes } : {}),
      createdAt: params.now,
      updatedAt: params.now,
    };
  }

  /**
   * @throws VaultError OVERPAYMENT_REJECTED when nothing is outstanding,
   *   or the amount exceeds it under the "reject" policy
   */
  applyPayment(liability: Liability, amount: string, now: string): PaymentEffect {
    const requested = parsePositiveAmount(amount, liability.decimals);
    const outstanding = parseAmount(liability.outstanding, liability.decimals);

    if (outstanding === 0n || (this._policy === "reject" && requested > outstanding)) {
      throw new VaultError(
        "OVERPAYMENT_REJECTED",
        `Payment of ${formatAmount(requested, liability.decimals)} exceeds outstanding ${liability.outstanding} on '${liability.id}'`,
        {
          liabilityId: liability.id,
          outstanding: liability.outstanding,
          requested: formatAmount(requested, liability.decimals),
        },
      );
    }

    const applied = requested > outstanding ? outstanding : requested;
    return {
      liability: {
        ...liability,
        outstanding: formatAmount(outstanding - applied, liability.decimals),
        updatedAt: now,
      },
      applied: formatAmount(applied, liability.decimals),
    };
  }

  /**
   * Give back the amount a deleted payment applied.
   */
  reversePayment(liability: Liability, applied: string, now: string): Liability {
    const delta = parsePositiveAmount(applied, liability.decimals);
    const outstanding = parseAmount(liability.outstanding, liability.decimals) + delta;
    if (outstanding > parseAmount(liability.principal, liability.decimals)) {
      throw new VaultError(
        "INTEGRITY_VIOLATION",
        `Reversing ${applied} would raise '${liability.id}' above its principal ${liability.principal}`,
      );
    }
    return {
      ...liability,
      outstanding: formatAmount(outstanding, liability.decimals),
      updatedAt: now,
    };
  }
}
