/**
 * @coffer/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @coffer/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of stored entries
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import { DomainError } from "@coffer/types";
import type {
  CashFlowKind,
  CashFlowLink,
  ErrorDetails,
} from "@coffer/types";

// ─── Scales ──────────────────────────────────────────────────────────────

/** Fractional digits carried by holding quantities. */
export const QUANTITY_DECIMALS = 8;

/** Fractional digits carried by unit prices and average cost. */
export const PRICE_DECIMALS = 8;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "CURRENCY_MISMATCH"
  | "INSUFFICIENT_FUNDS"
  | "INTEGRITY_VIOLATION";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends DomainError<LedgerErrorCode> {
  constructor(code: LedgerErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = "LedgerError";
  }
}

// ─── Journal Types ───────────────────────────────────────────────────────

/**
 * Everything the caller decides about a new journal entry.
 * Sequence, running balance and hashes are derived on append.
 */
export interface CashFlowDraft {
  readonly id: string;
  readonly accountId: string;
  readonly kind: CashFlowKind;
  /** Signed delta at the account's decimals */
  readonly amount: string;
  readonly currency: string;
  readonly occurredAt: string;
  readonly description: string;
  readonly link?: CashFlowLink | undefined;
  readonly reversalOf?: string | undefined;
}

/** A single problem found while verifying a journal. */
export interface JournalIssue {
  readonly sequence: number;
  readonly entryId: string;
  readonly reason: string;
}

export interface JournalVerification {
  readonly accountId: string;
  readonly valid: boolean;
  readonly entryCount: number;
  /** Balance reproduced by summing every entry's delta from zero */
  readonly replayedBalance: string;
  readonly issues: readonly JournalIssue[];
}

/**
 * Journal replay compared against the stored account balance.
 */
export interface ReconciliationResult extends JournalVerification {
  readonly storedBalance: string;
  /** replayedBalance === storedBalance and the chain verified */
  readonly reconciled: boolean;
}
