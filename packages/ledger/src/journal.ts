/**
 * @coffer/ledger — Cash-flow journal.
 *
 * Append-only audit log of every balance-affecting event, one hash
 * chain per account. Each entry is hashed using RFC 8785 (JCS)
 * canonicalization + SHA-256 and includes its predecessor's hash:
 *
 *   entry[1].hash = sha256(canonicalize(entry[1]) + "genesis")
 *   entry[n].hash = sha256(canonicalize(entry[n]) + entry[n-1].hash)
 *
 * Rewriting or dropping any entry breaks the chain from that point on,
 * and replaying the deltas from zero must reproduce the balance.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { CashFlowEntry } from "@coffer/types";
import { formatAmount, parseAmount } from "./money-math.js";
import type { CashFlowDraft, JournalIssue, JournalVerification } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * The hash used as `previousHash` for the first entry of an account.
 */
export const GENESIS_HASH = "genesis";

type UnhashedEntry = Omit<CashFlowEntry, "hash">;

function canonicalEntryContent(entry: UnhashedEntry): string {
  return canonicalize({
    id: entry.id,
    accountId: entry.accountId,
    sequence: entry.sequence,
    kind: entry.kind,
    amount: entry.amount,
    balanceAfter: entry.balanceAfter,
    currency: entry.currency,
    occurredAt: entry.occurredAt,
    description: entry.description,
    link: entry.link ?? null,
    reversalOf: entry.reversalOf ?? null,
  });
}

/**
 * Compute the SHA-256 hash of an entry given its predecessor's hash.
 */
export function computeEntryHash(entry: UnhashedEntry, previousHash: string): string {
  return createHash("sha256")
    .update(canonicalEntryContent(entry) + previousHash)
    .digest("hex");
}

/**
 * Build the next entry of an account's chain.
 *
 * @param previous - The account's latest entry, or undefined for the first one
 * @param decimals - The account currency's decimals
 */
export function createEntry(
  previous: CashFlowEntry | undefined,
  draft: CashFlowDraft,
  decimals: number,
): CashFlowEntry {
  if (previous !== undefined && previous.accountId !== draft.accountId) {
    throw new LedgerError(
      "INTEGRITY_VIOLATION",
      `Entry for '${draft.accountId}' cannot follow an entry of '${previous.accountId}'`,
    );
  }

  const delta = parseAmount(draft.amount, decimals);
  if (delta === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Journal entries must move a non-zero amount");
  }

  const balanceBefore = previous !== undefined
    ? parseAmount(previous.balanceAfter, decimals)
    : 0n;
  const previousHash = previous?.hash ?? GENESIS_HASH;

  const unhashed: UnhashedEntry = {
    id: draft.id,
    accountId: draft.accountId,
    sequence: (previous?.sequence ?? 0) + 1,
    kind: draft.kind,
    amount: formatAmount(delta, decimals),
    balanceAfter: formatAmount(balanceBefore + delta, decimals),
    currency: draft.currency,
    occurredAt: draft.occurredAt,
    description: draft.description,
    ...(draft.link !== undefined ? { link: draft.link } : {}),
    ...(draft.reversalOf !== undefined ? { reversalOf: draft.reversalOf } : {}),
    previousHash,
  };

  return { ...unhashed, hash: computeEntryHash(unhashed, previousHash) };
}

/**
 * Sum every entry's delta from zero.
 */
export function replayBalance(entries: readonly CashFlowEntry[], decimals: number): string {
  let balance = 0n;
  for (const entry of entries) {
    balance += parseAmount(entry.amount, decimals);
  }
  return formatAmount(balance, decimals);
}

/**
 * Verify one account's journal.
 *
 * Entries must be supplied in sequence order. Checks, per entry:
 * contiguous sequence, previousHash link, recomputed hash, and that
 * balanceAfter equals the running sum of deltas.
 */
export function verifyJournal(
  accountId: string,
  entries: readonly CashFlowEntry[],
  decimals: number,
): JournalVerification {
  const issues: JournalIssue[] = [];
  let running = 0n;
  let previousHash = GENESIS_HASH;
  let expectedSequence = 1;

  for (const entry of entries) {
    const issue = (reason: string): void => {
      issues.push({ sequence: entry.sequence, entryId: entry.id, reason });
    };

    if (entry.accountId !== accountId) {
      issue(`Entry belongs to account '${entry.accountId}'`);
    }
    if (entry.sequence !== expectedSequence) {
      issue(`Expected sequence ${String(expectedSequence)}, got ${String(entry.sequence)}`);
    }
    if (entry.previousHash !== previousHash) {
      issue(`previousHash mismatch: expected "${previousHash}", got "${entry.previousHash}"`);
    }

    const expectedHash = computeEntryHash(entry, entry.previousHash);
    if (entry.hash !== expectedHash) {
      issue(`Hash mismatch: expected "${expectedHash}", got "${entry.hash}"`);
    }

    running += parseAmount(entry.amount, decimals);
    const recorded = parseAmount(entry.balanceAfter, decimals);
    if (recorded !== running) {
      issue(
        `balanceAfter ${entry.balanceAfter} does not match replayed ${formatAmount(running, decimals)}`,
      );
    }

    previousHash = entry.hash;
    expectedSequence = entry.sequence + 1;
  }

  return {
    accountId,
    valid: issues.length === 0,
    entryCount: entries.length,
    replayedBalance: formatAmount(running, decimals),
    issues,
  };
}
