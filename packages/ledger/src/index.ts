/**
 * @coffer/ledger — Money arithmetic, account balances and the cash-flow journal.
 *
 * Public API:
 * - Money math: parseAmount, formatAmount, rescale, multiplyScaled, divideScaled, ...
 * - Account ledger: credit, debit, applyDelta, projectedValues, holdingsValueOf
 * - Journal: createEntry, verifyJournal, replayBalance, computeEntryHash
 * - Reconciliation: reconcileAccount, reconcileAll, groupByAccount
 */

// Money math
export {
  pow10,
  parseAmount,
  formatAmount,
  normalizeAmount,
  divRoundHalfUp,
  rescale,
  multiplyScaled,
  divideScaled,
  canonicalizeDecimal,
  validateMoney,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  isZero,
  isPositive,
  isNegative,
  zeroMoney,
  compareMoney,
  absMoney,
  parsePositiveAmount,
} from "./money-math.js";

// Account ledger
export {
  credit,
  debit,
  applyDelta,
  projectedValues,
  holdingsValueOf,
} from "./account-ledger.js";

// Journal
export {
  GENESIS_HASH,
  computeEntryHash,
  createEntry,
  replayBalance,
  verifyJournal,
} from "./journal.js";

// Reconciliation
export {
  groupByAccount,
  reconcileAccount,
  reconcileAll,
} from "./balance-calculator.js";

// Types & errors
export { LedgerError, QUANTITY_DECIMALS, PRICE_DECIMALS } from "./types.js";
export type {
  LedgerErrorCode,
  CashFlowDraft,
  JournalIssue,
  JournalVerification,
  ReconciliationResult,
} from "./types.js";
