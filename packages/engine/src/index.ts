/**
 * @coffer/engine — Transaction orchestrator.
 *
 * Public API:
 * - CofferEngine: every ledger, budget, holding and liability operation
 *   as one atomic unit under row locks, with post-mutation invariant checks
 * - parseCofferSnapshot: typed restore of a snapshot file's state
 * - EngineError / IntegrityError
 */

export { CofferEngine } from "./engine.js";
export { createStore } from "./runtime.js";
export { parseCofferSnapshot } from "./snapshot.js";
export { transferKind } from "./transfers.js";
export { syncStatus } from "./sync.js";
export { accountLock, budgetLock, holdingLock, liabilityLock } from "./unit.js";
export { EngineError, IntegrityError, TABLE_NAMES } from "./types.js";
export type {
  EngineErrorCode,
  CofferTables,
  CofferStore,
  EngineOptions,
  EngineSettings,
  CreateAccountInput,
  UpdateAccountInput,
  ListAccountsFilter,
  RecordIncomeInput,
  RecordExpenseInput,
  ExpenseFilter,
  CreateTransferInput,
  RecordTradeInput,
  HoldingFilter,
  CreateBudgetInput,
  CreateLiabilityInput,
  RecordPaymentInput,
  SyncOptions,
  AccountView,
  BudgetFunds,
  CurrencyTotals,
  Dashboard,
  JournalReport,
} from "./types.js";
