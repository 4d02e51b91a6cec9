/**
 * CofferEngine — Top-level coordinator for personal finances.
 *
 * Composes:
 * - AccountService: accounts, income, the cash-flow journal
 * - ExpenseService: expenses and their budget links
 * - TransferService: account-to-account moves
 * - TradeService: investment trades, holdings, portfolio
 * - BudgetService: budget lifecycle and available funds
 * - LiabilityService: debts and payments
 * - SyncService: market value refresh through a price oracle
 * - ReportService: dashboard and journal verification
 *
 * Every mutating method runs as one unit of work over the shared store:
 * all of its writes commit together or none do.
 */

import type { Logger } from "pino";
import type { StoreSnapshot } from "@coffer/store";
import type {
  Budget,
  BudgetFinalSnapshot,
  BudgetStatus,
  CashFlowEntry,
  Expense,
  Holding,
  Income,
  InvestmentTrade,
  Liability,
  LiabilityPayment,
  MarketSyncLog,
  Transfer,
} from "@coffer/types";
import type { PortfolioSummary } from "@coffer/vault";
import { AccountService } from "./accounts.js";
import { BudgetService } from "./budgets.js";
import { ExpenseService } from "./expenses.js";
import { LiabilityService } from "./liabilities.js";
import { ReportService } from "./reports.js";
import { EngineRuntime } from "./runtime.js";
import { SyncService } from "./sync.js";
import { TradeService } from "./trades.js";
import { TransferService } from "./transfers.js";
import type {
  AccountView,
  BudgetFunds,
  CofferStore,
  CofferTables,
  CreateAccountInput,
  UpdateAccountInput,
  CreateBudgetInput,
  CreateLiabilityInput,
  CreateTransferInput,
  Dashboard,
  EngineOptions,
  EngineSettings,
  ExpenseFilter,
  HoldingFilter,
  JournalReport,
  ListAccountsFilter,
  RecordExpenseInput,
  RecordIncomeInput,
  RecordPaymentInput,
  RecordTradeInput,
  SyncOptions,
} from "./types.js";

// =============================================================================
// CofferEngine
// =============================================================================

export class CofferEngine {
  private readonly runtime: EngineRuntime;
  private readonly accounts: AccountService;
  private readonly expenses: ExpenseService;
  private readonly transfers: TransferService;
  private readonly trades: TradeService;
  private readonly budgets: BudgetService;
  private readonly liabilities: LiabilityService;
  private readonly sync: SyncService;
  private readonly reports: ReportService;

  constructor(options: EngineOptions = {}) {
    this.runtime = new EngineRuntime(options);
    this.accounts = new AccountService(this.runtime);
    this.expenses = new ExpenseService(this.runtime);
    this.transfers = new TransferService(this.runtime);
    this.trades = new TradeService(this.runtime);
    this.budgets = new BudgetService(this.runtime);
    this.liabilities = new LiabilityService(this.runtime);
    this.sync = new SyncService(this.runtime);
    this.reports = new ReportService(this.runtime);
  }

  get store(): CofferStore {
    return this.runtime.store;
  }

  get settings(): EngineSettings {
    return this.runtime.settings;
  }

  get logger(): Logger {
    return this.runtime.logger;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Accounts & income
  // ───────────────────────────────────────────────────────────────────────

  createAccount(input: CreateAccountInput): Promise<AccountView> {
    return this.accounts.createAccount(input);
  }

  getAccount(id: string): AccountView {
    return this.accounts.getAccount(id);
  }

  listAccounts(filter?: ListAccountsFilter): readonly AccountView[] {
    return this.accounts.listAccounts(filter);
  }

  updateAccount(id: string, input: UpdateAccountInput): Promise<AccountView> {
    return this.accounts.updateAccount(id, input);
  }

  deactivateAccount(id: string): Promise<AccountView> {
    return this.accounts.deactivateAccount(id);
  }

  recordIncome(input: RecordIncomeInput): Promise<Income> {
    return this.accounts.recordIncome(input);
  }

  deleteIncome(id: string): Promise<void> {
    return this.accounts.deleteIncome(id);
  }

  listIncomes(accountId?: string): readonly Income[] {
    return this.accounts.listIncomes(accountId);
  }

  listCashFlows(accountId: string): readonly CashFlowEntry[] {
    return this.accounts.listCashFlows(accountId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Expenses
  // ───────────────────────────────────────────────────────────────────────

  recordExpense(input: RecordExpenseInput): Promise<Expense> {
    return this.expenses.recordExpense(input);
  }

  deleteExpense(id: string): Promise<void> {
    return this.expenses.deleteExpense(id);
  }

  getExpense(id: string): Expense | undefined {
    return this.expenses.getExpense(id);
  }

  listExpenses(filter?: ExpenseFilter): readonly Expense[] {
    return this.expenses.listExpenses(filter);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transfers
  // ───────────────────────────────────────────────────────────────────────

  createTransfer(input: CreateTransferInput): Promise<Transfer> {
    return this.transfers.createTransfer(input);
  }

  deleteTransfer(id: string): Promise<void> {
    return this.transfers.deleteTransfer(id);
  }

  listTransfers(accountId?: string): readonly Transfer[] {
    return this.transfers.listTransfers(accountId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Trades & holdings
  // ───────────────────────────────────────────────────────────────────────

  recordTrade(input: RecordTradeInput): Promise<InvestmentTrade> {
    return this.trades.recordTrade(input);
  }

  deleteTrade(id: string): Promise<void> {
    return this.trades.deleteTrade(id);
  }

  listTrades(accountId?: string): readonly InvestmentTrade[] {
    return this.trades.listTrades(accountId);
  }

  listHoldings(filter?: HoldingFilter): readonly Holding[] {
    return this.trades.listHoldings(filter);
  }

  portfolio(accountId: string): PortfolioSummary {
    return this.trades.portfolio(accountId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Budgets
  // ───────────────────────────────────────────────────────────────────────

  createBudget(input: CreateBudgetInput): Promise<Budget> {
    return this.budgets.createBudget(input);
  }

  reallocateBudget(id: string, allocated: string): Promise<Budget> {
    return this.budgets.reallocateBudget(id, allocated);
  }

  completeBudget(id: string): Promise<BudgetFinalSnapshot> {
    return this.budgets.completeBudget(id);
  }

  cancelBudget(id: string): Promise<Budget> {
    return this.budgets.cancelBudget(id);
  }

  deleteBudget(id: string): Promise<void> {
    return this.budgets.deleteBudget(id);
  }

  getBudget(id: string): Budget {
    return this.budgets.getBudget(id);
  }

  listBudgets(status?: BudgetStatus): readonly Budget[] {
    return this.budgets.listBudgets(status);
  }

  budgetAvailableFunds(id: string): BudgetFunds {
    return this.budgets.availableFunds(id);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Liabilities
  // ───────────────────────────────────────────────────────────────────────

  createLiability(input: CreateLiabilityInput): Promise<Liability> {
    return this.liabilities.createLiability(input);
  }

  recordPayment(input: RecordPaymentInput): Promise<LiabilityPayment> {
    return this.liabilities.recordPayment(input);
  }

  deletePayment(id: string): Promise<void> {
    return this.liabilities.deletePayment(id);
  }

  deleteLiability(id: string): Promise<void> {
    return this.liabilities.deleteLiability(id);
  }

  getLiability(id: string): Liability {
    return this.liabilities.getLiability(id);
  }

  listLiabilities(): readonly Liability[] {
    return this.liabilities.listLiabilities();
  }

  listPayments(liabilityId?: string): readonly LiabilityPayment[] {
    return this.liabilities.listPayments(liabilityId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Market sync
  // ───────────────────────────────────────────────────────────────────────

  syncHoldingsValue(options: SyncOptions): Promise<MarketSyncLog> {
    return this.sync.syncHoldingsValue(options);
  }

  listSyncLogs(limit?: number): readonly MarketSyncLog[] {
    return this.sync.listSyncLogs(limit);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reports
  // ───────────────────────────────────────────────────────────────────────

  dashboard(): Dashboard {
    return this.reports.dashboard();
  }

  verifyJournal(accountId?: string): JournalReport {
    return this.reports.verifyJournal(accountId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Persistence
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): StoreSnapshot<CofferTables> {
    return this.runtime.store.snapshot();
  }

  /** Must not be called while operations are in flight. */
  restore(snapshot: StoreSnapshot<CofferTables>): void {
    this.runtime.store.restore(snapshot);
    this.runtime.logger.info(
      { accounts: this.runtime.store.count("accounts"), createdAt: snapshot.createdAt },
      "state restored from snapshot",
    );
  }
}
