/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAccountRoutes } from "./accounts.js";
export { createIncomeRoutes } from "./incomes.js";
export { createExpenseRoutes } from "./expenses.js";
export { createTransferRoutes } from "./transfers.js";
export { createTradeRoutes } from "./trades.js";
export { createBudgetRoutes } from "./budgets.js";
export { createLiabilityRoutes } from "./liabilities.js";
export { createSyncRoutes } from "./sync.js";
export type { SyncRouteDeps } from "./sync.js";
export { createReportRoutes } from "./reports.js";
export type { ReportRouteDeps } from "./reports.js";
