/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { CofferEngine } from "@coffer/engine";
import type { PriceLookup } from "@coffer/vault";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  idempotencyMiddleware,
  InMemoryIdempotencyStore,
} from "./middleware/idempotency.js";
import type { IdempotencyStore } from "./middleware/idempotency.js";
import { loadExpenseCategories } from "./services/categories.js";
import type { ExpenseCategory } from "./services/categories.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createIncomeRoutes } from "./routes/incomes.js";
import { createExpenseRoutes } from "./routes/expenses.js";
import { createTransferRoutes } from "./routes/transfers.js";
import { createTradeRoutes } from "./routes/trades.js";
import { createBudgetRoutes } from "./routes/budgets.js";
import { createLiabilityRoutes } from "./routes/liabilities.js";
import { createSyncRoutes } from "./routes/sync.js";
import { createReportRoutes } from "./routes/reports.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly engine: CofferEngine;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Ignored when idempotencyStore is given. Default: 24h */
  readonly idempotencyTtlMs?: number | undefined;
  readonly idempotencyStore?: IdempotencyStore | undefined;
  /** Oracle for POST /sync requests that carry no prices */
  readonly priceLookup?: PriceLookup | undefined;
  /** Default: data/expense-categories.json */
  readonly categories?: readonly ExpenseCategory[] | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly engine: CofferEngine;
  readonly idempotencyStore: IdempotencyStore;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { engine } = options;
  const idempotencyStore =
    options.idempotencyStore ??
    new InMemoryIdempotencyStore(options.idempotencyTtlMs ?? 86400000);
  const categories = options.categories ?? loadExpenseCategories();

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(engine));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("engine", engine);
    await next();
  });

  // Idempotency for POST /api/* requests
  app.use("/api/*", idempotencyMiddleware(idempotencyStore));

  // Mount v1 API routes
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/incomes", createIncomeRoutes());
  app.route("/api/v1/expenses", createExpenseRoutes());
  app.route("/api/v1/transfers", createTransferRoutes());
  app.route("/api/v1/budgets", createBudgetRoutes());
  app.route("/api/v1/sync", createSyncRoutes({ priceLookup: options.priceLookup }));
  app.route("/api/v1", createTradeRoutes());
  app.route("/api/v1", createLiabilityRoutes());
  app.route("/api/v1", createReportRoutes({ categories }));

  return { app, engine, idempotencyStore };
}
