/**
 * Read-only report routes.
 *
 * GET /api/v1/dashboard        — Totals per currency and active budgets
 * GET /api/v1/journal/verify   — Replay and reconcile the cash-flow journal
 * GET /api/v1/categories       — Expense category catalogue
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { VerifyJournalQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";
import type { ExpenseCategory } from "../services/categories.js";

export interface ReportRouteDeps {
  readonly categories: readonly ExpenseCategory[];
}

export function createReportRoutes(deps: ReportRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/dashboard", (c) => {
    return c.json({ data: c.get("engine").dashboard() });
  });

  routes.get("/journal/verify", validateQuery(VerifyJournalQuerySchema), (c) => {
    const report = c.get("engine").verifyJournal(c.get("validatedQuery").accountId);
    return c.json({ data: report });
  });

  routes.get("/categories", (c) => {
    return c.json({ data: deps.categories });
  });

  return routes;
}
