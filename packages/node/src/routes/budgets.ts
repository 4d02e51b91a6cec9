/**
 * Budget routes.
 *
 * POST   /api/v1/budgets                      — Create a budget
 * GET    /api/v1/budgets                      — List budgets, optionally by status
 * GET    /api/v1/budgets/:id                  — Get one budget
 * GET    /api/v1/budgets/:id/available-funds  — Spendable cash of the eligible accounts
 * POST   /api/v1/budgets/:id/reallocate       — Change the allocation of an active budget
 * POST   /api/v1/budgets/:id/complete         — Freeze the budget and return its final figures
 * POST   /api/v1/budgets/:id/cancel           — Cancel an active budget
 * DELETE /api/v1/budgets/:id                  — Delete a budget no expense refers to
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateBudgetSchema,
  ListBudgetsQuerySchema,
  ReallocateBudgetSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { paginate, timestampKey } from "../types/pagination.js";

export function createBudgetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateBudgetSchema), async (c) => {
    const budget = await c.get("engine").createBudget(c.get("validatedBody"));
    return c.json({ data: budget }, 201);
  });

  routes.get("/", validateQuery(ListBudgetsQuerySchema), (c) => {
    const query = c.get("validatedQuery");
    const budgets = c.get("engine").listBudgets(query.status);
    return c.json(paginate(budgets, query, (b) => timestampKey(b.createdAt, b.id), "createdAt"));
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("engine").getBudget(c.req.param("id")) });
  });

  routes.get("/:id/available-funds", (c) => {
    return c.json({ data: c.get("engine").budgetAvailableFunds(c.req.param("id")) });
  });

  routes.post("/:id/reallocate", validateBody(ReallocateBudgetSchema), async (c) => {
    const { allocated } = c.get("validatedBody");
    const budget = await c.get("engine").reallocateBudget(c.req.param("id"), allocated);
    return c.json({ data: budget });
  });

  routes.post("/:id/complete", async (c) => {
    const snapshot = await c.get("engine").completeBudget(c.req.param("id"));
    return c.json({ data: snapshot });
  });

  routes.post("/:id/cancel", async (c) => {
    const budget = await c.get("engine").cancelBudget(c.req.param("id"));
    return c.json({ data: budget });
  });

  routes.delete("/:id", async (c) => {
    await c.get("engine").deleteBudget(c.req.param("id"));
    return c.body(null, 204);
  });

  return routes;
}
