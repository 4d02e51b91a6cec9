/**
 * Expense routes.
 *
 * POST   /api/v1/expenses       — Record an expense, optionally against a budget
 * GET    /api/v1/expenses       — List expenses by account, budget, category and date range
 * DELETE /api/v1/expenses/:id   — Reverse an expense and unlink it from its budget
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListExpensesQuerySchema, RecordExpenseSchema } from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { paginate, timestampKey } from "../types/pagination.js";

export function createExpenseRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(RecordExpenseSchema), async (c) => {
    const expense = await c.get("engine").recordExpense(c.get("validatedBody"));
    return c.json({ data: expense }, 201);
  });

  routes.get("/", validateQuery(ListExpensesQuerySchema), (c) => {
    const { cursor, limit, ...filter } = c.get("validatedQuery");
    const expenses = c.get("engine").listExpenses(filter);
    return c.json(
      paginate(expenses, { cursor, limit }, (e) => timestampKey(e.createdAt, e.id), "createdAt"),
    );
  });

  routes.delete("/:id", async (c) => {
    await c.get("engine").deleteExpense(c.req.param("id"));
    return c.body(null, 204);
  });

  return routes;
}
