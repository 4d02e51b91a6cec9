/**
 * Income routes.
 *
 * POST   /api/v1/incomes       — Credit an account
 * GET    /api/v1/incomes       — List incomes, optionally for one account
 * DELETE /api/v1/incomes/:id   — Reverse an income
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AccountScopedQuerySchema, RecordIncomeSchema } from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { paginate, timestampKey } from "../types/pagination.js";

export function createIncomeRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(RecordIncomeSchema), async (c) => {
    const income = await c.get("engine").recordIncome(c.get("validatedBody"));
    return c.json({ data: income }, 201);
  });

  routes.get("/", validateQuery(AccountScopedQuerySchema), (c) => {
    const query = c.get("validatedQuery");
    const incomes = c.get("engine").listIncomes(query.accountId);
    return c.json(paginate(incomes, query, (i) => timestampKey(i.createdAt, i.id), "createdAt"));
  });

  routes.delete("/:id", async (c) => {
    await c.get("engine").deleteIncome(c.req.param("id"));
    return c.body(null, 204);
  });

  return routes;
}
