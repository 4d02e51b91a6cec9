/**
 * Transfer routes.
 *
 * POST   /api/v1/transfers       — Move money between two accounts
 * GET    /api/v1/transfers       — List transfers touching an account
 * DELETE /api/v1/transfers/:id   — Reverse both legs of a transfer
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AccountScopedQuerySchema, CreateTransferSchema } from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { paginate, timestampKey } from "../types/pagination.js";

export function createTransferRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateTransferSchema), async (c) => {
    const transfer = await c.get("engine").createTransfer(c.get("validatedBody"));
    return c.json({ data: transfer }, 201);
  });

  routes.get("/", validateQuery(AccountScopedQuerySchema), (c) => {
    const query = c.get("validatedQuery");
    const transfers = c.get("engine").listTransfers(query.accountId);
    return c.json(paginate(transfers, query, (t) => timestampKey(t.createdAt, t.id), "createdAt"));
  });

  routes.delete("/:id", async (c) => {
    await c.get("engine").deleteTransfer(c.req.param("id"));
    return c.body(null, 204);
  });

  return routes;
}
