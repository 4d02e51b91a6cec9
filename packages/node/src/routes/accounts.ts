/**
 * Account routes.
 *
 * POST   /api/v1/accounts                  — Open an account
 * GET    /api/v1/accounts                  — List accounts (cursor pagination)
 * GET    /api/v1/accounts/:id              — Get one account with projected values
 * PATCH  /api/v1/accounts/:id              — Rename or re-describe an account
 * POST   /api/v1/accounts/:id/deactivate   — Soft-delete an account
 * GET    /api/v1/accounts/:id/portfolio    — Cost basis and unrealized P/L
 * GET    /api/v1/accounts/:id/cash-flows   — Journal entries (cursor pagination)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateAccountSchema,
  ListAccountsQuerySchema,
  PaginationQuerySchema,
  UpdateAccountSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { paginate, sequenceKey, timestampKey } from "../types/pagination.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateAccountSchema), async (c) => {
    const account = await c.get("engine").createAccount(c.get("validatedBody"));
    return c.json({ data: account }, 201);
  });

  routes.get("/", validateQuery(ListAccountsQuerySchema), (c) => {
    const query = c.get("validatedQuery");
    const accounts = c.get("engine").listAccounts({
      kind: query.kind,
      includeInactive: query.includeInactive,
    });
    return c.json(
      paginate(accounts, query, (a) => timestampKey(a.createdAt, a.id), "createdAt"),
    );
  });

  routes.get("/:id", (c) => {
    return c.json({ data: c.get("engine").getAccount(c.req.param("id")) });
  });

  routes.patch("/:id", validateBody(UpdateAccountSchema), async (c) => {
    const account = await c.get("engine").updateAccount(c.req.param("id"), c.get("validatedBody"));
    return c.json({ data: account });
  });

  routes.post("/:id/deactivate", async (c) => {
    const account = await c.get("engine").deactivateAccount(c.req.param("id"));
    return c.json({ data: account });
  });

  routes.get("/:id/portfolio", (c) => {
    return c.json({ data: c.get("engine").portfolio(c.req.param("id")) });
  });

  routes.get("/:id/cash-flows", validateQuery(PaginationQuerySchema), (c) => {
    const entries = c.get("engine").listCashFlows(c.req.param("id"));
    return c.json(
      paginate(entries, c.get("validatedQuery"), (e) => sequenceKey(e.sequence), "sequence"),
    );
  });

  return routes;
}
