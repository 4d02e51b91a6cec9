/**
 * Trade and holding routes.
 *
 * POST   /api/v1/trades       — Record a buy, sell, dividend or interest
 * GET    /api/v1/trades       — List trades, optionally for one account
 * DELETE /api/v1/trades/:id   — Remove a trade and replay its holding
 * GET    /api/v1/holdings     — List holdings
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AccountScopedQuerySchema,
  ListHoldingsQuerySchema,
  RecordTradeSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { paginate, timestampKey } from "../types/pagination.js";

export function createTradeRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/trades", validateBody(RecordTradeSchema), async (c) => {
    const trade = await c.get("engine").recordTrade(c.get("validatedBody"));
    return c.json({ data: trade }, 201);
  });

  routes.get("/trades", validateQuery(AccountScopedQuerySchema), (c) => {
    const query = c.get("validatedQuery");
    const trades = c.get("engine").listTrades(query.accountId);
    return c.json(paginate(trades, query, (t) => timestampKey(t.createdAt, t.id), "createdAt"));
  });

  routes.delete("/trades/:id", async (c) => {
    await c.get("engine").deleteTrade(c.req.param("id"));
    return c.body(null, 204);
  });

  routes.get("/holdings", validateQuery(ListHoldingsQuerySchema), (c) => {
    const query = c.get("validatedQuery");
    const holdings = c.get("engine").listHoldings({
      accountId: query.accountId,
      includeInactive: query.includeInactive,
    });
    return c.json(paginate(holdings, query, (h) => timestampKey(h.createdAt, h.id), "createdAt"));
  });

  return routes;
}
