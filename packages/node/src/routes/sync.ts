/**
 * Market value sync routes.
 *
 * POST /api/v1/sync        — Reprice holdings from a price map or the configured feed
 * GET  /api/v1/sync/logs   — Sync runs (cursor pagination)
 */

import { Hono } from "hono";
import { EngineError } from "@coffer/engine";
import { priceLookupFromMap } from "@coffer/vault";
import type { PriceLookup } from "@coffer/vault";
import type { AppEnv } from "../types/api-contract.js";
import { PaginationQuerySchema, SyncSchema } from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { paginate, timestampKey } from "../types/pagination.js";

export interface SyncRouteDeps {
  /** Oracle used when a request carries no prices */
  readonly priceLookup?: PriceLookup | undefined;
}

export function createSyncRoutes(deps?: SyncRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const feed = deps?.priceLookup;

  routes.post("/", validateBody(SyncSchema), async (c) => {
    const body = c.get("validatedBody");
    const lookup = body.prices !== undefined ? priceLookupFromMap(body.prices) : feed;
    if (lookup === undefined) {
      throw new EngineError(
        "INVALID_INPUT",
        "No price source: send prices or configure PRICE_FEED_URL",
      );
    }

    const log = await c.get("engine").syncHoldingsValue({ lookup, accountId: body.accountId });
    return c.json({ data: log });
  });

  routes.get("/logs", validateQuery(PaginationQuerySchema), (c) => {
    const logs = c.get("engine").listSyncLogs();
    return c.json(
      paginate(logs, c.get("validatedQuery"), (l) => timestampKey(l.startedAt, l.id), "startedAt"),
    );
  });

  return routes;
}
