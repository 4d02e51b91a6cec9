/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (every account reconciles with its journal)
 */

import { Hono } from "hono";
import type { CofferEngine } from "@coffer/engine";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(engine: CofferEngine): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const report = engine.verifyJournal();
    const broken = report.accounts.filter((a) => !a.reconciled).map((a) => a.accountId);

    return c.json(
      {
        status: report.valid ? "ready" : "not_ready",
        accounts: report.accounts.length,
        ...(broken.length > 0 ? { unreconciled: broken } : {}),
        timestamp: report.checkedAt,
      },
      report.valid ? 200 : 503,
    );
  });

  return routes;
}
