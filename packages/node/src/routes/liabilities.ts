/**
 * Liability routes.
 *
 * POST   /api/v1/liabilities                — Record a debt
 * GET    /api/v1/liabilities                — List liabilities
 * GET    /api/v1/liabilities/:id            — Get one liability
 * DELETE /api/v1/liabilities/:id            — Delete a liability with no payments
 * POST   /api/v1/liabilities/:id/payments   — Pay down a liability from an account
 * GET    /api/v1/liabilities/:id/payments   — List payments against a liability
 * DELETE /api/v1/payments/:id               — Reverse a payment
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateLiabilitySchema,
  PaginationQuerySchema,
  RecordPaymentSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { paginate, timestampKey } from "../types/pagination.js";

export function createLiabilityRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/liabilities", validateBody(CreateLiabilitySchema), async (c) => {
    const liability = await c.get("engine").createLiability(c.get("validatedBody"));
    return c.json({ data: liability }, 201);
  });

  routes.get("/liabilities", validateQuery(PaginationQuerySchema), (c) => {
    const liabilities = c.get("engine").listLiabilities();
    return c.json(
      paginate(liabilities, c.get("validatedQuery"), (l) => timestampKey(l.createdAt, l.id), "createdAt"),
    );
  });

  routes.get("/liabilities/:id", (c) => {
    return c.json({ data: c.get("engine").getLiability(c.req.param("id")) });
  });

  routes.delete("/liabilities/:id", async (c) => {
    await c.get("engine").deleteLiability(c.req.param("id"));
    return c.body(null, 204);
  });

  routes.post("/liabilities/:id/payments", validateBody(RecordPaymentSchema), async (c) => {
    const payment = await c.get("engine").recordPayment({
      ...c.get("validatedBody"),
      liabilityId: c.req.param("id"),
    });
    return c.json({ data: payment }, 201);
  });

  routes.get("/liabilities/:id/payments", validateQuery(PaginationQuerySchema), (c) => {
    const engine = c.get("engine");
    const liabilityId = c.req.param("id");
    engine.getLiability(liabilityId);
    return c.json(
      paginate(
        engine.listPayments(liabilityId),
        c.get("validatedQuery"),
        (p) => timestampKey(p.createdAt, p.id),
        "createdAt",
      ),
    );
  });

  routes.delete("/payments/:id", async (c) => {
    await c.get("engine").deletePayment(c.req.param("id"));
    return c.body(null, 204);
  });

  return routes;
}
