/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { CofferEngine } from "@coffer/engine";

export interface AppVariables {
  /** Unique request identifier (set by request-id middleware) */
  requestId: string;

  /** The engine every route operates on */
  engine: CofferEngine;
}

/**
 * Hono environment type for the coffer app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: AppVariables;
}

/** Environment of a handler behind validateBody(). */
export interface BodyEnv<T> {
  Variables: AppVariables & { validatedBody: T };
}

/** Environment of a handler behind validateQuery(). */
export interface QueryEnv<T> {
  Variables: AppVariables & { validatedQuery: T };
}
