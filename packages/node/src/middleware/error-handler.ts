/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Domain errors map to a status by their category; a few codes
 * override the category default. Anything else is a 500 whose
 * message is not passed on.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { isDomainError } from "@coffer/types";
import type { ErrorCategory, ErrorCode } from "@coffer/types";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const CATEGORY_STATUS: Record<ErrorCategory, ContentfulStatusCode> = {
  validation: 400,
  not_found: 404,
  state_conflict: 409,
  external_dependency: 502,
  integrity: 500,
};

const CODE_STATUS: Partial<Record<ErrorCode, ContentfulStatusCode>> = {
  INSUFFICIENT_FUNDS: 422,
  INSUFFICIENT_HOLDING_QUANTITY: 422,
  UNDERFUNDED_BUDGET: 422,
  OVERPAYMENT_REJECTED: 422,
  LOCK_TIMEOUT: 503,
};

export function statusForError(code: ErrorCode, category: ErrorCategory): ContentfulStatusCode {
  return CODE_STATUS[code] ?? CATEGORY_STATUS[category];
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (!isDomainError(err)) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  const status = statusForError(err.code, err.category);
  const envelope = createErrorEnvelope(err.code, err.message, err.details);
  return c.json(envelope, status);
}
