/**
 * Tests for error handler middleware.
 *
 * Verifies domain errors are mapped to correct HTTP status codes
 * and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { EngineError, IntegrityError } from "@coffer/engine";
import { handleError, statusForError } from "../../src/middleware/error-handler.js";
import type { ErrorBody } from "../setup.js";

function appThrowing(err: Error): Hono {
  const app = new Hono();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("statusForError", () => {
  it("maps categories to their default status", () => {
    expect(statusForError("INVALID_AMOUNT", "validation")).toBe(400);
    expect(statusForError("BUDGET_NOT_FOUND", "not_found")).toBe(404);
    expect(statusForError("INVALID_TRANSITION", "state_conflict")).toBe(409);
    expect(statusForError("PRICE_LOOKUP_TIMEOUT", "external_dependency")).toBe(502);
    expect(statusForError("SNAPSHOT_CORRUPT", "integrity")).toBe(500);
  });

  it("lets a code override its category", () => {
    expect(statusForError("INSUFFICIENT_FUNDS", "state_conflict")).toBe(422);
    expect(statusForError("OVERPAYMENT_REJECTED", "state_conflict")).toBe(422);
    expect(statusForError("LOCK_TIMEOUT", "state_conflict")).toBe(503);
  });
});

describe("handleError", () => {
  it("renders a domain error with its code, message and details", async () => {
    const app = appThrowing(new EngineError("ACCOUNT_NOT_FOUND", "Account 'a1' not found", { accountId: "a1" }));
    const res = await app.request("/boom");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "ACCOUNT_NOT_FOUND", message: "Account 'a1' not found", details: { accountId: "a1" } },
    });
  });

  it("omits details when the error has none", async () => {
    const res = await appThrowing(new EngineError("INVALID_INPUT", "bad")).request("/boom");
    expect(await res.json()).toEqual({ error: { code: "INVALID_INPUT", message: "bad" } });
  });

  it("answers 500 for an integrity violation", async () => {
    const res = await appThrowing(new IntegrityError("journal and balance disagree")).request("/boom");
    expect(res.status).toBe(500);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INTEGRITY_VIOLATION");
  });

  it("hides the message of an unexpected error", async () => {
    const res = await appThrowing(new TypeError("cannot read x of undefined")).request("/boom");
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } });
  });
});
