/**
 * Shared fixtures for engine tests.
 */

import { expect } from "vitest";
import { DomainError } from "@coffer/types";
import type { ErrorCode } from "@coffer/types";
import { CofferEngine } from "../src/engine.js";
import type { AccountView, EngineOptions } from "../src/types.js";

export const NOW = new Date("2026-03-15T09:00:00.000Z");
export const TODAY = "2026-03-15";

/** Zero-padded so creation-order ties sort the way ids were handed out. */
export function sequentialIds(prefix = "id"): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${String(next).padStart(4, "0")}`;
  };
}

export function createEngine(options: EngineOptions = {}): CofferEngine {
  return new CofferEngine({
    clock: () => NOW,
    ids: sequentialIds(),
    ...options,
  });
}

export function cashAccount(
  engine: CofferEngine,
  name: string,
  openingBalance = "0",
): Promise<AccountView> {
  return engine.createAccount({ name, kind: "cash", openingBalance });
}

export function investmentAccount(
  engine: CofferEngine,
  name: string,
  openingBalance = "0",
): Promise<AccountView> {
  return engine.createAccount({ name, kind: "investment", openingBalance });
}

export function expectCode(fn: () => unknown, code: ErrorCode): void {
  try {
    fn();
    expect.fail(`expected ${code}`);
  } catch (err) {
    expect(err).toBeInstanceOf(DomainError);
    if (err instanceof DomainError) expect(err.code).toBe(code);
  }
}

export async function expectRejection(promise: Promise<unknown>, code: ErrorCode): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(DomainError);
  await expect(promise).rejects.toMatchObject({ code });
}
