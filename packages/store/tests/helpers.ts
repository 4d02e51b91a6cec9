/**
 * Shared fixtures for store tests.
 */

import { expect } from "vitest";
import { InMemoryStore, StoreError } from "../src/index.js";
import type { StoreErrorCode } from "../src/index.js";

export interface Item {
  readonly id: string;
  readonly value: number;
}

export interface Note {
  readonly id: string;
  readonly text: string;
}

export interface TestTables {
  items: Item;
  notes: Note;
}

export function createStore(lockTimeoutMs = 50): InMemoryStore<TestTables> {
  return new InMemoryStore<TestTables>(["items", "notes"], { lockTimeoutMs });
}

export async function seed(
  store: InMemoryStore<TestTables>,
  ...items: readonly Item[]
): Promise<void> {
  const uow = await store.begin();
  for (const item of items) uow.insert("items", item);
  uow.commit();
}

export function expectStoreError(fn: () => unknown, code: StoreErrorCode): void {
  try {
    fn();
    expect.fail(`expected ${code}`);
  } catch (err) {
    expect(err).toBeInstanceOf(StoreError);
    if (err instanceof StoreError) expect(err.code).toBe(code);
  }
}

export async function expectStoreRejection(
  promise: Promise<unknown>,
  code: StoreErrorCode,
): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(StoreError);
  await expect(promise).rejects.toMatchObject({ code });
}

export const noopSleep = async (_ms: number): Promise<void> => {};
