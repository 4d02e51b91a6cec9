/**
 * Idempotency middleware.
 *
 * Caches POST mutation responses by Idempotency-Key header.
 * If the same key is seen again on the same path within the TTL, the
 * cached response is returned instead of re-executing the handler.
 * Failed requests are not cached, so a client may retry them.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

// =============================================================================
// Idempotency Store Interface
// =============================================================================

export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly cachedAt: number;
}

export interface IdempotencyStore {
  get(key: string): CachedResponse | undefined;
  set(key: string, response: CachedResponse): void;
  /** Current time on the store's clock, in epoch ms */
  now(): number;
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly _cache = new Map<string, CachedResponse>();
  private readonly _ttlMs: number;
  private readonly _now: () => number;

  constructor(ttlMs: number = 86400000, now: () => number = Date.now) {
    this._ttlMs = ttlMs;
    this._now = now;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this._cache.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (this._now() - entry.cachedAt > this._ttlMs) {
      this._cache.delete(key);
      return undefined;
    }

    return entry;
  }

  set(key: string, response: CachedResponse): void {
    this._cache.set(key, response);
  }

  get size(): number {
    return this._cache.size;
  }

  now(): number {
    return this._now();
  }

  clear(): void {
    this._cache.clear();
  }
}

// =============================================================================
// Middleware
// =============================================================================

export const IDEMPOTENCY_HEADER = "Idempotency-Key";
export const REPLAY_HEADER = "X-Idempotent-Replay";

export function idempotencyMiddleware(
  store: IdempotencyStore,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (c.req.method !== "POST") {
      return next();
    }

    const idempotencyKey = c.req.header(IDEMPOTENCY_HEADER);
    if (idempotencyKey === undefined) {
      return next();
    }

    const cacheKey = `${c.req.path}\n${idempotencyKey}`;
    const cached = store.get(cacheKey);
    if (cached !== undefined) {
      return new Response(cached.body, {
        status: cached.status,
        headers: { ...cached.headers, [REPLAY_HEADER]: "true" },
      });
    }

    await next();

    if (c.res.status < 400) {
      const cloned = c.res.clone();
      const body = await cloned.text();
      const headers: Record<string, string> = {};
      cloned.headers.forEach((value, key) => {
        headers[key] = value;
      });

      store.set(cacheKey, {
        status: c.res.status,
        body,
        headers,
        cachedAt: store.now(),
      });
    }
  };
}
