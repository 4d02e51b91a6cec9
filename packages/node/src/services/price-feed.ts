/**
 * HTTP price oracle.
 *
 * Asks `GET {baseUrl}/{symbol}` for a JSON body `{ "price": ... }`.
 * Every failure becomes a failed quote for that symbol; the sync batch
 * carries on with the rest.
 */

import { z } from "zod";
import type { PriceLookup, PriceQuote } from "@coffer/vault";

const PriceBodySchema = z.object({
  price: z.union([z.string().min(1), z.number()]),
});

export interface HttpPriceFeedConfig {
  readonly baseUrl: string;
  /** Abort the request after this long. Default: 5000 */
  readonly timeoutMs?: number | undefined;
  /** Custom fetch, for tests */
  readonly fetchFn?: typeof fetch | undefined;
}

export function httpPriceLookup(config: HttpPriceFeedConfig): PriceLookup {
  const root = config.baseUrl.replace(/\/+$/, "");
  const fetchFn = config.fetchFn ?? fetch;
  const timeoutMs = config.timeoutMs ?? 5000;

  return async (symbol, context): Promise<PriceQuote> => {
    const url = new URL(`${root}/${encodeURIComponent(symbol)}`);
    url.searchParams.set("assetKind", context.assetKind);
    url.searchParams.set("market", context.market);

    const response = await fetchFn(url, {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      return { ok: false, reason: `Price feed answered ${response.status} for ${symbol}` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      return { ok: false, reason: `Price feed sent invalid JSON for ${symbol}` };
    }

    const parsed = PriceBodySchema.safeParse(body);
    if (!parsed.success) {
      return { ok: false, reason: `Price feed sent no price for ${symbol}` };
    }
    return { ok: true, price: parsed.data.price };
  };
}
