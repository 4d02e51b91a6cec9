/**
 * @coffer/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { AssetKind } from "@coffer/types";
import type { EngineOptions } from "@coffer/engine";

// =============================================================================
// Schema
// =============================================================================

const ASSET_KINDS = ["stock", "fund", "bond", "crypto", "money_market"] as const satisfies readonly AssetKind[];

/** Comma-separated asset kinds; an empty string means "exclude nothing". */
const AssetKindListSchema = z
  .string()
  .transform((raw) => raw.split(",").map((part) => part.trim()).filter((part) => part !== ""))
  .pipe(z.array(z.enum(ASSET_KINDS)));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Domain defaults
  DEFAULT_CURRENCY: z.string().min(1).default("CNY"),
  DEFAULT_DECIMALS: z.coerce.number().int().min(0).max(8).default(2),

  // Policies
  OVERSPEND_POLICY: z.enum(["allow", "reject"]).default("allow"),
  OVERPAYMENT_POLICY: z.enum(["reject", "clamp"]).default("reject"),
  TERMINAL_UNLINK_POLICY: z.enum(["adjust", "reject"]).default("adjust"),

  // Market sync
  SYNC_EXCLUDED_ASSET_KINDS: AssetKindListSchema.default("bond,money_market,crypto"),
  PRICE_LOOKUP_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
  PRICE_FEED_URL: z.string().url().optional(),

  // Concurrency
  LOCK_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),

  // Persistence
  SNAPSHOT_PATH: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/** The engine settings a config carries. */
export function engineOptionsFromConfig(config: AppConfig): EngineOptions {
  return {
    defaultCurrency: config.DEFAULT_CURRENCY,
    defaultDecimals: config.DEFAULT_DECIMALS,
    overspendPolicy: config.OVERSPEND_POLICY,
    overpaymentPolicy: config.OVERPAYMENT_POLICY,
    terminalUnlinkPolicy: config.TERMINAL_UNLINK_POLICY,
    syncExcludedAssetKinds: config.SYNC_EXCLUDED_ASSET_KINDS,
    priceLookupTimeoutMs: config.PRICE_LOOKUP_TIMEOUT_MS,
    lockTimeoutMs: config.LOCK_TIMEOUT_MS,
  };
}
