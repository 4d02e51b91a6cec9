/**
 * Tests for config.ts — loadConfig + engineOptionsFromConfig.
 */

import { describe, it, expect } from "vitest";
import { engineOptionsFromConfig, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      DEFAULT_CURRENCY: "CNY",
      DEFAULT_DECIMALS: 2,
      OVERSPEND_POLICY: "allow",
      OVERPAYMENT_POLICY: "reject",
      TERMINAL_UNLINK_POLICY: "adjust",
      SYNC_EXCLUDED_ASSET_KINDS: ["bond", "money_market", "crypto"],
      PRICE_LOOKUP_TIMEOUT_MS: 5000,
      LOCK_TIMEOUT_MS: 5000,
      IDEMPOTENCY_TTL_MS: 86400000,
    });
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      DEFAULT_CURRENCY: "USD",
      DEFAULT_DECIMALS: "4",
      OVERSPEND_POLICY: "reject",
      OVERPAYMENT_POLICY: "clamp",
      TERMINAL_UNLINK_POLICY: "reject",
      SYNC_EXCLUDED_ASSET_KINDS: " crypto , bond ",
      PRICE_FEED_URL: "http://prices.test/quote",
      SNAPSHOT_PATH: "/tmp/coffer.json",
    });

    expect(config.PORT).toBe(8080);
    expect(config.DEFAULT_DECIMALS).toBe(4);
    expect(config.OVERPAYMENT_POLICY).toBe("clamp");
    expect(config.SYNC_EXCLUDED_ASSET_KINDS).toEqual(["crypto", "bond"]);
    expect(config.PRICE_FEED_URL).toBe("http://prices.test/quote");
    expect(config.SNAPSHOT_PATH).toBe("/tmp/coffer.json");
  });

  it("reads an empty exclusion list as excluding nothing", () => {
    expect(loadConfig({ SYNC_EXCLUDED_ASSET_KINDS: "" }).SYNC_EXCLUDED_ASSET_KINDS).toEqual([]);
  });

  it("throws on invalid values", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ OVERSPEND_POLICY: "sometimes" })).toThrow();
    expect(() => loadConfig({ SYNC_EXCLUDED_ASSET_KINDS: "bond,art" })).toThrow();
    expect(() => loadConfig({ PRICE_FEED_URL: "not a url" })).toThrow();
    expect(() => loadConfig({ DEFAULT_DECIMALS: "9" })).toThrow();
  });
});

describe("engineOptionsFromConfig", () => {
  it("maps the domain settings onto engine options", () => {
    const options = engineOptionsFromConfig(
      loadConfig({ OVERSPEND_POLICY: "reject", LOCK_TIMEOUT_MS: "250" }),
    );
    expect(options).toEqual({
      defaultCurrency: "CNY",
      defaultDecimals: 2,
      overspendPolicy: "reject",
      overpaymentPolicy: "reject",
      terminalUnlinkPolicy: "adjust",
      syncExcludedAssetKinds: ["bond", "money_market", "crypto"],
      priceLookupTimeoutMs: 5000,
      lockTimeoutMs: 250,
    });
  });
});
