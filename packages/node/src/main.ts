/**
 * @coffer/node — Entry point.
 *
 * Bootstraps the engine and the Hono app, loads config, starts the
 * HTTP server, and handles graceful shutdown. With SNAPSHOT_PATH set,
 * state is restored at startup and written back on shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { CofferEngine, parseCofferSnapshot } from "@coffer/engine";
import type { CofferTables } from "@coffer/engine";
import { FileSnapshotStore } from "@coffer/store";
import { engineOptionsFromConfig, loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { httpPriceLookup } from "./services/price-feed.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const engine = new CofferEngine({
    ...engineOptionsFromConfig(config),
    logger: logger.child({ component: "engine" }),
  });

  let snapshots: FileSnapshotStore<CofferTables> | undefined;
  if (config.SNAPSHOT_PATH !== undefined) {
    snapshots = new FileSnapshotStore(config.SNAPSHOT_PATH, parseCofferSnapshot);
    const saved = snapshots.load();
    if (saved !== undefined) {
      engine.restore(saved);
      logger.info({ path: snapshots.path, createdAt: saved.createdAt }, "Snapshot restored");
    } else {
      logger.info({ path: snapshots.path }, "No snapshot yet, starting empty");
    }
  }

  const priceLookup =
    config.PRICE_FEED_URL !== undefined
      ? httpPriceLookup({ baseUrl: config.PRICE_FEED_URL, timeoutMs: config.PRICE_LOOKUP_TIMEOUT_MS })
      : undefined;

  const { app } = createApp({
    engine,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    priceLookup,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, priceFeed: priceLookup !== undefined },
    "coffer node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "HTTP server did not close cleanly");
      }
      try {
        if (snapshots !== undefined) {
          snapshots.save(engine.snapshot());
          logger.info({ path: snapshots.path }, "Snapshot saved");
        }
      } catch (saveErr: unknown) {
        logger.error({ err: saveErr }, "Snapshot save failed");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
