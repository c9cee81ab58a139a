/**
 * @invite-escrow/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { SystemClock } from "@invite-escrow/escrow";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

// =============================================================================
// Bootstrap
// =============================================================================

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app } = createApp({
    serviceConfig: {
      clock: new SystemClock(config.DAY_ZERO_TIMESTAMP),
      registry: config.ASSET_REGISTRY_ADDRESS,
      bounds: { min: config.MIN_ESCROW_AMOUNT, max: config.MAX_ESCROW_AMOUNT },
      logger,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      registry: config.ASSET_REGISTRY_ADDRESS,
      minEscrow: config.MIN_ESCROW_AMOUNT.toString(),
      maxEscrow: config.MAX_ESCROW_AMOUNT.toString(),
    },
    "Escrow node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
