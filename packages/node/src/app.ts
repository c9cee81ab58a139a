/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { EscrowService } from "./services/escrow-service.js";
import type { EscrowServiceConfig } from "./services/escrow-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import {
  createAssetRoutes,
  createEscrowRoutes,
  createEventRoutes,
  createHealthRoutes,
  createIdentityRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: EscrowServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: EscrowService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new EscrowService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/identity", createIdentityRoutes());
  app.route("/api/v1", createAssetRoutes());
  app.route("/api/v1", createEscrowRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
