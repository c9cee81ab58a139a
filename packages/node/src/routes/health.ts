/**
 * Health check route.
 *
 * GET /health — Liveness probe with the ledger's current day and size
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { EscrowService } from "../services/escrow-service.js";

export function createHealthRoutes(service: EscrowService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      day: service.today(),
      escrows: service.ledger.recordCount,
      events: service.eventStore.globalPosition(),
    });
  });

  return routes;
}
