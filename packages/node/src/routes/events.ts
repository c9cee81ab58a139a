/**
 * Event query routes.
 *
 * GET /api/v1/events           — Escrow event log (position pagination)
 * GET /api/v1/events/integrity — Hash chain verification
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { readQuery } from "../middleware/validate.js";
import { presentEvent } from "../types/presenters.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = readQuery(c, ListEventsQuerySchema);

    // One extra to detect hasMore
    const page = c.get("service").readAllEvents({
      fromPosition: query.afterPosition + 1,
      maxCount: query.limit + 1,
    });
    const hasMore = page.length > query.limit;
    const data = hasMore ? page.slice(0, query.limit) : page;
    const last = data.at(-1);

    return c.json({
      data: data.map(presentEvent),
      pagination: {
        nextPosition: hasMore && last !== undefined ? last.globalPosition : null,
        hasMore,
      },
    });
  });

  routes.get("/integrity", (c) => {
    return c.json({ data: c.get("service").verifyIntegrity() });
  });

  return routes;
}
