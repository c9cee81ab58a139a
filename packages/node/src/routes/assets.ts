/**
 * Asset routes.
 *
 * POST /api/v1/assets/mint       — Credit original-form units
 * GET  /api/v1/accounts/:address — Original and wrapped balances
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AccountParamsSchema, MintSchema } from "../types/dto.js";
import { readBody, readParams } from "../middleware/validate.js";
import { presentAccount } from "../types/presenters.js";

export function createAssetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/assets/mint", async (c) => {
    const body = await readBody(c, MintSchema);
    const balances = c.get("service").mint(body.to, body.amount);
    return c.json({ data: presentAccount(body.to, balances) }, 201);
  });

  routes.get("/accounts/:address", (c) => {
    const { address } = readParams(c, AccountParamsSchema);
    return c.json({ data: presentAccount(address, c.get("service").account(address)) });
  });

  return routes;
}
