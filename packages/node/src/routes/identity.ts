/**
 * Identity routes.
 *
 * POST /api/v1/identity/principals — Register a principal
 * POST /api/v1/identity/trust      — Record trust, optionally until a day
 * DELETE /api/v1/identity/trust/:truster/:trustee — Withdraw trust
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RegisterPrincipalSchema, SetTrustSchema, TrustParamsSchema } from "../types/dto.js";
import { readBody, readParams } from "../middleware/validate.js";

export function createIdentityRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/principals", async (c) => {
    const body = await readBody(c, RegisterPrincipalSchema);
    c.get("service").registerPrincipal(body.address, body.onboarded);
    return c.json({ data: body }, 201);
  });

  routes.post("/trust", async (c) => {
    const body = await readBody(c, SetTrustSchema);
    c.get("service").setTrust(body.truster, body.trustee, body.expiresOnDay);
    return c.json(
      {
        data: {
          truster: body.truster,
          trustee: body.trustee,
          expiresOnDay: body.expiresOnDay ?? null,
        },
      },
      201,
    );
  });

  routes.delete("/trust/:truster/:trustee", (c) => {
    const { truster, trustee } = readParams(c, TrustParamsSchema);
    const revoked = c.get("service").revokeTrust(truster, trustee);
    return c.json({ data: { truster, trustee, revoked } });
  });

  return routes;
}
