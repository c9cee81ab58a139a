/**
 * Escrow routes.
 *
 * POST /api/v1/escrows                    — Lock value for an invitee
 * POST /api/v1/escrows/redeem             — Redeem one inviter, refund the rest
 * POST /api/v1/escrows/revoke             — Revoke one escrow
 * POST /api/v1/escrows/revoke-all         — Revoke every escrow of an inviter
 * GET  /api/v1/escrows/:inviter/:invitee  — Current balance and age
 * GET  /api/v1/inviters/:invitee          — Inviters holding an escrow for an invitee
 * GET  /api/v1/invitees/:inviter          — Invitees of an inviter
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateEscrowSchema,
  InviteeParamsSchema,
  InviterParamsSchema,
  PairParamsSchema,
  RedeemSchema,
  RevokeAllSchema,
  RevokeSchema,
} from "../types/dto.js";
import { readBody, readParams } from "../middleware/validate.js";
import {
  presentBalance,
  presentNotification,
  presentRedeem,
  presentRevokeAll,
} from "../types/presenters.js";

export function createEscrowRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/escrows", async (c) => {
    const body = await readBody(c, CreateEscrowSchema);
    const created = c.get("service").createEscrow(body.inviter, body.invitee, body.amount);
    return c.json({ data: presentNotification(created) }, 201);
  });

  routes.post("/escrows/redeem", async (c) => {
    const body = await readBody(c, RedeemSchema);
    const result = c.get("service").redeem(body.invitee, body.inviter);
    return c.json({ data: presentRedeem(result) });
  });

  routes.post("/escrows/revoke", async (c) => {
    const body = await readBody(c, RevokeSchema);
    const revoked = c.get("service").revokeOne(body.inviter, body.invitee);
    return c.json({ data: presentNotification(revoked) });
  });

  routes.post("/escrows/revoke-all", async (c) => {
    const body = await readBody(c, RevokeAllSchema);
    const result = c.get("service").revokeAll(body.inviter);
    return c.json({ data: presentRevokeAll(result) });
  });

  routes.get("/escrows/:inviter/:invitee", (c) => {
    const { inviter, invitee } = readParams(c, PairParamsSchema);
    const balance = c.get("service").balanceAndAge(inviter, invitee);
    return c.json({ data: { inviter, invitee, ...presentBalance(balance) } });
  });

  routes.get("/inviters/:invitee", (c) => {
    const { invitee } = readParams(c, InviteeParamsSchema);
    return c.json({ data: c.get("service").listInviters(invitee) });
  });

  routes.get("/invitees/:inviter", (c) => {
    const { inviter } = readParams(c, InviterParamsSchema);
    return c.json({ data: c.get("service").listInvitees(inviter) });
  });

  return routes;
}
