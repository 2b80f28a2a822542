/**
 * Claim routes. Each pays underlying out of custody to the caller.
 *
 * POST /api/v1/claims/redemption              — Settled redemption payouts
 * POST /api/v1/claims/curator-fees/:vaultId   — Curator fee balance of a vault
 * POST /api/v1/claims/protocol-fees           — Protocol fee balance (admin principal)
 */

import { Hono } from "hono";
import type { Protocol } from "@meridian/orchestrator";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";

export function createClaimRoutes(protocol: Protocol): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("write"));

  routes.post("/redemption", (c) => {
    const amount = protocol.custody.claimRedemption(c.get("auth").principal);
    return c.json({ data: { amount: amount.toString() } });
  });

  routes.post("/curator-fees/:vaultId", (c) => {
    const amount = protocol.vaults.claimCuratorFees(c.req.param("vaultId"), c.get("auth").principal);
    return c.json({ data: { amount: amount.toString() } });
  });

  routes.post("/protocol-fees", (c) => {
    const amount = protocol.custody.claimProtocolFees(c.get("auth").principal);
    return c.json({ data: { amount: amount.toString() } });
  });

  return routes;
}
