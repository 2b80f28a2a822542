/**
 * Vault routes. The caller's principal is the user, curator or admin of
 * each operation.
 *
 * GET    /api/v1/vaults                          — List vaults
 * POST   /api/v1/vaults                          — Create a vault (curator)
 * GET    /api/v1/vaults/:id                      — One vault
 * GET    /api/v1/vaults/:id/positions/:user      — Shares and pending requests of a user
 * POST   /api/v1/vaults/:id/deposits             — Request a deposit
 * DELETE /api/v1/vaults/:id/deposits             — Cancel (part of) a deposit request
 * POST   /api/v1/vaults/:id/redeems              — Request a redemption
 * DELETE /api/v1/vaults/:id/redeems              — Cancel (part of) a redemption request
 * POST   /api/v1/vaults/:id/intent               — Submit a plaintext or encrypted intent
 * POST   /api/v1/vaults/:id/decommission         — Start decommissioning (admin)
 * POST   /api/v1/vaults/:id/redeem-decommissioned — Synchronous redemption
 */

import { Hono } from "hono";
import type { Protocol } from "@meridian/orchestrator";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateVaultSchema,
  DepositRequestSchema,
  IntentSchema,
  RedeemRequestSchema,
} from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createVaultRoutes(protocol: Protocol): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { vaults, custody } = protocol;

  routes.get("/", (c) => {
    return c.json({ data: vaults.list().map((vault) => vault.snapshot()) });
  });

  routes.post("/", requirePermission("write"), validateBody(CreateVaultSchema), (c) => {
    const vault = vaults.createVault(c.get("auth").principal, c.req.valid("json"));
    return c.json({ data: vault.snapshot() }, 201);
  });

  routes.get("/:id", (c) => {
    return c.json({ data: vaults.get(c.req.param("id")).snapshot() });
  });

  routes.get("/:id/positions/:user", (c) => {
    const vault = vaults.get(c.req.param("id"));
    const user = c.req.param("user");
    return c.json({
      data: {
        vaultId: vault.id,
        user,
        shares: vault.shareBalanceOf(user).toString(),
        pendingDeposit: vault.pendingDepositOf(user).toString(),
        pendingRedeem: vault.pendingRedeemOf(user).toString(),
        claimable: custody.claimableOf(user).toString(),
      },
    });
  });

  // ─── Requests ───────────────────────────────────────────────────

  routes.post("/:id/deposits", requirePermission("write"), validateBody(DepositRequestSchema), (c) => {
    const vaultId = c.req.param("id");
    vaults.requestDeposit(vaultId, c.get("auth").principal, c.req.valid("json").amount);
    return c.json({ data: vaults.get(vaultId).snapshot() }, 202);
  });

  routes.delete("/:id/deposits", requirePermission("write"), validateBody(DepositRequestSchema), (c) => {
    const vaultId = c.req.param("id");
    vaults.cancelDepositRequest(vaultId, c.get("auth").principal, c.req.valid("json").amount);
    return c.json({ data: vaults.get(vaultId).snapshot() });
  });

  routes.post("/:id/redeems", requirePermission("write"), validateBody(RedeemRequestSchema), (c) => {
    const vaultId = c.req.param("id");
    vaults.requestRedeem(vaultId, c.get("auth").principal, c.req.valid("json").shares);
    return c.json({ data: vaults.get(vaultId).snapshot() }, 202);
  });

  routes.delete("/:id/redeems", requirePermission("write"), validateBody(RedeemRequestSchema), (c) => {
    const vaultId = c.req.param("id");
    vaults.cancelRedeemRequest(vaultId, c.get("auth").principal, c.req.valid("json").shares);
    return c.json({ data: vaults.get(vaultId).snapshot() });
  });

  // ─── Curator ────────────────────────────────────────────────────

  routes.post("/:id/intent", requirePermission("write"), validateBody(IntentSchema), (c) => {
    const vaultId = c.req.param("id");
    const { principal } = c.get("auth");
    const body = c.req.valid("json");

    if ("allocation" in body) {
      vaults.submitIntent(vaultId, principal, body.allocation);
    } else {
      vaults.submitEncryptedIntent(vaultId, principal, body.ciphertext);
    }
    return c.json({ data: vaults.get(vaultId).snapshot() });
  });

  // ─── Decommissioning ────────────────────────────────────────────

  routes.post("/:id/decommission", requirePermission("admin"), (c) => {
    const vaultId = c.req.param("id");
    vaults.decommissionVault(vaultId, c.get("auth").principal);
    return c.json({ data: vaults.get(vaultId).snapshot() });
  });

  routes.post("/:id/redeem-decommissioned", requirePermission("write"), validateBody(RedeemRequestSchema), (c) => {
    const vaultId = c.req.param("id");
    const assets = vaults.redeemDecommissioned(vaultId, c.get("auth").principal, c.req.valid("json").shares);
    return c.json({ data: { vaultId, assets: assets.toString() } });
  });

  return routes;
}
