/**
 * Keeper routes.
 *
 * GET  /api/v1/upkeep — checkUpkeep of both orchestrators
 * POST /api/v1/upkeep — performUpkeep on one orchestrator as the caller's principal
 */

import { Hono } from "hono";
import type { Protocol } from "@meridian/orchestrator";
import type { AppEnv } from "../types/api-contract.js";
import { UpkeepSchema } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createUpkeepRoutes(protocol: Protocol): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({
      data: {
        states: protocol.states.checkUpkeep(),
        liquidity: protocol.liquidity.checkUpkeep(),
      },
    });
  });

  routes.post("/", requirePermission("write"), validateBody(UpkeepSchema), (c) => {
    const { principal } = c.get("auth");
    const body = c.req.valid("json");

    const result =
      body.orchestrator === "states"
        ? protocol.states.performUpkeep(principal, { action: body.action, minibatchIndex: body.minibatchIndex })
        : protocol.liquidity.performUpkeep(principal, { action: body.action, minibatchIndex: body.minibatchIndex });

    return c.json({ data: { orchestrator: body.orchestrator, ...result } });
  });

  return routes;
}
