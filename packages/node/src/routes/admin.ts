/**
 * Protocol administration.
 *
 * POST /api/v1/admin/pause    — Pause (guardian or admin principal)
 * POST /api/v1/admin/unpause  — Unpause (admin principal)
 */

import { Hono } from "hono";
import type { Protocol } from "@meridian/orchestrator";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";

export function createAdminRoutes(protocol: Protocol): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("admin"));

  routes.post("/pause", (c) => {
    protocol.config.pause(c.get("auth").principal);
    return c.json({ data: { paused: protocol.config.isPaused() } });
  });

  routes.post("/unpause", (c) => {
    protocol.config.unpause(c.get("auth").principal);
    return c.json({ data: { paused: protocol.config.isPaused() } });
  });

  return routes;
}
