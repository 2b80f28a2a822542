/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (event store hash chain intact)
 */

import { Hono } from "hono";
import type { Protocol } from "@meridian/orchestrator";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(protocol: Protocol): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = protocol.store.verifyIntegrity();
    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      events: protocol.store.globalPosition(),
      paused: protocol.config.isPaused(),
      timestamp: new Date().toISOString(),
    };
    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
