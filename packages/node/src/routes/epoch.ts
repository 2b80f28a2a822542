/**
 * Epoch status.
 *
 * GET /api/v1/epoch — Phases, cursors, counters and protocol parameters
 */

import { Hono } from "hono";
import type { Protocol } from "@meridian/orchestrator";
import type { AppEnv } from "../types/api-contract.js";
import { parametersView } from "../types/views.js";

export function createEpochRoutes(protocol: Protocol): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({
      data: {
        ...protocol.state.summary(),
        paused: protocol.config.isPaused(),
        underlying: protocol.config.underlying,
        whitelist: protocol.config.whitelistedAssets(),
        parameters: parametersView(protocol.config.parameters),
      },
    });
  });

  return routes;
}
