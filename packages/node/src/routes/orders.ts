/**
 * GET /api/v1/orders — The netted order book of the last built epoch
 */

import { Hono } from "hono";
import type { Protocol } from "@meridian/orchestrator";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { orderBookView } from "../types/views.js";

export function createOrderRoutes(protocol: Protocol): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const book = protocol.state.orders;
    if (book === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", "No order book has been built yet"), 404);
    }
    return c.json({
      data: {
        ...orderBookView(book),
        executed: protocol.state.lastProcessedEpoch >= book.epoch,
      },
    });
  });

  return routes;
}
