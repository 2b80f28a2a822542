/**
 * Event query routes.
 *
 * GET /api/v1/events            — All events (cursor pagination)
 * GET /api/v1/events/verify     — Recompute the hash chain
 * GET /api/v1/events/:streamId  — Events of one stream
 */

import { Hono } from "hono";
import type { Protocol } from "@meridian/orchestrator";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";

export function createEventRoutes(protocol: Protocol): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(ListEventsQuerySchema), (c) => {
    const query = c.req.valid("query");
    const result = paginate(protocol.store.readAll(), query, (e) => e.globalPosition);
    return c.json(result);
  });

  routes.get("/verify", (c) => {
    return c.json({ data: protocol.store.verifyIntegrity() });
  });

  routes.get("/:streamId", validateQuery(ListEventsQuerySchema), (c) => {
    const query = c.req.valid("query");
    const events = protocol.store.read(c.req.param("streamId"));
    const result = paginate(events, query, (e) => e.version);
    return c.json(result);
  });

  return routes;
}
