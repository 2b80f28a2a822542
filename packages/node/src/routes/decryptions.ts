/**
 * Decryption routes for encrypted vault intents.
 *
 * GET  /api/v1/decryptions             — Requests still awaiting an answer
 * POST /api/v1/decryptions/:requestId  — Answer a request (decryptor principal)
 */

import { Hono } from "hono";
import type { Protocol, QueuedDecryptor } from "@meridian/orchestrator";
import type { AppEnv } from "../types/api-contract.js";
import { DecryptionResultSchema } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createDecryptionRoutes(protocol: Protocol, decryptor: QueuedDecryptor): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const outstanding = decryptor.pending.filter((request) =>
      protocol.state.pendingDecryptions.has(request.requestId),
    );
    return c.json({ data: outstanding });
  });

  routes.post("/:requestId", requirePermission("write"), validateBody(DecryptionResultSchema), (c) => {
    const requestId = c.req.param("requestId");
    protocol.states.fulfillDecryption(c.get("auth").principal, requestId, c.req.valid("json").allocation);
    return c.json({ data: { requestId, epoch: protocol.state.computingEpoch } });
  });

  return routes;
}
