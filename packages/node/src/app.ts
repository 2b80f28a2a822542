/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around one Protocol.
 * main.ts serves it; tests call app.request directly.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { Protocol, QueuedDecryptor } from "@meridian/orchestrator";
import type { AppEnv } from "./types/api-contract.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { anonymousAuthMiddleware, authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createEpochRoutes } from "./routes/epoch.js";
import { createUpkeepRoutes } from "./routes/upkeep.js";
import { createVaultRoutes } from "./routes/vaults.js";
import { createOrderRoutes } from "./routes/orders.js";
import { createEventRoutes } from "./routes/events.js";
import { createClaimRoutes } from "./routes/claims.js";
import { createDecryptionRoutes } from "./routes/decryptions.js";
import { createAdminRoutes } from "./routes/admin.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly protocol: Protocol;
  /** Serves the decryption queue when present */
  readonly decryptor?: QueuedDecryptor;
  /** Request logging when present */
  readonly logger?: Logger;
  /** Auth configuration. Without it every caller names its principal in X-Principal. */
  readonly auth?: AuthConfig;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly protocol: Protocol;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const { protocol } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", loggerMiddleware(options.logger));
  }

  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(protocol));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use(
    "/api/*",
    options.auth !== undefined ? authMiddleware(options.auth) : anonymousAuthMiddleware(),
  );

  app.route("/api/v1/epoch", createEpochRoutes(protocol));
  app.route("/api/v1/upkeep", createUpkeepRoutes(protocol));
  app.route("/api/v1/vaults", createVaultRoutes(protocol));
  app.route("/api/v1/orders", createOrderRoutes(protocol));
  app.route("/api/v1/events", createEventRoutes(protocol));
  app.route("/api/v1/claims", createClaimRoutes(protocol));
  app.route("/api/v1/admin", createAdminRoutes(protocol));

  if (options.decryptor !== undefined) {
    app.route("/api/v1/decryptions", createDecryptionRoutes(protocol, options.decryptor));
  }

  return { app, protocol };
}
