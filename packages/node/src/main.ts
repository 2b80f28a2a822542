/**
 * @meridian/node — Entry point.
 *
 * Loads config, builds the protocol against the simulated adapters,
 * starts the HTTP server and the keeper, and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";
import { Keeper } from "./services/keeper.js";
import { createSimulatedProtocol } from "./services/simulation.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let auth: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const apiKeys = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      apiKeys.set(k.key, k);
    }
    auth = { apiKeys };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; callers name their principal in X-Principal");
  }

  const { protocol, decryptor } = createSimulatedProtocol(config);
  const { app } = createApp({ protocol, decryptor, logger, auth });

  const keeper = new Keeper({
    protocol,
    principal: config.KEEPER_PRINCIPAL,
    logger,
    intervalMs: config.KEEPER_INTERVAL_MS,
  });
  if (config.KEEPER_ENABLED) {
    keeper.start();
  }

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      underlying: protocol.config.underlying.id,
      assets: protocol.config.whitelistedAssets().map((a) => a.id),
    },
    "Meridian node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    keeper.stop();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
