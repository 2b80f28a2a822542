/**
 * @meridian/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { AssetInfo, PriceQuote } from "@meridian/types";
import type { ProtocolParameters, ProtocolPrincipals } from "@meridian/vault";
import { parseUnits } from "@meridian/accounting";
import type { Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const flag = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Principals
  ADMIN_PRINCIPAL: z.string().min(1).default("admin"),
  GUARDIAN_PRINCIPAL: z.string().min(1).default("guardian"),
  KEEPER_PRINCIPAL: z.string().min(1).default("keeper"),
  DECRYPTOR_PRINCIPAL: z.string().min(1).default("decryptor"),
  CURATORS: z.string().default(""),

  // Assets
  UNDERLYING_ASSET: z.string().min(1).default("USDC"),
  UNDERLYING_DECIMALS: z.coerce.number().int().min(0).max(36).default(6),
  ASSETS: z.string().default(""),

  // Epoch parameters
  EPOCH_DURATION_SECONDS: z.coerce.number().int().min(60).default(86_400),
  MINIBATCH_SIZE: z.coerce.number().int().min(1).default(8),
  SLIPPAGE_TOLERANCE_BPS: z.coerce.number().int().min(0).max(2_000).default(100),
  BUFFER_RATIO_BPS: z.coerce.number().int().min(1).max(500).default(100),
  RISK_FREE_RATE_BPS: z.coerce.number().int().min(0).max(10_000).default(0),

  // Simulated venue
  SIMULATED_SLIPPAGE_BPS: z.coerce.number().int().min(0).max(10_000).default(0),

  // Keeper
  KEEPER_ENABLED: flag.default("true"),
  KEEPER_INTERVAL_MS: z.coerce.number().int().min(100).default(5_000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly principal: string;
}

function parseRole(role: string): Role | undefined {
  return role === "admin" || role === "operator" || role === "viewer" ? role : undefined;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:principal1,key2:role2:principal2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, rawRole, principal] = parts;
    if (parts.length !== 3 || key === undefined || rawRole === undefined || principal === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:principal`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    const role = parseRole(rawRole);
    if (role === undefined) {
      throw new Error(
        `Invalid role "${rawRole}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (principal === "") {
      throw new Error("Principal cannot be empty in API_KEYS");
    }

    keys.push({ key, role, principal });
  }

  return keys;
}

// =============================================================================
// Asset Parsing
// =============================================================================

/** Decimals of the configured quote prices. */
export const PRICE_DECIMALS = 8;

export interface ConfiguredAsset {
  readonly asset: AssetInfo;
  readonly quote: PriceQuote;
}

/**
 * Parse the ASSETS env var: "id:decimals:price,...", price in whole
 * underlying units per whole asset unit ("2000", "0.35").
 */
export function parseAssets(raw: string): readonly ConfiguredAsset[] {
  if (raw.trim() === "") {
    return [];
  }

  return raw.split(",").map((entry) => {
    const parts = entry.trim().split(":");
    const [id, rawDecimals, rawPrice] = parts;
    if (parts.length !== 3 || id === undefined || rawDecimals === undefined || rawPrice === undefined || id === "") {
      throw new Error(
        `Invalid ASSETS entry: "${entry.trim()}". Expected format: id:decimals:price`,
      );
    }
    const decimals = Number(rawDecimals);
    if (!Number.isInteger(decimals) || decimals < 0) {
      throw new Error(`Invalid decimals "${rawDecimals}" for asset "${id}"`);
    }
    return {
      asset: { id, decimals },
      quote: { price: parseUnits(rawPrice, PRICE_DECIMALS), priceDecimals: PRICE_DECIMALS },
    };
  });
}

export function parseList(raw: string): readonly string[] {
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

// =============================================================================
// Protocol settings
// =============================================================================

export function principalsFrom(config: AppConfig): ProtocolPrincipals {
  return {
    admin: config.ADMIN_PRINCIPAL,
    guardian: config.GUARDIAN_PRINCIPAL,
    automationRegistry: config.KEEPER_PRINCIPAL,
    decryptor: config.DECRYPTOR_PRINCIPAL,
  };
}

export function parametersFrom(config: AppConfig): Partial<ProtocolParameters> {
  return {
    epochDurationSeconds: config.EPOCH_DURATION_SECONDS,
    minibatchSize: config.MINIBATCH_SIZE,
    slippageToleranceBps: config.SLIPPAGE_TOLERANCE_BPS,
    bufferRatioBps: config.BUFFER_RATIO_BPS,
    riskFreeRateBps: config.RISK_FREE_RATE_BPS,
  };
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
