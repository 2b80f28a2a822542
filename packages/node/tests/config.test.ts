/**
 * Tests for config.ts — env parsing, API keys, assets.
 */

import { describe, it, expect } from "vitest";
import {
  loadConfig,
  parametersFrom,
  parseApiKeys,
  parseAssets,
  parseList,
  principalsFrom,
} from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses comma-separated entries with their principal", () => {
    expect(parseApiKeys(" k1:admin:admin , k2:operator:keeper,k3:viewer:alice ")).toEqual([
      { key: "k1", role: "admin", principal: "admin" },
      { key: "k2", role: "operator", principal: "keeper" },
      { key: "k3", role: "viewer", principal: "alice" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c:d")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key, unknown role or empty principal", () => {
    expect(() => parseApiKeys(":admin:admin")).toThrow("API key cannot be empty");
    expect(() => parseApiKeys("k1:superuser:admin")).toThrow('Invalid role "superuser"');
    expect(() => parseApiKeys("k1:admin:")).toThrow("Principal cannot be empty");
  });
});

// =============================================================================
// parseAssets / parseList
// =============================================================================

describe("parseAssets", () => {
  it("reads decimals and a price scaled to eight decimals", () => {
    expect(parseAssets("WETH:18:2000, WBTC:8:60000.5")).toEqual([
      { asset: { id: "WETH", decimals: 18 }, quote: { price: 200_000_000_000n, priceDecimals: 8 } },
      { asset: { id: "WBTC", decimals: 8 }, quote: { price: 6_000_050_000_000n, priceDecimals: 8 } },
    ]);
  });

  it("returns nothing for an empty value", () => {
    expect(parseAssets("")).toEqual([]);
  });

  it("rejects malformed entries", () => {
    expect(() => parseAssets("WETH:18")).toThrow("Invalid ASSETS entry");
    expect(() => parseAssets("WETH:x:2000")).toThrow('Invalid decimals "x"');
    expect(() => parseAssets("WETH:18:-1")).toThrow("Invalid amount format");
  });
});

describe("parseList", () => {
  it("drops blanks", () => {
    expect(parseList(" curator-1, ,curator-2 ")).toEqual(["curator-1", "curator-2"]);
    expect(parseList("")).toEqual([]);
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.UNDERLYING_ASSET).toBe("USDC");
    expect(config.UNDERLYING_DECIMALS).toBe(6);
    expect(config.KEEPER_ENABLED).toBe(true);
    expect(config.KEEPER_INTERVAL_MS).toBe(5_000);
  });

  it("coerces numbers and flags", () => {
    const config = loadConfig({
      PORT: "8080",
      MINIBATCH_SIZE: "4",
      KEEPER_ENABLED: "false",
    });
    expect(config.PORT).toBe(8080);
    expect(config.MINIBATCH_SIZE).toBe(4);
    expect(config.KEEPER_ENABLED).toBe(false);
  });

  it("rejects out-of-range protocol parameters", () => {
    expect(() => loadConfig({ EPOCH_DURATION_SECONDS: "59" })).toThrow();
    expect(() => loadConfig({ BUFFER_RATIO_BPS: "0" })).toThrow();
    expect(() => loadConfig({ SLIPPAGE_TOLERANCE_BPS: "2001" })).toThrow();
    expect(() => loadConfig({ KEEPER_ENABLED: "yes" })).toThrow();
  });

  it("maps onto protocol principals and parameters", () => {
    const config = loadConfig({ KEEPER_PRINCIPAL: "bot", EPOCH_DURATION_SECONDS: "3600" });
    expect(principalsFrom(config)).toEqual({
      admin: "admin",
      guardian: "guardian",
      automationRegistry: "bot",
      decryptor: "decryptor",
    });
    expect(parametersFrom(config)).toEqual({
      epochDurationSeconds: 3600,
      minibatchSize: 8,
      slippageToleranceBps: 100,
      bufferRatioBps: 100,
      riskFreeRateBps: 0,
    });
  });
});
