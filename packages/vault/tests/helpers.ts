/**
 * Shared fixtures for vault tests.
 */

import type { AssetInfo } from "@meridian/types";
import { InMemoryEventStore } from "@meridian/event-store";
import { ConfigRegistry } from "../src/config-registry.js";
import { Custody } from "../src/custody.js";
import { VaultRegistry } from "../src/vault-registry.js";
import type { ProtocolParameters, SystemStatus } from "../src/types.js";

export const ADMIN = "admin";
export const GUARDIAN = "guardian";
export const KEEPER = "keeper";
export const DECRYPTOR = "decryptor";
export const CURATOR = "curator-1";
export const ALICE = "alice";
export const BOB = "bob";

export const USDC: AssetInfo = { id: "USDC", decimals: 6 };
export const WETH: AssetInfo = { id: "WETH", decimals: 18 };
export const WBTC: AssetInfo = { id: "WBTC", decimals: 8 };

export const START_TIME = 1_700_000_000;

/** Whole USDC → smallest units. */
export function usdc(n: number): bigint {
  return BigInt(n) * 1_000_000n;
}

/** Whole shares → smallest units (18 decimals). */
export function shares(n: number): bigint {
  return BigInt(n) * 10n ** 18n;
}

export class StatusStub implements SystemStatus {
  idle = true;

  isSystemIdle(): boolean {
    return this.idle;
  }
}

export function createFixture(parameters?: Partial<ProtocolParameters>) {
  const store = new InMemoryEventStore();
  const status = new StatusStub();
  const time = { now: START_TIME };
  const config = new ConfigRegistry(
    {
      underlying: USDC,
      principals: { admin: ADMIN, guardian: GUARDIAN, automationRegistry: KEEPER, decryptor: DECRYPTOR },
      parameters,
    },
    status,
    store,
  );
  const custody = new Custody(config, store);
  const vaults = new VaultRegistry(config, custody, store, () => time.now);

  config.whitelistCurator(ADMIN, CURATOR);
  config.whitelistAsset(ADMIN, WETH);
  config.whitelistAsset(ADMIN, WBTC);

  return { store, status, time, config, custody, vaults };
}

export type Fixture = ReturnType<typeof createFixture>;

/** The error a call throws; fails the test when it returns normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected the call to throw");
}
