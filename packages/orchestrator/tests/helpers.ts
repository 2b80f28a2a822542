/**
 * Shared fixtures for orchestrator tests.
 */

import type { AssetId, AssetInfo, FeeModel, IntentAllocation, PriceQuote } from "@meridian/types";
import type { ProtocolParameters, Vault } from "@meridian/vault";
import { Protocol } from "../src/protocol.js";
import { QueuedDecryptor, SimulatedExecutionAdapter, StaticPriceAdapter } from "../src/adapters.js";

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
export const DAY = 86_400;

export const NO_FEES: FeeModel = { kind: "absolute", performanceFeeBps: 0, managementFeeBps: 0 };

/** Half WETH, half underlying. */
export const HALF_WETH: IntentAllocation = [
  { asset: "WETH", weight: 500_000_000 },
  { asset: "USDC", weight: 500_000_000 },
];

export function usdc(n: number): bigint {
  return BigInt(n) * 1_000_000n;
}

export function shares(n: number): bigint {
  return BigInt(n) * 10n ** 18n;
}

/** Whole USDC price with 6 price decimals. */
export function priceOf(n: number): PriceQuote {
  return { price: BigInt(n) * 1_000_000n, priceDecimals: 6 };
}

const DECIMALS = new Map<AssetId, number>([USDC, WETH, WBTC].map((asset): [AssetId, number] => [asset.id, asset.decimals]));

function decimalsOf(asset: AssetId): number {
  const decimals = DECIMALS.get(asset);
  if (decimals === undefined) {
    throw new Error(`Unknown test asset "${asset}"`);
  }
  return decimals;
}

export function createProtocol(parameters?: Partial<ProtocolParameters>) {
  const time = { now: START_TIME };
  const prices = new StaticPriceAdapter({ WETH: priceOf(2_000), WBTC: priceOf(60_000) });
  const execution = new SimulatedExecutionAdapter({ prices, underlyingDecimals: USDC.decimals, decimalsOf });
  const decryptor = new QueuedDecryptor();

  const protocol = new Protocol({
    underlying: USDC,
    principals: { admin: ADMIN, guardian: GUARDIAN, automationRegistry: KEEPER, decryptor: DECRYPTOR },
    parameters,
    adapters: { prices, execution, decryptor },
    clock: () => time.now,
  });

  protocol.config.whitelistCurator(ADMIN, CURATOR);
  protocol.config.whitelistAsset(ADMIN, WETH);
  protocol.config.whitelistAsset(ADMIN, WBTC);

  return { protocol, time, prices, execution, decryptor };
}

export type Fixture = ReturnType<typeof createProtocol>;

export function createVault(fixture: Fixture, id = "alpha", feeModel: FeeModel = NO_FEES): Vault {
  return fixture.protocol.vaults.createVault(CURATOR, { id, type: "transparent", feeModel });
}

/** Drives the states orchestrator until it is idle again or blocked. */
export function runStates(protocol: Protocol): void {
  for (let step = 0; step < 1_000; step++) {
    const check = protocol.states.checkUpkeep();
    if (!check.needed) {
      return;
    }
    protocol.states.performUpkeep(KEEPER, check.payload);
    if (protocol.state.statesPhase === "idle") {
      return;
    }
  }
  throw new Error("States orchestrator did not return to idle");
}

/** Drives the liquidity orchestrator through one execution. */
export function runLiquidity(protocol: Protocol): void {
  for (let step = 0; step < 1_000; step++) {
    const check = protocol.liquidity.checkUpkeep();
    if (!check.needed) {
      return;
    }
    protocol.liquidity.performUpkeep(KEEPER, check.payload);
    if (protocol.state.liquidityPhase === "idle") {
      return;
    }
  }
  throw new Error("Liquidity orchestrator did not return to idle");
}

export function runEpoch(protocol: Protocol): void {
  runStates(protocol);
  runLiquidity(protocol);
}

/** The error a call throws; fails the test when it returns normally. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected the call to throw");
}
