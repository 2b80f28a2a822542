import { describe, it, expect } from "vitest";
import { PROTOCOL_EVENTS } from "@meridian/event-store";
import type { Protocol } from "../src/protocol.js";
import {
  ADMIN,
  ALICE,
  BOB,
  CURATOR,
  DAY,
  HALF_WETH,
  createProtocol,
  createVault,
  priceOf,
  runEpoch,
  runLiquidity,
  runStates,
  shares,
  usdc,
} from "./helpers.js";

function buffer(protocol: Protocol): bigint {
  const recorded = protocol.vaults.list().reduce((sum, vault) => sum + vault.holding("USDC"), 0n);
  return protocol.custody.balanceOf("USDC") - recorded - protocol.custody.liabilities();
}

describe("epoch lifecycle", () => {
  it("mints the first deposit one-to-one and tops up the buffer", () => {
    const fixture = createProtocol();
    const { protocol } = fixture;
    const vault = createVault(fixture);
    protocol.vaults.requestDeposit("alpha", ALICE, usdc(100));

    runEpoch(protocol);

    expect(vault.shareBalanceOf(ALICE)).toBe(shares(100));
    expect(vault.totalSupply).toBe(shares(100));
    expect(vault.totalAssets).toBe(usdc(99));
    expect(vault.portfolio).toEqual(new Map([["USDC", usdc(99)]]));
    expect(vault.highWaterMark).toBe(1_000_000n);
    expect(protocol.custody.escrowed).toBe(0n);
    expect(buffer(protocol)).toBe(usdc(1));
    expect(protocol.state.epochCounter).toBe(1);
    expect(protocol.state.lastProcessedEpoch).toBe(1);
    expect(protocol.isSystemIdle()).toBe(true);
  });

  it("prices redemptions before deposits off point-in-time totals", () => {
    const fixture = createProtocol();
    const { protocol, time } = fixture;
    const vault = createVault(fixture);
    protocol.vaults.requestDeposit("alpha", ALICE, usdc(100));
    runEpoch(protocol);

    time.now += DAY;
    protocol.vaults.requestRedeem("alpha", ALICE, shares(90));
    protocol.vaults.requestDeposit("alpha", BOB, usdc(10));
    runStates(protocol);

    const preprocessed = protocol.state.requirePreprocessed("alpha");
    expect(preprocessed.totalAssetsForRedeem).toBe(usdc(99));
    expect(preprocessed.payouts).toEqual([{ user: ALICE, shares: shares(90), assets: 89_100_000n }]);
    expect(preprocessed.totalAssetsForDeposit).toBe(9_900_000n);
    expect(preprocessed.tentativeTotalAssets).toBe(19_900_000n);
    expect(protocol.state.bufferDeductions.size).toBe(0);
    expect(protocol.isSystemIdle()).toBe(false);

    runLiquidity(protocol);

    expect(protocol.custody.claimableOf(ALICE)).toBe(89_100_000n);
    expect(vault.shareBalanceOf(ALICE)).toBe(shares(10));
    expect(vault.shareBalanceOf(BOB)).toBe(10_101_010_090_807_061_534n);
    expect(vault.totalSupply).toBe(20_101_010_090_807_061_534n);
    expect(vault.totalAssets).toBe(19_900_000n);
    expect(vault.sharePrice()).toBe(990_000n);
    expect(buffer(protocol)).toBe(usdc(1));

    expect(protocol.custody.claimRedemption(ALICE)).toBe(89_100_000n);
    expect(protocol.custody.balanceOf("USDC")).toBe(20_900_000n);
  });

  it("records the epoch as one correlated event stream", () => {
    const fixture = createProtocol();
    const { protocol } = fixture;
    createVault(fixture);
    protocol.vaults.requestDeposit("alpha", ALICE, usdc(100));

    runEpoch(protocol);

    const events = protocol.store.read("epoch-1");
    expect(events.map((stored) => stored.event.type)).toEqual([
      PROTOCOL_EVENTS.EPOCH_STARTED,
      PROTOCOL_EVENTS.PHASE_ADVANCED,
      PROTOCOL_EVENTS.VAULT_PREPROCESSED,
      PROTOCOL_EVENTS.PHASE_ADVANCED,
      PROTOCOL_EVENTS.PHASE_ADVANCED,
      PROTOCOL_EVENTS.BUFFER_ALLOCATED,
      PROTOCOL_EVENTS.PHASE_ADVANCED,
      PROTOCOL_EVENTS.PHASE_ADVANCED,
      PROTOCOL_EVENTS.PHASE_ADVANCED,
      PROTOCOL_EVENTS.ORDERS_BUILT,
      PROTOCOL_EVENTS.PHASE_ADVANCED,
      PROTOCOL_EVENTS.EXECUTION_STARTED,
      PROTOCOL_EVENTS.DEPOSIT_SETTLED,
      PROTOCOL_EVENTS.VAULT_SETTLED,
      PROTOCOL_EVENTS.EXECUTION_COMPLETED,
    ]);
    expect(events.every((stored) => stored.event.metadata.correlationId === "epoch-1")).toBe(true);
    expect(events[0]?.event.payload).toEqual({ epoch: 1, vaultCount: 1, startedAt: 1_700_000_000 });
    expect(protocol.store.verifyIntegrity().valid).toBe(true);
  });
});

describe("fees", () => {
  function feeFixture() {
    const fixture = createProtocol({ volumeFeeBps: 10, revenueShareBps: 1_000 });
    const { protocol } = fixture;
    const vault = createVault(fixture, "alpha", { kind: "high-water-mark", performanceFeeBps: 2_000, managementFeeBps: 200 });
    protocol.config.setDustThreshold(ADMIN, "WETH", 10n ** 12n);
    protocol.vaults.submitIntent("alpha", CURATOR, HALF_WETH);
    protocol.vaults.requestDeposit("alpha", ALICE, usdc(100));
    runEpoch(protocol);
    return { ...fixture, vault };
  }

  it("takes volume, management and performance fees in order", () => {
    const { protocol, time, prices } = feeFixture();
    time.now += DAY;
    prices.setPrice("WETH", priceOf(2_200));

    runStates(protocol);

    const preprocessed = protocol.state.requirePreprocessed("alpha");
    expect(preprocessed.activeAssets).toBe(103_950_000n);
    expect(preprocessed.fees).toEqual({
      volumeFee: 284n,
      managementFee: 5_695n,
      performanceFee: 788_800n,
      revenueShare: 79_449n,
    });
    expect(preprocessed.totalAssetsForRedeem).toBe(103_155_221n);
    expect(protocol.state.bufferDeductions.get("alpha")).toBe(31_552n);
  });

  it("rebalances the gain back to the intent", () => {
    const { protocol, time, prices } = feeFixture();
    time.now += DAY;
    prices.setPrice("WETH", priceOf(2_200));

    runStates(protocol);

    expect(protocol.state.requireTarget("alpha")).toEqual({
      finalTotalAssets: 103_123_669n,
      portfolio: new Map([["WETH", 23_437_197_272_727_272n], ["USDC", 51_561_836n]]),
    });
    expect(protocol.state.orders?.sells).toEqual([{
      asset: "WETH",
      side: "sell",
      amount: 1_312_802_727_272_728n,
      estimatedUnderlyingValue: 2_888_166n,
      draining: false,
    }]);
    expect(protocol.state.orders?.buys).toEqual([]);
  });

  it("credits curator and protocol fees and raises the high-water mark at settlement", () => {
    const { protocol, time, prices, vault } = feeFixture();
    time.now += DAY;
    prices.setPrice("WETH", priceOf(2_200));

    runEpoch(protocol);

    expect(protocol.custody.curatorFeesOf("alpha")).toBe(715_046n);
    expect(protocol.custody.protocolFees).toBe(79_733n);
    expect(vault.highWaterMark).toBe(1_031_236n);
    expect(vault.totalAssets).toBe(103_123_669n);
    expect(protocol.custody.balanceOf("USDC")).toBe(53_388_166n);
    expect(protocol.custody.balanceOf("WETH")).toBe(23_437_197_272_727_272n);
    expect(buffer(protocol)).toBe(1_031_551n);

    expect(protocol.vaults.claimCuratorFees("alpha", CURATOR)).toBe(715_046n);
    expect(protocol.custody.claimProtocolFees(ADMIN)).toBe(79_733n);
  });
});

describe("decommissioning", () => {
  function invested() {
    const fixture = createProtocol();
    const { protocol } = fixture;
    const vault = createVault(fixture);
    protocol.vaults.submitIntent("alpha", CURATOR, HALF_WETH);
    protocol.vaults.requestDeposit("alpha", ALICE, usdc(100));
    runEpoch(protocol);
    return { ...fixture, vault };
  }

  it("liquidates into the underlying and settles open redemptions", () => {
    const { protocol, time, vault } = invested();
    protocol.vaults.decommissionVault("alpha", ADMIN);
    protocol.vaults.requestRedeem("alpha", ALICE, shares(10));
    time.now += DAY;

    runEpoch(protocol);

    expect(vault.status).toBe("decommissioned");
    expect(vault.totalAssets).toBe(89_100_000n);
    expect(vault.portfolio).toEqual(new Map([["USDC", 89_100_000n]]));
    expect(protocol.custody.claimableOf(ALICE)).toBe(9_900_000n);
    expect(protocol.custody.balanceOf("WETH")).toBe(0n);
    expect(protocol.custody.balanceOf("USDC")).toBe(usdc(100));
    expect(buffer(protocol)).toBe(usdc(1));
  });

  it("redeems synchronously afterwards and leaves later epochs", () => {
    const { protocol, time } = invested();
    protocol.vaults.decommissionVault("alpha", ADMIN);
    protocol.vaults.requestRedeem("alpha", ALICE, shares(10));
    time.now += DAY;
    runEpoch(protocol);

    expect(protocol.vaults.redeemDecommissioned("alpha", ALICE, shares(40))).toBe(39_600_000n);

    time.now += DAY;
    runStates(protocol);
    expect(protocol.state.epochVaults()).toEqual([]);
    expect(protocol.store.read("epoch-3")[0]?.event.payload).toMatchObject({ vaultCount: 0 });
  });
});

describe("asset removal", () => {
  it("sells a draining asset first and drops it once drained", () => {
    const fixture = createProtocol();
    const { protocol, time } = fixture;
    const vault = createVault(fixture);
    protocol.vaults.submitIntent("alpha", CURATOR, HALF_WETH);
    protocol.vaults.requestDeposit("alpha", ALICE, usdc(100));
    runEpoch(protocol);

    protocol.config.removeWhitelistedAsset(ADMIN, "WETH");
    time.now += DAY;
    runStates(protocol);

    expect(protocol.state.requireTarget("alpha").portfolio).toEqual(new Map([["USDC", usdc(99)]]));
    expect(protocol.state.orders?.sells).toEqual([{
      asset: "WETH",
      side: "sell",
      amount: 24_750_000_000_000_000n,
      estimatedUnderlyingValue: 49_500_000n,
      draining: true,
    }]);

    runLiquidity(protocol);

    expect(vault.holding("WETH")).toBe(0n);
    expect(protocol.config.whitelistedAssets().map((asset) => asset.id)).toEqual(["WBTC"]);
    expect(protocol.store.read("config").map((stored) => stored.event.type)).toContain(PROTOCOL_EVENTS.ASSET_REMOVED);
  });
});
