/**
 * Epoch, upkeep, order and claim routes driven over HTTP through two epochs.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { VaultSnapshot } from "@meridian/vault";
import { HALF_WETH, KEYS, createAlpha, createTestNode, jsonRequest, runUpkeep } from "../setup.js";
import type { TestNode } from "../setup.js";

interface Envelope<T> {
  readonly data: T;
}

interface ErrorBody {
  readonly error: { readonly code: string; readonly message: string };
}

const EPOCH_ACTIONS = [
  "states:startEpoch",
  "states:preprocessTransparentVaults",
  "states:preprocessEncryptedVaults",
  "states:buffer",
  "states:postprocessTransparentVaults",
  "states:postprocessEncryptedVaults",
  "states:buildOrders",
  "liquidity:startExecution",
  "liquidity:redeem",
  "liquidity:sell",
  "liquidity:buy",
  "liquidity:deposit",
];

describe("GET /api/v1/epoch", () => {
  it("reports phases, assets and parameters", async () => {
    const node = createTestNode();
    const res = await node.app.request(jsonRequest("/api/v1/epoch", "GET", undefined, KEYS.viewer));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: {
        epochCounter: 0,
        lastProcessedEpoch: 0,
        lastEpochStart: 0,
        statesPhase: "idle",
        liquidityPhase: "idle",
        statesCursor: 0,
        liquidityCursor: 0,
        pendingDecryptions: [],
        idle: true,
        paused: false,
        underlying: { id: "USDC", decimals: 6 },
        whitelist: [{ id: "WETH", decimals: 18, status: "active" }],
        parameters: {
          epochDurationSeconds: 86_400,
          minibatchSize: 8,
          slippageToleranceBps: 100,
          bufferRatioBps: 100,
          riskFreeRateBps: 0,
          volumeFeeBps: 0,
          revenueShareBps: 0,
          minDepositAmount: "0",
          minRedeemAmount: "0",
          feeChangeCooldownSeconds: 604_800,
        },
      },
    });
  });

  it("requires an API key", async () => {
    const node = createTestNode();
    const res = await node.app.request("/api/v1/epoch");
    expect(res.status).toBe(401);
  });
});

describe("upkeep routes", () => {
  let node: TestNode;

  beforeEach(() => {
    node = createTestNode();
  });

  it("reports the first epoch as due", async () => {
    const res = await node.app.request(jsonRequest("/api/v1/upkeep", "GET", undefined, KEYS.keeper));
    expect(await res.json()).toEqual({
      data: {
        states: { needed: true, payload: { action: "startEpoch", minibatchIndex: 0 } },
        liquidity: { needed: false },
      },
    });
  });

  it("performs an upkeep as the keeper principal", async () => {
    const res = await node.app.request(
      jsonRequest("/api/v1/upkeep", "POST", { orchestrator: "states", action: "startEpoch", minibatchIndex: 0 }, KEYS.keeper),
    );
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { orchestrator: "states", performed: true, phase: "preprocessing-transparent-vaults", epoch: 0 },
    });
  });

  it("rejects other principals", async () => {
    const res = await node.app.request(
      jsonRequest("/api/v1/upkeep", "POST", { orchestrator: "states", action: "startEpoch", minibatchIndex: 0 }, KEYS.alice),
    );
    expect(res.status).toBe(403);
    expect(((await res.json()) as ErrorBody).error.code).toBe("NOT_AUTHORIZED");
  });

  it("rejects an action out of sequence", async () => {
    const res = await node.app.request(
      jsonRequest("/api/v1/upkeep", "POST", { orchestrator: "states", action: "buffer", minibatchIndex: 0 }, KEYS.keeper),
    );
    expect(res.status).toBe(409);
    expect(((await res.json()) as ErrorBody).error.code).toBe("INVALID_STATE");
  });

  it("rejects an action of the other orchestrator", async () => {
    const res = await node.app.request(
      jsonRequest("/api/v1/upkeep", "POST", { orchestrator: "liquidity", action: "startEpoch", minibatchIndex: 0 }, KEYS.keeper),
    );
    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("VALIDATION_ERROR");
  });

  it("treats a repeated startExecution as a no-op", async () => {
    const res = await node.app.request(
      jsonRequest("/api/v1/upkeep", "POST", { orchestrator: "liquidity", action: "startExecution", minibatchIndex: 0 }, KEYS.keeper),
    );
    expect(await res.json()).toEqual({
      data: { orchestrator: "liquidity", performed: false, phase: "idle", epoch: 0 },
    });
  });
});

describe("two epochs over HTTP", () => {
  let node: TestNode;

  beforeEach(async () => {
    node = createTestNode();
    await createAlpha(node);
    await node.app.request(jsonRequest("/api/v1/vaults/alpha/intent", "POST", { allocation: HALF_WETH }, KEYS.curator));
    await node.app.request(jsonRequest("/api/v1/vaults/alpha/deposits", "POST", { amount: "100000000" }, KEYS.alice));
  });

  it("has no order book before the first epoch", async () => {
    const res = await node.app.request(jsonRequest("/api/v1/orders", "GET", undefined, KEYS.viewer));
    expect(res.status).toBe(404);
  });

  it("mints shares and buys the target portfolio in epoch 1", async () => {
    expect(await runUpkeep(node)).toEqual(EPOCH_ACTIONS);

    const orders = await node.app.request(jsonRequest("/api/v1/orders", "GET", undefined, KEYS.viewer));
    expect(await orders.json()).toEqual({
      data: {
        epoch: 1,
        sells: [],
        buys: [
          {
            asset: "WETH",
            side: "buy",
            amount: "24750000000000000",
            estimatedUnderlyingValue: "49500000",
            draining: false,
          },
        ],
        filteredAsDust: [],
        executed: true,
      },
    });

    const vault = await node.app.request(jsonRequest("/api/v1/vaults/alpha", "GET", undefined, KEYS.viewer));
    const { data } = (await vault.json()) as Envelope<VaultSnapshot>;
    expect(data).toMatchObject({
      totalAssets: "99000000",
      totalSupply: "100000000000000000000",
      sharePrice: "990000",
      highWaterMark: "1000000",
      portfolio: { WETH: "24750000000000000", USDC: "49500000" },
      pendingDeposits: "0",
    });

    const { custody } = node.simulation.protocol;
    expect(custody.balanceOf("USDC")).toBe(50_500_000n);
    expect(custody.balanceOf("WETH")).toBe(24_750_000_000_000_000n);
  });

  it("waits out the epoch duration, then pays a redemption claim in epoch 2", async () => {
    await runUpkeep(node);

    const redeem = await node.app.request(
      jsonRequest("/api/v1/vaults/alpha/redeems", "POST", { shares: "10000000000000000000" }, KEYS.alice),
    );
    expect(redeem.status).toBe(202);

    expect(await runUpkeep(node)).toEqual([]);

    node.time.now += 86_400;
    expect(await runUpkeep(node)).toEqual(EPOCH_ACTIONS);

    const orders = await node.app.request(jsonRequest("/api/v1/orders", "GET", undefined, KEYS.viewer));
    expect(await orders.json()).toEqual({
      data: { epoch: 2, sells: [], buys: [], filteredAsDust: ["WETH"], executed: true },
    });

    const claim = await node.app.request(jsonRequest("/api/v1/claims/redemption", "POST", undefined, KEYS.alice));
    expect(claim.status).toBe(200);
    expect(await claim.json()).toEqual({ data: { amount: "9900000" } });

    const again = await node.app.request(jsonRequest("/api/v1/claims/redemption", "POST", undefined, KEYS.alice));
    expect(again.status).toBe(422);
    expect(((await again.json()) as ErrorBody).error.code).toBe("NOTHING_TO_CLAIM");
  });

  it("refuses user requests while an epoch is in progress", async () => {
    await node.app.request(
      jsonRequest("/api/v1/upkeep", "POST", { orchestrator: "states", action: "startEpoch", minibatchIndex: 0 }, KEYS.keeper),
    );

    const res = await node.app.request(
      jsonRequest("/api/v1/vaults/alpha/deposits", "POST", { amount: "1000000" }, KEYS.alice),
    );
    expect(res.status).toBe(409);
    expect(((await res.json()) as ErrorBody).error.code).toBe("SYSTEM_NOT_IDLE");
  });
});
