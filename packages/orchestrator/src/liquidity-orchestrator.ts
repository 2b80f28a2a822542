/**
 * LiquidityOrchestrator — Executes a computed epoch.
 *
 *   idle → redeeming → selling → buying → depositing → idle
 *
 * Redemptions are credited before any trade, sells run before buys so
 * their proceeds fund the buys, and deposits mint last against the
 * post-redemption totals.
 *
 * Rules:
 * - startExecution for an epoch already executed is a no-op
 * - Every phase is entered and left even when it has nothing to do
 * - Each fill is committed to custody before the next order is sent,
 *   and the cursor moves one order at a time
 * - A fill the venue refuses stops the minibatch on that order; the
 *   retry resumes there
 */

import type {
  AssetId,
  LiquidityAction,
  LiquidityPhase,
  Order,
  UpkeepCheck,
  UpkeepPayload,
  UpkeepResult,
} from "@meridian/types";
import { BPS, convertToShares, maxBigInt, mulDiv, sharePrice } from "@meridian/accounting";
import type { EventStore } from "@meridian/event-store";
import { EventRecorder, PROTOCOL_EVENTS } from "@meridian/event-store";
import type {
  OrderExecutedPayload,
  SettlementPayload,
  VaultSettledPayload,
} from "@meridian/event-store";
import type { ConfigRegistry, Custody, DepositMint, VaultRegistry } from "@meridian/vault";
import type { EpochState } from "./epoch-state.js";
import type { EpochOrderBook, ExecutionAdapter } from "./types.js";
import { OrchestratorError } from "./types.js";

// =============================================================================
// Transitions
// =============================================================================

const ACTION_FOR: Readonly<Record<LiquidityPhase, LiquidityAction>> = {
  idle: "startExecution",
  redeeming: "redeem",
  selling: "sell",
  buying: "buy",
  depositing: "deposit",
};

const NEXT_PHASE: Readonly<Record<LiquidityPhase, LiquidityPhase>> = {
  idle: "redeeming",
  redeeming: "selling",
  selling: "buying",
  buying: "depositing",
  depositing: "idle",
};

interface Fill {
  readonly order: Order;
  readonly bound: bigint;
  readonly underlyingAmount: bigint;
}

// =============================================================================
// Orchestrator
// =============================================================================

export interface LiquidityOrchestratorDeps {
  readonly state: EpochState;
  readonly config: ConfigRegistry;
  readonly vaults: VaultRegistry;
  readonly custody: Custody;
  readonly execution: ExecutionAdapter;
  readonly store: EventStore;
}

export class LiquidityOrchestrator {
  private readonly state: EpochState;
  private readonly config: ConfigRegistry;
  private readonly vaults: VaultRegistry;
  private readonly custody: Custody;
  private readonly execution: ExecutionAdapter;
  private readonly recorder: EventRecorder;

  constructor(deps: LiquidityOrchestratorDeps) {
    this.state = deps.state;
    this.config = deps.config;
    this.vaults = deps.vaults;
    this.custody = deps.custody;
    this.execution = deps.execution;
    this.recorder = new EventRecorder(deps.store, "liquidity-orchestrator");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Keeper interface
  // ───────────────────────────────────────────────────────────────────────

  checkUpkeep(): UpkeepCheck<LiquidityAction> {
    if (this.config.isPaused()) {
      return { needed: false };
    }
    if (this.state.liquidityPhase === "idle" && !this.hasUnexecutedEpoch()) {
      return { needed: false };
    }
    return { needed: true, payload: this.expectedPayload() };
  }

  performUpkeep(caller: string, payload: UpkeepPayload<LiquidityAction>): UpkeepResult<LiquidityPhase> {
    if (!this.config.hasRole(caller, "automationRegistry")) {
      throw new OrchestratorError("NOT_AUTHORIZED", `Caller "${caller}" is not the automation registry`);
    }
    if (this.config.isPaused()) {
      throw new OrchestratorError("PROTOCOL_PAUSED", "Upkeep is suspended while the protocol is paused");
    }

    const { state } = this;
    if (state.liquidityPhase === "idle" && payload.action === "startExecution" && !this.hasUnexecutedEpoch()) {
      return { performed: false, phase: state.liquidityPhase, epoch: state.lastProcessedEpoch };
    }
    this.requireExpected(payload);

    switch (state.liquidityPhase) {
      case "idle":
        this.startExecution(caller);
        break;
      case "redeeming":
        this.settleRedemptions(caller);
        break;
      case "selling":
        this.executeBatch(caller, "sell");
        break;
      case "buying":
        this.executeBatch(caller, "buy");
        break;
      case "depositing":
        this.settleDeposits(caller);
        break;
    }

    return { performed: true, phase: state.liquidityPhase, epoch: state.epochCounter };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Sequencing
  // ───────────────────────────────────────────────────────────────────────

  private hasUnexecutedEpoch(): boolean {
    return this.state.epochCounter > this.state.lastProcessedEpoch;
  }

  private expectedPayload(): UpkeepPayload<LiquidityAction> {
    return {
      action: ACTION_FOR[this.state.liquidityPhase],
      minibatchIndex: Math.floor(this.state.liquidityCursor / this.config.parameters.minibatchSize),
    };
  }

  private requireExpected(payload: UpkeepPayload<LiquidityAction>): void {
    const expected = this.expectedPayload();
    if (payload.action !== expected.action) {
      throw new OrchestratorError(
        "INVALID_STATE",
        `Action "${payload.action}" is not valid in phase "${this.state.liquidityPhase}", expected "${expected.action}"`,
      );
    }
    if (payload.minibatchIndex !== expected.minibatchIndex) {
      throw new OrchestratorError(
        "INVALID_STATE",
        `Minibatch ${payload.minibatchIndex} requested, next is ${expected.minibatchIndex}`,
      );
    }
  }

  private advance(): void {
    this.state.liquidityPhase = NEXT_PHASE[this.state.liquidityPhase];
    this.state.liquidityCursor = 0;
  }

  /** Moves the cursor past `size` items and advances once `total` are done. */
  private step(size: number, total: number): void {
    this.state.liquidityCursor += size;
    if (this.state.liquidityCursor >= total) {
      this.advance();
    }
  }

  /** From the cursor to the end of its minibatch. */
  private nextBatch<T>(items: readonly T[]): readonly T[] {
    const start = this.state.liquidityCursor;
    const size = this.config.parameters.minibatchSize;
    return items.slice(start, (Math.floor(start / size) + 1) * size);
  }

  private requireOrders(): EpochOrderBook {
    const orders = this.state.orders;
    if (orders === undefined || orders.epoch !== this.state.epochCounter) {
      throw new OrchestratorError("INVARIANT_VIOLATION", `No order book for epoch ${this.state.epochCounter}`);
    }
    return orders;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Phases
  // ───────────────────────────────────────────────────────────────────────

  private startExecution(actor: string): void {
    const orders = this.requireOrders();
    this.record(actor, PROTOCOL_EVENTS.EXECUTION_STARTED, {
      epoch: orders.epoch,
      sells: orders.sells.length,
      buys: orders.buys.length,
    });
    this.advance();
  }

  private settleRedemptions(actor: string): void {
    const ids = this.state.epochVaults();
    const batch = this.nextBatch(ids);

    for (const id of batch) {
      const { payouts } = this.state.requirePreprocessed(id);
      this.vaults.get(id).settleRedemptions(payouts);
      for (const payout of payouts) {
        this.custody.creditRedemption(payout.user, payout.assets);
        this.record(actor, PROTOCOL_EVENTS.REDEMPTION_SETTLED, {
          epoch: this.state.epochCounter,
          vaultId: id,
          user: payout.user,
          amount: payout.assets.toString(),
          shares: payout.shares.toString(),
        } satisfies SettlementPayload);
      }
    }
    this.step(batch.length, ids.length);
  }

  /**
   * Sell bound: minimum proceeds  = estimate * (1 - slippage)
   * Buy bound:  maximum cost      = estimate * (1 + slippage)
   */
  private executeBatch(actor: string, side: "sell" | "buy"): void {
    const orders = this.requireOrders();
    const all = side === "sell" ? orders.sells : orders.buys;
    const batch = this.nextBatch(all);
    const slippage = BigInt(this.config.parameters.slippageToleranceBps);

    const bounded = batch.map((order) => ({
      order,
      bound: side === "sell"
        ? mulDiv(order.estimatedUnderlyingValue, BPS - slippage, BPS, "floor")
        : mulDiv(order.estimatedUnderlyingValue, BPS + slippage, BPS, "floor"),
    }));
    this.requireFunds(side, bounded);

    for (const { order, bound } of bounded) {
      const underlyingAmount = this.execution.execute(side, order.asset, order.amount, bound);
      this.commitFill(actor, side, { order, bound, underlyingAmount });
      this.state.liquidityCursor += 1;
      if (side === "sell" ? underlyingAmount < bound : underlyingAmount > bound) {
        throw new OrchestratorError(
          "SLIPPAGE_EXCEEDED",
          `Venue filled ${side} of ${order.amount} "${order.asset}" at ${underlyingAmount}, outside bound ${bound}`,
        );
      }
    }
    if (this.state.liquidityCursor >= all.length) {
      this.advance();
    }
  }

  private commitFill(actor: string, side: "sell" | "buy", { order, bound, underlyingAmount }: Fill): void {
    if (side === "sell") {
      this.custody.applySell(order.asset, order.amount, underlyingAmount);
    } else {
      this.custody.applyBuy(order.asset, order.amount, underlyingAmount);
    }
    this.record(actor, PROTOCOL_EVENTS.ORDER_EXECUTED, {
      epoch: this.state.epochCounter,
      asset: order.asset,
      side,
      amount: order.amount.toString(),
      bound: bound.toString(),
      underlyingAmount: underlyingAmount.toString(),
    } satisfies OrderExecutedPayload);
  }

  private requireFunds(side: "sell" | "buy", batch: readonly { order: Order; bound: bigint }[]): void {
    if (side === "sell") {
      for (const { order } of batch) {
        const held = this.custody.balanceOf(order.asset);
        if (held < order.amount) {
          throw new OrchestratorError("INSUFFICIENT_FUNDS", `Custody holds ${held} "${order.asset}", sell needs ${order.amount}`);
        }
      }
      return;
    }

    const needed = batch.reduce((sum, { bound }) => sum + bound, 0n);
    const held = this.custody.balanceOf(this.config.underlying.id);
    if (held < needed) {
      throw new OrchestratorError("INSUFFICIENT_FUNDS", `Custody holds ${held} underlying, buys may cost ${needed}`);
    }
  }

  /**
   * Mints deposits against totalAssetsForDeposit and the post-burn
   * supply, credits fees and writes the vault's final record.
   */
  private settleDeposits(actor: string): void {
    const ids = this.state.epochVaults();
    const batch = this.nextBatch(ids);

    for (const id of batch) {
      const vault = this.vaults.get(id);
      const preprocessed = this.state.requirePreprocessed(id);
      const target = this.state.requireTarget(id);

      const supply = vault.totalSupply;
      const mints: DepositMint[] = preprocessed.deposits.map(({ user, amount }) => ({
        user,
        assets: amount,
        shares: convertToShares(amount, preprocessed.totalAssetsForDeposit, supply, vault.decimalsOffset, "floor"),
      }));
      vault.settleDeposits(mints);
      const deposited = mints.reduce((sum, mint) => sum + mint.assets, 0n);
      if (deposited > 0n) {
        this.custody.settleDeposit(deposited);
      }
      for (const mint of mints) {
        this.record(actor, PROTOCOL_EVENTS.DEPOSIT_SETTLED, {
          epoch: this.state.epochCounter,
          vaultId: id,
          user: mint.user,
          amount: mint.assets.toString(),
          shares: mint.shares.toString(),
        } satisfies SettlementPayload);
      }

      const { fees } = preprocessed;
      const curatorFee = fees.managementFee + fees.performanceFee - fees.revenueShare;
      const protocolFee = fees.volumeFee + fees.revenueShare;
      if (curatorFee > 0n) {
        this.custody.creditCuratorFee(id, curatorFee);
      }
      if (protocolFee > 0n) {
        this.custody.creditProtocolFee(protocolFee);
      }

      const price = sharePrice(target.finalTotalAssets, vault.totalSupply, vault.shareDecimals, vault.underlyingDecimals);
      vault.recordSettlement({
        totalAssets: target.finalTotalAssets,
        portfolio: target.portfolio,
        highWaterMark: maxBigInt(vault.highWaterMark, price),
      });
      this.record(actor, PROTOCOL_EVENTS.VAULT_SETTLED, {
        epoch: this.state.epochCounter,
        vaultId: id,
        totalAssets: target.finalTotalAssets.toString(),
        totalSupply: vault.totalSupply.toString(),
        sharePrice: price.toString(),
        curatorFee: curatorFee.toString(),
        protocolFee: protocolFee.toString(),
      } satisfies VaultSettledPayload);

      if (vault.status === "decommissioning") {
        vault.markDecommissioned();
        this.record(actor, PROTOCOL_EVENTS.VAULT_DECOMMISSIONED, {
          epoch: this.state.epochCounter,
          vaultId: id,
        });
      }
    }

    this.state.liquidityCursor += batch.length;
    if (this.state.liquidityCursor >= ids.length) {
      this.completeExecution(actor);
    }
  }

  private completeExecution(actor: string): void {
    const removed = this.finalizeDrainedAssets(actor);
    this.state.lastProcessedEpoch = this.state.epochCounter;
    this.advance();
    this.record(actor, PROTOCOL_EVENTS.EXECUTION_COMPLETED, {
      epoch: this.state.epochCounter,
      removedAssets: removed,
    });
  }

  /**
   * A draining asset leaves the whitelist once no vault records it and
   * custody holds no more than dust of it.
   */
  private finalizeDrainedAssets(actor: string): readonly AssetId[] {
    const removed: AssetId[] = [];
    const vaults = this.vaults.list();
    for (const asset of this.config.whitelistedAssets()) {
      if (!this.config.isDraining(asset.id)) {
        continue;
      }
      const recorded = vaults.some((vault) => vault.holding(asset.id) > 0n);
      if (recorded || this.custody.balanceOf(asset.id) > this.config.dustThreshold(asset.id)) {
        continue;
      }
      this.config.finalizeAssetRemoval(asset.id, actor);
      removed.push(asset.id);
    }

    if (removed.length > 0) {
      const carry = new Map(this.state.dustCarry);
      for (const asset of removed) {
        carry.delete(asset);
      }
      this.state.dustCarry = carry;
    }
    return removed;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private record(actor: string, type: string, payload: Readonly<Record<string, unknown>>): void {
    const correlationId = `epoch-${this.state.epochCounter}`;
    this.recorder.record(correlationId, type, { actor, correlationId }, payload);
  }
}
