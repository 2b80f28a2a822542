/**
 * StatesOrchestrator — Computes one epoch's vault states and orders.
 *
 * Driven by a keeper through checkUpkeep / performUpkeep. Each call
 * performs one action on at most one minibatch of vaults:
 *
 *   idle
 *     → preprocessing-transparent-vaults   fees, redemptions, deposits
 *     → preprocessing-encrypted-vaults     same, plus decryption requests
 *     → buffering                          liquidity buffer top-up
 *     → postprocessing-transparent-vaults  target portfolios
 *     → postprocessing-encrypted-vaults
 *     → building-orders                    netting, dust filtering
 *     → idle (epochCounter + 1)
 *
 * Rules:
 * - Callers other than the automation registry are rejected first
 * - An action that does not match the phase, or a minibatch index that
 *   does not match the cursor, fails with INVALID_STATE and changes nothing
 * - Every figure of a minibatch is computed before any of it is committed
 * - Redemptions and deposits price off point-in-time totals fixed in
 *   preprocessing, never off a partially updated vault
 */

import type {
  AssetId,
  PriceQuote,
  StatesAction,
  StatesPhase,
  UpkeepCheck,
  UpkeepPayload,
  UpkeepResult,
} from "@meridian/types";
import {
  AccountingError,
  applyBps,
  assertValidQuote,
  computeEpochFees,
  convertToAssets,
  minBigInt,
  mulDiv,
  saturatingSub,
  totalFeeCharge,
  valueInUnderlying,
} from "@meridian/accounting";
import type { EventStore } from "@meridian/event-store";
import { EventRecorder, PROTOCOL_EVENTS } from "@meridian/event-store";
import type {
  EpochStartedPayload,
  OrdersBuiltPayload,
  PhaseAdvancedPayload,
  VaultPreprocessedPayload,
} from "@meridian/event-store";
import type { Clock, ConfigRegistry, Custody, Vault, VaultRegistry } from "@meridian/vault";
import { checkIntent } from "@meridian/vault";
import type { EpochState } from "./epoch-state.js";
import type { AllocationContext, NettingAsset } from "./order-book.js";
import { targetPortfolio } from "./order-book.js";
import type {
  IntentDecryptor,
  PreprocessedVault,
  PriceAdapter,
  VaultTarget,
} from "./types.js";
import { OrchestratorError } from "./types.js";

// =============================================================================
// Transitions
// =============================================================================

const ACTION_FOR: Readonly<Record<StatesPhase, StatesAction>> = {
  "idle": "startEpoch",
  "preprocessing-transparent-vaults": "preprocessTransparentVaults",
  "preprocessing-encrypted-vaults": "preprocessEncryptedVaults",
  "buffering": "buffer",
  "postprocessing-transparent-vaults": "postprocessTransparentVaults",
  "postprocessing-encrypted-vaults": "postprocessEncryptedVaults",
  "building-orders": "buildOrders",
};

const NEXT_PHASE: Readonly<Record<StatesPhase, StatesPhase>> = {
  "idle": "preprocessing-transparent-vaults",
  "preprocessing-transparent-vaults": "preprocessing-encrypted-vaults",
  "preprocessing-encrypted-vaults": "buffering",
  "buffering": "postprocessing-transparent-vaults",
  "postprocessing-transparent-vaults": "postprocessing-encrypted-vaults",
  "postprocessing-encrypted-vaults": "building-orders",
  "building-orders": "idle",
};

// =============================================================================
// Orchestrator
// =============================================================================

export interface StatesOrchestratorDeps {
  readonly state: EpochState;
  readonly config: ConfigRegistry;
  readonly vaults: VaultRegistry;
  readonly custody: Custody;
  readonly prices: PriceAdapter;
  readonly decryptor: IntentDecryptor;
  readonly store: EventStore;
  readonly clock: Clock;
}

export class StatesOrchestrator {
  private readonly state: EpochState;
  private readonly config: ConfigRegistry;
  private readonly vaults: VaultRegistry;
  private readonly custody: Custody;
  private readonly prices: PriceAdapter;
  private readonly decryptor: IntentDecryptor;
  private readonly clock: Clock;
  private readonly recorder: EventRecorder;

  constructor(deps: StatesOrchestratorDeps) {
    this.state = deps.state;
    this.config = deps.config;
    this.vaults = deps.vaults;
    this.custody = deps.custody;
    this.prices = deps.prices;
    this.decryptor = deps.decryptor;
    this.clock = deps.clock;
    this.recorder = new EventRecorder(deps.store, "states-orchestrator");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Keeper interface
  // ───────────────────────────────────────────────────────────────────────

  checkUpkeep(): UpkeepCheck<StatesAction> {
    const { state } = this;
    if (this.config.isPaused()) {
      return { needed: false };
    }

    if (state.statesPhase === "idle") {
      if (!state.isSystemIdle() || !this.epochDue()) {
        return { needed: false };
      }
      return { needed: true, payload: { action: "startEpoch", minibatchIndex: 0 } };
    }

    if (state.statesPhase === "preprocessing-encrypted-vaults"
      && state.statesCursor >= state.encryptedVaults.length
      && state.pendingDecryptions.size > 0) {
      return { needed: false };
    }

    return { needed: true, payload: this.expectedPayload() };
  }

  performUpkeep(caller: string, payload: UpkeepPayload<StatesAction>): UpkeepResult<StatesPhase> {
    if (!this.config.hasRole(caller, "automationRegistry")) {
      throw new OrchestratorError("NOT_AUTHORIZED", `Caller "${caller}" is not the automation registry`);
    }
    if (this.config.isPaused()) {
      throw new OrchestratorError("PROTOCOL_PAUSED", "Upkeep is suspended while the protocol is paused");
    }
    this.requireExpected(payload);

    switch (this.state.statesPhase) {
      case "idle":
        this.startEpoch(caller);
        break;
      case "preprocessing-transparent-vaults":
        this.preprocess(caller, this.state.transparentVaults);
        break;
      case "preprocessing-encrypted-vaults":
        this.preprocess(caller, this.state.encryptedVaults);
        break;
      case "buffering":
        this.allocateBuffer(caller);
        break;
      case "postprocessing-transparent-vaults":
        this.postprocess(caller, this.state.transparentVaults);
        break;
      case "postprocessing-encrypted-vaults":
        this.postprocess(caller, this.state.encryptedVaults);
        break;
      case "building-orders":
        this.buildOrders(caller);
        break;
    }

    return { performed: true, phase: this.state.statesPhase, epoch: this.state.epochCounter };
  }

  /**
   * Decryptor callback for an encrypted vault's intent. An allocation
   * that fails validation leaves the vault on its last valid intent, or
   * on the underlying when it never had one.
   */
  fulfillDecryption(caller: string, requestId: string, allocation: unknown): void {
    if (!this.config.hasRole(caller, "decryptor")) {
      throw new OrchestratorError("NOT_AUTHORIZED", `Caller "${caller}" is not the decryptor`);
    }
    const vaultId = this.state.pendingDecryptions.get(requestId);
    if (vaultId === undefined) {
      throw new OrchestratorError("UNKNOWN_REQUEST", `No pending decryption "${requestId}"`);
    }

    const vault = this.vaults.get(vaultId);
    const check = checkIntent(allocation, this.config);
    if (check.valid) {
      vault.setIntent(check.intent);
    }
    this.state.intents.set(vaultId, vault.intent);
    this.state.pendingDecryptions.delete(requestId);

    this.record(caller, PROTOCOL_EVENTS.DECRYPTION_FULFILLED, {
      epoch: this.state.computingEpoch,
      vaultId,
      requestId,
      valid: check.valid,
      ...(check.valid ? {} : { reason: check.reason }),
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Sequencing
  // ───────────────────────────────────────────────────────────────────────

  private epochDue(): boolean {
    const { lastEpochStart } = this.state;
    return lastEpochStart === 0
      || this.clock() >= lastEpochStart + this.config.parameters.epochDurationSeconds;
  }

  private expectedPayload(): UpkeepPayload<StatesAction> {
    return {
      action: ACTION_FOR[this.state.statesPhase],
      minibatchIndex: Math.floor(this.state.statesCursor / this.config.parameters.minibatchSize),
    };
  }

  private requireExpected(payload: UpkeepPayload<StatesAction>): void {
    const expected = this.expectedPayload();
    if (payload.action !== expected.action) {
      throw new OrchestratorError(
        "INVALID_STATE",
        `Action "${payload.action}" is not valid in phase "${this.state.statesPhase}", expected "${expected.action}"`,
      );
    }
    if (payload.minibatchIndex !== expected.minibatchIndex) {
      throw new OrchestratorError(
        "INVALID_STATE",
        `Minibatch ${payload.minibatchIndex} requested, next is ${expected.minibatchIndex}`,
      );
    }
  }

  private advance(actor: string): void {
    const from = this.state.statesPhase;
    const to = NEXT_PHASE[from];
    this.state.statesPhase = to;
    this.state.statesCursor = 0;
    this.record(actor, PROTOCOL_EVENTS.PHASE_ADVANCED, {
      epoch: this.state.computingEpoch,
      from,
      to,
    } satisfies PhaseAdvancedPayload);
  }

  /** Ids of the next minibatch in `ids`. */
  private nextBatch(ids: readonly string[]): readonly string[] {
    const start = this.state.statesCursor;
    return ids.slice(start, start + this.config.parameters.minibatchSize);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Start
  // ───────────────────────────────────────────────────────────────────────

  private startEpoch(actor: string): void {
    if (!this.state.isSystemIdle()) {
      throw new OrchestratorError("INVALID_STATE", `Epoch ${this.state.epochCounter} has not been executed yet`);
    }
    if (!this.epochDue()) {
      throw new OrchestratorError("INVALID_STATE", "The next epoch is not due yet");
    }

    const now = this.clock();
    const prices = this.quoteAll();
    const transparent = this.vaults.epochVaults("transparent");
    const encrypted = this.vaults.epochVaults("encrypted");

    for (const vault of [...transparent, ...encrypted]) {
      vault.activateScheduledFeeModel(now);
    }
    this.state.beginEpoch({
      startedAt: now,
      transparentVaults: transparent.map((vault) => vault.id),
      encryptedVaults: encrypted.map((vault) => vault.id),
      prices,
    });

    this.record(actor, PROTOCOL_EVENTS.EPOCH_STARTED, {
      epoch: this.state.computingEpoch,
      vaultCount: transparent.length + encrypted.length,
      startedAt: now,
    } satisfies EpochStartedPayload);
    this.advance(actor);
  }

  /** One quote per whitelisted asset, draining ones included. */
  private quoteAll(): ReadonlyMap<AssetId, PriceQuote> {
    const prices = new Map<AssetId, PriceQuote>();
    for (const asset of this.config.whitelistedAssets()) {
      const quote = this.prices.quote(asset.id);
      try {
        assertValidQuote(asset.id, quote);
      } catch (err) {
        if (err instanceof AccountingError) {
          throw new OrchestratorError("INVALID_PRICE", err.message);
        }
        throw err;
      }
      prices.set(asset.id, quote);
    }
    return prices;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Preprocessing
  // ───────────────────────────────────────────────────────────────────────

  private preprocess(actor: string, ids: readonly string[]): void {
    const batch = this.nextBatch(ids);
    const results = batch.map((id) => this.preprocessVault(this.vaults.get(id)));

    for (const result of results) {
      this.state.preprocessed.set(result.vaultId, result);
      this.record(actor, PROTOCOL_EVENTS.VAULT_PREPROCESSED, {
        epoch: this.state.computingEpoch,
        vaultId: result.vaultId,
        activeAssets: result.activeAssets.toString(),
        totalAssetsForRedeem: result.totalAssetsForRedeem.toString(),
        totalAssetsForDeposit: result.totalAssetsForDeposit.toString(),
        volumeFee: result.fees.volumeFee.toString(),
        managementFee: result.fees.managementFee.toString(),
        performanceFee: result.fees.performanceFee.toString(),
      } satisfies VaultPreprocessedPayload);
      this.resolveIntent(actor, this.vaults.get(result.vaultId));
    }
    this.state.statesCursor += batch.length;

    if (this.state.statesCursor < ids.length) {
      return;
    }
    if (this.state.pendingDecryptions.size > 0) {
      if (batch.length === 0) {
        throw new OrchestratorError(
          "INVALID_STATE",
          `Awaiting ${this.state.pendingDecryptions.size} intent decryption(s)`,
        );
      }
      return;
    }
    this.advance(actor);
  }

  private preprocessVault(vault: Vault): PreprocessedVault {
    const params = this.config.parameters;
    const activeAssets = this.activeAssets(vault);

    const fees = computeEpochFees(
      activeAssets,
      vault.feeModel,
      {
        totalAssets: vault.totalAssets,
        totalSupply: vault.totalSupply,
        highWaterMark: vault.highWaterMark,
        shareDecimals: vault.shareDecimals,
        underlyingDecimals: vault.underlyingDecimals,
      },
      params,
    );
    const totalAssetsForRedeem = saturatingSub(activeAssets, totalFeeCharge(fees));

    const supply = vault.totalSupply;
    const payouts = vault.pendingRedeemRequests().map(({ user, amount }) => ({
      user,
      shares: amount,
      assets: convertToAssets(amount, totalAssetsForRedeem, supply, vault.decimalsOffset, "floor"),
    }));
    const paidOut = payouts.reduce((sum, payout) => sum + payout.assets, 0n);
    const totalAssetsForDeposit = totalAssetsForRedeem - paidOut;

    const deposits = vault.status === "active" ? vault.pendingDepositRequests() : [];
    const deposited = deposits.reduce((sum, request) => sum + request.amount, 0n);

    return {
      vaultId: vault.id,
      activeAssets,
      fees,
      totalAssetsForRedeem,
      payouts,
      totalAssetsForDeposit,
      deposits,
      tentativeTotalAssets: totalAssetsForDeposit + deposited,
    };
  }

  /** Recorded holdings marked to the epoch's prices. */
  private activeAssets(vault: Vault): bigint {
    let total = 0n;
    for (const [asset, amount] of vault.portfolio) {
      total += asset === vault.underlying
        ? amount
        : valueInUnderlying(amount, this.config.assetDecimals(asset), this.state.requirePrice(asset), vault.underlyingDecimals, "floor");
    }
    return total;
  }

  /**
   * Transparent vaults use their current intent. Encrypted vaults with a
   * ciphertext wait for the decryptor. A decommissioning vault has no
   * allocation.
   */
  private resolveIntent(actor: string, vault: Vault): void {
    if (vault.status !== "active") {
      this.state.intents.set(vault.id, undefined);
      return;
    }
    const ciphertext = vault.encryptedIntent;
    if (vault.type === "transparent" || ciphertext === undefined) {
      this.state.intents.set(vault.id, vault.intent);
      return;
    }

    const requestId = `${this.state.computingEpoch}:${vault.id}`;
    this.state.pendingDecryptions.set(requestId, vault.id);
    this.record(actor, PROTOCOL_EVENTS.DECRYPTION_REQUESTED, {
      epoch: this.state.computingEpoch,
      vaultId: vault.id,
      requestId,
    });
    this.decryptor.requestDecryption({ requestId, vaultId: vault.id, ciphertext });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Buffer
  // ───────────────────────────────────────────────────────────────────────

  /**
   *   buffer  = custody underlying - Σ vault underlying - liabilities
   *   target  = Σ tentative * bufferRatio
   *   deficit = target - buffer, taken pro rata (rounded up) from each
   *             vault's tentative total, never more than that total
   */
  private allocateBuffer(actor: string): void {
    const ids = this.state.epochVaults();
    const underlying = this.config.underlying.id;

    const totalTentative = ids.reduce(
      (sum, id) => sum + this.state.requirePreprocessed(id).tentativeTotalAssets,
      0n,
    );
    const recorded = this.vaults.list().reduce((sum, vault) => sum + vault.holding(underlying), 0n);
    const buffer = this.custody.balanceOf(underlying) - recorded - this.custody.liabilities();
    const target = applyBps(totalTentative, this.config.parameters.bufferRatioBps, "floor");
    const deficit = target > buffer ? target - buffer : 0n;

    const deductions = new Map<string, bigint>();
    if (deficit > 0n && totalTentative > 0n) {
      for (const id of ids) {
        const tentative = this.state.requirePreprocessed(id).tentativeTotalAssets;
        deductions.set(id, minBigInt(tentative, mulDiv(deficit, tentative, totalTentative, "ceil")));
      }
    }
    this.state.bufferDeductions = deductions;

    this.record(actor, PROTOCOL_EVENTS.BUFFER_ALLOCATED, {
      epoch: this.state.computingEpoch,
      buffer: buffer.toString(),
      target: target.toString(),
      deficit: deficit.toString(),
    });
    this.advance(actor);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Postprocessing
  // ───────────────────────────────────────────────────────────────────────

  private postprocess(actor: string, ids: readonly string[]): void {
    const ctx = this.allocationContext();
    const batch = this.nextBatch(ids);
    const results = batch.map((id): [Vault, VaultTarget] => {
      const vault = this.vaults.get(id);
      const preprocessed = this.state.requirePreprocessed(id);
      const finalTotalAssets = preprocessed.tentativeTotalAssets - (this.state.bufferDeductions.get(id) ?? 0n);
      const allocation = vault.status === "active" ? this.state.intents.get(id) : undefined;
      return [vault, { finalTotalAssets, portfolio: targetPortfolio(finalTotalAssets, allocation, ctx) }];
    });

    for (const [vault, target] of results) {
      this.state.targets.set(vault.id, target);
      this.state.orderBook.fold(vault.portfolio, target.portfolio, ctx.underlying);
    }
    this.state.statesCursor += batch.length;

    if (this.state.statesCursor >= ids.length) {
      this.advance(actor);
    }
  }

  private allocationContext(): AllocationContext {
    const { config, state } = this;
    return {
      underlying: config.underlying.id,
      underlyingDecimals: config.underlying.decimals,
      isInvestable: (asset) => config.isInvestable(asset) && state.prices.has(asset),
      decimalsOf: (asset) => config.assetDecimals(asset),
      priceOf: (asset) => state.requirePrice(asset),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Orders
  // ───────────────────────────────────────────────────────────────────────

  private buildOrders(actor: string): void {
    const assets: NettingAsset[] = this.config.whitelistedAssets().map((asset) => ({
      id: asset.id,
      decimals: asset.decimals,
      draining: this.config.isDraining(asset.id),
      dustThreshold: this.config.dustThreshold(asset.id),
      price: this.state.requirePrice(asset.id),
    }));
    const epoch = this.state.computingEpoch;
    const netted = this.state.orderBook.build(assets, this.state.dustCarry, this.config.underlying.decimals);

    this.state.orders = {
      epoch,
      sells: netted.sells,
      buys: netted.buys,
      filteredAsDust: netted.filteredAsDust,
    };
    this.state.dustCarry = netted.carry;

    this.record(actor, PROTOCOL_EVENTS.ORDERS_BUILT, {
      epoch,
      buys: netted.buys.length,
      sells: netted.sells.length,
      filteredAsDust: netted.filteredAsDust,
    } satisfies OrdersBuiltPayload);

    this.advance(actor);
    this.state.epochCounter = epoch;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private record(actor: string, type: string, payload: Readonly<Record<string, unknown>>): void {
    const correlationId = `epoch-${this.state.computingEpoch}`;
    this.recorder.record(correlationId, type, { actor, correlationId }, payload);
  }
}
