/**
 * VaultRegistry — Vault lifecycle and user-facing requests.
 *
 * Rules:
 * - Requests and cancellations only while the system is idle and unpaused
 * - Deposits escrow underlying in custody; redeem requests lock shares
 * - Curators set intents and schedule fee model changes for their vaults
 * - Fee model changes take effect after the configured cooldown
 * - Decommissioning refunds pending deposits and keeps redemptions open
 */

import type { FeeModel, VaultType } from "@meridian/types";
import { isFeeModel } from "@meridian/types";
import { convertToAssets } from "@meridian/accounting";
import type { EventStore } from "@meridian/event-store";
import { EventRecorder, PROTOCOL_EVENTS } from "@meridian/event-store";
import type { ConfigRegistry } from "./config-registry.js";
import type { Custody } from "./custody.js";
import { validateIntent } from "./intent.js";
import type { Clock, CreateVaultParams } from "./types.js";
import { VaultError, systemClock } from "./types.js";
import { Vault } from "./vault.js";

export const MAX_PERFORMANCE_FEE_BPS = 3_000;
export const MAX_MANAGEMENT_FEE_BPS = 300;
export const DEFAULT_SHARE_DECIMALS = 18;
const MAX_SHARE_DECIMALS = 36;

export function validateFeeModel(model: unknown): FeeModel {
  if (!isFeeModel(model)) {
    throw new VaultError("INVALID_FEE_MODEL", "Fee model must have a known kind and integer basis points");
  }
  if (model.performanceFeeBps > MAX_PERFORMANCE_FEE_BPS || model.managementFeeBps > MAX_MANAGEMENT_FEE_BPS) {
    throw new VaultError(
      "INVALID_FEE_MODEL",
      `Fees exceed limits: performance <= ${MAX_PERFORMANCE_FEE_BPS} bps, management <= ${MAX_MANAGEMENT_FEE_BPS} bps`,
    );
  }
  return model;
}

function streamOf(vaultId: string): string {
  return `vault-${vaultId}`;
}

export class VaultRegistry {
  private readonly vaults = new Map<string, Vault>();
  private readonly recorder: EventRecorder;

  constructor(
    private readonly config: ConfigRegistry,
    private readonly custody: Custody,
    store: EventStore,
    private readonly clock: Clock = systemClock,
  ) {
    this.recorder = new EventRecorder(store, "vault");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Registry
  // ───────────────────────────────────────────────────────────────────────

  createVault(caller: string, params: CreateVaultParams): Vault {
    this.config.requireNotPaused("create vaults");
    if (!this.config.isCurator(caller)) {
      throw new VaultError("NOT_AUTHORIZED", `Caller "${caller}" is not a whitelisted curator`);
    }
    if (params.id.length === 0 || this.vaults.has(params.id)) {
      throw new VaultError("VAULT_EXISTS", `Vault id "${params.id}" is empty or taken`);
    }

    const { underlying } = this.config;
    const shareDecimals = params.shareDecimals ?? DEFAULT_SHARE_DECIMALS;
    if (!Number.isInteger(shareDecimals) || shareDecimals < underlying.decimals || shareDecimals > MAX_SHARE_DECIMALS) {
      throw new VaultError(
        "INVALID_CONFIG",
        `Share decimals must be an integer in [${underlying.decimals}, ${MAX_SHARE_DECIMALS}], got ${String(shareDecimals)}`,
      );
    }

    const vault = new Vault({
      id: params.id,
      type: params.type,
      curator: caller,
      feeModel: validateFeeModel(params.feeModel),
      shareDecimals,
      underlying: underlying.id,
      underlyingDecimals: underlying.decimals,
    });
    this.vaults.set(vault.id, vault);

    this.recorder.record(streamOf(vault.id), PROTOCOL_EVENTS.VAULT_CREATED, { actor: caller }, {
      vaultId: vault.id,
      type: vault.type,
      curator: caller,
      shareDecimals,
      feeModel: vault.feeModel,
    });
    return vault;
  }

  get(vaultId: string): Vault {
    const vault = this.vaults.get(vaultId);
    if (vault === undefined) {
      throw new VaultError("VAULT_NOT_FOUND", `Vault "${vaultId}" not found`);
    }
    return vault;
  }

  /** All vaults in creation order. */
  list(): readonly Vault[] {
    return [...this.vaults.values()];
  }

  /** Vaults of a type that take part in the next epoch. */
  epochVaults(type: VaultType): readonly Vault[] {
    return this.list().filter((v) => v.type === type && v.status !== "decommissioned");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposit / redeem requests
  // ───────────────────────────────────────────────────────────────────────

  requestDeposit(vaultId: string, user: string, amount: bigint): void {
    const vault = this.requireRequestWindow(vaultId, "request deposits");
    if (vault.status !== "active") {
      throw new VaultError("VAULT_DECOMMISSIONING", `Vault "${vaultId}" no longer accepts deposits`);
    }
    this.requireMinimum(amount, this.config.parameters.minDepositAmount);

    this.custody.escrowDeposit(amount);
    vault.addDepositRequest(user, amount);
    this.recorder.record(streamOf(vaultId), PROTOCOL_EVENTS.DEPOSIT_REQUESTED, { actor: user }, {
      vaultId,
      user,
      amount: amount.toString(),
    });
  }

  cancelDepositRequest(vaultId: string, user: string, amount: bigint): void {
    const vault = this.requireRequestWindow(vaultId, "cancel deposits");

    vault.removeDepositRequest(user, amount);
    this.custody.refundDeposit(amount);
    this.recorder.record(streamOf(vaultId), PROTOCOL_EVENTS.DEPOSIT_CANCELLED, { actor: user }, {
      vaultId,
      user,
      amount: amount.toString(),
    });
  }

  requestRedeem(vaultId: string, user: string, shares: bigint): void {
    const vault = this.requireRequestWindow(vaultId, "request redemptions");
    if (vault.status === "decommissioned") {
      throw new VaultError("VAULT_DECOMMISSIONING", `Vault "${vaultId}" is decommissioned; redeem synchronously`);
    }
    this.requireMinimum(shares, this.config.parameters.minRedeemAmount);

    vault.addRedeemRequest(user, shares);
    this.recorder.record(streamOf(vaultId), PROTOCOL_EVENTS.REDEEM_REQUESTED, { actor: user }, {
      vaultId,
      user,
      shares: shares.toString(),
    });
  }

  cancelRedeemRequest(vaultId: string, user: string, shares: bigint): void {
    const vault = this.requireRequestWindow(vaultId, "cancel redemptions");

    vault.removeRedeemRequest(user, shares);
    this.recorder.record(streamOf(vaultId), PROTOCOL_EVENTS.REDEEM_CANCELLED, { actor: user }, {
      vaultId,
      user,
      shares: shares.toString(),
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Curator operations
  // ───────────────────────────────────────────────────────────────────────

  submitIntent(vaultId: string, caller: string, allocation: unknown): void {
    const vault = this.requireCuratorOf(vaultId, caller);
    if (vault.type !== "transparent") {
      throw new VaultError("INVALID_INTENT", `Vault "${vaultId}" takes encrypted intents`);
    }
    this.requireActive(vault);

    const intent = validateIntent(allocation, this.config);
    vault.setIntent(intent);
    this.recorder.record(streamOf(vaultId), PROTOCOL_EVENTS.INTENT_SUBMITTED, { actor: caller }, {
      vaultId,
      intent,
    });
  }

  submitEncryptedIntent(vaultId: string, caller: string, ciphertext: string): void {
    const vault = this.requireCuratorOf(vaultId, caller);
    if (vault.type !== "encrypted") {
      throw new VaultError("INVALID_INTENT", `Vault "${vaultId}" takes plaintext intents`);
    }
    this.requireActive(vault);
    if (ciphertext.length === 0) {
      throw new VaultError("INVALID_INTENT", "Encrypted intent must be non-empty");
    }

    vault.setEncryptedIntent(ciphertext);
    this.recorder.record(streamOf(vaultId), PROTOCOL_EVENTS.ENCRYPTED_INTENT_SUBMITTED, { actor: caller }, {
      vaultId,
    });
  }

  updateFeeModel(vaultId: string, caller: string, model: unknown): void {
    const vault = this.requireCuratorOf(vaultId, caller);
    this.requireActive(vault);

    const validated = validateFeeModel(model);
    const effectiveAt = this.clock() + this.config.parameters.feeChangeCooldownSeconds;
    vault.scheduleFeeModel({ model: validated, effectiveAt });
    this.recorder.record(streamOf(vaultId), PROTOCOL_EVENTS.FEE_MODEL_SCHEDULED, { actor: caller }, {
      vaultId,
      feeModel: validated,
      effectiveAt,
    });
  }

  claimCuratorFees(vaultId: string, caller: string): bigint {
    const vault = this.get(vaultId);
    if (vault.curator !== caller) {
      throw new VaultError("NOT_AUTHORIZED", `Caller "${caller}" is not the curator of "${vaultId}"`);
    }
    return this.custody.withdrawCuratorFees(vaultId, caller);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Decommissioning
  // ───────────────────────────────────────────────────────────────────────

  decommissionVault(vaultId: string, caller: string): void {
    this.config.requireRole(caller, "admin");
    this.config.requireIdle("decommission vaults");
    const vault = this.get(vaultId);
    this.requireActive(vault);

    const refunds = vault.clearDepositRequests();
    for (const refund of refunds) {
      this.custody.refundDeposit(refund.amount);
    }
    vault.startDecommissioning();

    this.recorder.record(streamOf(vaultId), PROTOCOL_EVENTS.DECOMMISSIONING_STARTED, { actor: caller }, {
      vaultId,
      refunds: refunds.map((r) => ({ user: r.user, amount: r.amount.toString() })),
    });
  }

  /** Pays a decommissioned vault's shares out at its recorded price. */
  redeemDecommissioned(vaultId: string, user: string, shares: bigint): bigint {
    this.config.requireNotPaused("redeem");
    const vault = this.get(vaultId);
    if (vault.status !== "decommissioned") {
      throw new VaultError("VAULT_NOT_DECOMMISSIONED", `Vault "${vaultId}" is ${vault.status}`);
    }
    if (shares <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Shares must be positive, got ${shares}`);
    }

    const assets = convertToAssets(shares, vault.totalAssets, vault.totalSupply, vault.decimalsOffset, "floor");
    const available = this.custody.balanceOf(this.config.underlying.id);
    if (assets > available) {
      throw new VaultError("INSUFFICIENT_BALANCE", `Custody holds ${available} underlying, cannot pay ${assets}`);
    }

    vault.burnSynchronous(user, shares, assets);
    this.custody.payOut(assets);
    this.recorder.record(streamOf(vaultId), PROTOCOL_EVENTS.SYNCHRONOUS_REDEEMED, { actor: user }, {
      vaultId,
      user,
      shares: shares.toString(),
      amount: assets.toString(),
    });
    return assets;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private requireRequestWindow(vaultId: string, operation: string): Vault {
    const vault = this.get(vaultId);
    this.config.requireNotPaused(operation);
    this.config.requireIdle(operation);
    return vault;
  }

  private requireCuratorOf(vaultId: string, caller: string): Vault {
    this.config.requireNotPaused("update vaults");
    const vault = this.get(vaultId);
    if (vault.curator !== caller) {
      throw new VaultError("NOT_AUTHORIZED", `Caller "${caller}" is not the curator of "${vaultId}"`);
    }
    return vault;
  }

  private requireActive(vault: Vault): void {
    if (vault.status !== "active") {
      throw new VaultError("VAULT_DECOMMISSIONING", `Vault "${vault.id}" is ${vault.status}`);
    }
  }

  private requireMinimum(amount: bigint, minimum: bigint): void {
    if (amount <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Amount must be positive, got ${amount}`);
    }
    if (amount < minimum) {
      throw new VaultError("BELOW_MINIMUM", `Amount ${amount} is below the minimum of ${minimum}`);
    }
  }
}
