/**
 * Vault — One managed portfolio and its share ledger.
 *
 * Owns its intent, recorded portfolio, request queues and share balances.
 * The request-side methods are driven by the VaultRegistry; the
 * settle and record methods by the orchestrators, which alone write
 * totalAssets and totalSupply.
 *
 * Pending requests aggregate per user and keep first-request order.
 * Shares under a redeem request leave the user's balance but stay in
 * totalSupply until the redemption settles.
 */

import type {
  AssetId,
  FeeModel,
  IntentAllocation,
  PendingRequest,
  VaultStatus,
  VaultType,
} from "@meridian/types";
import { decimalsOffset, pow10, sharePrice } from "@meridian/accounting";
import type {
  DepositMint,
  RedeemPayout,
  ScheduledFeeModel,
  VaultSettlement,
  VaultSnapshot,
} from "./types.js";
import { VaultError } from "./types.js";

export interface VaultInit {
  readonly id: string;
  readonly type: VaultType;
  readonly curator: string;
  readonly feeModel: FeeModel;
  readonly shareDecimals: number;
  readonly underlying: AssetId;
  readonly underlyingDecimals: number;
}

function toRequests(queue: ReadonlyMap<string, bigint>): readonly PendingRequest[] {
  return [...queue].map(([user, amount]) => ({ user, amount }));
}

function total(queue: ReadonlyMap<string, bigint>): bigint {
  let sum = 0n;
  for (const amount of queue.values()) {
    sum += amount;
  }
  return sum;
}

function reduce(queue: Map<string, bigint>, user: string, amount: bigint): void {
  const current = queue.get(user) ?? 0n;
  if (amount <= 0n || amount > current) {
    throw new VaultError("NO_PENDING_REQUEST", `Pending request of "${user}" is ${current}, cannot cancel ${amount}`);
  }
  if (current === amount) {
    queue.delete(user);
  } else {
    queue.set(user, current - amount);
  }
}

export class Vault {
  readonly id: string;
  readonly type: VaultType;
  readonly curator: string;
  readonly shareDecimals: number;
  readonly underlying: AssetId;
  readonly underlyingDecimals: number;
  readonly decimalsOffset: number;

  private _status: VaultStatus = "active";
  private _feeModel: FeeModel;
  private _scheduledFeeModel: ScheduledFeeModel | undefined;
  private _highWaterMark: bigint;
  private _intent: IntentAllocation | undefined;
  private _encryptedIntent: string | undefined;
  private _portfolio = new Map<AssetId, bigint>();
  private _totalAssets = 0n;
  private _totalSupply = 0n;
  private readonly shares = new Map<string, bigint>();
  private readonly pendingDeposits = new Map<string, bigint>();
  private readonly pendingRedeems = new Map<string, bigint>();

  constructor(init: VaultInit) {
    this.id = init.id;
    this.type = init.type;
    this.curator = init.curator;
    this.shareDecimals = init.shareDecimals;
    this.underlying = init.underlying;
    this.underlyingDecimals = init.underlyingDecimals;
    this.decimalsOffset = decimalsOffset(init.shareDecimals, init.underlyingDecimals);
    this._feeModel = init.feeModel;
    // An empty vault prices one share at one whole underlying unit.
    this._highWaterMark = pow10(init.underlyingDecimals);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get status(): VaultStatus {
    return this._status;
  }

  get feeModel(): FeeModel {
    return this._feeModel;
  }

  get scheduledFeeModel(): ScheduledFeeModel | undefined {
    return this._scheduledFeeModel;
  }

  get highWaterMark(): bigint {
    return this._highWaterMark;
  }

  /** Last valid intent; undefined means 100% underlying. */
  get intent(): IntentAllocation | undefined {
    return this._intent;
  }

  get encryptedIntent(): string | undefined {
    return this._encryptedIntent;
  }

  get totalAssets(): bigint {
    return this._totalAssets;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  get portfolio(): ReadonlyMap<AssetId, bigint> {
    return this._portfolio;
  }

  holding(asset: AssetId): bigint {
    return this._portfolio.get(asset) ?? 0n;
  }

  sharePrice(): bigint {
    return sharePrice(this._totalAssets, this._totalSupply, this.shareDecimals, this.underlyingDecimals);
  }

  shareBalanceOf(user: string): bigint {
    return this.shares.get(user) ?? 0n;
  }

  pendingDepositRequests(): readonly PendingRequest[] {
    return toRequests(this.pendingDeposits);
  }

  pendingRedeemRequests(): readonly PendingRequest[] {
    return toRequests(this.pendingRedeems);
  }

  pendingDepositOf(user: string): bigint {
    return this.pendingDeposits.get(user) ?? 0n;
  }

  pendingRedeemOf(user: string): bigint {
    return this.pendingRedeems.get(user) ?? 0n;
  }

  pendingDepositTotal(): bigint {
    return total(this.pendingDeposits);
  }

  pendingRedeemTotal(): bigint {
    return total(this.pendingRedeems);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Requests
  // ───────────────────────────────────────────────────────────────────────

  addDepositRequest(user: string, amount: bigint): void {
    this.pendingDeposits.set(user, this.pendingDepositOf(user) + amount);
  }

  removeDepositRequest(user: string, amount: bigint): void {
    reduce(this.pendingDeposits, user, amount);
  }

  /** Drops every pending deposit and returns what was dropped. */
  clearDepositRequests(): readonly PendingRequest[] {
    const dropped = this.pendingDepositRequests();
    this.pendingDeposits.clear();
    return dropped;
  }

  addRedeemRequest(user: string, shares: bigint): void {
    const balance = this.shareBalanceOf(user);
    if (shares > balance) {
      throw new VaultError("INSUFFICIENT_SHARES", `"${user}" holds ${balance} shares, cannot redeem ${shares}`);
    }
    this.setShares(user, balance - shares);
    this.pendingRedeems.set(user, this.pendingRedeemOf(user) + shares);
  }

  removeRedeemRequest(user: string, shares: bigint): void {
    reduce(this.pendingRedeems, user, shares);
    this.setShares(user, this.shareBalanceOf(user) + shares);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Curator settings
  // ───────────────────────────────────────────────────────────────────────

  setIntent(allocation: IntentAllocation): void {
    this._intent = allocation;
  }

  setEncryptedIntent(ciphertext: string): void {
    this._encryptedIntent = ciphertext;
  }

  scheduleFeeModel(scheduled: ScheduledFeeModel): void {
    this._scheduledFeeModel = scheduled;
  }

  /** Returns true when a scheduled model took effect. */
  activateScheduledFeeModel(now: number): boolean {
    const scheduled = this._scheduledFeeModel;
    if (scheduled === undefined || now < scheduled.effectiveAt) {
      return false;
    }
    this._feeModel = scheduled.model;
    this._scheduledFeeModel = undefined;
    return true;
  }

  startDecommissioning(): void {
    this._status = "decommissioning";
  }

  // ───────────────────────────────────────────────────────────────────────
  // Settlement (orchestrator only)
  // ───────────────────────────────────────────────────────────────────────

  settleRedemptions(payouts: readonly RedeemPayout[]): void {
    for (const payout of payouts) {
      if (this.pendingRedeemOf(payout.user) !== payout.shares) {
        throw new VaultError(
          "NO_PENDING_REQUEST",
          `Vault "${this.id}" has ${this.pendingRedeemOf(payout.user)} shares pending for "${payout.user}", settling ${payout.shares}`,
        );
      }
    }
    for (const payout of payouts) {
      this.pendingRedeems.delete(payout.user);
      this._totalSupply -= payout.shares;
    }
  }

  settleDeposits(mints: readonly DepositMint[]): void {
    for (const mint of mints) {
      if (this.pendingDepositOf(mint.user) !== mint.assets) {
        throw new VaultError(
          "NO_PENDING_REQUEST",
          `Vault "${this.id}" has ${this.pendingDepositOf(mint.user)} pending for "${mint.user}", settling ${mint.assets}`,
        );
      }
    }
    for (const mint of mints) {
      this.pendingDeposits.delete(mint.user);
      this.setShares(mint.user, this.shareBalanceOf(mint.user) + mint.shares);
      this._totalSupply += mint.shares;
    }
  }

  recordSettlement(settlement: VaultSettlement): void {
    this._totalAssets = settlement.totalAssets;
    this._portfolio = new Map([...settlement.portfolio].filter(([, amount]) => amount > 0n));
    this._highWaterMark = settlement.highWaterMark;
  }

  markDecommissioned(): void {
    this._status = "decommissioned";
  }

  /** Synchronous redemption of a decommissioned vault, paid from underlying. */
  burnSynchronous(user: string, shares: bigint, assets: bigint): void {
    const balance = this.shareBalanceOf(user);
    if (shares > balance) {
      throw new VaultError("INSUFFICIENT_SHARES", `"${user}" holds ${balance} shares, cannot redeem ${shares}`);
    }
    const held = this.holding(this.underlying);
    if (assets > held) {
      throw new VaultError("INSUFFICIENT_BALANCE", `Vault "${this.id}" holds ${held} underlying, cannot pay ${assets}`);
    }
    this.setShares(user, balance - shares);
    this._totalSupply -= shares;
    this._totalAssets -= assets;
    if (held === assets) {
      this._portfolio.delete(this.underlying);
    } else {
      this._portfolio.set(this.underlying, held - assets);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): VaultSnapshot {
    const portfolio: Record<AssetId, string> = {};
    for (const [asset, amount] of this._portfolio) {
      portfolio[asset] = amount.toString();
    }
    const base: VaultSnapshot = {
      id: this.id,
      type: this.type,
      curator: this.curator,
      status: this._status,
      shareDecimals: this.shareDecimals,
      feeModel: this._feeModel,
      highWaterMark: this._highWaterMark.toString(),
      totalAssets: this._totalAssets.toString(),
      totalSupply: this._totalSupply.toString(),
      sharePrice: this.sharePrice().toString(),
      intent: this._intent ?? null,
      hasEncryptedIntent: this._encryptedIntent !== undefined,
      portfolio,
      pendingDeposits: this.pendingDepositTotal().toString(),
      pendingRedeems: this.pendingRedeemTotal().toString(),
    };
    return this._scheduledFeeModel === undefined
      ? base
      : { ...base, scheduledFeeModel: this._scheduledFeeModel };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private setShares(user: string, amount: bigint): void {
    if (amount === 0n) {
      this.shares.delete(user);
    } else {
      this.shares.set(user, amount);
    }
  }
}
