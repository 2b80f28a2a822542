/**
 * Custody — Pooled protocol holdings.
 *
 * Tracks what the protocol physically holds per asset and what it owes:
 * escrowed deposits, claimable redemptions, curator and protocol fees.
 *
 * The liquidity buffer is not stored. It is whatever underlying remains
 * after vault records and liabilities:
 *
 *   buffer = balance(underlying) - Σ vault underlying - liabilities()
 *
 * Rules:
 * - Balances never go negative; a shortfall fails with INSUFFICIENT_BALANCE
 * - Claims are pull-based and fail while paused
 */

import type { AssetId } from "@meridian/types";
import type { EventStore } from "@meridian/event-store";
import { EventRecorder, PROTOCOL_EVENTS } from "@meridian/event-store";
import type { ConfigRegistry } from "./config-registry.js";
import { VaultError } from "./types.js";

function sum(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const value of values) {
    total += value;
  }
  return total;
}

export class Custody {
  private readonly balances = new Map<AssetId, bigint>();
  private readonly claimable = new Map<string, bigint>();
  private readonly curatorFees = new Map<string, bigint>();
  private _escrowed = 0n;
  private _protocolFees = 0n;
  private readonly recorder: EventRecorder;

  constructor(
    private readonly config: ConfigRegistry,
    store: EventStore,
  ) {
    this.recorder = new EventRecorder(store, "custody");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  balanceOf(asset: AssetId): bigint {
    return this.balances.get(asset) ?? 0n;
  }

  get escrowed(): bigint {
    return this._escrowed;
  }

  get protocolFees(): bigint {
    return this._protocolFees;
  }

  claimableOf(user: string): bigint {
    return this.claimable.get(user) ?? 0n;
  }

  curatorFeesOf(vaultId: string): bigint {
    return this.curatorFees.get(vaultId) ?? 0n;
  }

  /** Underlying owed to depositors, redeemers, curators and the protocol. */
  liabilities(): bigint {
    return this._escrowed + sum(this.claimable.values()) + sum(this.curatorFees.values()) + this._protocolFees;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Inflows and escrow
  // ───────────────────────────────────────────────────────────────────────

  /** Unsolicited transfer into custody. Underlying lands in the buffer. */
  receive(asset: AssetId, amount: bigint): void {
    this.requirePositive(amount);
    this.adjust(asset, amount);
  }

  escrowDeposit(amount: bigint): void {
    this.requirePositive(amount);
    this.adjust(this.config.underlying.id, amount);
    this._escrowed += amount;
  }

  refundDeposit(amount: bigint): void {
    this.requireEscrowed(amount);
    this.adjust(this.config.underlying.id, -amount);
    this._escrowed -= amount;
  }

  /** Escrowed underlying becomes vault assets. */
  settleDeposit(amount: bigint): void {
    this.requireEscrowed(amount);
    this._escrowed -= amount;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Settlement credits
  // ───────────────────────────────────────────────────────────────────────

  creditRedemption(user: string, amount: bigint): void {
    this.claimable.set(user, this.claimableOf(user) + amount);
  }

  creditCuratorFee(vaultId: string, amount: bigint): void {
    this.curatorFees.set(vaultId, this.curatorFeesOf(vaultId) + amount);
  }

  creditProtocolFee(amount: bigint): void {
    this._protocolFees += amount;
  }

  /** Direct payout, used by synchronous redemption of decommissioned vaults. */
  payOut(amount: bigint): void {
    this.adjust(this.config.underlying.id, -amount);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Trades
  // ───────────────────────────────────────────────────────────────────────

  applySell(asset: AssetId, amount: bigint, proceeds: bigint): void {
    if (this.balanceOf(asset) < amount) {
      throw new VaultError("INSUFFICIENT_BALANCE", `Custody holds ${this.balanceOf(asset)} of "${asset}", cannot sell ${amount}`);
    }
    this.adjust(asset, -amount);
    this.adjust(this.config.underlying.id, proceeds);
  }

  applyBuy(asset: AssetId, amount: bigint, cost: bigint): void {
    this.adjust(this.config.underlying.id, -cost);
    this.adjust(asset, amount);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Claims
  // ───────────────────────────────────────────────────────────────────────

  claimRedemption(user: string): bigint {
    this.config.requireNotPaused("claim redemptions");
    const amount = this.claimableOf(user);
    if (amount === 0n) {
      throw new VaultError("NOTHING_TO_CLAIM", `No claimable redemption for "${user}"`);
    }

    this.adjust(this.config.underlying.id, -amount);
    this.claimable.delete(user);
    this.recorder.record("custody", PROTOCOL_EVENTS.REDEMPTION_CLAIMED, { actor: user }, {
      user,
      amount: amount.toString(),
    });
    return amount;
  }

  /** Curator authorization is checked by the vault registry. */
  withdrawCuratorFees(vaultId: string, curator: string): bigint {
    this.config.requireNotPaused("claim curator fees");
    const amount = this.curatorFeesOf(vaultId);
    if (amount === 0n) {
      throw new VaultError("NOTHING_TO_CLAIM", `No curator fees accrued for vault "${vaultId}"`);
    }

    this.adjust(this.config.underlying.id, -amount);
    this.curatorFees.delete(vaultId);
    this.recorder.record("custody", PROTOCOL_EVENTS.CURATOR_FEES_CLAIMED, { actor: curator }, {
      vaultId,
      amount: amount.toString(),
    });
    return amount;
  }

  claimProtocolFees(caller: string): bigint {
    this.config.requireRole(caller, "admin");
    this.config.requireNotPaused("claim protocol fees");
    const amount = this._protocolFees;
    if (amount === 0n) {
      throw new VaultError("NOTHING_TO_CLAIM", "No protocol fees accrued");
    }

    this.adjust(this.config.underlying.id, -amount);
    this._protocolFees = 0n;
    this.recorder.record("custody", PROTOCOL_EVENTS.PROTOCOL_FEES_CLAIMED, { actor: caller }, {
      amount: amount.toString(),
    });
    return amount;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private adjust(asset: AssetId, delta: bigint): void {
    const next = this.balanceOf(asset) + delta;
    if (next < 0n) {
      throw new VaultError(
        "INSUFFICIENT_BALANCE",
        `Custody holds ${this.balanceOf(asset)} of "${asset}", cannot release ${-delta}`,
      );
    }
    if (next === 0n) {
      this.balances.delete(asset);
    } else {
      this.balances.set(asset, next);
    }
  }

  private requirePositive(amount: bigint): void {
    if (amount <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Amount must be positive, got ${amount}`);
    }
  }

  private requireEscrowed(amount: bigint): void {
    if (amount <= 0n || amount > this._escrowed) {
      throw new VaultError("INVALID_AMOUNT", `Cannot release ${amount} from escrow holding ${this._escrowed}`);
    }
  }
}
