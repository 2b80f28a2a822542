/**
 * Order netting.
 *
 * Vault targets are compared with vault records per asset; the deltas of
 * every vault are summed, so the epoch trades at most one order per asset.
 *
 *   net(asset) = Σ (target - current) + carried dust
 *
 * |net| <= dust threshold: no order, net carries to the next epoch
 * net > 0: buy, net < 0: sell
 *
 * The underlying is never ordered; it moves with every trade.
 */

import type { AssetId, IntentAllocation, Order, PriceQuote } from "@meridian/types";
import { INTENT_SCALE } from "@meridian/types";
import { mulDiv, unitsForValue, valueInUnderlying } from "@meridian/accounting";
import type { NettedOrders } from "./types.js";

const SCALE = BigInt(INTENT_SCALE);

// ─── Target portfolios ───────────────────────────────────────────────────

export interface AllocationContext {
  readonly underlying: AssetId;
  readonly underlyingDecimals: number;
  /** Assets an allocation may still hold; the rest folds into the underlying */
  isInvestable(asset: AssetId): boolean;
  decimalsOf(asset: AssetId): number;
  priceOf(asset: AssetId): PriceQuote;
}

/**
 * Split `finalTotalAssets` across the allocation at epoch prices.
 *
 * Asset units round down and the underlying takes the remainder, so
 * the target is worth exactly `finalTotalAssets` at epoch prices. A
 * weight on an asset that is no longer investable stays in the underlying. No allocation
 * means 100% underlying.
 */
export function targetPortfolio(
  finalTotalAssets: bigint,
  allocation: IntentAllocation | undefined,
  ctx: AllocationContext,
): Map<AssetId, bigint> {
  const portfolio = new Map<AssetId, bigint>();
  let allocated = 0n;

  for (const { asset, weight } of allocation ?? []) {
    if (asset === ctx.underlying || !ctx.isInvestable(asset)) {
      continue;
    }
    const decimals = ctx.decimalsOf(asset);
    const quote = ctx.priceOf(asset);
    const value = mulDiv(finalTotalAssets, BigInt(weight), SCALE, "floor");
    const units = unitsForValue(value, decimals, quote, ctx.underlyingDecimals, "floor");
    if (units > 0n) {
      portfolio.set(asset, units);
      allocated += valueInUnderlying(units, decimals, quote, ctx.underlyingDecimals, "floor");
    }
  }

  portfolio.set(ctx.underlying, finalTotalAssets - allocated);
  return portfolio;
}

// ─── Netting ─────────────────────────────────────────────────────────────

export interface NettingAsset {
  readonly id: AssetId;
  readonly decimals: number;
  readonly draining: boolean;
  readonly dustThreshold: bigint;
  readonly price: PriceQuote;
}

export interface NettingResult extends NettedOrders {
  readonly carry: ReadonlyMap<AssetId, bigint>;
}

function abs(value: bigint): bigint {
  return value < 0n ? -value : value;
}

/**
 * Accumulates per-asset deltas across postprocessing minibatches.
 */
export class OrderBook {
  private readonly deltas = new Map<AssetId, bigint>();

  /** Adds one vault's (target - current) for every non-underlying asset. */
  fold(
    current: ReadonlyMap<AssetId, bigint>,
    target: ReadonlyMap<AssetId, bigint>,
    underlying: AssetId,
  ): void {
    const assets = new Set([...current.keys(), ...target.keys()]);
    for (const asset of assets) {
      if (asset === underlying) {
        continue;
      }
      const delta = (target.get(asset) ?? 0n) - (current.get(asset) ?? 0n);
      this.deltas.set(asset, this.delta(asset) + delta);
    }
  }

  delta(asset: AssetId): bigint {
    return this.deltas.get(asset) ?? 0n;
  }

  /**
   * One order per asset whose net clears its dust threshold. Sells of
   * draining assets come first; otherwise orders keep `assets` order.
   */
  build(
    assets: readonly NettingAsset[],
    carry: ReadonlyMap<AssetId, bigint>,
    underlyingDecimals: number,
  ): NettingResult {
    const sells: Order[] = [];
    const buys: Order[] = [];
    const filteredAsDust: AssetId[] = [];
    const nextCarry = new Map<AssetId, bigint>();

    for (const asset of assets) {
      const net = this.delta(asset.id) + (carry.get(asset.id) ?? 0n);
      if (net === 0n) {
        continue;
      }
      const amount = abs(net);
      if (amount <= asset.dustThreshold) {
        nextCarry.set(asset.id, net);
        filteredAsDust.push(asset.id);
        continue;
      }

      const order: Order = {
        asset: asset.id,
        side: net < 0n ? "sell" : "buy",
        amount,
        estimatedUnderlyingValue: valueInUnderlying(amount, asset.decimals, asset.price, underlyingDecimals, "floor"),
        draining: asset.draining,
      };
      (order.side === "sell" ? sells : buys).push(order);
    }

    const orderedSells = [
      ...sells.filter((order) => order.draining),
      ...sells.filter((order) => !order.draining),
    ];
    return { sells: orderedSells, buys, filteredAsDust, carry: nextCarry };
  }
}
