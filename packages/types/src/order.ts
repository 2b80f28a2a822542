/**
 * Order Types
 *
 * Orders are netted across every vault in an epoch: at most one order
 * per asset, never both a buy and a sell.
 */

import type { AssetId } from "./asset.js";

export type OrderSide = "buy" | "sell";

export interface Order {
  readonly asset: AssetId;
  readonly side: OrderSide;

  /** Quantity in the asset's smallest unit */
  readonly amount: bigint;

  /** Value of `amount` in underlying units at the epoch's price */
  readonly estimatedUnderlyingValue: bigint;

  /** The asset is leaving the whitelist; such sells execute first */
  readonly draining: boolean;
}
