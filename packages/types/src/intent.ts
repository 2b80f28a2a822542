/**
 * Intent Types
 *
 * An intent is a curator's target allocation for a vault: an ordered list
 * of (asset, weight) pairs whose weights sum exactly to INTENT_SCALE.
 */

import type { AssetId } from "./asset.js";

/** Sum that every non-empty intent's weights must reach. */
export const INTENT_SCALE = 1_000_000_000;

export interface IntentWeight {
  readonly asset: AssetId;

  /** Fraction of vault assets, scaled by INTENT_SCALE */
  readonly weight: number;
}

export type IntentAllocation = readonly IntentWeight[];
