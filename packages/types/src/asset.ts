/**
 * Asset Types
 *
 * Assets are identified by an opaque string id (a token address, a ticker).
 * Amounts are always bigint in the asset's smallest unit.
 */

/** Opaque asset identifier. */
export type AssetId = string;

/**
 * A whitelisted asset and its native precision.
 */
export interface AssetInfo {
  readonly id: AssetId;

  /** Number of decimals of the asset's smallest unit */
  readonly decimals: number;
}

/**
 * A price quote for one whole unit of an asset, expressed in whole units
 * of the underlying asset scaled by `priceDecimals`.
 *
 * price = 1_050_000n, priceDecimals = 6 → 1 asset = 1.05 underlying
 */
export interface PriceQuote {
  readonly price: bigint;
  readonly priceDecimals: number;
}
