/**
 * @meridian/accounting — Share/asset conversion with a virtual offset.
 *
 *   assets = shares * (totalAssets + 1) / (totalSupply + 10^decimalsOffset)
 *   shares = assets * (totalSupply + 10^decimalsOffset) / (totalAssets + 1)
 *
 * The `+1` and `10^decimalsOffset` terms act as a virtual depositor. A
 * donation D made while `S` shares exist moves the holders' claim by at
 * most D * S / (S + 10^decimalsOffset), rounded up.
 *
 * `totalAssets` is always a point-in-time figure supplied by the caller:
 * redemptions price off the pre-deposit figure, deposits off the
 * post-redemption figure.
 */

import { mulDiv, pow10 } from "./math.js";
import { AccountingError } from "./types.js";
import type { Rounding } from "./types.js";

export function convertToAssets(
  shares: bigint,
  totalAssets: bigint,
  totalSupply: bigint,
  decimalsOffset: number,
  rounding: Rounding,
): bigint {
  return mulDiv(shares, totalAssets + 1n, totalSupply + pow10(decimalsOffset), rounding);
}

export function convertToShares(
  assets: bigint,
  totalAssets: bigint,
  totalSupply: bigint,
  decimalsOffset: number,
  rounding: Rounding,
): bigint {
  return mulDiv(assets, totalSupply + pow10(decimalsOffset), totalAssets + 1n, rounding);
}

/**
 * decimalsOffset = shareDecimals - underlyingDecimals.
 * Shares may not be less precise than the underlying.
 */
export function decimalsOffset(shareDecimals: number, underlyingDecimals: number): number {
  const offset = shareDecimals - underlyingDecimals;
  if (!Number.isInteger(offset) || offset < 0) {
    throw new AccountingError(
      "INVALID_DECIMALS",
      `Share decimals (${String(shareDecimals)}) must be >= underlying decimals (${String(underlyingDecimals)})`,
    );
  }
  return offset;
}

/**
 * Value of one whole share (10^shareDecimals) in underlying units.
 * An empty vault prices at exactly 10^underlyingDecimals.
 */
export function sharePrice(
  totalAssets: bigint,
  totalSupply: bigint,
  shareDecimals: number,
  underlyingDecimals: number,
): bigint {
  return convertToAssets(
    pow10(shareDecimals),
    totalAssets,
    totalSupply,
    decimalsOffset(shareDecimals, underlyingDecimals),
    "floor",
  );
}
