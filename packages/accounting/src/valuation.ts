/**
 * @meridian/accounting — Price valuation between an asset and the underlying.
 *
 *   value = amount * price * 10^underlyingDecimals / 10^(priceDecimals + assetDecimals)
 *
 * A quote at or below zero is never a usable price.
 */

import type { PriceQuote } from "@meridian/types";
import { mulDiv, pow10 } from "./math.js";
import { AccountingError } from "./types.js";
import type { Rounding } from "./types.js";

export function assertValidQuote(asset: string, quote: PriceQuote): void {
  if (quote.price <= 0n) {
    throw new AccountingError("INVALID_PRICE", `Price for asset "${asset}" must be positive, got ${quote.price}`);
  }
  if (!Number.isInteger(quote.priceDecimals) || quote.priceDecimals < 0) {
    throw new AccountingError(
      "INVALID_PRICE",
      `Price decimals for asset "${asset}" must be a non-negative integer, got ${String(quote.priceDecimals)}`,
    );
  }
}

/** Asset units → underlying units. */
export function valueInUnderlying(
  amount: bigint,
  assetDecimals: number,
  quote: PriceQuote,
  underlyingDecimals: number,
  rounding: Rounding,
): bigint {
  return mulDiv(
    amount * quote.price,
    pow10(underlyingDecimals),
    pow10(quote.priceDecimals + assetDecimals),
    rounding,
  );
}

/** Underlying units → asset units. */
export function unitsForValue(
  value: bigint,
  assetDecimals: number,
  quote: PriceQuote,
  underlyingDecimals: number,
  rounding: Rounding,
): bigint {
  return mulDiv(
    value,
    pow10(quote.priceDecimals + assetDecimals),
    quote.price * pow10(underlyingDecimals),
    rounding,
  );
}
