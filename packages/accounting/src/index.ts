/**
 * @meridian/accounting — Public API
 *
 * Deterministic bigint accounting for vaults:
 * - Fixed-point arithmetic with explicit rounding
 * - Share/asset conversion with a virtual offset
 * - Price valuation between assets and the underlying
 * - Epoch fee computation across five fee models
 */

// Types
export type { Rounding, AccountingErrorCode } from "./types.js";
export { AccountingError, BPS, SECONDS_PER_YEAR } from "./types.js";

// Arithmetic
export {
  pow10,
  mulDiv,
  applyBps,
  minBigInt,
  maxBigInt,
  saturatingSub,
  parseUnits,
} from "./math.js";

// Conversion
export {
  convertToAssets,
  convertToShares,
  decimalsOffset,
  sharePrice,
} from "./conversion.js";

// Valuation
export {
  assertValidQuote,
  valueInUnderlying,
  unitsForValue,
} from "./valuation.js";

// Fees
export type { VaultFeeSnapshot, FeeParameters } from "./fee-engine.js";
export {
  managementFee,
  volumeFee,
  hurdlePrice,
  benchmarkPrice,
  performanceFee,
  computeEpochFees,
  totalFeeCharge,
} from "./fee-engine.js";
