/**
 * Fee Model Types
 *
 * A vault's fee model is discriminated by `kind`. The kind selects the
 * benchmark share price that performance is measured against:
 *
 * - absolute:        last recorded share price
 * - soft-hurdle:     hurdle price (last price grown at the risk-free rate)
 * - hard-hurdle:     hurdle price
 * - high-water-mark: stored high-water mark
 * - hurdle-hwm:      max(hurdle price, high-water mark)
 */

/** Fee model kinds, in their canonical order. */
export const FEE_MODEL_KINDS = [
  "absolute",
  "soft-hurdle",
  "hard-hurdle",
  "high-water-mark",
  "hurdle-hwm",
] as const;

export type FeeModelKind = (typeof FEE_MODEL_KINDS)[number];

/**
 * Curator fee terms for a vault.
 * Fees are in basis points; the management fee is annualised.
 */
export interface FeeModel {
  readonly kind: FeeModelKind;
  readonly performanceFeeBps: number;
  readonly managementFeeBps: number;
}

/**
 * Fees charged to a vault for one epoch, in underlying units.
 */
export interface EpochFees {
  /** Protocol volume fee, taken before curator fees */
  readonly volumeFee: bigint;
  readonly managementFee: bigint;
  readonly performanceFee: bigint;
  /** Protocol share of the curator fee (management + performance) */
  readonly revenueShare: bigint;
}
