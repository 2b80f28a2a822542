/**
 * @meridian/accounting — FeeEngine.
 *
 * Pure functions; no state. Fees for one epoch are taken in a fixed order:
 *
 *   1. protocol volume fee on active assets
 *   2. management fee on what remains
 *   3. performance fee on what remains after the management fee
 *
 * The protocol's revenue share is a cut of (2) + (3), not an extra charge.
 * Reordering (2) and (3) changes the performance fee.
 */

import type { EpochFees, FeeModel } from "@meridian/types";
import { sharePrice } from "./conversion.js";
import { applyBps, maxBigInt, minBigInt, mulDiv, pow10 } from "./math.js";
import { AccountingError, BPS, SECONDS_PER_YEAR } from "./types.js";

// ─── Inputs ──────────────────────────────────────────────────────────────

/**
 * The vault's recorded state at the end of the previous epoch.
 */
export interface VaultFeeSnapshot {
  /** Recorded (point-in-time) total assets, before this epoch's fees */
  readonly totalAssets: bigint;
  readonly totalSupply: bigint;
  readonly highWaterMark: bigint;
  readonly shareDecimals: number;
  readonly underlyingDecimals: number;
}

/**
 * Protocol-wide fee parameters for one epoch.
 */
export interface FeeParameters {
  readonly epochDurationSeconds: number;
  readonly riskFreeRateBps: number;
  readonly volumeFeeBps: number;
  readonly revenueShareBps: number;
}

function assertNonNegativeInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new AccountingError("INVALID_FEE_INPUT", `${name} must be a non-negative integer, got ${String(value)}`);
  }
}

/** amount * bps * duration / (10_000 * year), floored. */
function annualised(amount: bigint, bps: number, epochDurationSeconds: number): bigint {
  assertNonNegativeInteger("fee rate", bps);
  assertNonNegativeInteger("epoch duration", epochDurationSeconds);
  if (bps === 0 || amount === 0n) {
    return 0n;
  }
  return mulDiv(amount, BigInt(bps) * BigInt(epochDurationSeconds), BPS * SECONDS_PER_YEAR, "floor");
}

// ─── Fee Components ──────────────────────────────────────────────────────

export function managementFee(
  assets: bigint,
  model: FeeModel,
  epochDurationSeconds: number,
): bigint {
  return annualised(assets, model.managementFeeBps, epochDurationSeconds);
}

export function volumeFee(
  assets: bigint,
  volumeFeeBps: number,
  epochDurationSeconds: number,
): bigint {
  return annualised(assets, volumeFeeBps, epochDurationSeconds);
}

/**
 * Last share price grown at the risk-free rate over one epoch.
 * Computed in one division: no truncated intermediate return.
 */
export function hurdlePrice(
  currentSharePrice: bigint,
  riskFreeRateBps: number,
  epochDurationSeconds: number,
): bigint {
  assertNonNegativeInteger("risk-free rate", riskFreeRateBps);
  assertNonNegativeInteger("epoch duration", epochDurationSeconds);
  const base = BPS * SECONDS_PER_YEAR;
  const grown = base + BigInt(riskFreeRateBps) * BigInt(epochDurationSeconds);
  return mulDiv(currentSharePrice, grown, base, "floor");
}

/**
 * Share price that performance is measured against.
 */
export function benchmarkPrice(
  model: FeeModel,
  currentSharePrice: bigint,
  highWaterMark: bigint,
  riskFreeRateBps: number,
  epochDurationSeconds: number,
): bigint {
  switch (model.kind) {
    case "absolute":
      return currentSharePrice;
    case "high-water-mark":
      return highWaterMark;
    case "soft-hurdle":
    case "hard-hurdle":
      return hurdlePrice(currentSharePrice, riskFreeRateBps, epochDurationSeconds);
    case "hurdle-hwm":
      return maxBigInt(
        highWaterMark,
        hurdlePrice(currentSharePrice, riskFreeRateBps, epochDurationSeconds),
      );
  }
}

/**
 * performanceFeeBps * gain * supply / (10_000 * 10^shareDecimals), floored,
 * where gain is the active share price above the benchmark.
 *
 * `assetsAfterManagementFee` must already exclude the management fee.
 */
export function performanceFee(
  assetsAfterManagementFee: bigint,
  model: FeeModel,
  snapshot: VaultFeeSnapshot,
  epochDurationSeconds: number,
  riskFreeRateBps: number,
): bigint {
  assertNonNegativeInteger("performance fee", model.performanceFeeBps);
  if (model.performanceFeeBps === 0 || snapshot.totalSupply === 0n) {
    return 0n;
  }

  const { shareDecimals, underlyingDecimals, totalSupply } = snapshot;
  const current = sharePrice(snapshot.totalAssets, totalSupply, shareDecimals, underlyingDecimals);
  const active = sharePrice(assetsAfterManagementFee, totalSupply, shareDecimals, underlyingDecimals);
  const benchmark = benchmarkPrice(
    model,
    current,
    snapshot.highWaterMark,
    riskFreeRateBps,
    epochDurationSeconds,
  );

  if (active <= benchmark) {
    return 0n;
  }

  const fee = mulDiv(
    BigInt(model.performanceFeeBps) * (active - benchmark),
    totalSupply,
    BPS * pow10(shareDecimals),
    "floor",
  );
  return minBigInt(fee, assetsAfterManagementFee);
}

// ─── Composite ───────────────────────────────────────────────────────────

/**
 * All fees for one vault and one epoch, in the mandated order.
 */
export function computeEpochFees(
  activeAssets: bigint,
  model: FeeModel,
  snapshot: VaultFeeSnapshot,
  params: FeeParameters,
): EpochFees {
  const volume = volumeFee(activeAssets, params.volumeFeeBps, params.epochDurationSeconds);
  const afterVolume = activeAssets - volume;

  const management = managementFee(afterVolume, model, params.epochDurationSeconds);
  const afterManagement = afterVolume - management;

  const performance = performanceFee(
    afterManagement,
    model,
    snapshot,
    params.epochDurationSeconds,
    params.riskFreeRateBps,
  );

  assertNonNegativeInteger("revenue share", params.revenueShareBps);
  const revenueShare = applyBps(management + performance, params.revenueShareBps, "floor");

  return {
    volumeFee: volume,
    managementFee: management,
    performanceFee: performance,
    revenueShare,
  };
}

/** Everything the epoch removes from the vault's assets. */
export function totalFeeCharge(fees: EpochFees): bigint {
  return fees.volumeFee + fees.managementFee + fees.performanceFee;
}
