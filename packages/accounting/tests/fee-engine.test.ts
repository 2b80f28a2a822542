/**
 * Tests for the FeeEngine.
 *
 * Baseline vault: 100 USDC backing 100 shares (price 1.000000),
 * 6-decimal underlying, 18-decimal shares.
 */

import { describe, it, expect } from "vitest";
import type { FeeModel } from "@meridian/types";
import {
  managementFee,
  volumeFee,
  hurdlePrice,
  benchmarkPrice,
  performanceFee,
  computeEpochFees,
  totalFeeCharge,
} from "../src/fee-engine.js";
import type { VaultFeeSnapshot } from "../src/fee-engine.js";
import { AccountingError } from "../src/types.js";

const YEAR = 31_536_000;
const DAY = 86_400;
const usdc = (whole: number): bigint => BigInt(whole) * 10n ** 6n;

const snapshot: VaultFeeSnapshot = {
  totalAssets: usdc(100),
  totalSupply: 100n * 10n ** 18n,
  highWaterMark: usdc(1),
  shareDecimals: 18,
  underlyingDecimals: 6,
};

function model(kind: FeeModel["kind"], performanceFeeBps = 1000, managementFeeBps = 0): FeeModel {
  return { kind, performanceFeeBps, managementFeeBps };
}

// =============================================================================
// Management / volume fees
// =============================================================================

describe("managementFee", () => {
  it("is proportional to assets, rate and epoch duration", () => {
    expect(managementFee(usdc(100_000), model("absolute", 0, 100), DAY)).toBe(2_739_726n);
  });

  it("charges the full annual rate over a year", () => {
    expect(managementFee(usdc(110), model("absolute", 0, 100), YEAR)).toBe(1_100_000n);
  });

  it("is zero when the rate is zero", () => {
    expect(managementFee(usdc(100_000), model("absolute", 1000, 0), DAY)).toBe(0n);
  });

  it("rejects a fractional rate", () => {
    expect(() => managementFee(usdc(1), model("absolute", 0, 1.5), DAY)).toThrow(AccountingError);
  });
});

describe("volumeFee", () => {
  it("annualises the protocol rate", () => {
    expect(volumeFee(usdc(110), 50, YEAR)).toBe(550_000n);
  });

  it("is zero on zero assets", () => {
    expect(volumeFee(0n, 50, YEAR)).toBe(0n);
  });
});

// =============================================================================
// Benchmarks
// =============================================================================

describe("hurdlePrice", () => {
  it("grows the price by the full rate over a year", () => {
    expect(hurdlePrice(usdc(1), 400, YEAR)).toBe(1_040_000n);
  });

  it("keeps sub-basis-point growth over short epochs", () => {
    expect(hurdlePrice(usdc(1), 400, DAY)).toBe(1_000_109n);
  });

  it("equals the current price at a zero rate", () => {
    expect(hurdlePrice(usdc(1), 0, DAY)).toBe(usdc(1));
  });
});

describe("benchmarkPrice", () => {
  const current = usdc(1);
  const hwm = 1_050_000n;

  it("absolute uses the current price", () => {
    expect(benchmarkPrice(model("absolute"), current, hwm, 400, YEAR)).toBe(current);
  });

  it("high-water-mark uses the stored mark", () => {
    expect(benchmarkPrice(model("high-water-mark"), current, hwm, 400, YEAR)).toBe(hwm);
  });

  it("both hurdle kinds use the hurdle price", () => {
    expect(benchmarkPrice(model("soft-hurdle"), current, hwm, 400, YEAR)).toBe(1_040_000n);
    expect(benchmarkPrice(model("hard-hurdle"), current, hwm, 400, YEAR)).toBe(1_040_000n);
  });

  it("hurdle-hwm uses the larger of mark and hurdle", () => {
    expect(benchmarkPrice(model("hurdle-hwm"), current, hwm, 400, YEAR)).toBe(hwm);
    expect(benchmarkPrice(model("hurdle-hwm"), current, usdc(1), 400, YEAR)).toBe(1_040_000n);
  });
});

// =============================================================================
// Performance fee
// =============================================================================

describe("performanceFee", () => {
  it("charges on gain above the current price (absolute)", () => {
    // active price 1.099999, benchmark 1.000000
    expect(performanceFee(usdc(110), model("absolute"), snapshot, YEAR, 400)).toBe(999_990n);
  });

  it("is zero without a gain", () => {
    expect(performanceFee(usdc(100), model("absolute"), snapshot, YEAR, 400)).toBe(0n);
    expect(performanceFee(usdc(90), model("absolute"), snapshot, YEAR, 400)).toBe(0n);
  });

  it("measures against the high-water mark", () => {
    const withMark = { ...snapshot, highWaterMark: 1_050_000n };
    expect(performanceFee(usdc(110), model("high-water-mark"), withMark, YEAR, 400)).toBe(499_990n);
  });

  it("measures against the hurdle", () => {
    expect(performanceFee(usdc(110), model("hard-hurdle"), snapshot, YEAR, 400)).toBe(599_990n);
    expect(performanceFee(usdc(110), model("soft-hurdle"), snapshot, YEAR, 400)).toBe(599_990n);
  });

  it("hurdle-hwm takes the stricter benchmark", () => {
    const withMark = { ...snapshot, highWaterMark: 1_050_000n };
    expect(performanceFee(usdc(110), model("hurdle-hwm"), withMark, YEAR, 400)).toBe(499_990n);
    expect(performanceFee(usdc(110), model("hurdle-hwm"), snapshot, YEAR, 400)).toBe(599_990n);
  });

  it("is zero when the rate is zero", () => {
    expect(performanceFee(usdc(110), model("absolute", 0), snapshot, YEAR, 400)).toBe(0n);
  });

  it("is zero for a vault without shares", () => {
    const empty = { ...snapshot, totalAssets: 0n, totalSupply: 0n };
    expect(performanceFee(usdc(110), model("absolute"), empty, YEAR, 400)).toBe(0n);
  });
});

// =============================================================================
// Composite
// =============================================================================

describe("computeEpochFees", () => {
  const params = { epochDurationSeconds: YEAR, riskFreeRateBps: 0, volumeFeeBps: 0, revenueShareBps: 2000 };

  it("takes management before performance", () => {
    const fees = computeEpochFees(usdc(110), model("absolute", 1000, 100), snapshot, params);
    expect(fees).toEqual({
      volumeFee: 0n,
      managementFee: 1_100_000n,
      performanceFee: 889_990n,
      revenueShare: 397_998n,
    });
  });

  it("charges less performance fee than on raw assets", () => {
    const fees = computeEpochFees(usdc(110), model("absolute", 1000, 100), snapshot, params);
    const onRaw = performanceFee(usdc(110), model("absolute", 1000, 100), snapshot, YEAR, 0);
    expect(onRaw).toBe(999_990n);
    expect(fees.performanceFee).toBeLessThan(onRaw);
  });

  it("takes the protocol volume fee first", () => {
    const fees = computeEpochFees(usdc(110), model("absolute", 1000, 100), snapshot, {
      ...params,
      volumeFeeBps: 50,
    });
    expect(fees).toEqual({
      volumeFee: 550_000n,
      managementFee: 1_094_500n,
      performanceFee: 835_540n,
      revenueShare: 386_008n,
    });
  });

  it("totals the charge without double-counting the revenue share", () => {
    const fees = computeEpochFees(usdc(110), model("absolute", 1000, 100), snapshot, params);
    expect(totalFeeCharge(fees)).toBe(1_989_990n);
  });
});
