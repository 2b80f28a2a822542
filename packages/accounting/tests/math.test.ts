/**
 * Tests for fixed-point arithmetic.
 */

import { describe, it, expect } from "vitest";
import {
  pow10,
  mulDiv,
  applyBps,
  minBigInt,
  maxBigInt,
  saturatingSub,
  parseUnits,
} from "../src/math.js";
import { AccountingError } from "../src/types.js";

describe("pow10", () => {
  it("computes powers of ten", () => {
    expect(pow10(0)).toBe(1n);
    expect(pow10(6)).toBe(1_000_000n);
    expect(pow10(18)).toBe(1_000_000_000_000_000_000n);
  });

  it("rejects negative and fractional exponents", () => {
    expect(() => pow10(-1)).toThrow(AccountingError);
    expect(() => pow10(1.5)).toThrow(/integer/);
  });
});

describe("mulDiv", () => {
  it("floors by default direction", () => {
    expect(mulDiv(7n, 3n, 2n, "floor")).toBe(10n);
  });

  it("rounds up when requested and a remainder exists", () => {
    expect(mulDiv(7n, 3n, 2n, "ceil")).toBe(11n);
  });

  it("does not round up exact quotients", () => {
    expect(mulDiv(6n, 3n, 2n, "ceil")).toBe(9n);
  });

  it("keeps full precision of the intermediate product", () => {
    const big = 10n ** 30n;
    expect(mulDiv(big, big, big, "floor")).toBe(big);
  });

  it("rejects a zero denominator", () => {
    try {
      mulDiv(1n, 1n, 0n, "floor");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AccountingError);
      expect(err).toMatchObject({ code: "DIVISION_BY_ZERO" });
    }
  });

  it("rejects negative operands", () => {
    expect(() => mulDiv(-1n, 1n, 1n, "floor")).toThrow(/non-negative/);
  });
});

describe("applyBps", () => {
  it("takes a basis-point fraction", () => {
    expect(applyBps(1_000_000n, 250, "floor")).toBe(25_000n);
  });

  it("rounds as requested", () => {
    expect(applyBps(3n, 5_000, "floor")).toBe(1n);
    expect(applyBps(3n, 5_000, "ceil")).toBe(2n);
  });

  it("rejects fractional basis points", () => {
    expect(() => applyBps(1n, 0.5, "floor")).toThrow(AccountingError);
  });
});

describe("min / max / saturatingSub", () => {
  it("selects the smaller and larger value", () => {
    expect(minBigInt(3n, 5n)).toBe(3n);
    expect(maxBigInt(3n, 5n)).toBe(5n);
  });

  it("floors subtraction at zero", () => {
    expect(saturatingSub(5n, 3n)).toBe(2n);
    expect(saturatingSub(3n, 5n)).toBe(0n);
  });
});

describe("parseUnits", () => {
  it("scales whole amounts", () => {
    expect(parseUnits("100", 6)).toBe(100_000_000n);
  });

  it("scales fractional amounts", () => {
    expect(parseUnits("100.5", 6)).toBe(100_500_000n);
    expect(parseUnits("0.000001", 6)).toBe(1n);
  });

  it("trims surrounding whitespace", () => {
    expect(parseUnits(" 1.25 ", 2)).toBe(125n);
  });

  it("rejects too many decimal places", () => {
    expect(() => parseUnits("1.0000001", 6)).toThrow(/7 decimal places/);
  });

  it("rejects signs and garbage", () => {
    expect(() => parseUnits("-1", 6)).toThrow(AccountingError);
    expect(() => parseUnits("1e6", 6)).toThrow(AccountingError);
    expect(() => parseUnits("", 6)).toThrow(AccountingError);
  });
});
