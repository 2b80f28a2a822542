/**
 * @meridian/accounting — Deterministic fixed-point arithmetic.
 *
 * Every product is formed in full before a single division, so no
 * intermediate truncation happens. Rounding direction is always explicit
 * at the call site that chooses it.
 *
 * Rules:
 * - No floating-point operations
 * - Operands are non-negative; denominators are positive
 * - Decimal strings are unsigned integers with an optional fraction
 */

import { AccountingError } from "./types.js";
import type { Rounding } from "./types.js";

// ─── Primitives ──────────────────────────────────────────────────────────

/**
 * 10^exp as bigint.
 *
 * pow10(6) → 1_000_000n
 */
export function pow10(exp: number): bigint {
  if (!Number.isInteger(exp) || exp < 0 || exp > 77) {
    throw new AccountingError("INVALID_DECIMALS", `Exponent must be an integer in [0, 77], got ${String(exp)}`);
  }
  return 10n ** BigInt(exp);
}

/**
 * (a * b) / denominator with explicit rounding.
 *
 * mulDiv(7n, 3n, 2n, "floor") → 10n
 * mulDiv(7n, 3n, 2n, "ceil")  → 11n
 */
export function mulDiv(
  a: bigint,
  b: bigint,
  denominator: bigint,
  rounding: Rounding,
): bigint {
  if (a < 0n || b < 0n) {
    throw new AccountingError("NEGATIVE_OPERAND", `mulDiv operands must be non-negative, got ${a} and ${b}`);
  }
  if (denominator <= 0n) {
    throw new AccountingError("DIVISION_BY_ZERO", `mulDiv denominator must be positive, got ${denominator}`);
  }

  const product = a * b;
  const quotient = product / denominator;
  if (rounding === "ceil" && product % denominator !== 0n) {
    return quotient + 1n;
  }
  return quotient;
}

/**
 * amount * bps / 10_000, rounded as requested.
 */
export function applyBps(amount: bigint, bps: number, rounding: Rounding): bigint {
  if (!Number.isInteger(bps) || bps < 0) {
    throw new AccountingError("INVALID_AMOUNT", `Basis points must be a non-negative integer, got ${String(bps)}`);
  }
  return mulDiv(amount, BigInt(bps), 10_000n, rounding);
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/** a - b, floored at zero. */
export function saturatingSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

// ─── Decimal Strings ─────────────────────────────────────────────────────

/**
 * Parse an unsigned decimal string into smallest units.
 *
 * "100.5" with decimals=6 → 100500000n
 * "42"    with decimals=0 → 42n
 */
export function parseUnits(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new AccountingError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }
  const scale = pow10(decimals);

  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  if (fracPart.length > decimals) {
    throw new AccountingError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const frac = fracPart === "" ? 0n : BigInt(fracPart.padEnd(decimals, "0"));
  return BigInt(intPart) * scale + frac;
}
