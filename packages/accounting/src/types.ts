/**
 * @meridian/accounting — Shared constants and the accounting error.
 *
 * Rules:
 * - All amounts are bigint in the smallest unit
 * - Basis points and durations are plain integers
 * - Fail-closed: invalid inputs throw, never silently clamp
 */

/** Basis-point denominator. */
export const BPS = 10_000n;

/** Seconds in a 365-day year, the annualisation base for fees and rates. */
export const SECONDS_PER_YEAR = 31_536_000n;

/** Rounding direction for integer division. */
export type Rounding = "floor" | "ceil";

// ─── Error Types ─────────────────────────────────────────────────────────

export type AccountingErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_DECIMALS"
  | "DIVISION_BY_ZERO"
  | "NEGATIVE_OPERAND"
  | "INVALID_PRICE"
  | "INVALID_FEE_INPUT";

export class AccountingError extends Error {
  public readonly code: AccountingErrorCode;

  constructor(code: AccountingErrorCode, message: string) {
    super(message);
    this.name = "AccountingError";
    this.code = code;
  }
}
