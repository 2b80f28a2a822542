/**
 * Vault Types
 */

export type VaultType = "transparent" | "encrypted";

/**
 * - active: accepts deposits and redemptions
 * - decommissioning: redemptions only; the portfolio is being unwound
 * - decommissioned: terminal; excluded from epochs, redeemable synchronously
 */
export type VaultStatus = "active" | "decommissioning" | "decommissioned";

export interface PendingRequest {
  readonly user: string;
  /** Underlying units for deposits, shares for redemptions */
  readonly amount: bigint;
}
