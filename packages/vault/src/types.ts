/**
 * Vault Types
 *
 * Domain types for vault records, custody and protocol configuration.
 *
 * Rules:
 * - Amounts are bigint in the smallest unit
 * - Public snapshots carry amounts as decimal strings
 * - User-facing mutations happen only while the system is idle
 * - totalAssets and totalSupply are written by the orchestrators alone
 */

import type {
  AssetId,
  FeeModel,
  IntentAllocation,
  VaultStatus,
  VaultType,
} from "@meridian/types";

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Read-only view of the epoch state machine.
 */
export interface SystemStatus {
  isSystemIdle(): boolean;
}

/** Current time in unix seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

// =============================================================================
// Configuration
// =============================================================================

export type PrincipalRole = "admin" | "guardian" | "automationRegistry" | "decryptor";

export type ProtocolPrincipals = Readonly<Record<PrincipalRole, string>>;

export interface ProtocolParameters {
  readonly epochDurationSeconds: number;
  /** Vaults (or orders) processed per upkeep call */
  readonly minibatchSize: number;
  readonly slippageToleranceBps: number;
  /** Share of tentative vault assets held back as liquidity buffer */
  readonly bufferRatioBps: number;
  /** Annualised */
  readonly riskFreeRateBps: number;
  /** Annualised protocol fee on active assets */
  readonly volumeFeeBps: number;
  /** Protocol cut of curator fees */
  readonly revenueShareBps: number;
  readonly minDepositAmount: bigint;
  readonly minRedeemAmount: bigint;
  readonly feeChangeCooldownSeconds: number;
}

export type AssetStatus = "active" | "draining";

export interface WhitelistedAsset {
  readonly id: AssetId;
  readonly decimals: number;
  readonly status: AssetStatus;
}

// =============================================================================
// Vault
// =============================================================================

export interface CreateVaultParams {
  readonly id: string;
  readonly type: VaultType;
  readonly feeModel: FeeModel;
  /** Default 18 */
  readonly shareDecimals?: number;
}

export interface ScheduledFeeModel {
  readonly model: FeeModel;
  /** Unix seconds */
  readonly effectiveAt: number;
}

/** Redemption priced in preprocessing, paid in the redeem phase. */
export interface RedeemPayout {
  readonly user: string;
  readonly shares: bigint;
  readonly assets: bigint;
}

/** Deposit priced and minted in the deposit phase. */
export interface DepositMint {
  readonly user: string;
  readonly assets: bigint;
  readonly shares: bigint;
}

export interface VaultSettlement {
  readonly totalAssets: bigint;
  readonly portfolio: ReadonlyMap<AssetId, bigint>;
  readonly highWaterMark: bigint;
}

/**
 * JSON-safe view of a vault.
 */
export interface VaultSnapshot {
  readonly id: string;
  readonly type: VaultType;
  readonly curator: string;
  readonly status: VaultStatus;
  readonly shareDecimals: number;
  readonly feeModel: FeeModel;
  readonly scheduledFeeModel?: { readonly model: FeeModel; readonly effectiveAt: number };
  readonly highWaterMark: string;
  readonly totalAssets: string;
  readonly totalSupply: string;
  readonly sharePrice: string;
  readonly intent: IntentAllocation | null;
  readonly hasEncryptedIntent: boolean;
  readonly portfolio: Readonly<Record<AssetId, string>>;
  readonly pendingDeposits: string;
  readonly pendingRedeems: string;
}

// =============================================================================
// Errors
// =============================================================================

export type VaultErrorCode =
  | "VAULT_NOT_FOUND"
  | "VAULT_EXISTS"
  | "NOT_AUTHORIZED"
  | "INVALID_CONFIG"
  | "INVALID_AMOUNT"
  | "INVALID_INTENT"
  | "INVALID_FEE_MODEL"
  | "UNKNOWN_ASSET"
  | "SYSTEM_NOT_IDLE"
  | "PROTOCOL_PAUSED"
  | "BELOW_MINIMUM"
  | "INSUFFICIENT_SHARES"
  | "INSUFFICIENT_BALANCE"
  | "NO_PENDING_REQUEST"
  | "NOTHING_TO_CLAIM"
  | "VAULT_DECOMMISSIONING"
  | "VAULT_NOT_DECOMMISSIONED";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}
