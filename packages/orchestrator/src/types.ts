/**
 * @meridian/orchestrator — Collaborator contracts, epoch work products and errors.
 *
 * Adapters are synchronous: one upkeep call is one unit of work that
 * either completes or throws before committing.
 */

import type {
  AssetId,
  EpochFees,
  IntentAllocation,
  Order,
  OrderSide,
  PendingRequest,
  PriceQuote,
} from "@meridian/types";
import type { ConfigRegistry, RedeemPayout } from "@meridian/vault";

// =============================================================================
// Collaborators
// =============================================================================

export interface PriceAdapter {
  /** Must throw rather than return a zero or unreliable price. */
  quote(asset: AssetId): PriceQuote;
}

export interface ExecutionAdapter {
  /**
   * Trade `amount` of `asset` (its own units) against the underlying.
   * `bound` is the minimum underlying out for a sell, the maximum
   * underlying in for a buy. Returns the underlying actually received
   * or spent. A fill that would breach `bound` must throw
   * SLIPPAGE_EXCEEDED without executing.
   */
  execute(side: OrderSide, asset: AssetId, amount: bigint, bound: bigint): bigint;
}

export interface DecryptionRequest {
  readonly requestId: string;
  readonly vaultId: string;
  readonly ciphertext: string;
}

export interface IntentDecryptor {
  /** Answered later through StatesOrchestrator.fulfillDecryption. */
  requestDecryption(request: DecryptionRequest): void;
}

export interface ProtocolAdapters {
  readonly prices: PriceAdapter;
  readonly execution: ExecutionAdapter;
  readonly decryptor: IntentDecryptor;
}

export type AdapterFactory = (config: ConfigRegistry) => ProtocolAdapters;

// =============================================================================
// Epoch work products
// =============================================================================

/**
 * Point-in-time figures for one vault, fixed in preprocessing:
 *
 *   totalAssetsForRedeem  = active assets - fees
 *   totalAssetsForDeposit = totalAssetsForRedeem - redemption payouts
 *   tentativeTotalAssets  = totalAssetsForDeposit + pending deposits
 */
export interface PreprocessedVault {
  readonly vaultId: string;
  readonly activeAssets: bigint;
  readonly fees: EpochFees;
  readonly totalAssetsForRedeem: bigint;
  readonly payouts: readonly RedeemPayout[];
  readonly totalAssetsForDeposit: bigint;
  readonly deposits: readonly PendingRequest[];
  readonly tentativeTotalAssets: bigint;
}

/** Postprocessing output: the vault's assets after the buffer and its target holdings. */
export interface VaultTarget {
  readonly finalTotalAssets: bigint;
  readonly portfolio: ReadonlyMap<AssetId, bigint>;
}

export interface NettedOrders {
  readonly sells: readonly Order[];
  readonly buys: readonly Order[];
  /** Assets whose netted delta stayed within the dust threshold */
  readonly filteredAsDust: readonly AssetId[];
}

export interface EpochOrderBook extends NettedOrders {
  readonly epoch: number;
}

/** Resolved allocation per vault; undefined means 100% underlying. */
export type ResolvedIntent = IntentAllocation | undefined;

// =============================================================================
// Errors
// =============================================================================

export type OrchestratorErrorCode =
  | "NOT_AUTHORIZED"
  | "INVALID_STATE"
  | "INVALID_PRICE"
  | "INSUFFICIENT_FUNDS"
  | "SLIPPAGE_EXCEEDED"
  | "PROTOCOL_PAUSED"
  | "UNKNOWN_REQUEST"
  | "INVARIANT_VIOLATION";

export class OrchestratorError extends Error {
  public readonly code: OrchestratorErrorCode;

  constructor(code: OrchestratorErrorCode, message: string) {
    super(message);
    this.name = "OrchestratorError";
    this.code = code;
  }
}
