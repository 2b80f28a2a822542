/**
 * @meridian/event-store — Protocol event definitions.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 *
 * Payload amounts are decimal-integer strings in the smallest unit.
 */

// =============================================================================
// Event Types
// =============================================================================

export const PROTOCOL_EVENTS = {
  // Config
  PARAMETER_UPDATED: "config.parameter.updated",
  ASSET_WHITELISTED: "config.asset.whitelisted",
  ASSET_REMOVAL_REQUESTED: "config.asset.removal-requested",
  ASSET_REMOVED: "config.asset.removed",
  CURATOR_WHITELISTED: "config.curator.whitelisted",
  PRINCIPAL_UPDATED: "config.principal.updated",
  PROTOCOL_PAUSED: "config.protocol.paused",
  PROTOCOL_UNPAUSED: "config.protocol.unpaused",

  // Vault
  VAULT_CREATED: "vault.vault.created",
  DEPOSIT_REQUESTED: "vault.deposit.requested",
  DEPOSIT_CANCELLED: "vault.deposit.cancelled",
  REDEEM_REQUESTED: "vault.redeem.requested",
  REDEEM_CANCELLED: "vault.redeem.cancelled",
  INTENT_SUBMITTED: "vault.intent.submitted",
  ENCRYPTED_INTENT_SUBMITTED: "vault.encrypted-intent.submitted",
  FEE_MODEL_SCHEDULED: "vault.fee-model.scheduled",
  DECOMMISSIONING_STARTED: "vault.decommissioning.started",
  SYNCHRONOUS_REDEEMED: "vault.redeem.synchronous",

  // Custody
  REDEMPTION_CLAIMED: "custody.redemption.claimed",
  CURATOR_FEES_CLAIMED: "custody.curator-fees.claimed",
  PROTOCOL_FEES_CLAIMED: "custody.protocol-fees.claimed",

  // States orchestrator
  EPOCH_STARTED: "states.epoch.started",
  PHASE_ADVANCED: "states.phase.advanced",
  VAULT_PREPROCESSED: "states.vault.preprocessed",
  DECRYPTION_REQUESTED: "states.decryption.requested",
  DECRYPTION_FULFILLED: "states.decryption.fulfilled",
  BUFFER_ALLOCATED: "states.buffer.allocated",
  ORDERS_BUILT: "states.orders.built",

  // Liquidity orchestrator
  EXECUTION_STARTED: "liquidity.execution.started",
  REDEMPTION_SETTLED: "liquidity.redemption.settled",
  ORDER_EXECUTED: "liquidity.order.executed",
  DEPOSIT_SETTLED: "liquidity.deposit.settled",
  VAULT_SETTLED: "liquidity.vault.settled",
  VAULT_DECOMMISSIONED: "liquidity.vault.decommissioned",
  EXECUTION_COMPLETED: "liquidity.execution.completed",
} as const;

export type ProtocolEventType = (typeof PROTOCOL_EVENTS)[keyof typeof PROTOCOL_EVENTS];

// =============================================================================
// Payloads
// =============================================================================

export interface EpochStartedPayload {
  readonly epoch: number;
  readonly vaultCount: number;
  readonly startedAt: number;
}

export interface PhaseAdvancedPayload {
  readonly epoch: number;
  readonly from: string;
  readonly to: string;
}

export interface VaultPreprocessedPayload {
  readonly epoch: number;
  readonly vaultId: string;
  readonly activeAssets: string;
  readonly totalAssetsForRedeem: string;
  readonly totalAssetsForDeposit: string;
  readonly volumeFee: string;
  readonly managementFee: string;
  readonly performanceFee: string;
}

export interface OrdersBuiltPayload {
  readonly epoch: number;
  readonly buys: number;
  readonly sells: number;
  readonly filteredAsDust: readonly string[];
}

export interface OrderExecutedPayload {
  readonly epoch: number;
  readonly asset: string;
  readonly side: "buy" | "sell";
  readonly amount: string;
  readonly bound: string;
  readonly underlyingAmount: string;
}

export interface SettlementPayload {
  readonly epoch: number;
  readonly vaultId: string;
  readonly user: string;
  readonly amount: string;
  readonly shares: string;
}

export interface VaultSettledPayload {
  readonly epoch: number;
  readonly vaultId: string;
  readonly totalAssets: string;
  readonly totalSupply: string;
  readonly sharePrice: string;
  readonly curatorFee: string;
  readonly protocolFee: string;
}
