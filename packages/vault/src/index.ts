/**
 * @meridian/vault — Public API
 *
 * Vault records and the in-process state around them:
 * - ConfigRegistry: whitelists, principals, bounded parameters, pause
 * - Custody: pooled balances, escrow, claims, fee balances
 * - Vault / VaultRegistry: request queues, intents, fee models, decommissioning
 */

// Types
export type {
  SystemStatus,
  Clock,
  PrincipalRole,
  ProtocolPrincipals,
  ProtocolParameters,
  AssetStatus,
  WhitelistedAsset,
  CreateVaultParams,
  ScheduledFeeModel,
  RedeemPayout,
  DepositMint,
  VaultSettlement,
  VaultSnapshot,
  VaultErrorCode,
} from "./types.js";
export { VaultError, systemClock } from "./types.js";

// Configuration
export type { ConfigRegistryInit } from "./config-registry.js";
export { ConfigRegistry, DEFAULT_PARAMETERS } from "./config-registry.js";

// Custody
export { Custody } from "./custody.js";

// Intents
export { checkIntent, validateIntent } from "./intent.js";
export type { IntentCheck } from "./intent.js";

// Vaults
export type { VaultInit } from "./vault.js";
export { Vault } from "./vault.js";
export {
  VaultRegistry,
  validateFeeModel,
  MAX_PERFORMANCE_FEE_BPS,
  MAX_MANAGEMENT_FEE_BPS,
  DEFAULT_SHARE_DECIMALS,
} from "./vault-registry.js";
