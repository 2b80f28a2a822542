/**
 * @meridian/types — Shared domain types for the vault orchestration stack.
 *
 * These types are used across all packages:
 * - Assets, prices and orders
 * - Fee models and intents
 * - Orchestrator phases, actions and keeper payloads
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - Amounts are bigint in the smallest unit; basis points are numbers
 * - No runtime dependencies
 */

// Asset types
export type { AssetId, AssetInfo, PriceQuote } from "./asset.js";

// Fee types
export type { FeeModel, FeeModelKind, EpochFees } from "./fee.js";
export { FEE_MODEL_KINDS } from "./fee.js";

// Intent types
export type { IntentWeight, IntentAllocation } from "./intent.js";
export { INTENT_SCALE } from "./intent.js";

// Order types
export type { Order, OrderSide } from "./order.js";

// Vault types
export type { VaultType, VaultStatus, PendingRequest } from "./vault.js";

// Epoch types
export type {
  StatesPhase,
  StatesAction,
  LiquidityPhase,
  LiquidityAction,
  UpkeepPayload,
  UpkeepCheck,
  UpkeepResult,
} from "./epoch.js";
export {
  STATES_PHASES,
  STATES_ACTIONS,
  LIQUIDITY_PHASES,
  LIQUIDITY_ACTIONS,
} from "./epoch.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Runtime type guards
export {
  isFeeModelKind,
  isFeeModel,
  isIntentWeight,
  isIntentAllocation,
  isOrderSide,
  isStatesAction,
  isLiquidityAction,
  isUpkeepPayload,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
