/**
 * @meridian/orchestrator — Public API
 *
 * The epoch state machine:
 * - StatesOrchestrator: fees, redemptions, deposits, buffer, targets, orders
 * - LiquidityOrchestrator: redemption credits, trades, deposit mints
 * - Protocol: composition root wiring both around one EpochState
 */

// Types
export type {
  PriceAdapter,
  ExecutionAdapter,
  DecryptionRequest,
  IntentDecryptor,
  ProtocolAdapters,
  AdapterFactory,
  PreprocessedVault,
  VaultTarget,
  NettedOrders,
  EpochOrderBook,
  ResolvedIntent,
  OrchestratorErrorCode,
} from "./types.js";
export { OrchestratorError } from "./types.js";

// State
export type { EpochStart, EpochStateSummary } from "./epoch-state.js";
export { EpochState } from "./epoch-state.js";

// Netting
export type { AllocationContext, NettingAsset, NettingResult } from "./order-book.js";
export { OrderBook, targetPortfolio } from "./order-book.js";

// Orchestrators
export type { StatesOrchestratorDeps } from "./states-orchestrator.js";
export { StatesOrchestrator } from "./states-orchestrator.js";
export type { LiquidityOrchestratorDeps } from "./liquidity-orchestrator.js";
export { LiquidityOrchestrator } from "./liquidity-orchestrator.js";

// Adapters
export type { ExecutionRecord, SimulatedExecutionOptions } from "./adapters.js";
export { StaticPriceAdapter, SimulatedExecutionAdapter, QueuedDecryptor } from "./adapters.js";

// Composition
export type { ProtocolOptions } from "./protocol.js";
export { Protocol } from "./protocol.js";
