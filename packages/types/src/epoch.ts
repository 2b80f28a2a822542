/**
 * Epoch Types
 *
 * Phase and action vocabularies of both orchestrators, and the keeper
 * payload that carries an action and a minibatch index.
 */

// =============================================================================
// States orchestrator
// =============================================================================

export const STATES_PHASES = [
  "idle",
  "preprocessing-transparent-vaults",
  "preprocessing-encrypted-vaults",
  "buffering",
  "postprocessing-transparent-vaults",
  "postprocessing-encrypted-vaults",
  "building-orders",
] as const;

export type StatesPhase = (typeof STATES_PHASES)[number];

export const STATES_ACTIONS = [
  "startEpoch",
  "preprocessTransparentVaults",
  "preprocessEncryptedVaults",
  "buffer",
  "postprocessTransparentVaults",
  "postprocessEncryptedVaults",
  "buildOrders",
] as const;

export type StatesAction = (typeof STATES_ACTIONS)[number];

// =============================================================================
// Liquidity orchestrator
// =============================================================================

export const LIQUIDITY_PHASES = [
  "idle",
  "redeeming",
  "selling",
  "buying",
  "depositing",
] as const;

export type LiquidityPhase = (typeof LIQUIDITY_PHASES)[number];

export const LIQUIDITY_ACTIONS = [
  "startExecution",
  "redeem",
  "sell",
  "buy",
  "deposit",
] as const;

export type LiquidityAction = (typeof LIQUIDITY_ACTIONS)[number];

// =============================================================================
// Keeper payloads
// =============================================================================

export interface UpkeepPayload<A extends string> {
  readonly action: A;
  readonly minibatchIndex: number;
}

export type UpkeepCheck<A extends string> =
  | { readonly needed: true; readonly payload: UpkeepPayload<A> }
  | { readonly needed: false };

/**
 * Outcome of a performUpkeep call.
 * `performed` is false only for an idempotent no-op.
 */
export interface UpkeepResult<P extends string> {
  readonly performed: boolean;
  readonly phase: P;
  readonly epoch: number;
}
