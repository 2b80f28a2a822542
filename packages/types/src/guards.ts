/**
 * Runtime Type Guards
 *
 * Narrowing functions for domain types, used where values cross a
 * trust boundary (decryption results, API inputs, deserialized events).
 */

import type { FeeModel, FeeModelKind } from "./fee.js";
import type { IntentAllocation, IntentWeight } from "./intent.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";
import type { LiquidityAction, StatesAction, UpkeepPayload } from "./epoch.js";
import type { OrderSide } from "./order.js";
import { FEE_MODEL_KINDS } from "./fee.js";
import { LIQUIDITY_ACTIONS, STATES_ACTIONS } from "./epoch.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isBps(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 10_000;
}

// =============================================================================
// Fee guards
// =============================================================================

const FEE_KINDS = new Set<string>(FEE_MODEL_KINDS);

export function isFeeModelKind(value: unknown): value is FeeModelKind {
  return typeof value === "string" && FEE_KINDS.has(value);
}

export function isFeeModel(value: unknown): value is FeeModel {
  if (!isRecord(value)) return false;
  return (
    isFeeModelKind(value.kind) &&
    isBps(value.performanceFeeBps) &&
    isBps(value.managementFeeBps)
  );
}

// =============================================================================
// Intent guards
// =============================================================================

/**
 * Structural check only: string asset ids and non-negative integer
 * weights. Whitelist and sum checks belong to the vault.
 */
export function isIntentWeight(value: unknown): value is IntentWeight {
  if (!isRecord(value)) return false;
  return (
    typeof value.asset === "string" &&
    value.asset.length > 0 &&
    typeof value.weight === "number" &&
    Number.isSafeInteger(value.weight) &&
    value.weight >= 0
  );
}

export function isIntentAllocation(value: unknown): value is IntentAllocation {
  return Array.isArray(value) && value.every(isIntentWeight);
}

// =============================================================================
// Order / upkeep guards
// =============================================================================

export function isOrderSide(value: unknown): value is OrderSide {
  return value === "buy" || value === "sell";
}

const STATES_ACTION_SET = new Set<string>(STATES_ACTIONS);
const LIQUIDITY_ACTION_SET = new Set<string>(LIQUIDITY_ACTIONS);

export function isStatesAction(value: unknown): value is StatesAction {
  return typeof value === "string" && STATES_ACTION_SET.has(value);
}

export function isLiquidityAction(value: unknown): value is LiquidityAction {
  return typeof value === "string" && LIQUIDITY_ACTION_SET.has(value);
}

export function isUpkeepPayload<A extends string>(
  value: unknown,
  isAction: (action: unknown) => action is A,
): value is UpkeepPayload<A> {
  if (!isRecord(value)) return false;
  return (
    isAction(value.action) &&
    typeof value.minibatchIndex === "number" &&
    Number.isInteger(value.minibatchIndex) &&
    value.minibatchIndex >= 0
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>([
  "config", "vault", "custody", "states-orchestrator", "liquidity-orchestrator",
]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    isEventSource(value.source) &&
    (value.causationId === undefined || typeof value.causationId === "string")
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    value.type.length > 0 &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
