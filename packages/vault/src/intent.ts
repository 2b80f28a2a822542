/**
 * Intent validation.
 *
 * A valid intent:
 * - is a non-empty list of (asset, weight)
 * - names each asset once, and only the underlying or active whitelisted assets
 * - has positive integer weights summing exactly to INTENT_SCALE
 */

import type { AssetId, IntentAllocation } from "@meridian/types";
import { INTENT_SCALE, isIntentAllocation } from "@meridian/types";
import type { ConfigRegistry } from "./config-registry.js";
import { VaultError } from "./types.js";

/**
 * Returns the reason the allocation is invalid, or undefined.
 */
export function intentViolation(allocation: unknown, config: ConfigRegistry): string | undefined {
  if (!isIntentAllocation(allocation)) {
    return "allocation must be a list of { asset, weight } with integer weights";
  }
  if (allocation.length === 0) {
    return "allocation is empty";
  }

  const seen = new Set<AssetId>();
  let total = 0;
  for (const { asset, weight } of allocation) {
    if (seen.has(asset)) {
      return `asset "${asset}" appears more than once`;
    }
    seen.add(asset);
    if (!config.isInvestable(asset)) {
      return `asset "${asset}" is not whitelisted`;
    }
    if (weight <= 0) {
      return `weight for "${asset}" must be positive`;
    }
    total += weight;
    if (total > INTENT_SCALE) {
      return `weights exceed ${INTENT_SCALE}`;
    }
  }

  if (total !== INTENT_SCALE) {
    return `weights sum to ${total}, expected ${INTENT_SCALE}`;
  }
  return undefined;
}

export type IntentCheck =
  | { readonly valid: true; readonly intent: IntentAllocation }
  | { readonly valid: false; readonly reason: string };

/**
 * Validates the allocation and, when valid, returns a frozen copy
 * detached from the caller's array.
 */
export function checkIntent(allocation: unknown, config: ConfigRegistry): IntentCheck {
  const violation = intentViolation(allocation, config);
  if (violation !== undefined || !isIntentAllocation(allocation)) {
    return { valid: false, reason: violation ?? "malformed" };
  }
  const intent = allocation.map(({ asset, weight }) => Object.freeze({ asset, weight }));
  return { valid: true, intent: Object.freeze(intent) };
}

export function validateIntent(allocation: unknown, config: ConfigRegistry): IntentAllocation {
  const check = checkIntent(allocation, config);
  if (!check.valid) {
    throw new VaultError("INVALID_INTENT", `Invalid intent: ${check.reason}`);
  }
  return check.intent;
}
