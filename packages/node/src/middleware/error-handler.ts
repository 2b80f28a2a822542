/**
 * Global error handler.
 *
 * Maps the coded errors of the protocol packages to HTTP statuses and
 * answers with the error envelope. Anything else is a 500 with a
 * generic message.
 */

import type { Context } from "hono";
import { AccountingError } from "@meridian/accounting";
import { EventStoreError } from "@meridian/event-store";
import { OrchestratorError } from "@meridian/orchestrator";
import { VaultError } from "@meridian/vault";
import { createErrorEnvelope } from "../types/error.js";

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

type DomainError = AccountingError | EventStoreError | OrchestratorError | VaultError;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Authorization
  NOT_AUTHORIZED: 403,

  // Lookup
  VAULT_NOT_FOUND: 404,
  UNKNOWN_ASSET: 404,
  UNKNOWN_REQUEST: 404,

  // Sequencing
  INVALID_STATE: 409,
  SYSTEM_NOT_IDLE: 409,
  PROTOCOL_PAUSED: 409,
  VAULT_EXISTS: 409,
  VAULT_DECOMMISSIONING: 409,
  VAULT_NOT_DECOMMISSIONED: 409,

  // Input
  INVALID_CONFIG: 400,
  INVALID_AMOUNT: 400,
  INVALID_INTENT: 400,
  INVALID_FEE_MODEL: 400,

  // Balances and execution
  BELOW_MINIMUM: 422,
  INSUFFICIENT_SHARES: 422,
  INSUFFICIENT_BALANCE: 422,
  NO_PENDING_REQUEST: 422,
  NOTHING_TO_CLAIM: 422,
  INVALID_PRICE: 422,
  INSUFFICIENT_FUNDS: 422,
  SLIPPAGE_EXCEEDED: 422,
};

function isDomainError(err: unknown): err is DomainError {
  return (
    err instanceof VaultError ||
    err instanceof OrchestratorError ||
    err instanceof AccountingError ||
    err instanceof EventStoreError
  );
}

export function statusOf(err: unknown): ErrorStatus {
  if (!isDomainError(err)) {
    return 500;
  }
  return STATUS_MAP[err.code] ?? 500;
}

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: unknown, c: Context): Response {
  const status = statusOf(err);

  if (status === 500 || !isDomainError(err)) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(err.code, err.message), status);
}
