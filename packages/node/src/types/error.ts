/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code, message, details? } }
 */

import type { AccountingErrorCode } from "@meridian/accounting";
import type { EventStoreErrorCode } from "@meridian/event-store";
import type { OrchestratorErrorCode } from "@meridian/orchestrator";
import type { VaultErrorCode } from "@meridian/vault";

/** Codes produced by the HTTP layer itself. */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

/** Domain errors keep the code of the package that raised them. */
export type DomainErrorCode =
  | AccountingErrorCode
  | EventStoreErrorCode
  | OrchestratorErrorCode
  | VaultErrorCode;

export type ErrorCode = ApiErrorCode | DomainErrorCode;

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}
