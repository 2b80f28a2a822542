/**
 * Event Types
 *
 * Append-only event architecture.
 * Every state change in the protocol is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Amounts in payloads are decimal strings
 * - A call that changes nothing emits nothing
 */

/** Subsystems that emit events. */
export type EventSource =
  | "config"
  | "vault"
  | "custody"
  | "states-orchestrator"
  | "liquidity-orchestrator";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Principal that caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Groups the events of one epoch or one request */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "epoch.started", "vault.deposit.requested") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
