/**
 * @meridian/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only, hash-chained event streams
 * - InMemoryEventStore
 * - Protocol event type constants and payload shapes
 * - EventRecorder for building event metadata per subsystem
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  UnhashedEvent,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";

// Protocol events
export { PROTOCOL_EVENTS } from "./protocol-events.js";
export type {
  ProtocolEventType,
  EpochStartedPayload,
  PhaseAdvancedPayload,
  VaultPreprocessedPayload,
  OrdersBuiltPayload,
  OrderExecutedPayload,
  SettlementPayload,
  VaultSettledPayload,
} from "./protocol-events.js";

// Recorder
export { EventRecorder } from "./recorder.js";
export type { RecordContext, EventRecorderOptions } from "./recorder.js";
