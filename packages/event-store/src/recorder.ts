/**
 * @meridian/event-store — Event recorder.
 *
 * Builds DomainEvent metadata (id, timestamp, source) for one emitting
 * subsystem and appends the event to its stream.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventMetadata, EventSource } from "@meridian/types";
import type { EventStore, StoredEvent } from "./types.js";

export interface RecordContext {
  /** Principal that caused the change */
  readonly actor: string;
  /** Defaults to the new event's own id */
  readonly correlationId?: string | undefined;
  readonly causationId?: string | undefined;
}

export interface EventRecorderOptions {
  readonly clock?: () => Date;
  readonly newId?: () => string;
}

export class EventRecorder {
  private readonly clock: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly store: EventStore,
    private readonly source: EventSource,
    options: EventRecorderOptions = {},
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  record(
    streamId: string,
    type: string,
    context: RecordContext,
    payload: Readonly<Record<string, unknown>>,
  ): StoredEvent {
    const eventId = this.newId();
    const base = {
      eventId,
      timestamp: this.clock().toISOString(),
      actor: context.actor,
      correlationId: context.correlationId ?? eventId,
      source: this.source,
    };
    const metadata: EventMetadata = context.causationId !== undefined
      ? { ...base, causationId: context.causationId }
      : base;

    const event: DomainEvent = { type, metadata, payload };
    const result = this.store.append(streamId, [event]);

    const [stored] = this.store.read(streamId, { fromVersion: result.toVersion, maxCount: 1 });
    if (stored === undefined) {
      throw new Error(`Event "${type}" was not readable after append to "${streamId}"`);
    }
    return stored;
  }
}
