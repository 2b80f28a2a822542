/**
 * Shared fixtures for event-store tests.
 */

import type { DomainEvent } from "@meridian/types";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Readonly<Record<string, unknown>> = { epoch: 1 },
): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2026-03-01T00:00:00.000Z",
      actor: "keeper",
      correlationId: "epoch-1",
      source: "states-orchestrator",
    },
    payload,
  };
}

export function makeEvents(count: number, prefix = "states.phase.advanced"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(prefix, { epoch: 1, step: i + 1 }));
}
