/**
 * Tests for EventRecorder.
 */

import { describe, it, expect } from "vitest";
import { EventRecorder } from "../src/recorder.js";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { PROTOCOL_EVENTS } from "../src/protocol-events.js";

function fixedRecorder(store: InMemoryEventStore): EventRecorder {
  let n = 0;
  return new EventRecorder(store, "vault", {
    clock: () => new Date("2026-03-01T12:00:00.000Z"),
    newId: () => `id-${++n}`,
  });
}

describe("EventRecorder", () => {
  it("builds metadata and appends to the stream", () => {
    const store = new InMemoryEventStore();
    const recorder = fixedRecorder(store);

    const stored = recorder.record(
      "vault-alpha",
      PROTOCOL_EVENTS.DEPOSIT_REQUESTED,
      { actor: "depositor-1", correlationId: "req-1" },
      { amount: "1000000" },
    );

    expect(stored.streamId).toBe("vault-alpha");
    expect(stored.version).toBe(1);
    expect(stored.event).toEqual({
      type: "vault.deposit.requested",
      metadata: {
        eventId: "id-1",
        timestamp: "2026-03-01T12:00:00.000Z",
        actor: "depositor-1",
        correlationId: "req-1",
        source: "vault",
      },
      payload: { amount: "1000000" },
    });
  });

  it("carries a causation id when given", () => {
    const store = new InMemoryEventStore();
    const recorder = fixedRecorder(store);

    const stored = recorder.record(
      "vault-alpha",
      PROTOCOL_EVENTS.DEPOSIT_CANCELLED,
      { actor: "depositor-1", correlationId: "req-1", causationId: "id-0" },
      {},
    );

    expect(stored.event.metadata.causationId).toBe("id-0");
  });

  it("uses the event id as correlation id by default", () => {
    const store = new InMemoryEventStore();
    const stored = fixedRecorder(store).record("config", PROTOCOL_EVENTS.PROTOCOL_PAUSED, { actor: "guardian" }, {});

    expect(stored.event.metadata.correlationId).toBe("id-1");
  });

  it("returns the newest event of a busy stream", () => {
    const store = new InMemoryEventStore();
    const recorder = fixedRecorder(store);
    recorder.record("vault-alpha", "a", { actor: "x", correlationId: "c" }, {});
    const second = recorder.record("vault-alpha", "b", { actor: "x", correlationId: "c" }, {});

    expect(second.version).toBe(2);
    expect(second.event.type).toBe("b");
  });
});
