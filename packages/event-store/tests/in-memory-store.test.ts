/**
 * Tests for InMemoryEventStore.
 *
 * Verifies:
 * - Append: single event, batch, ordering, global position
 * - ReadAll: global ordering, from position, max count
 * - Errors: empty append, invalid stream ID
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@pegledger/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { EventStoreError } from "../src/types.js";
import { GENESIS_HASH } from "../src/hash-chain.js";

// =============================================================================
// Helpers
// =============================================================================

let counter = 0;

function makeEvent(type: string): DomainEvent {
  counter++;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "test",
      correlationId: `corr-${counter}`,
      source: "ledger",
    },
    payload: { n: counter },
  };
}

function makeEvents(count: number, prefix = "Event"): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`${prefix}${i + 1}`));
}

// =============================================================================
// Append
// =============================================================================

describe("append", () => {
  it("appends a single event to a new stream", () => {
    const store = new InMemoryEventStore();
    const result = store.append("stream-1", [makeEvent("Transfer")]);

    expect(result).toEqual({
      streamId: "stream-1",
      fromVersion: 1,
      toVersion: 1,
      count: 1,
    });
  });

  it("assigns contiguous versions within a stream", () => {
    const store = new InMemoryEventStore();
    store.append("stream-1", makeEvents(2));
    const second = store.append("stream-1", makeEvents(3));

    expect(second.fromVersion).toBe(3);
    expect(second.toVersion).toBe(5);
    expect(store.streamVersion("stream-1")).toBe(5);
    expect(store.streamVersion("missing")).toBe(0);
    expect(store.readAll().map((e) => e.version)).toEqual([1, 2, 3, 4, 5]);
  });

  it("assigns global positions across streams", () => {
    const store = new InMemoryEventStore();
    store.append("a", makeEvents(2));
    store.append("b", makeEvents(1));
    store.append("a", makeEvents(1));

    expect(store.readAll().map((e) => [e.streamId, e.globalPosition])).toEqual([
      ["a", 1],
      ["a", 2],
      ["b", 3],
      ["a", 4],
    ]);
    expect(store.globalPosition()).toBe(4);
  });

  it("links each event to its predecessor's hash", () => {
    const store = new InMemoryEventStore();
    store.append("a", makeEvents(2));
    store.append("b", makeEvents(1));

    const all = store.readAll();
    expect(all[0]?.previousHash).toBe(GENESIS_HASH);
    expect(all[1]?.previousHash).toBe(all[0]?.hash);
    expect(all[2]?.previousHash).toBe(all[1]?.hash);
    expect(all[0]?.hash).toMatch(/^[0-9a-f]{64}$/);
  });

  it("stamps appendedAt from the injected clock", () => {
    const store = new InMemoryEventStore({
      now: () => new Date("2026-03-04T05:06:07.000Z"),
    });
    store.append("a", makeEvents(1));

    expect(store.readAll()[0]?.appendedAt).toBe("2026-03-04T05:06:07.000Z");
  });

  it("rejects an empty batch", () => {
    const store = new InMemoryEventStore();
    expect(() => store.append("a", [])).toThrow(EventStoreError);
    expect(store.globalPosition()).toBe(0);
  });

  it("rejects an empty stream ID", () => {
    const store = new InMemoryEventStore();
    try {
      store.append("", makeEvents(1));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(EventStoreError);
      if (err instanceof EventStoreError) {
        expect(err.code).toBe("INVALID_STREAM_ID");
      }
    }
  });
});

// =============================================================================
// Read
// =============================================================================

describe("readAll", () => {
  it("reads in global order from a position", () => {
    const store = new InMemoryEventStore();
    store.append("a", makeEvents(2));
    store.append("b", makeEvents(2));

    expect(
      store.readAll({ fromPosition: 2, maxCount: 2 }).map((e) => e.globalPosition),
    ).toEqual([2, 3]);
  });

  it("reads backward from the last position by default", () => {
    const store = new InMemoryEventStore();
    store.append("a", makeEvents(3));

    expect(
      store.readAll({ direction: "backward" }).map((e) => e.globalPosition),
    ).toEqual([3, 2, 1]);
  });
});
