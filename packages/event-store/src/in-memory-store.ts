/**
 * @pegledger/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. The ledger node keeps its whole history
 * here: the ledger itself is in-memory, so the log lives exactly as long.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - No durability guarantees
 */

import type { DomainEvent } from "@pegledger/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt` timestamps. Default: wall clock */
  readonly now?: () => Date;
}

/**
 * In-memory event store. One global log in append order, plus the head
 * version of each stream.
 */
export class InMemoryEventStore implements EventStore {
  private readonly _streamVersions = new Map<string, number>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _now: () => Date;

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._now = options?.now ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError(
        "EMPTY_APPEND",
        "Cannot append zero events",
        streamId,
      );
    }

    const fromVersion = this.streamVersion(streamId) + 1;
    const appendedAt = this._now().toISOString();

    events.forEach((event, i) => {
      const base: UnhashedStoredEvent = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };

      const previousHash = this._lastHash;
      const stored: StoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };
      this._lastHash = stored.hash;

      this._globalLog.push(stored);
    });
    this._streamVersions.set(streamId, fromVersion + events.length - 1);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const direction = options?.direction ?? "forward";
    const fromPosition =
      options?.fromPosition ??
      (direction === "forward" ? 1 : this._globalLog.length);

    const result =
      direction === "forward"
        ? this._globalLog.filter((e) => e.globalPosition >= fromPosition)
        : this._globalLog
            .filter((e) => e.globalPosition <= fromPosition)
            .reverse();

    return limit(result, options?.maxCount);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streamVersions.get(streamId) ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError(
        "INVALID_STREAM_ID",
        "Stream ID must be a non-empty string",
      );
    }
  }
}

function limit(
  events: readonly StoredEvent[],
  maxCount: number | undefined,
): readonly StoredEvent[] {
  if (maxCount === undefined || maxCount < 0) {
    return events;
  }
  return events.slice(0, maxCount);
}
