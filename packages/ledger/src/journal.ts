/**
 * @pegledger/ledger — Atomic units.
 *
 * Every state write made inside a unit records how to undo it, and every
 * event is buffered. When the outermost unit returns, the undo log is
 * discarded and the events go to commit listeners in emission order. When
 * any unit throws, its writes are undone in reverse and its events dropped.
 *
 * Units nest: an inner unit joins the outer one and only unwinds its own
 * part on failure.
 *
 * An async unit may suspend once on an external call (`suspend()`), after
 * its writes are done. From then until the unit commits or rolls back,
 * any new unit is refused with REENTRANT_CALL.
 *
 * A listener that throws does not fail the unit: the error goes to
 * `onListenerError` and the remaining listeners still run. Without a
 * handler it is rethrown on a later microtask.
 */

import type {
  CommitListener,
  CommittedUnit,
  LedgerEvent,
  ListenerErrorHandler,
} from "./types.js";
import { LedgerError } from "./types.js";

interface Mark {
  readonly undo: number;
  readonly events: number;
}

export class Journal {
  private readonly _undo: (() => void)[] = [];
  private readonly _events: LedgerEvent[] = [];
  private readonly _listeners = new Set<CommitListener>();
  private readonly _sequencePoint: () => bigint;
  private readonly _onListenerError: ListenerErrorHandler | undefined;
  private _depth = 0;
  private _async = false;
  private _suspended = false;

  constructor(sequencePoint: () => bigint, onListenerError?: ListenerErrorHandler) {
    this._sequencePoint = sequencePoint;
    this._onListenerError = onListenerError;
  }

  get active(): boolean {
    return this._depth > 0;
  }

  /** True from an async unit's `suspend()` until that unit settles. */
  get suspended(): boolean {
    return this._suspended;
  }

  // ─── Units ──────────────────────────────────────────────────────────

  run<T>(fn: () => T): T {
    this._assertNotSuspended();
    const mark = this._mark();
    this._depth++;

    let result: T;
    try {
      result = fn();
    } catch (err) {
      this._depth--;
      this._rollback(mark);
      throw err;
    }

    this._depth--;
    if (this._depth === 0) {
      this._commit();
    }
    return result;
  }

  async runAsync<T>(fn: () => Promise<T>): Promise<T> {
    this._assertNotSuspended();
    if (this._depth > 0) {
      throw new LedgerError(
        "REENTRANT_CALL",
        "An async unit cannot open inside another unit",
      );
    }

    const mark = this._mark();
    this._depth++;
    this._async = true;

    let result: T;
    try {
      result = await fn();
    } catch (err) {
      this._settleAsync();
      this._rollback(mark);
      throw err;
    }

    this._settleAsync();
    this._commit();
    return result;
  }

  /**
   * Await an external call from inside an async unit. The unit stays
   * closed to other callers until runAsync() settles it, not merely until
   * `call` settles.
   */
  async suspend<T>(call: () => Promise<T>): Promise<T> {
    if (!this._async) {
      throw new LedgerError("REENTRANT_CALL", "suspend() outside an async unit");
    }
    this._assertNotSuspended();
    this._suspended = true;
    return call();
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  /**
   * Record an undo step for a write just made.
   */
  record(undo: () => void): void {
    if (this._depth === 0) {
      throw new Error("Journal write outside a unit");
    }
    this._undo.push(undo);
  }

  /**
   * Set a map entry; a zero-like `value` for which `isEmpty` holds deletes it.
   */
  set<K, V>(map: Map<K, V>, key: K, value: V, isEmpty?: (value: V) => boolean): void {
    const had = map.has(key);
    const previous = map.get(key);

    if (isEmpty?.(value) === true) {
      map.delete(key);
    } else {
      map.set(key, value);
    }

    this.record(() => {
      if (had && previous !== undefined) {
        map.set(key, previous);
      } else {
        map.delete(key);
      }
    });
  }

  push<T>(list: T[], item: T): void {
    list.push(item);
    this.record(() => {
      list.pop();
    });
  }

  replaceLast<T>(list: T[], item: T): void {
    const index = list.length - 1;
    const previous = list[index];
    if (previous === undefined) {
      throw new Error("replaceLast() on an empty list");
    }
    list[index] = item;
    this.record(() => {
      list[index] = previous;
    });
  }

  add<T>(set: Set<T>, item: T): void {
    if (set.has(item)) return;
    set.add(item);
    this.record(() => {
      set.delete(item);
    });
  }

  // ─── Events ─────────────────────────────────────────────────────────

  emit(event: LedgerEvent): void {
    if (this._depth === 0) {
      throw new Error("Event emitted outside a unit");
    }
    this._events.push(event);
  }

  onCommit(listener: CommitListener): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _assertNotSuspended(): void {
    if (this._suspended) {
      throw new LedgerError(
        "REENTRANT_CALL",
        "Ledger is awaiting an outbound transfer; retry after it settles",
      );
    }
  }

  private _settleAsync(): void {
    this._depth--;
    this._async = false;
    this._suspended = false;
  }

  private _mark(): Mark {
    return { undo: this._undo.length, events: this._events.length };
  }

  private _rollback(mark: Mark): void {
    while (this._undo.length > mark.undo) {
      const undo = this._undo.pop();
      undo?.();
    }
    this._events.length = mark.events;
  }

  private _commit(): void {
    const events = this._events.splice(0);
    this._undo.length = 0;
    if (events.length === 0) return;

    const unit: CommittedUnit = { events, sequencePoint: this._sequencePoint() };
    for (const listener of [...this._listeners]) {
      try {
        listener(unit);
      } catch (err) {
        this._reportListenerError(err, unit);
      }
    }
  }

  private _reportListenerError(error: unknown, unit: CommittedUnit): void {
    const handler = this._onListenerError;
    if (handler !== undefined) {
      handler(error, unit);
      return;
    }
    queueMicrotask(() => {
      throw error;
    });
  }
}
