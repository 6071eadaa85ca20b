/**
 * Tests for atomic units.
 *
 * Verifies:
 * - Commit delivers buffered events in order, once per outermost unit
 * - Failure undoes writes in reverse and drops events
 * - Nested units unwind only their own part
 * - Async units refuse new units from suspend() until they settle
 * - A throwing commit listener neither fails the unit nor starves later listeners
 */

import { describe, it, expect, vi } from "vitest";
import { Journal } from "../src/journal.js";
import type { CommittedUnit, LedgerEvent } from "../src/types.js";
import { ALICE, BOB, expectLedgerError, expectLedgerRejection } from "./setup.js";

function transfer(value: bigint): LedgerEvent {
  return {
    eventName: "Transfer",
    args: { from: ALICE.address, to: BOB.address, value },
  };
}

function makeJournal(): { journal: Journal; units: CommittedUnit[] } {
  const journal = new Journal(() => 7n);
  const units: CommittedUnit[] = [];
  journal.onCommit((unit) => units.push(unit));
  return { journal, units };
}

describe("Journal.run", () => {
  it("commits events once, at the outermost unit", () => {
    const { journal, units } = makeJournal();

    journal.run(() => {
      journal.emit(transfer(1n));
      journal.run(() => {
        journal.emit(transfer(2n));
      });
      expect(units).toHaveLength(0);
    });

    expect(units).toEqual([{ events: [transfer(1n), transfer(2n)], sequencePoint: 7n }]);
  });

  it("does not notify for a unit without events", () => {
    const { journal, units } = makeJournal();
    journal.run(() => 1);
    expect(units).toHaveLength(0);
  });

  it("undoes every write when the unit throws", () => {
    const { journal, units } = makeJournal();
    const map = new Map<string, number>([["a", 1]]);
    const list = [1];
    const set = new Set<string>();

    expect(() =>
      journal.run(() => {
        journal.set(map, "a", 2);
        journal.set(map, "b", 3);
        journal.push(list, 2);
        journal.replaceLast(list, 9);
        journal.add(set, "x");
        journal.emit(transfer(1n));
        throw new Error("boom");
      }),
    ).toThrow("boom");

    expect([...map]).toEqual([["a", 1]]);
    expect(list).toEqual([1]);
    expect(set.size).toBe(0);
    expect(units).toHaveLength(0);
  });

  it("unwinds only the failed inner unit", () => {
    const { journal, units } = makeJournal();
    const map = new Map<string, number>();

    journal.run(() => {
      journal.set(map, "outer", 1);
      journal.emit(transfer(1n));
      try {
        journal.run(() => {
          journal.set(map, "inner", 2);
          journal.emit(transfer(2n));
          throw new Error("inner");
        });
      } catch {
        // the outer unit carries on
      }
    });

    expect([...map]).toEqual([["outer", 1]]);
    expect(units[0]?.events).toEqual([transfer(1n)]);
  });

  it("deletes empty values and restores them on undo", () => {
    const { journal } = makeJournal();
    const map = new Map<string, bigint>([["a", 5n]]);
    const isZero = (v: bigint): boolean => v === 0n;

    expect(() =>
      journal.run(() => {
        journal.set(map, "a", 0n, isZero);
        expect(map.has("a")).toBe(false);
        throw new Error("undo");
      }),
    ).toThrow("undo");

    expect(map.get("a")).toBe(5n);
  });

  it("refuses writes and events outside a unit", () => {
    const { journal } = makeJournal();
    expect(() => journal.push([], 1)).toThrow("Journal write outside a unit");
    expect(() => journal.emit(transfer(1n))).toThrow("Event emitted outside a unit");
  });
});

describe("Journal.runAsync", () => {
  it("refuses new units while suspended", async () => {
    const { journal, units } = makeJournal();
    let release: (value: boolean) => void = () => undefined;

    const pending = journal.runAsync(async () => {
      journal.emit({ eventName: "Withdrawal", args: { src: ALICE.address, wad: 1n } });
      return journal.suspend(
        () =>
          new Promise<boolean>((resolve) => {
            release = resolve;
          }),
      );
    });

    expect(journal.suspended).toBe(true);
    expectLedgerError(() => journal.run(() => 1), "REENTRANT_CALL");
    await expectLedgerRejection(journal.runAsync(async () => 1), "REENTRANT_CALL");

    release(true);
    await expect(pending).resolves.toBe(true);
    expect(journal.suspended).toBe(false);
    expect(units).toHaveLength(1);
    expect(journal.run(() => 2)).toBe(2);
  });

  it("stays closed between the outbound call settling and the unit settling", async () => {
    const { journal, units } = makeJournal();
    const map = new Map<string, number>();
    let release: (value: boolean) => void = () => undefined;
    const outbound = new Promise<boolean>((resolve) => {
      release = resolve;
    });
    let joined: unknown;

    const pending = journal.runAsync(async () => {
      journal.emit(transfer(1n));
      const ok = await journal.suspend(() => outbound);
      if (!ok) throw new Error("payout failed");
    });
    const late = outbound.then(() => {
      try {
        journal.run(() => journal.set(map, "late", 1));
      } catch (err) {
        joined = err;
      }
    });

    release(false);
    await late;
    await expect(pending).rejects.toThrow("payout failed");

    expect(joined).toMatchObject({ code: "REENTRANT_CALL" });
    expect(map.size).toBe(0);
    expect(units).toHaveLength(0);
    expect(journal.suspended).toBe(false);
  });

  it("refuses suspend() outside an async unit", async () => {
    const { journal } = makeJournal();

    await expectLedgerRejection(journal.suspend(() => Promise.resolve(true)), "REENTRANT_CALL");
  });

  it("rolls back when the async body rejects", async () => {
    const { journal, units } = makeJournal();
    const map = new Map<string, number>();

    await expect(
      journal.runAsync(async () => {
        journal.set(map, "a", 1);
        journal.emit(transfer(1n));
        await journal.suspend(() => Promise.resolve(true));
        throw new Error("late");
      }),
    ).rejects.toThrow("late");

    expect(map.size).toBe(0);
    expect(units).toHaveLength(0);
    expect(journal.active).toBe(false);
  });

  it("cannot open inside a synchronous unit", async () => {
    const { journal } = makeJournal();
    let inner: Promise<unknown> = Promise.resolve();

    journal.run(() => {
      inner = journal.runAsync(async () => 1);
    });

    await expectLedgerRejection(inner, "REENTRANT_CALL");
  });
});

describe("Journal commit listeners", () => {
  it("keeps the unit and notifies later listeners when one throws", () => {
    const onListenerError = vi.fn();
    const journal = new Journal(() => 7n, onListenerError);
    const map = new Map<string, number>();
    const seen: CommittedUnit[] = [];
    journal.onCommit(() => {
      throw new Error("indexer down");
    });
    journal.onCommit((unit) => seen.push(unit));

    const result = journal.run(() => {
      journal.set(map, "a", 1);
      journal.emit(transfer(1n));
      return "done";
    });

    expect(result).toBe("done");
    expect(map.get("a")).toBe(1);
    expect(seen).toHaveLength(1);
    expect(onListenerError).toHaveBeenCalledTimes(1);
    expect(onListenerError).toHaveBeenCalledWith(new Error("indexer down"), seen[0]);
  });

  it("stops notifying after unsubscribe", () => {
    const { journal, units } = makeJournal();
    const extra: CommittedUnit[] = [];
    const unsubscribe = journal.onCommit((unit) => extra.push(unit));

    journal.run(() => journal.emit(transfer(1n)));
    unsubscribe();
    journal.run(() => journal.emit(transfer(2n)));

    expect(units).toHaveLength(2);
    expect(extra).toHaveLength(1);
  });
});
