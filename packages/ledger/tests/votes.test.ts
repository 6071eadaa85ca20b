/**
 * Tests for the voting-power mirror.
 *
 * Verifies:
 * - Undelegated balances carry no votes
 * - Delegation moves the whole balance weight and emits in order
 * - Balance changes move weight between delegates
 * - Checkpoints: one per sequence point, historical lookups, future guard
 */

import { describe, it, expect } from "vitest";
import { ZERO_ADDRESS } from "../src/address.js";
import { latestCheckpoint, pushCheckpoint, upperLookup } from "../src/checkpoints.js";
import { Journal } from "../src/journal.js";
import type { Checkpoint } from "../src/types.js";
import { ALICE, BOB, CAROL, DAVE, createTestLedger, expectLedgerError } from "./setup.js";

// =============================================================================
// Checkpoint series
// =============================================================================

describe("checkpoint series", () => {
  const series: readonly Checkpoint[] = [
    { key: 2n, votes: 10n },
    { key: 5n, votes: 30n },
    { key: 9n, votes: 0n },
    { key: 12n, votes: 7n },
  ];

  it("finds the last value at or before a key", () => {
    expect(upperLookup(series, 1n)).toBe(0n);
    expect(upperLookup(series, 2n)).toBe(10n);
    expect(upperLookup(series, 4n)).toBe(10n);
    expect(upperLookup(series, 5n)).toBe(30n);
    expect(upperLookup(series, 11n)).toBe(0n);
    expect(upperLookup(series, 100n)).toBe(7n);
    expect(upperLookup([], 100n)).toBe(0n);
  });

  it("replaces the latest entry at the same key and refuses older keys", () => {
    const journal = new Journal(() => 0n);
    const list: Checkpoint[] = [];

    journal.run(() => {
      expect(pushCheckpoint(journal, list, 3n, 10n)).toEqual([0n, 10n]);
      expect(pushCheckpoint(journal, list, 3n, 15n)).toEqual([10n, 15n]);
      expect(pushCheckpoint(journal, list, 4n, 5n)).toEqual([15n, 5n]);
    });
    expect(list).toEqual([
      { key: 3n, votes: 15n },
      { key: 4n, votes: 5n },
    ]);
    expect(latestCheckpoint(list)).toBe(5n);

    expectLedgerError(
      () => journal.run(() => pushCheckpoint(journal, list, 2n, 1n)),
      "UNORDERED_CHECKPOINT",
    );
    expect(list).toHaveLength(2);
  });
});

// =============================================================================
// Delegation
// =============================================================================

describe("delegation", () => {
  it("undelegated holders have no votes", () => {
    const { ledger } = createTestLedger();
    ledger.depositValue(ALICE.address, 100n);

    expect(ledger.delegates(ALICE.address)).toBe(ZERO_ADDRESS);
    expect(ledger.getVotes(ALICE.address)).toBe(0n);
    expect(ledger.numCheckpoints(ALICE.address)).toBe(0);
  });

  it("self-delegation makes the balance count", () => {
    const { ledger, events } = createTestLedger();
    ledger.depositValue(ALICE.address, 100n);
    events.length = 0;

    ledger.delegate(ALICE.address, ALICE.address);

    expect(ledger.getVotes(ALICE.address)).toBe(100n);
    expect(events).toEqual([
      {
        eventName: "DelegateChanged",
        args: { delegator: ALICE.address, fromDelegate: ZERO_ADDRESS, toDelegate: ALICE.address },
      },
      {
        eventName: "DelegateVotesChanged",
        args: { delegate: ALICE.address, previousVotes: 0n, newVotes: 100n },
      },
    ]);
  });

  it("redelegation moves the whole weight, old delegate first", () => {
    const { ledger, events } = createTestLedger();
    ledger.depositValue(ALICE.address, 100n);
    ledger.delegate(ALICE.address, BOB.address);
    events.length = 0;

    ledger.delegate(ALICE.address, CAROL.address);

    expect(ledger.getVotes(BOB.address)).toBe(0n);
    expect(ledger.getVotes(CAROL.address)).toBe(100n);
    expect(events.slice(1)).toEqual([
      {
        eventName: "DelegateVotesChanged",
        args: { delegate: BOB.address, previousVotes: 100n, newVotes: 0n },
      },
      {
        eventName: "DelegateVotesChanged",
        args: { delegate: CAROL.address, previousVotes: 0n, newVotes: 100n },
      },
    ]);
  });

  it("delegating with no balance emits only DelegateChanged", () => {
    const { ledger, events } = createTestLedger();
    ledger.delegate(ALICE.address, BOB.address);
    expect(events.map((e) => e.eventName)).toEqual(["DelegateChanged"]);
  });

  it("delegating to the zero address withdraws the weight", () => {
    const { ledger } = createTestLedger();
    ledger.depositValue(ALICE.address, 40n);
    ledger.delegate(ALICE.address, BOB.address);
    ledger.delegate(ALICE.address, ZERO_ADDRESS);

    expect(ledger.getVotes(BOB.address)).toBe(0n);
    expect(ledger.delegates(ALICE.address)).toBe(ZERO_ADDRESS);
  });

  it("transfers move weight between delegates", () => {
    const { ledger } = createTestLedger();
    ledger.depositValue(ALICE.address, 100n);
    ledger.delegate(ALICE.address, ALICE.address);
    ledger.delegate(BOB.address, CAROL.address);

    ledger.transfer(ALICE.address, BOB.address, 30n);
    expect(ledger.getVotes(ALICE.address)).toBe(70n);
    expect(ledger.getVotes(CAROL.address)).toBe(30n);

    ledger.transfer(BOB.address, DAVE.address, 10n);
    expect(ledger.getVotes(CAROL.address)).toBe(20n);
    expect(ledger.getVotes(DAVE.address)).toBe(0n);
  });
});

// =============================================================================
// History
// =============================================================================

describe("history", () => {
  it("writes one checkpoint per sequence point", () => {
    const { ledger, clock } = createTestLedger();
    ledger.delegate(ALICE.address, ALICE.address);

    ledger.depositValue(ALICE.address, 10n);
    ledger.depositValue(ALICE.address, 5n);
    expect(ledger.numCheckpoints(ALICE.address)).toBe(1);
    expect(ledger.checkpoints(ALICE.address, 0)).toEqual({ key: 1n, votes: 15n });

    clock.mine();
    ledger.depositValue(ALICE.address, 5n);
    expect(ledger.checkpointSeries(ALICE.address)).toEqual([
      { key: 1n, votes: 15n },
      { key: 2n, votes: 20n },
    ]);
  });

  it("answers past lookups and refuses the future", () => {
    const { ledger, clock } = createTestLedger();
    ledger.delegate(ALICE.address, ALICE.address);
    ledger.depositValue(ALICE.address, 10n); // block 1
    clock.mine();
    ledger.depositValue(ALICE.address, 20n); // block 2
    clock.mine();
    ledger.transfer(ALICE.address, BOB.address, 5n); // block 3
    clock.mine(); // now block 4

    expect(ledger.clock()).toBe(4n);
    expect(ledger.getPastVotes(ALICE.address, 0n)).toBe(0n);
    expect(ledger.getPastVotes(ALICE.address, 1n)).toBe(10n);
    expect(ledger.getPastVotes(ALICE.address, 2n)).toBe(30n);
    expect(ledger.getPastTotalSupply(1n)).toBe(10n);
    expect(ledger.getPastTotalSupply(2n)).toBe(30n);

    expect(ledger.getVotes(ALICE.address, 4n)).toBe(ledger.getVotes(ALICE.address));
    expectLedgerError(() => ledger.getVotes(ALICE.address, 5n), "FUTURE_LOOKUP");
    expectLedgerError(() => ledger.getPastVotes(ALICE.address, 4n), "FUTURE_LOOKUP");
    expectLedgerError(() => ledger.getPastTotalSupply(4n), "FUTURE_LOOKUP");
  });

  it("uses a block-number clock", () => {
    const { ledger } = createTestLedger();
    expect(ledger.CLOCK_MODE()).toBe("mode=blocknumber&from=default");
    expect(ledger.clock()).toBe(1n);
  });
});
