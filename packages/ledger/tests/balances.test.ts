/**
 * Tests for the balance book and transfers.
 *
 * Verifies:
 * - mint / burn / transfer validation and error codes
 * - Transfer events, including zero-value transfers
 * - Hooks run after the write and roll back with it
 * - Address normalization at the public surface
 */

import { describe, it, expect } from "vitest";
import { BalanceBook } from "../src/balances.js";
import { Journal } from "../src/journal.js";
import { createLedgerState } from "../src/state.js";
import { ZERO_ADDRESS } from "../src/address.js";
import type { CommittedUnit } from "../src/types.js";
import { MAX_SAFE_SUPPLY } from "../src/uint.js";
import {
  ALICE,
  BOB,
  CAROL,
  createTestLedger,
  expectLedgerError,
} from "./setup.js";

function makeBook(): { book: BalanceBook; units: CommittedUnit[] } {
  const journal = new Journal(() => 1n);
  const units: CommittedUnit[] = [];
  journal.onCommit((unit) => units.push(unit));
  return { book: new BalanceBook(createLedgerState(), journal), units };
}

// =============================================================================
// BalanceBook
// =============================================================================

describe("BalanceBook.mint", () => {
  it("credits the account and total supply", () => {
    const { book, units } = makeBook();
    book.mint(ALICE.address, 100n);

    expect(book.balanceOf(ALICE.address)).toBe(100n);
    expect(book.totalSupply()).toBe(100n);
    expect(units[0]?.events).toEqual([
      { eventName: "Transfer", args: { from: ZERO_ADDRESS, to: ALICE.address, value: 100n } },
    ]);
  });

  it("rejects zero", () => {
    const { book } = makeBook();
    expectLedgerError(() => book.mint(ALICE.address, 0n), "ZERO_AMOUNT");
  });

  it("rejects the zero address", () => {
    const { book } = makeBook();
    expectLedgerError(() => book.mint(ZERO_ADDRESS, 1n), "INVALID_RECIPIENT");
  });

  it("caps supply at the vote-safe maximum", () => {
    const { book, units } = makeBook();
    book.mint(ALICE.address, MAX_SAFE_SUPPLY);
    expectLedgerError(() => book.mint(BOB.address, 1n), "EXCEEDED_SAFE_SUPPLY");

    expect(book.totalSupply()).toBe(MAX_SAFE_SUPPLY);
    expect(book.balanceOf(BOB.address)).toBe(0n);
    expect(units).toHaveLength(1);
  });
});

describe("BalanceBook.burn", () => {
  it("debits the account and total supply", () => {
    const { book } = makeBook();
    book.mint(ALICE.address, 100n);
    book.burn(ALICE.address, 40n);

    expect(book.balanceOf(ALICE.address)).toBe(60n);
    expect(book.totalSupply()).toBe(60n);
  });

  it("drops the holder once the balance reaches zero", () => {
    const { book } = makeBook();
    book.mint(ALICE.address, 5n);
    book.burn(ALICE.address, 5n);
    expect(book.holders()).toEqual([]);
  });

  it("rejects zero, the zero address and overdrafts", () => {
    const { book } = makeBook();
    book.mint(ALICE.address, 10n);

    expectLedgerError(() => book.burn(ALICE.address, 0n), "ZERO_AMOUNT");
    expectLedgerError(() => book.burn(ZERO_ADDRESS, 1n), "INVALID_SENDER");
    expectLedgerError(() => book.burn(ALICE.address, 11n), "INSUFFICIENT_BALANCE");
    expect(book.totalSupply()).toBe(10n);
  });
});

describe("balance-change hooks", () => {
  it("run after the write, in registration order", () => {
    const { book } = makeBook();
    const seen: string[] = [];
    book.addHook((_from, to) => seen.push(`first:${book.balanceOf(to).toString()}`));
    book.addHook((_from, to) => seen.push(`second:${book.balanceOf(to).toString()}`));

    book.mint(ALICE.address, 5n);
    expect(seen).toEqual(["first:5", "second:5"]);
  });

  it("a throwing hook undoes the write and its event", () => {
    const { book, units } = makeBook();
    book.addHook(() => {
      throw new Error("hook failed");
    });

    expect(() => book.mint(ALICE.address, 5n)).toThrow("hook failed");
    expect(book.balanceOf(ALICE.address)).toBe(0n);
    expect(book.totalSupply()).toBe(0n);
    expect(units).toHaveLength(0);
  });
});

// =============================================================================
// PegLedger.transfer
// =============================================================================

describe("PegLedger.transfer", () => {
  it("moves balance without changing supply", () => {
    const { ledger, events } = createTestLedger();
    ledger.depositValue(ALICE.address, 100n);
    events.length = 0;

    ledger.transfer(ALICE.address, BOB.address, 30n);

    expect(ledger.balanceOf(ALICE.address)).toBe(70n);
    expect(ledger.balanceOf(BOB.address)).toBe(30n);
    expect(ledger.totalSupply()).toBe(100n);
    expect(events).toEqual([
      { eventName: "Transfer", args: { from: ALICE.address, to: BOB.address, value: 30n } },
    ]);
  });

  it("allows zero-value transfers", () => {
    const { ledger, events } = createTestLedger();
    ledger.transfer(ALICE.address, BOB.address, 0n);

    expect(events).toEqual([
      { eventName: "Transfer", args: { from: ALICE.address, to: BOB.address, value: 0n } },
    ]);
  });

  it("allows transfers to self", () => {
    const { ledger } = createTestLedger();
    ledger.depositValue(ALICE.address, 10n);
    ledger.transfer(ALICE.address, ALICE.address, 10n);
    expect(ledger.balanceOf(ALICE.address)).toBe(10n);
  });

  it("rejects overdrafts and changes nothing", () => {
    const { ledger, events } = createTestLedger();
    ledger.depositValue(ALICE.address, 10n);
    events.length = 0;

    expectLedgerError(
      () => ledger.transfer(ALICE.address, BOB.address, 11n),
      "INSUFFICIENT_BALANCE",
    );
    expect(ledger.balanceOf(ALICE.address)).toBe(10n);
    expect(ledger.balanceOf(BOB.address)).toBe(0n);
    expect(events).toEqual([]);
  });

  it("rejects the zero address on either side", () => {
    const { ledger } = createTestLedger();
    expectLedgerError(() => ledger.transfer(ZERO_ADDRESS, BOB.address, 0n), "INVALID_SENDER");
    expectLedgerError(() => ledger.transfer(ALICE.address, ZERO_ADDRESS, 0n), "INVALID_RECIPIENT");
  });

  it("rejects malformed addresses and amounts", () => {
    const { ledger } = createTestLedger();
    expectLedgerError(() => ledger.transfer("0x1234", BOB.address, 0n), "INVALID_ADDRESS");
    expectLedgerError(() => ledger.transfer(ALICE.address, BOB.address, -1n), "INVALID_AMOUNT");
  });

  it("treats address case as insignificant", () => {
    const { ledger } = createTestLedger();
    ledger.depositValue(CAROL.address.toLowerCase(), 8n);
    expect(ledger.balanceOf(CAROL.address)).toBe(8n);
    expect(ledger.balanceOf(CAROL.address.toUpperCase().replace("0X", "0x"))).toBe(8n);
  });
});
