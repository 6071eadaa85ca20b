/**
 * @pegledger/ledger — Balance book.
 *
 * mint, burn and transfer all go through `_update`, whose step order is fixed:
 *
 *   1. validate
 *   2. write balances and total supply
 *   3. emit Transfer
 *   4. call every balance-change hook, in registration order
 *
 * Hooks therefore observe the post-mutation balances.
 */

import { isZeroAddress, ZERO_ADDRESS } from "./address.js";
import type { Journal } from "./journal.js";
import type { LedgerState } from "./state.js";
import type { Address, BalanceChangeHook } from "./types.js";
import { LedgerError } from "./types.js";
import { assertUint, checkedAdd, checkedSub, MAX_SAFE_SUPPLY } from "./uint.js";

const isZero = (value: bigint): boolean => value === 0n;

export class BalanceBook {
  private readonly _hooks: BalanceChangeHook[] = [];

  constructor(
    private readonly _state: LedgerState,
    private readonly _journal: Journal,
  ) {}

  // ─── Reads ──────────────────────────────────────────────────────────

  balanceOf(account: Address): bigint {
    return this._state.balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this._state.supply.value;
  }

  /** Accounts with a non-zero balance. */
  holders(): readonly Address[] {
    return [...this._state.balances.keys()];
  }

  // ─── Hooks ──────────────────────────────────────────────────────────

  addHook(hook: BalanceChangeHook): void {
    this._hooks.push(hook);
  }

  // ─── Mutations ──────────────────────────────────────────────────────

  mint(account: Address, amount: bigint): void {
    assertUint(amount);
    if (amount === 0n) {
      throw new LedgerError("ZERO_AMOUNT", "Mint amount must be greater than zero");
    }
    if (isZeroAddress(account)) {
      throw new LedgerError("INVALID_RECIPIENT", "Cannot mint to the zero address");
    }
    this._update(ZERO_ADDRESS, account, amount);
  }

  burn(account: Address, amount: bigint): void {
    assertUint(amount);
    if (amount === 0n) {
      throw new LedgerError("ZERO_AMOUNT", "Burn amount must be greater than zero");
    }
    if (isZeroAddress(account)) {
      throw new LedgerError("INVALID_SENDER", "Cannot burn from the zero address");
    }
    this._update(account, ZERO_ADDRESS, amount);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    assertUint(amount);
    if (isZeroAddress(from)) {
      throw new LedgerError("INVALID_SENDER", "Cannot transfer from the zero address");
    }
    if (isZeroAddress(to)) {
      throw new LedgerError("INVALID_RECIPIENT", "Cannot transfer to the zero address");
    }
    this._update(from, to, amount);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _update(from: Address, to: Address, value: bigint): void {
    this._journal.run(() => {
      // 1. validate
      let supply = this._state.supply.value;
      if (isZeroAddress(from)) {
        supply = checkedAdd(supply, value);
        if (supply > MAX_SAFE_SUPPLY) {
          throw new LedgerError(
            "EXCEEDED_SAFE_SUPPLY",
            `Total supply ${supply.toString()} exceeds the vote-safe cap ${MAX_SAFE_SUPPLY.toString()}`,
            { increasedSupply: supply.toString(), cap: MAX_SAFE_SUPPLY.toString() },
          );
        }
      } else {
        const balance = this.balanceOf(from);
        if (balance < value) {
          throw new LedgerError(
            "INSUFFICIENT_BALANCE",
            `Balance of ${from} is ${balance.toString()}, needed ${value.toString()}`,
            { sender: from, balance: balance.toString(), needed: value.toString() },
          );
        }
      }
      if (isZeroAddress(to)) {
        supply = checkedSub(supply, value);
      }

      // 2. write
      if (!isZeroAddress(from)) {
        this._journal.set(
          this._state.balances,
          from,
          checkedSub(this.balanceOf(from), value),
          isZero,
        );
      }
      if (!isZeroAddress(to)) {
        this._journal.set(
          this._state.balances,
          to,
          checkedAdd(this.balanceOf(to), value),
          isZero,
        );
      }
      this._setSupply(supply);

      // 3. emit
      this._journal.emit({ eventName: "Transfer", args: { from, to, value } });

      // 4. hooks
      for (const hook of this._hooks) {
        hook(from, to, value);
      }
    });
  }

  private _setSupply(value: bigint): void {
    const previous = this._state.supply.value;
    if (previous === value) return;
    this._state.supply.value = value;
    this._journal.record(() => {
      this._state.supply.value = previous;
    });
  }
}
