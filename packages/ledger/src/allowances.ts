/**
 * @pegledger/ledger — Allowance book and nonces.
 *
 * `approve` overwrites. `spendAllowance` decrements without emitting
 * Approval, and never touches an unlimited allowance.
 */

import { isZeroAddress } from "./address.js";
import type { Journal } from "./journal.js";
import type { LedgerState } from "./state.js";
import type { Address } from "./types.js";
import { LedgerError } from "./types.js";
import { assertUint, checkedAdd, UNLIMITED_ALLOWANCE } from "./uint.js";

const isZero = (value: bigint): boolean => value === 0n;

export class AllowanceBook {
  constructor(
    private readonly _state: LedgerState,
    private readonly _journal: Journal,
  ) {}

  allowance(owner: Address, spender: Address): bigint {
    return this._state.allowances.get(owner)?.get(spender) ?? 0n;
  }

  nonces(owner: Address): bigint {
    return this._state.nonces.get(owner) ?? 0n;
  }

  approve(owner: Address, spender: Address, value: bigint): void {
    assertUint(value);
    if (isZeroAddress(owner)) {
      throw new LedgerError("INVALID_APPROVER", "Approver is the zero address");
    }
    if (isZeroAddress(spender)) {
      throw new LedgerError("INVALID_SPENDER", "Spender is the zero address");
    }

    this._journal.run(() => {
      this._write(owner, spender, value);
      this._journal.emit({ eventName: "Approval", args: { owner, spender, value } });
    });
  }

  spendAllowance(owner: Address, spender: Address, value: bigint): void {
    assertUint(value);
    const current = this.allowance(owner, spender);
    if (current === UNLIMITED_ALLOWANCE) return;

    if (current < value) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOWANCE",
        `Allowance of ${spender} over ${owner} is ${current.toString()}, needed ${value.toString()}`,
        { owner, spender, allowance: current.toString(), needed: value.toString() },
      );
    }

    this._journal.run(() => {
      this._write(owner, spender, current - value);
    });
  }

  /**
   * Consume the owner's current nonce and return it.
   */
  useNonce(owner: Address): bigint {
    const current = this.nonces(owner);
    this._journal.run(() => {
      this._journal.set(this._state.nonces, owner, checkedAdd(current, 1n));
    });
    return current;
  }

  private _write(owner: Address, spender: Address, value: bigint): void {
    let bySpender = this._state.allowances.get(owner);
    if (bySpender === undefined) {
      bySpender = new Map();
      this._journal.set(this._state.allowances, owner, bySpender);
    }
    this._journal.set(bySpender, spender, value, isZero);
  }
}
