/**
 * @pegledger/ledger — In-memory native asset.
 *
 * A plain balance book for the base asset the ledger wraps. The reserve
 * account (the ledger's own address) holds every deposited unit; `send`
 * pays out of it.
 */

import type { Address, NativeAssetPort } from "./types.js";

export class InMemoryNativeAsset implements NativeAssetPort {
  private readonly _balances = new Map<Address, bigint>();

  constructor(readonly reserve: Address) {}

  balanceOf(account: Address): bigint {
    return this._balances.get(account) ?? 0n;
  }

  /** Create native units out of thin air (genesis allocations, tests). */
  fund(account: Address, amount: bigint): void {
    this._balances.set(account, this.balanceOf(account) + amount);
  }

  /**
   * Move units between accounts. Returns false, changing nothing,
   * when `from` holds less than `amount`.
   */
  transfer(from: Address, to: Address, amount: bigint): boolean {
    const available = this.balanceOf(from);
    if (amount < 0n || available < amount) {
      return false;
    }
    this._balances.set(from, available - amount);
    this._balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  send(to: Address, amount: bigint): Promise<boolean> {
    return Promise.resolve(this.transfer(this.reserve, to, amount));
  }

  /** Every account with a native balance. */
  entries(): readonly (readonly [Address, bigint])[] {
    return [...this._balances.entries()];
  }
}
