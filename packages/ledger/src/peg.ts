/**
 * @pegledger/ledger — Peg adapter.
 *
 * deposit:  mint → Deposit
 * withdraw: burn → Withdrawal → push native units out
 *
 * The burn and the outbound push are one unit: if the push resolves false
 * or throws, the burn and its events are undone and the caller gets
 * TRANSFER_FAILED.
 */

import type { BalanceBook } from "./balances.js";
import type { Journal } from "./journal.js";
import type { Address, NativeAssetPort } from "./types.js";
import { LedgerError } from "./types.js";
import { assertUint } from "./uint.js";

export class PegAdapter {
  constructor(
    private readonly _balances: BalanceBook,
    private readonly _journal: Journal,
    private readonly _port: NativeAssetPort,
  ) {}

  deposit(account: Address, amount: bigint): void {
    assertNonZero(amount, "Deposit");
    this._journal.run(() => {
      this._balances.mint(account, amount);
      this._journal.emit({ eventName: "Deposit", args: { dst: account, wad: amount } });
    });
  }

  withdraw(account: Address, amount: bigint): Promise<void> {
    assertNonZero(amount, "Withdrawal");
    return this._journal.runAsync(async () => {
      this._balances.burn(account, amount);
      this._journal.emit({ eventName: "Withdrawal", args: { src: account, wad: amount } });

      let sent: boolean;
      try {
        sent = await this._journal.suspend(() => this._port.send(account, amount));
      } catch (err) {
        throw new LedgerError(
          "TRANSFER_FAILED",
          `Outbound transfer of ${amount.toString()} to ${account} threw: ${err instanceof Error ? err.message : String(err)}`,
          { to: account, amount: amount.toString() },
        );
      }

      if (!sent) {
        throw new LedgerError(
          "TRANSFER_FAILED",
          `Outbound transfer of ${amount.toString()} to ${account} failed`,
          { to: account, amount: amount.toString() },
        );
      }
    });
  }
}

function assertNonZero(amount: bigint, what: string): void {
  assertUint(amount);
  if (amount === 0n) {
    throw new LedgerError("ZERO_AMOUNT", `${what} amount must be greater than zero`);
  }
}
