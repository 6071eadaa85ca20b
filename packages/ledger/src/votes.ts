/**
 * @pegledger/ledger — Voting-power mirror.
 *
 * Each account's balance counts toward its delegate's voting power. An
 * account that never delegated counts toward nobody, including itself;
 * self-delegation is explicit.
 *
 * The mirror is a balance-change hook: it runs inside the same unit as
 * the balance write and sees the post-mutation balances.
 *
 * Reads:
 * - getVotes(account) — current power
 * - getVotes(account, t) — power at or before t (t ≤ clock)
 * - getPastVotes(account, t) / getPastTotalSupply(t) — t < clock
 */

import { isZeroAddress, ZERO_ADDRESS } from "./address.js";
import type { BalanceBook } from "./balances.js";
import { latestCheckpoint, pushCheckpoint, upperLookup } from "./checkpoints.js";
import type { Journal } from "./journal.js";
import type { LedgerState } from "./state.js";
import type { Address, BalanceChangeHook, Checkpoint } from "./types.js";
import { LedgerError } from "./types.js";
import { checkedAdd, checkedSub } from "./uint.js";

export class VotingPowerMirror {
  constructor(
    private readonly _state: LedgerState,
    private readonly _journal: Journal,
    private readonly _balances: BalanceBook,
    private readonly _clock: () => bigint,
  ) {}

  /**
   * The hook to register on the balance book.
   */
  readonly onBalanceChange: BalanceChangeHook = (from, to, value) => {
    const now = this._clock();
    if (isZeroAddress(from)) {
      const supply = latestCheckpoint(this._state.supplyCheckpoints);
      pushCheckpoint(this._journal, this._state.supplyCheckpoints, now, checkedAdd(supply, value));
    }
    if (isZeroAddress(to)) {
      const supply = latestCheckpoint(this._state.supplyCheckpoints);
      pushCheckpoint(this._journal, this._state.supplyCheckpoints, now, checkedSub(supply, value));
    }
    this._moveVotingPower(this.delegates(from), this.delegates(to), value);
  };

  // ─── Delegation ─────────────────────────────────────────────────────

  delegates(account: Address): Address {
    return this._state.delegates.get(account) ?? ZERO_ADDRESS;
  }

  delegate(account: Address, delegatee: Address): void {
    if (isZeroAddress(account)) {
      throw new LedgerError("INVALID_SENDER", "The zero address cannot delegate");
    }

    this._journal.run(() => {
      const previous = this.delegates(account);
      this._journal.set(
        this._state.delegates,
        account,
        delegatee,
        (d) => isZeroAddress(d),
      );
      this._journal.emit({
        eventName: "DelegateChanged",
        args: { delegator: account, fromDelegate: previous, toDelegate: delegatee },
      });
      this._moveVotingPower(previous, delegatee, this._balances.balanceOf(account));
    });
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  getVotes(account: Address, at?: bigint): bigint {
    const series = this._series(account);
    if (at === undefined) {
      return latestCheckpoint(series);
    }
    this._assertNotFuture(at, true);
    return upperLookup(series, at);
  }

  getPastVotes(account: Address, timepoint: bigint): bigint {
    this._assertNotFuture(timepoint, false);
    return upperLookup(this._series(account), timepoint);
  }

  getPastTotalSupply(timepoint: bigint): bigint {
    this._assertNotFuture(timepoint, false);
    return upperLookup(this._state.supplyCheckpoints, timepoint);
  }

  numCheckpoints(account: Address): number {
    return this._series(account).length;
  }

  checkpoints(account: Address, index: number): Checkpoint | undefined {
    return this._series(account)[index];
  }

  /** Every checkpoint of an account, oldest first. */
  series(account: Address): readonly Checkpoint[] {
    return [...this._series(account)];
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _series(account: Address): readonly Checkpoint[] {
    return this._state.checkpoints.get(account) ?? [];
  }

  private _assertNotFuture(timepoint: bigint, inclusive: boolean): void {
    const now = this._clock();
    const future = inclusive ? timepoint > now : timepoint >= now;
    if (future) {
      throw new LedgerError(
        "FUTURE_LOOKUP",
        `Sequence point ${timepoint.toString()} is not in the past (current ${now.toString()})`,
        { timepoint: timepoint.toString(), clock: now.toString() },
      );
    }
  }

  private _moveVotingPower(src: Address, dst: Address, amount: bigint): void {
    if (src === dst || amount === 0n) return;

    if (!isZeroAddress(src)) {
      const [previousVotes, newVotes] = this._push(src, (votes) => checkedSub(votes, amount));
      this._journal.emit({
        eventName: "DelegateVotesChanged",
        args: { delegate: src, previousVotes, newVotes },
      });
    }
    if (!isZeroAddress(dst)) {
      const [previousVotes, newVotes] = this._push(dst, (votes) => checkedAdd(votes, amount));
      this._journal.emit({
        eventName: "DelegateVotesChanged",
        args: { delegate: dst, previousVotes, newVotes },
      });
    }
  }

  private _push(
    delegate: Address,
    op: (votes: bigint) => bigint,
  ): readonly [bigint, bigint] {
    let series = this._state.checkpoints.get(delegate);
    if (series === undefined) {
      series = [];
      this._journal.set(this._state.checkpoints, delegate, series);
    }
    return pushCheckpoint(this._journal, series, this._clock(), op(latestCheckpoint(series)));
  }
}
