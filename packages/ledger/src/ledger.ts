/**
 * @pegledger/ledger — PegLedger, the composition root.
 *
 * A token wrapping a native asset 1:1, with allowances, signed approvals
 * and checkpointed delegated voting power.
 *
 * One LedgerState is owned here and shared by the books:
 * - BalanceBook — balances, total supply, the ordered balance-change hooks
 * - AllowanceBook — allowances and nonces
 * - VotingPowerMirror — delegation and checkpoints (a balance-change hook)
 * - PegAdapter — deposit / withdraw against the native-asset port
 *
 * Every mutation is one journal unit: it either commits with all its
 * events, or fails with a LedgerError and leaves nothing behind. While a
 * withdrawal waits on its payout, state reads are refused with
 * REENTRANT_CALL like mutations are.
 *
 * Public inputs are strings and bigints; addresses are normalized to
 * checksum form on the way in.
 */

import { isAddress, isUintString } from "@pegledger/types";
import { normalizeAddress } from "./address.js";
import { AllowanceBook } from "./allowances.js";
import { BalanceBook } from "./balances.js";
import { latestCheckpoint } from "./checkpoints.js";
import { CLOCK_MODE } from "./clock.js";
import { Journal } from "./journal.js";
import { PegAdapter } from "./peg.js";
import {
  assertSignature,
  domainSeparator,
  recoverDelegationSigner,
  recoverPermitSigner,
} from "./permit.js";
import type { SigningDomain } from "./permit.js";
import { createLedgerState } from "./state.js";
import type { LedgerState } from "./state.js";
import type {
  Address,
  Checkpoint,
  CheckpointSnapshot,
  CommitListener,
  Hex,
  InvariantReport,
  LedgerClock,
  LedgerSnapshot,
  ListenerErrorHandler,
  NativeAssetPort,
  PegLedgerOptions,
  TokenMetadata,
  VoteMismatch,
} from "./types.js";
import { LedgerError } from "./types.js";
import { assertUint, MAX_SAFE_SUPPLY } from "./uint.js";
import { VotingPowerMirror } from "./votes.js";

/**
 * ERC-5267 domain description.
 */
export interface Eip712Domain {
  readonly fields: Hex;
  readonly name: string;
  readonly version: string;
  readonly chainId: number;
  readonly verifyingContract: Address;
  readonly salt: Hex;
  readonly extensions: readonly bigint[];
}

export interface LedgerCollaborators {
  readonly clock: LedgerClock;
  readonly nativeAsset: NativeAssetPort;
  readonly onListenerError?: ListenerErrorHandler;
}

export class PegLedger {
  readonly token: TokenMetadata;
  readonly address: Address;
  readonly chainId: number;

  private readonly _state: LedgerState = createLedgerState();
  private readonly _clock: LedgerClock;
  private readonly _domain: SigningDomain;
  private readonly _journal: Journal;
  private readonly _balances: BalanceBook;
  private readonly _allowances: AllowanceBook;
  private readonly _votes: VotingPowerMirror;
  private readonly _peg: PegAdapter;

  constructor(options: PegLedgerOptions) {
    this.token = options.token;
    this.address = normalizeAddress(options.address, "ledger address");
    this.chainId = options.chainId;
    this._clock = options.clock;
    this._domain = {
      name: options.token.name,
      version: options.version ?? "1",
      chainId: options.chainId,
      verifyingContract: this.address,
    };

    const now = (): bigint => this._clock.blockNumber();
    this._journal = new Journal(now, options.onListenerError);
    this._balances = new BalanceBook(this._state, this._journal);
    this._allowances = new AllowanceBook(this._state, this._journal);
    this._votes = new VotingPowerMirror(this._state, this._journal, this._balances, now);
    this._peg = new PegAdapter(this._balances, this._journal, options.nativeAsset);

    this._balances.addHook(this._votes.onBalanceChange);
  }

  // ─── Metadata ────────────────────────────────────────────────────────

  name(): string {
    return this.token.name;
  }

  symbol(): string {
    return this.token.symbol;
  }

  decimals(): number {
    return this.token.decimals;
  }

  clock(): bigint {
    return this._clock.blockNumber();
  }

  CLOCK_MODE(): string {
    return CLOCK_MODE;
  }

  DOMAIN_SEPARATOR(): Hex {
    return domainSeparator(this._domain);
  }

  eip712Domain(): Eip712Domain {
    return {
      fields: "0x0f",
      name: this._domain.name,
      version: this._domain.version,
      chainId: this._domain.chainId,
      verifyingContract: this._domain.verifyingContract,
      salt: `0x${"00".repeat(32)}`,
      extensions: [],
    };
  }

  /** The domain signed messages are bound to. */
  signingDomain(): SigningDomain {
    return { ...this._domain };
  }

  // ─── Balance reads ───────────────────────────────────────────────────

  totalSupply(): bigint {
    this._assertSettled();
    return this._balances.totalSupply();
  }

  balanceOf(account: string): bigint {
    this._assertSettled();
    return this._balances.balanceOf(normalizeAddress(account, "account"));
  }

  allowance(owner: string, spender: string): bigint {
    this._assertSettled();
    return this._allowances.allowance(
      normalizeAddress(owner, "owner"),
      normalizeAddress(spender, "spender"),
    );
  }

  nonces(owner: string): bigint {
    this._assertSettled();
    return this._allowances.nonces(normalizeAddress(owner, "owner"));
  }

  // ─── Vote reads ──────────────────────────────────────────────────────

  delegates(account: string): Address {
    this._assertSettled();
    return this._votes.delegates(normalizeAddress(account, "account"));
  }

  /**
   * Voting power now, or at a sequence point no later than `clock()`.
   */
  getVotes(account: string, atSequencePoint?: bigint): bigint {
    this._assertSettled();
    return this._votes.getVotes(normalizeAddress(account, "account"), atSequencePoint);
  }

  getPastVotes(account: string, timepoint: bigint): bigint {
    this._assertSettled();
    return this._votes.getPastVotes(normalizeAddress(account, "account"), timepoint);
  }

  getPastTotalSupply(timepoint: bigint): bigint {
    this._assertSettled();
    return this._votes.getPastTotalSupply(timepoint);
  }

  numCheckpoints(account: string): number {
    this._assertSettled();
    return this._votes.numCheckpoints(normalizeAddress(account, "account"));
  }

  checkpoints(account: string, index: number): Checkpoint | undefined {
    this._assertSettled();
    return this._votes.checkpoints(normalizeAddress(account, "account"), index);
  }

  checkpointSeries(account: string): readonly Checkpoint[] {
    this._assertSettled();
    return this._votes.series(normalizeAddress(account, "account"));
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  transfer(from: string, to: string, amount: bigint): void {
    this._balances.transfer(
      normalizeAddress(from, "sender"),
      normalizeAddress(to, "recipient"),
      amount,
    );
  }

  approve(owner: string, spender: string, amount: bigint): void {
    this._allowances.approve(
      normalizeAddress(owner, "owner"),
      normalizeAddress(spender, "spender"),
      amount,
    );
  }

  /**
   * Spend `spender`'s allowance over `owner` to move `amount` to `to`.
   */
  spendFrom(spender: string, owner: string, to: string, amount: bigint): void {
    const spenderAddress = normalizeAddress(spender, "spender");
    const ownerAddress = normalizeAddress(owner, "owner");
    const recipient = normalizeAddress(to, "recipient");

    this._journal.run(() => {
      this._allowances.spendAllowance(ownerAddress, spenderAddress, amount);
      this._balances.transfer(ownerAddress, recipient, amount);
    });
  }

  /**
   * Approve through an EIP-712 Permit signed by `owner`.
   *
   * Check order: deadline, signature shape and reuse, signer.
   */
  async approveBySignature(
    owner: string,
    spender: string,
    amount: bigint,
    deadline: bigint,
    signature: string,
  ): Promise<void> {
    const ownerAddress = normalizeAddress(owner, "owner");
    const spenderAddress = normalizeAddress(spender, "spender");
    assertUint(amount);
    assertUint(deadline, "deadline");
    this._assertNotExpired(deadline);
    const sig = this._assertFreshSignature(signature);

    const nonce = this._allowances.nonces(ownerAddress);
    const signer = await recoverPermitSigner(
      this._domain,
      { owner: ownerAddress, spender: spenderAddress, value: amount, nonce, deadline },
      sig,
    );
    if (signer !== ownerAddress) {
      throw new LedgerError("INVALID_SIGNER", `Recovered signer ${signer} is not the owner ${ownerAddress}`, {
        signer,
        owner: ownerAddress,
      });
    }

    this._journal.run(() => {
      this._consume(ownerAddress, nonce, sig);
      this._allowances.approve(ownerAddress, spenderAddress, amount);
    });
  }

  delegate(account: string, delegatee: string): void {
    this._votes.delegate(
      normalizeAddress(account, "account"),
      normalizeAddress(delegatee, "delegatee"),
    );
  }

  /**
   * Delegate through an EIP-712 Delegation. Returns the delegator (the signer).
   */
  async delegateBySignature(
    delegatee: string,
    nonce: bigint,
    expiry: bigint,
    signature: string,
  ): Promise<Address> {
    const delegateeAddress = normalizeAddress(delegatee, "delegatee");
    assertUint(nonce, "nonce");
    assertUint(expiry, "expiry");
    this._assertNotExpired(expiry);
    const sig = this._assertFreshSignature(signature);

    const signer = await recoverDelegationSigner(
      this._domain,
      { delegatee: delegateeAddress, nonce, expiry },
      sig,
    );

    this._journal.run(() => {
      this._consume(signer, nonce, sig);
      this._votes.delegate(signer, delegateeAddress);
    });
    return signer;
  }

  depositValue(account: string, amount: bigint): void {
    this._peg.deposit(normalizeAddress(account, "account"), amount);
  }

  async withdrawValue(account: string, amount: bigint): Promise<void> {
    await this._peg.withdraw(normalizeAddress(account, "account"), amount);
  }

  // ─── Observers ───────────────────────────────────────────────────────

  /**
   * Receive the events of every committed operation. Returns an unsubscribe.
   */
  subscribe(listener: CommitListener): () => void {
    return this._journal.onCommit(listener);
  }

  // ─── Invariants ──────────────────────────────────────────────────────

  checkInvariants(): InvariantReport {
    this._assertSettled();
    let sumOfBalances = 0n;
    const expected = new Map<Address, bigint>();

    for (const [account, balance] of this._state.balances) {
      sumOfBalances += balance;
      const delegatee = this._state.delegates.get(account);
      if (delegatee !== undefined) {
        expected.set(delegatee, (expected.get(delegatee) ?? 0n) + balance);
      }
    }

    const voteMismatches: VoteMismatch[] = [];
    const delegatesSeen = new Set<Address>([
      ...expected.keys(),
      ...this._state.checkpoints.keys(),
    ]);
    for (const delegatee of delegatesSeen) {
      const want = expected.get(delegatee) ?? 0n;
      const actual = latestCheckpoint(this._state.checkpoints.get(delegatee) ?? []);
      if (want !== actual) {
        voteMismatches.push({ delegate: delegatee, expected: want, actual });
      }
    }

    const totalSupply = this._state.supply.value;
    const supplyCheckpointMatches =
      latestCheckpoint(this._state.supplyCheckpoints) === totalSupply;

    return {
      ok:
        sumOfBalances === totalSupply &&
        supplyCheckpointMatches &&
        voteMismatches.length === 0,
      totalSupply,
      sumOfBalances,
      supplyCheckpointMatches,
      voteMismatches,
    };
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(createdAt?: string): LedgerSnapshot {
    this._assertSettled();
    const s = this._state;
    const record = <V, R>(map: ReadonlyMap<Address, V>, fn: (v: V) => R): Record<string, R> =>
      Object.fromEntries([...map].map(([k, v]) => [k, fn(v)]));
    const series = (list: readonly Checkpoint[]): CheckpointSnapshot[] =>
      list.map((c) => ({ key: c.key.toString(), votes: c.votes.toString() }));

    return {
      version: 1,
      token: this.token,
      chainId: this.chainId,
      address: this.address,
      eip712Version: this._domain.version,
      totalSupply: s.supply.value.toString(),
      balances: record(s.balances, (v) => v.toString()),
      allowances: record(s.allowances, (bySpender) => record(bySpender, (v) => v.toString())),
      nonces: record(s.nonces, (v) => v.toString()),
      delegates: record(s.delegates, (v) => v),
      checkpoints: record(s.checkpoints, series),
      supplyCheckpoints: series(s.supplyCheckpoints),
      consumedSignatures: [...s.consumedSignatures],
      createdAt: createdAt ?? new Date().toISOString(),
    };
  }

  /**
   * Restore a ledger from a snapshot. The restored state must pass
   * checkInvariants().
   *
   * @throws LedgerError INVALID_SNAPSHOT
   */
  static fromSnapshot(snapshot: LedgerSnapshot, collaborators: LedgerCollaborators): PegLedger {
    if (snapshot.version !== 1) {
      throw invalidSnapshot(`unsupported version ${String(snapshot.version)}`);
    }

    const ledger = new PegLedger({
      token: snapshot.token,
      chainId: snapshot.chainId,
      address: snapshot.address,
      version: snapshot.eip712Version,
      clock: collaborators.clock,
      nativeAsset: collaborators.nativeAsset,
      onListenerError: collaborators.onListenerError,
    });
    const s = ledger._state;

    s.supply.value = snapshotUint(snapshot.totalSupply, "totalSupply");
    if (s.supply.value > MAX_SAFE_SUPPLY) {
      throw invalidSnapshot("totalSupply exceeds the vote-safe cap");
    }

    for (const [account, value] of Object.entries(snapshot.balances)) {
      const amount = snapshotUint(value, `balances.${account}`);
      if (amount > 0n) s.balances.set(snapshotAddress(account), amount);
    }
    for (const [owner, bySpender] of Object.entries(snapshot.allowances)) {
      const map = new Map<Address, bigint>();
      for (const [spender, value] of Object.entries(bySpender)) {
        map.set(snapshotAddress(spender), snapshotUint(value, `allowances.${owner}.${spender}`));
      }
      s.allowances.set(snapshotAddress(owner), map);
    }
    for (const [owner, value] of Object.entries(snapshot.nonces)) {
      s.nonces.set(snapshotAddress(owner), snapshotUint(value, `nonces.${owner}`));
    }
    for (const [account, delegatee] of Object.entries(snapshot.delegates)) {
      s.delegates.set(snapshotAddress(account), snapshotAddress(delegatee));
    }
    for (const [account, list] of Object.entries(snapshot.checkpoints)) {
      s.checkpoints.set(snapshotAddress(account), snapshotSeries(list, `checkpoints.${account}`));
    }
    s.supplyCheckpoints.push(...snapshotSeries(snapshot.supplyCheckpoints, "supplyCheckpoints"));
    for (const sig of snapshot.consumedSignatures) {
      if (!/^0x[0-9a-f]{130}$/.test(sig)) {
        throw invalidSnapshot(`malformed consumed signature "${sig}"`);
      }
      s.consumedSignatures.add(`0x${sig.slice(2)}`);
    }

    const report = ledger.checkInvariants();
    if (!report.ok) {
      throw new LedgerError("INVALID_SNAPSHOT", "Snapshot state violates ledger invariants", {
        totalSupply: report.totalSupply.toString(),
        sumOfBalances: report.sumOfBalances.toString(),
        supplyCheckpointMatches: report.supplyCheckpointMatches,
        voteMismatches: report.voteMismatches.map((m) => m.delegate),
      });
    }
    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _assertSettled(): void {
    if (this._journal.suspended) {
      throw new LedgerError(
        "REENTRANT_CALL",
        "Ledger is awaiting an outbound transfer; read again after it settles",
      );
    }
  }

  private _assertNotExpired(deadline: bigint): void {
    const now = this._clock.timestamp();
    if (now > deadline) {
      throw new LedgerError(
        "EXPIRED_DEADLINE",
        `Signature expired at ${deadline.toString()} (now ${now.toString()})`,
        { deadline: deadline.toString(), now: now.toString() },
      );
    }
  }

  private _assertFreshSignature(signature: string): Hex {
    const sig = assertSignature(signature);
    if (this._state.consumedSignatures.has(sig)) {
      throw new LedgerError("INVALID_SIGNATURE", "Signature has already been used");
    }
    return sig;
  }

  /**
   * Spend `signer`'s nonce for a verified signature. The nonce is checked
   * again here because recovery awaited.
   */
  private _consume(signer: Address, nonce: bigint, sig: Hex): void {
    if (this._state.consumedSignatures.has(sig)) {
      throw new LedgerError("INVALID_SIGNATURE", "Signature has already been used");
    }
    const current = this._allowances.nonces(signer);
    if (current !== nonce) {
      throw new LedgerError(
        "INVALID_SIGNER",
        `Nonce ${nonce.toString()} does not match the current nonce ${current.toString()} of ${signer}`,
        { signer, nonce: nonce.toString(), current: current.toString() },
      );
    }
    this._allowances.useNonce(signer);
    this._journal.add(this._state.consumedSignatures, sig);
  }
}

// ─── Snapshot parsing ──────────────────────────────────────────────────

function invalidSnapshot(reason: string): LedgerError {
  return new LedgerError("INVALID_SNAPSHOT", `Invalid snapshot: ${reason}`);
}

function snapshotUint(value: string, label: string): bigint {
  if (!isUintString(value)) {
    throw invalidSnapshot(`${label} is not a uint256 string`);
  }
  return BigInt(value);
}

function snapshotAddress(value: string): Address {
  if (!isAddress(value)) {
    throw invalidSnapshot(`"${value}" is not an address`);
  }
  return normalizeAddress(value);
}

function snapshotSeries(list: readonly CheckpointSnapshot[], label: string): Checkpoint[] {
  const series: Checkpoint[] = [];
  for (const entry of list) {
    const key = snapshotUint(entry.key, `${label} key`);
    const last = series.at(-1);
    if (last !== undefined && last.key >= key) {
      throw invalidSnapshot(`${label} keys are not strictly increasing`);
    }
    series.push({ key, votes: snapshotUint(entry.votes, `${label} votes`) });
  }
  return series;
}
