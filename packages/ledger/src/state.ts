/**
 * @pegledger/ledger — Ledger state.
 *
 * One owned object holding every table. Books read it directly and
 * write to it only through the journal.
 */

import type { Address, Checkpoint, Hex } from "./types.js";

export interface LedgerState {
  /** Absent key means zero balance */
  readonly balances: Map<Address, bigint>;

  /** Boxed so writes can be journaled like the tables */
  readonly supply: { value: bigint };

  /** owner → spender → allowance */
  readonly allowances: Map<Address, Map<Address, bigint>>;

  readonly nonces: Map<Address, bigint>;

  /** Absent key means no delegate */
  readonly delegates: Map<Address, Address>;

  readonly checkpoints: Map<Address, Checkpoint[]>;
  readonly supplyCheckpoints: Checkpoint[];

  /** Lower-cased signatures already accepted */
  readonly consumedSignatures: Set<Hex>;
}

export function createLedgerState(): LedgerState {
  return {
    balances: new Map(),
    supply: { value: 0n },
    allowances: new Map(),
    nonces: new Map(),
    delegates: new Map(),
    checkpoints: new Map(),
    supplyCheckpoints: [],
    consumedSignatures: new Set(),
  };
}
