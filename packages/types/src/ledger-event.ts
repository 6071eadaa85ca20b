/**
 * Ledger Event Payloads
 *
 * Wire form of the events observers receive. Field names and order
 * follow the standard token event schemas so indexers can consume them
 * unchanged:
 *
 *   Transfer(address indexed from, address indexed to, uint256 value)
 *   Approval(address indexed owner, address indexed spender, uint256 value)
 *   Deposit(address indexed dst, uint256 wad)
 *   Withdrawal(address indexed src, uint256 wad)
 *   DelegateChanged(address indexed delegator, address indexed fromDelegate, address indexed toDelegate)
 *   DelegateVotesChanged(address indexed delegate, uint256 previousVotes, uint256 newVotes)
 *
 * Amounts are base-10 strings of the integer value (JSON has no bigint).
 */

import type { Address } from "./address.js";

/** Base-10 string of a non-negative integer. */
export type UintString = string;

export interface TransferPayload {
  readonly from: Address;
  readonly to: Address;
  readonly value: UintString;
}

export interface ApprovalPayload {
  readonly owner: Address;
  readonly spender: Address;
  readonly value: UintString;
}

export interface DepositPayload {
  readonly dst: Address;
  readonly wad: UintString;
}

export interface WithdrawalPayload {
  readonly src: Address;
  readonly wad: UintString;
}

export interface DelegateChangedPayload {
  readonly delegator: Address;
  readonly fromDelegate: Address;
  readonly toDelegate: Address;
}

export interface DelegateVotesChangedPayload {
  readonly delegate: Address;
  readonly previousVotes: UintString;
  readonly newVotes: UintString;
}

/**
 * Names of every event the ledger emits.
 */
export type LedgerEventName =
  | "Transfer"
  | "Approval"
  | "Deposit"
  | "Withdrawal"
  | "DelegateChanged"
  | "DelegateVotesChanged";
