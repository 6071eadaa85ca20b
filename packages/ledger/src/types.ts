/**
 * @pegledger/ledger — Type definitions.
 *
 * All types are readonly. Amounts are exact `bigint`; the wire form
 * (snapshots, events handed to the event store) uses decimal strings.
 */

import type { Address, Hex } from "@pegledger/types";

export type { Address, Hex };

// ─── Errors ──────────────────────────────────────────────────────────────

export type LedgerErrorCode =
  | "ZERO_AMOUNT"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INVALID_RECIPIENT"
  | "INVALID_SENDER"
  | "INVALID_APPROVER"
  | "INVALID_SPENDER"
  | "INVALID_SIGNATURE"
  | "INVALID_SIGNER"
  | "EXPIRED_DEADLINE"
  | "TRANSFER_FAILED"
  | "ARITHMETIC_OVERFLOW"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "EXCEEDED_SAFE_SUPPLY"
  | "FUTURE_LOOKUP"
  | "UNORDERED_CHECKPOINT"
  | "REENTRANT_CALL"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger engine.
 * Always thrown; the operation that raised it leaves no trace.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: LedgerErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }
}

// ─── Events ──────────────────────────────────────────────────────────────

/**
 * Events as the ledger emits them, shaped like decoded logs
 * (`eventName` + `args`) so they line up with the ABI in abi.ts.
 */
export type LedgerEvent =
  | {
      readonly eventName: "Transfer";
      readonly args: { readonly from: Address; readonly to: Address; readonly value: bigint };
    }
  | {
      readonly eventName: "Approval";
      readonly args: { readonly owner: Address; readonly spender: Address; readonly value: bigint };
    }
  | {
      readonly eventName: "Deposit";
      readonly args: { readonly dst: Address; readonly wad: bigint };
    }
  | {
      readonly eventName: "Withdrawal";
      readonly args: { readonly src: Address; readonly wad: bigint };
    }
  | {
      readonly eventName: "DelegateChanged";
      readonly args: {
        readonly delegator: Address;
        readonly fromDelegate: Address;
        readonly toDelegate: Address;
      };
    }
  | {
      readonly eventName: "DelegateVotesChanged";
      readonly args: {
        readonly delegate: Address;
        readonly previousVotes: bigint;
        readonly newVotes: bigint;
      };
    };

/**
 * The events of one committed operation, in emission order.
 */
export interface CommittedUnit {
  readonly events: readonly LedgerEvent[];

  /** Sequence point the operation committed at */
  readonly sequencePoint: bigint;
}

export type CommitListener = (unit: CommittedUnit) => void;

export type ListenerErrorHandler = (error: unknown, unit: CommittedUnit) => void;

/**
 * Called after every balance write, with the post-mutation state in place.
 * `from` is the zero address on mint, `to` on burn.
 */
export type BalanceChangeHook = (from: Address, to: Address, value: bigint) => void;

// ─── Checkpoints ─────────────────────────────────────────────────────────

export interface Checkpoint {
  /** Sequence point the value took effect at */
  readonly key: bigint;
  readonly votes: bigint;
}

// ─── Collaborators ───────────────────────────────────────────────────────

/**
 * Source of sequence points and time, supplied by the host.
 */
export interface LedgerClock {
  /** Current sequence point (block number) */
  blockNumber(): bigint;

  /** Current time in unix seconds */
  timestamp(): bigint;
}

/**
 * Outbound native-asset push. Resolves `false` when the transfer failed.
 */
export interface NativeAssetPort {
  send(to: Address, amount: bigint): Promise<boolean>;
}

// ─── Configuration ───────────────────────────────────────────────────────

export interface TokenMetadata {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
}

export interface PegLedgerOptions {
  readonly token: TokenMetadata;

  /** Chain the signed messages are bound to */
  readonly chainId: number;

  /** Ledger identity; also the reserve holding the native asset */
  readonly address: string;

  /** EIP-712 domain version. Default: "1" */
  readonly version?: string;

  readonly clock: LedgerClock;
  readonly nativeAsset: NativeAssetPort;

  /** Receives errors thrown by commit listeners; the operation still succeeds */
  readonly onListenerError?: ListenerErrorHandler;
}

// ─── Snapshots ───────────────────────────────────────────────────────────

export interface CheckpointSnapshot {
  readonly key: string;
  readonly votes: string;
}

/**
 * Serializable ledger state. Amounts and sequence points are decimal strings.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly token: TokenMetadata;
  readonly chainId: number;
  readonly address: Address;
  readonly eip712Version: string;
  readonly totalSupply: string;
  readonly balances: Readonly<Record<string, string>>;
  readonly allowances: Readonly<Record<string, Readonly<Record<string, string>>>>;
  readonly nonces: Readonly<Record<string, string>>;
  readonly delegates: Readonly<Record<string, string>>;
  readonly checkpoints: Readonly<Record<string, readonly CheckpointSnapshot[]>>;
  readonly supplyCheckpoints: readonly CheckpointSnapshot[];
  readonly consumedSignatures: readonly string[];
  readonly createdAt: string;
}

// ─── Invariants ──────────────────────────────────────────────────────────

export interface VoteMismatch {
  readonly delegate: Address;
  readonly expected: bigint;
  readonly actual: bigint;
}

export interface InvariantReport {
  readonly ok: boolean;
  readonly totalSupply: bigint;
  readonly sumOfBalances: bigint;

  /** Latest total-supply checkpoint equals total supply */
  readonly supplyCheckpointMatches: boolean;

  /** Delegates whose latest checkpoint differs from the balances delegated to them */
  readonly voteMismatches: readonly VoteMismatch[];
}
