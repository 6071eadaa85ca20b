/**
 * @pegledger/ledger — A native-asset-pegged token ledger.
 *
 * Balances, allowances, signed approvals and checkpointed delegated
 * voting power, kept in one in-memory state.
 *
 * Invariants:
 * - Sum of balances equals total supply after every operation
 * - No balance, allowance or supply is ever negative
 * - A signed message is accepted at most once (nonce + consumed set)
 * - Every delegate's latest checkpoint equals the balances delegated to it
 * - A failed operation changes nothing and emits nothing
 */

// Core engine
export { PegLedger } from "./ledger.js";
export type { Eip712Domain, LedgerCollaborators } from "./ledger.js";

// Books
export { BalanceBook } from "./balances.js";
export { AllowanceBook } from "./allowances.js";
export { VotingPowerMirror } from "./votes.js";
export { PegAdapter } from "./peg.js";
export { Journal } from "./journal.js";
export { createLedgerState } from "./state.js";
export type { LedgerState } from "./state.js";
export { pushCheckpoint, latestCheckpoint, upperLookup } from "./checkpoints.js";

// Collaborators
export { BlockClock, CLOCK_MODE } from "./clock.js";
export type { BlockClockOptions } from "./clock.js";
export { InMemoryNativeAsset } from "./native-asset.js";

// Signed messages
export {
  PERMIT_TYPES,
  DELEGATION_TYPES,
  domainSeparator,
  assertSignature,
  recoverPermitSigner,
  recoverDelegationSigner,
  signPermit,
  signDelegation,
} from "./permit.js";
export type { SigningDomain, PermitMessage, DelegationMessage } from "./permit.js";

// Event ABI
export { LEDGER_EVENT_ABI, encodeLedgerLog } from "./abi.js";
export type { EncodedLog } from "./abi.js";

// Addresses and amounts
export { normalizeAddress, isZeroAddress, ZERO_ADDRESS } from "./address.js";
export {
  MAX_UINT256,
  MAX_SAFE_SUPPLY,
  UNLIMITED_ALLOWANCE,
  assertUint,
  checkedAdd,
  checkedSub,
  parseUint,
  parseAmount,
  formatAmount,
} from "./uint.js";

// Types
export type {
  Address,
  Hex,
  LedgerErrorCode,
  LedgerEvent,
  CommittedUnit,
  CommitListener,
  ListenerErrorHandler,
  BalanceChangeHook,
  Checkpoint,
  LedgerClock,
  NativeAssetPort,
  TokenMetadata,
  PegLedgerOptions,
  CheckpointSnapshot,
  LedgerSnapshot,
  VoteMismatch,
  InvariantReport,
} from "./types.js";

export { LedgerError } from "./types.js";
