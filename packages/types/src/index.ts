/**
 * @pegledger/types — Shared domain types for the pegledger stack.
 *
 * These types are used across all pegledger packages:
 * - Account addresses
 * - Event architecture
 * - Wire payloads of the ledger's standard events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Address types
export type { Address, Hex } from "./address.js";
export { ZERO_ADDRESS } from "./address.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Ledger event payloads
export type {
  UintString,
  LedgerEventName,
  TransferPayload,
  ApprovalPayload,
  DepositPayload,
  WithdrawalPayload,
  DelegateChangedPayload,
  DelegateVotesChangedPayload,
} from "./ledger-event.js";

// Runtime type guards
export {
  isAddress,
  isUintString,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
  isTransferPayload,
  isApprovalPayload,
  isDepositPayload,
  isWithdrawalPayload,
  isDelegateChangedPayload,
  isDelegateVotesChangedPayload,
} from "./guards.js";
