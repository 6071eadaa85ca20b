/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized events, snapshots).
 */

import type { Address } from "./address.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";
import type {
  ApprovalPayload,
  DelegateChangedPayload,
  DelegateVotesChangedPayload,
  DepositPayload,
  TransferPayload,
  UintString,
  WithdrawalPayload,
} from "./ledger-event.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

// =============================================================================
// Primitive guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;
const UINT_PATTERN = /^(0|[1-9]\d*)$/;

/** Upper bound of a uint256. */
const MAX_UINT256 = 2n ** 256n - 1n;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function isUintString(value: unknown): value is UintString {
  return (
    typeof value === "string" &&
    UINT_PATTERN.test(value) &&
    BigInt(value) <= MAX_UINT256
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["ledger", "allowance", "votes", "peg"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    (value.sequencePoint === undefined || isUintString(value.sequencePoint)) &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}

// =============================================================================
// Ledger event payload guards
// =============================================================================

export function isTransferPayload(value: unknown): value is TransferPayload {
  if (!isRecord(value)) return false;
  return isAddress(value.from) && isAddress(value.to) && isUintString(value.value);
}

export function isApprovalPayload(value: unknown): value is ApprovalPayload {
  if (!isRecord(value)) return false;
  return (
    isAddress(value.owner) &&
    isAddress(value.spender) &&
    isUintString(value.value)
  );
}

export function isDepositPayload(value: unknown): value is DepositPayload {
  if (!isRecord(value)) return false;
  return isAddress(value.dst) && isUintString(value.wad);
}

export function isWithdrawalPayload(value: unknown): value is WithdrawalPayload {
  if (!isRecord(value)) return false;
  return isAddress(value.src) && isUintString(value.wad);
}

export function isDelegateChangedPayload(
  value: unknown,
): value is DelegateChangedPayload {
  if (!isRecord(value)) return false;
  return (
    isAddress(value.delegator) &&
    isAddress(value.fromDelegate) &&
    isAddress(value.toDelegate)
  );
}

export function isDelegateVotesChangedPayload(
  value: unknown,
): value is DelegateVotesChangedPayload {
  if (!isRecord(value)) return false;
  return (
    isAddress(value.delegate) &&
    isUintString(value.previousVotes) &&
    isUintString(value.newVotes)
  );
}
