/**
 * @pegledger/event-store — Ledger event schemas.
 *
 * The six events a pegged-token ledger emits, registered at version 1.
 */

import {
  isApprovalPayload,
  isDelegateChangedPayload,
  isDelegateVotesChangedPayload,
  isDepositPayload,
  isTransferPayload,
  isWithdrawalPayload,
} from "@pegledger/types";
import type { LedgerEventName } from "@pegledger/types";
import { EventCatalog } from "./catalog.js";
import type { EventSchema } from "./catalog.js";

/** Stream the node appends every ledger event to. */
export const LEDGER_STREAM = "ledger";

export const LEDGER_EVENTS = {
  TRANSFER: "Transfer",
  APPROVAL: "Approval",
  DEPOSIT: "Deposit",
  WITHDRAWAL: "Withdrawal",
  DELEGATE_CHANGED: "DelegateChanged",
  DELEGATE_VOTES_CHANGED: "DelegateVotesChanged",
} as const satisfies Record<string, LedgerEventName>;

export const LEDGER_EVENT_SCHEMAS: readonly EventSchema[] = [
  {
    type: LEDGER_EVENTS.TRANSFER,
    version: 1,
    description: "Balance moved between accounts; zero address marks mint or burn",
    source: "ledger",
    validate: isTransferPayload,
  },
  {
    type: LEDGER_EVENTS.APPROVAL,
    version: 1,
    description: "Allowance set by approve or permit",
    source: "allowance",
    validate: isApprovalPayload,
  },
  {
    type: LEDGER_EVENTS.DEPOSIT,
    version: 1,
    description: "Native value wrapped into the token",
    source: "peg",
    validate: isDepositPayload,
  },
  {
    type: LEDGER_EVENTS.WITHDRAWAL,
    version: 1,
    description: "Token unwrapped back into native value",
    source: "peg",
    validate: isWithdrawalPayload,
  },
  {
    type: LEDGER_EVENTS.DELEGATE_CHANGED,
    version: 1,
    description: "An account changed its voting delegate",
    source: "votes",
    validate: isDelegateChangedPayload,
  },
  {
    type: LEDGER_EVENTS.DELEGATE_VOTES_CHANGED,
    version: 1,
    description: "A delegate's voting weight changed",
    source: "votes",
    validate: isDelegateVotesChangedPayload,
  },
];

/**
 * A catalog with every ledger event registered.
 */
export function createLedgerCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of LEDGER_EVENT_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
