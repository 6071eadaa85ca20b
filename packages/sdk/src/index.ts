/**
 * @pegledger/sdk — Typed HTTP client for a pegledger node.
 *
 * @packageDocumentation
 */

// Types
export type { PegLedgerClientConfig, PegLedgerResponse, PaginatedList } from "./types.js";
export { PegLedgerApiError } from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";

// Client
export {
  PegLedgerClient,
  TokenNamespace,
  AccountsNamespace,
  LedgerNamespace,
  EventsNamespace,
} from "./client.js";

export type {
  TokenInfo,
  AccountInfo,
  AllowanceInfo,
  VotesInfo,
  Checkpoint,
  Receipt,
  LedgerSnapshot,
  LedgerEventRecord,
  PermitParams,
  DelegateBySigParams,
  ListEventsParams,
} from "./client.js";
