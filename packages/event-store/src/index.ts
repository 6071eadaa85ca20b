/**
 * @pegledger/event-store — Append-only event persistence.
 *
 * - EventStore interface with per-stream versions
 * - InMemoryEventStore with a SHA-256 hash chain
 * - EventCatalog with the ledger's event schemas
 */

export type {
  UnhashedStoredEvent,
  StoredEvent,
  AppendResult,
  ReadDirection,
  ReadAllOptions,
  EventStore,
  IntegrityError,
  EventStoreIntegrityResult,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

export { GENESIS_HASH, computeEventHash, verifyHashChain } from "./hash-chain.js";

export { EventCatalog, CatalogError } from "./catalog.js";
export type { EventSchema } from "./catalog.js";

export {
  LEDGER_STREAM,
  LEDGER_EVENTS,
  LEDGER_EVENT_SCHEMAS,
  createLedgerCatalog,
} from "./ledger-events.js";
