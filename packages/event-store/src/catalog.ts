/**
 * @pegledger/event-store — Event Catalog.
 *
 * Keeps a registry of every event type the ledger emits with:
 * - Typed event definitions (type string → payload shape)
 * - The subsystem that emits each type
 * - A schema version per type
 *
 * The node checks each event against its schema before appending it.
 */

import type { EventSource } from "@pegledger/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

/**
 * A versioned event schema.
 */
export interface EventSchema {
  /** Event type string (e.g., "Transfer") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which ledger subsystem emits this event */
  readonly source: EventSource;

  /** True if the payload is valid for the current version. */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Registry of domain event types.
 *
 * ```ts
 * const catalog = createLedgerCatalog();
 * catalog.validate("Transfer", { from, to, value: "10" }); // true
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema. A later registration of the same type
   * replaces it.
   */
  register(schema: EventSchema): void {
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /** Registered event types, sorted. */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  /**
   * Validate a payload against its registered schema.
   * Unregistered types are invalid.
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  /**
   * The schema `payload` conforms to.
   *
   * @throws CatalogError if the type is unregistered or the payload is malformed
   */
  assertValid(eventType: string, payload: unknown): EventSchema {
    const schema = this._schemas.get(eventType);
    if (schema === undefined) {
      throw new CatalogError(`Unknown event type "${eventType}"`);
    }
    if (!schema.validate(payload)) {
      throw new CatalogError(
        `Payload does not match the "${eventType}" schema (v${String(schema.version)})`,
      );
    }
    return schema;
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
