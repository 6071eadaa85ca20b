/**
 * Event Types
 *
 * Append-only event architecture.
 * Every committed ledger mutation is captured as one or more DomainEvents.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Events are replayable: same events → same balances
 * - No UPDATE, no DELETE — only new events
 */

/**
 * Which ledger subsystem emitted an event.
 */
export type EventSource = "ledger" | "allowance" | "votes" | "peg";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Account (or host component) that caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID shared by every event of one ledger operation */
  readonly correlationId: string;

  /** Sequence point (block number) the event was committed at, as a decimal string */
  readonly sequencePoint?: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event.
 * Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "Transfer", "DelegateVotesChanged") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
