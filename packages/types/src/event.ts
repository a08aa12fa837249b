/**
 * Event Types
 *
 * Append-only notification architecture.
 * Every committed state change is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are written only after the mutation they describe commits
 * - Every event has metadata (who, when, which operation)
 * - Amounts in payloads are decimal strings (JSON-safe)
 */

/**
 * Subsystems that emit events.
 */
export type EventSource = "vault" | "registry" | "host" | "adversary";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** The party whose call produced this event */
  readonly actor: string;

  /** ID of the top-level operation that produced this event */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event.
 * Discriminated by `type` field.
 */
export interface DomainEvent<TPayload extends object = Readonly<Record<string, unknown>>> {
  /** Event type identifier (e.g., "vault.deposit", "vault.withdrawal") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<TPayload>;
}
