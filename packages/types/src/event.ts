/**
 * Event Types
 *
 * Every successful state change in the vault is journaled as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Payload amounts are integer strings (canonical JSON has no bigint)
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Account that triggered the operation */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID grouping every event written by one operation */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

export type EventSource = "vault" | "redemption" | "fees";

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "redeem.requested", "fees.settled") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
