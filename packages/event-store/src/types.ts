/**
 * @sluice/event-store — Core types.
 *
 * The vault journal is an append-only log of domain events split into
 * streams (one per vault, one per redemption controller and asset).
 *
 * - Stream versions start at 1 and have no gaps
 * - Global positions order every event across streams
 * - One commit may touch several streams and is all-or-nothing
 * - Every stored event is linked into a single SHA-256 hash chain
 */

import type { DomainEvent } from "@sluice/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A journaled event before it is linked into the chain.
 */
export interface UnhashedEvent {
  readonly event: DomainEvent;

  readonly streamId: string;

  /** Position within the stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When the journal accepted the event, ISO 8601 */
  readonly appendedAt: string;
}

export interface StoredEvent extends UnhashedEvent {
  /** sha256(canonical(event) + previousHash), hex */
  readonly hash: string;

  /** Hash of the preceding event in global order, or GENESIS_HASH */
  readonly previousHash: string;
}

// =============================================================================
// Commits
// =============================================================================

/**
 * Version a stream must be at for a write to go through.
 *
 * - A number: exactly this version
 * - "no_stream": the stream must not exist yet
 * - "any": no check
 */
export type ExpectedVersion = number | "no_stream" | "any";

/** Events bound for one stream within a commit. */
export interface StreamAppend {
  readonly streamId: string;
  readonly events: readonly DomainEvent[];
  readonly expectedVersion?: ExpectedVersion | undefined;
}

export interface AppendResult {
  readonly streamId: string;

  /** Version of the first event written */
  readonly fromVersion: number;

  /** Stream head after the write */
  readonly toVersion: number;

  readonly count: number;
}

// =============================================================================
// Reads
// =============================================================================

export interface ReadOptions {
  /** First version to return (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number | undefined;
}

export interface ReadAllOptions {
  /** First global position to return (inclusive). Default: 1 */
  readonly fromPosition?: number | undefined;

  /** Only events written by this operation */
  readonly correlationId?: string | undefined;

  /** Only events whose type is one of these */
  readonly types?: readonly string[] | undefined;
}

// =============================================================================
// Subscription
// =============================================================================

/** Called once per stored event, in global order, after the commit. */
export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event checked, 0 when empty */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

export interface EventStore {
  /**
   * Write events to one stream.
   *
   * @throws EventStoreError on a version conflict or an empty batch
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    expectedVersion?: ExpectedVersion,
  ): AppendResult;

  /**
   * Write to several streams at once. Every version check runs before
   * anything is stored; subscribers see the events only afterwards.
   */
  commit(appends: readonly StreamAppend[]): readonly AppendResult[];

  /** Events of one stream; empty if the stream doesn't exist. */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Events across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribeAll(handler: EventHandler): Subscription;

  /** Current version of a stream, 0 if it doesn't exist. */
  streamVersion(streamId: string): number;

  /** Position of the last event, 0 when empty. */
  globalPosition(): number;

  /** Hash of the last event, GENESIS_HASH when empty. */
  head(): string;

  /** Recompute and check the whole chain. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION"
  | "SUBSCRIBER_FAILED";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string | undefined,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
