/**
 * @sluice/event-store — In-memory journal.
 *
 * Plain arrays, no durability. Subscribers run synchronously once a
 * commit is stored; the vault rebuilds nothing from here on restart.
 */

import type { DomainEvent } from "@sluice/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  StreamAppend,
  Subscription,
  UnhashedEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { GENESIS_HASH, linkEvents, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /**
   * Receives errors thrown by subscribers. Without it, the first
   * subscriber error is rethrown as SUBSCRIBER_FAILED after every
   * subscriber has seen the commit.
   */
  readonly onSubscriberError?: ((error: unknown, event: StoredEvent) => void) | undefined;

  /** Source of appendedAt. Default: the system clock */
  readonly now?: (() => Date) | undefined;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _log: StoredEvent[] = [];
  private readonly _subscribers = new Set<EventHandler>();
  private readonly _onSubscriberError: InMemoryEventStoreOptions["onSubscriberError"];
  private readonly _now: () => Date;

  constructor(options?: InMemoryEventStoreOptions) {
    this._onSubscriberError = options?.onSubscriberError;
    this._now = options?.now ?? (() => new Date());
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    expectedVersion?: ExpectedVersion,
  ): AppendResult {
    const [result] = this.commit([{ streamId, events, expectedVersion }]);
    if (result === undefined) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    return result;
  }

  commit(appends: readonly StreamAppend[]): readonly AppendResult[] {
    if (appends.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Commit names no streams");
    }

    // Versions a stream will have reached by each append in this commit
    const heads = new Map<string, number>();
    for (const { streamId, events, expectedVersion } of appends) {
      if (streamId.length === 0) {
        throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
      }
      if (events.length === 0) {
        throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
      }
      const head = heads.get(streamId) ?? this.streamVersion(streamId);
      checkExpectedVersion(streamId, head, expectedVersion);
      heads.set(streamId, head + events.length);
    }

    const appendedAt = this._now().toISOString();
    const pending: UnhashedEvent[] = [];
    const results: AppendResult[] = [];
    const versions = new Map<string, number>();

    for (const { streamId, events } of appends) {
      const fromVersion = (versions.get(streamId) ?? this.streamVersion(streamId)) + 1;
      events.forEach((event, i) => {
        pending.push({
          event,
          streamId,
          version: fromVersion + i,
          globalPosition: this._log.length + pending.length + 1,
          appendedAt,
        });
      });
      const toVersion = fromVersion + events.length - 1;
      versions.set(streamId, toVersion);
      results.push({ streamId, fromVersion, toVersion, count: events.length });
    }

    const stored = linkEvents(pending, this.head());
    for (const event of stored) {
      const stream = this._streams.get(event.streamId) ?? [];
      stream.push(event);
      this._streams.set(event.streamId, stream);
      this._log.push(event);
    }

    this._dispatch(stored);
    return results;
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
    const fromVersion = options?.fromVersion ?? 1;
    if (!Number.isInteger(fromVersion) || fromVersion < 1) {
      throw new EventStoreError("INVALID_VERSION", `fromVersion must be >= 1, got ${fromVersion}`, streamId);
    }
    return (this._streams.get(streamId) ?? []).slice(fromVersion - 1);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = Math.max(options?.fromPosition ?? 1, 1);
    const types = options?.types;
    const correlationId = options?.correlationId;

    return this._log.slice(fromPosition - 1).filter(
      (e) =>
        (types === undefined || types.includes(e.event.type)) &&
        (correlationId === undefined || e.event.metadata.correlationId === correlationId),
    );
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._log.length;
  }

  head(): string {
    return this._log[this._log.length - 1]?.hash ?? GENESIS_HASH;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _dispatch(events: readonly StoredEvent[]): void {
    let firstFailure: { error: unknown; event: StoredEvent } | undefined;

    for (const event of events) {
      for (const handler of [...this._subscribers]) {
        try {
          handler(event);
        } catch (error) {
          if (this._onSubscriberError !== undefined) {
            this._onSubscriberError(error, event);
          } else {
            firstFailure ??= { error, event };
          }
        }
      }
    }

    if (firstFailure !== undefined) {
      throw new EventStoreError(
        "SUBSCRIBER_FAILED",
        `Subscriber failed on event at position ${firstFailure.event.globalPosition}: ${String(firstFailure.error)}`,
        firstFailure.event.streamId,
      );
    }
  }
}

function checkExpectedVersion(
  streamId: string,
  current: number,
  expected: ExpectedVersion | undefined,
): void {
  if (expected === undefined || expected === "any") {
    return;
  }
  if (expected === "no_stream") {
    if (current !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${current}), expected no_stream`,
        streamId,
      );
    }
    return;
  }
  if (current !== expected) {
    throw new EventStoreError(
      "CONCURRENCY_CONFLICT",
      `Stream "${streamId}" is at version ${current}, expected ${expected}`,
      streamId,
    );
  }
}
