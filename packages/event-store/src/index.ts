/**
 * @sluice/event-store — Append-only vault journal.
 *
 * @packageDocumentation
 */

export type {
  UnhashedEvent,
  StoredEvent,
  ExpectedVersion,
  StreamAppend,
  AppendResult,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, linkEvents, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";
