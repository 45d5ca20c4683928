/**
 * @sluice/event-store — Hash chain over the journal.
 *
 *   hash[0] = sha256(jcs(event[0]) + "genesis")
 *   hash[n] = sha256(jcs(event[n]) + hash[n-1])
 *
 * jcs is RFC 8785 canonical JSON, so the hash does not depend on key
 * order. Editing any stored event breaks every link after it.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

export function computeEventHash(entry: UnhashedEvent, previousHash: string): string {
  const { event, streamId, version, globalPosition, appendedAt } = entry;
  const content = canonicalize({
    type: event.type,
    metadata: event.metadata,
    payload: event.payload,
    streamId,
    version,
    globalPosition,
    appendedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Hash `entries` in order, the first one chained to `previousHash`.
 */
export function linkEvents(
  entries: readonly UnhashedEvent[],
  previousHash: string,
): StoredEvent[] {
  const linked: StoredEvent[] = [];
  let prev = previousHash;
  for (const entry of entries) {
    const hash = computeEventHash(entry, prev);
    linked.push({ ...entry, hash, previousHash: prev });
    prev = hash;
  }
  return linked;
}

/**
 * Check every link of a journal given in global order. Positions must
 * run 1, 2, 3, ... with no gaps.
 */
export function verifyHashChain(events: readonly StoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let expectedPrevious = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const [index, stored] of events.entries()) {
    const position = stored.globalPosition;

    if (position !== index + 1) {
      errors.push({ position, reason: `expected global position ${index + 1}, found ${position}` });
    }
    if (stored.previousHash !== expectedPrevious) {
      errors.push({ position, reason: "previousHash does not match the preceding event" });
    }
    if (stored.hash !== computeEventHash(stored, stored.previousHash)) {
      errors.push({ position, reason: "event content does not match its hash" });
    }

    expectedPrevious = stored.hash;
    lastVerifiedPosition = position;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
