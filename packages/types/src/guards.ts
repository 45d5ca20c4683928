/**
 * Runtime Type Guards
 *
 * Narrowing functions for domain types at system boundaries
 * (API inputs, deserialized snapshots, journal replay).
 */

import type {
  ClaimableRedeemView,
  PendingRedeemView,
} from "./financial.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Amount guards
// =============================================================================

const UINT_STRING = /^(0|[1-9]\d*)$/;

/** A base-10 unsigned integer string without leading zeros. */
export function isUintString(value: unknown): value is string {
  return typeof value === "string" && UINT_STRING.test(value);
}

/** A non-negative bigint. */
export function isUint(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n;
}

// =============================================================================
// Redemption guards
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isPendingRedeemView(value: unknown): value is PendingRedeemView {
  if (!isRecord(value)) return false;
  return isUintString(value.shares) && isUintString(value.requestTime);
}

export function isClaimableRedeemView(value: unknown): value is ClaimableRedeemView {
  if (!isRecord(value)) return false;
  return isUintString(value.assets) && isUintString(value.shares);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vault", "redemption", "fees"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
