/**
 * Runtime type guard tests for @sluice/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isUintString,
  isUint,
  isPendingRedeemView,
  isClaimableRedeemView,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";

// =============================================================================
// Amount guards
// =============================================================================

describe("isUintString", () => {
  it("accepts zero and plain integers", () => {
    expect(isUintString("0")).toBe(true);
    expect(isUintString("1000000000000000000000000")).toBe(true);
  });

  it("rejects leading zeros, signs and decimals", () => {
    expect(isUintString("007")).toBe(false);
    expect(isUintString("-1")).toBe(false);
    expect(isUintString("+1")).toBe(false);
    expect(isUintString("1.5")).toBe(false);
    expect(isUintString("")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isUintString(1)).toBe(false);
    expect(isUintString(1n)).toBe(false);
    expect(isUintString(null)).toBe(false);
  });
});

describe("isUint", () => {
  it("accepts non-negative bigint", () => {
    expect(isUint(0n)).toBe(true);
    expect(isUint(42n)).toBe(true);
  });

  it("rejects negative bigint and numbers", () => {
    expect(isUint(-1n)).toBe(false);
    expect(isUint(1)).toBe(false);
  });
});

// =============================================================================
// Redemption guards
// =============================================================================

describe("isPendingRedeemView", () => {
  it("accepts a well-formed record", () => {
    expect(isPendingRedeemView({ shares: "100", requestTime: "1700000000" })).toBe(true);
  });

  it("rejects numeric fields", () => {
    expect(isPendingRedeemView({ shares: 100, requestTime: "0" })).toBe(false);
  });

  it("rejects missing requestTime", () => {
    expect(isPendingRedeemView({ shares: "100" })).toBe(false);
  });

  it("rejects null", () => {
    expect(isPendingRedeemView(null)).toBe(false);
  });
});

describe("isClaimableRedeemView", () => {
  it("accepts a well-formed record", () => {
    expect(isClaimableRedeemView({ assets: "99", shares: "100" })).toBe(true);
  });

  it("rejects a negative amount", () => {
    expect(isClaimableRedeemView({ assets: "-1", shares: "100" })).toBe(false);
  });

  it("rejects non-objects", () => {
    expect(isClaimableRedeemView("99/100")).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const validMetadata = {
  eventId: "evt-1",
  timestamp: "2025-01-15T10:00:00.000Z",
  actor: "alice",
  correlationId: "op-1",
  source: "redemption",
};

describe("isEventSource", () => {
  it("accepts known sources", () => {
    expect(isEventSource("vault")).toBe(true);
    expect(isEventSource("redemption")).toBe(true);
    expect(isEventSource("fees")).toBe(true);
  });

  it("rejects unknown sources", () => {
    expect(isEventSource("treasury")).toBe(false);
    expect(isEventSource(3)).toBe(false);
  });
});

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(validMetadata)).toBe(true);
  });

  it("accepts metadata with a causation ID", () => {
    expect(isEventMetadata({ ...validMetadata, causationId: "evt-0" })).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...validMetadata, source: "observer" })).toBe(false);
  });

  it("rejects missing correlationId", () => {
    const { correlationId: _omit, ...rest } = validMetadata;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({
        type: "redeem.requested",
        metadata: validMetadata,
        payload: { shares: "100" },
      }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(
      isDomainEvent({ type: "redeem.requested", metadata: validMetadata, payload: null }),
    ).toBe(false);
  });

  it("rejects invalid metadata", () => {
    expect(
      isDomainEvent({ type: "x", metadata: { eventId: "e" }, payload: {} }),
    ).toBe(false);
  });
});
