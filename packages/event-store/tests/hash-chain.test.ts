/**
 * Tests for the journal hash chain.
 */

import { describe, it, expect } from "vitest";
import type { StoredEvent, UnhashedEvent } from "../src/types.js";
import { computeEventHash, GENESIS_HASH, linkEvents, verifyHashChain } from "../src/hash-chain.js";
import { deposited, requested, T0_ISO } from "./helpers.js";

function entries(): UnhashedEvent[] {
  return [
    { event: deposited("1000"), streamId: "vault", version: 1, globalPosition: 1, appendedAt: T0_ISO },
    { event: requested("100"), streamId: "redeem:USDC:alice", version: 1, globalPosition: 2, appendedAt: T0_ISO },
    { event: requested("5"), streamId: "redeem:USDC:alice", version: 2, globalPosition: 3, appendedAt: T0_ISO },
  ];
}

describe("computeEventHash", () => {
  it("is a hex sha256 digest", () => {
    const [first] = entries();
    if (first === undefined) throw new Error("fixture");

    expect(computeEventHash(first, GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores payload key order", () => {
    const [first] = entries();
    if (first === undefined) throw new Error("fixture");
    const reordered: UnhashedEvent = {
      ...first,
      event: { ...first.event, payload: Object.fromEntries(Object.entries(first.event.payload).reverse()) },
    };

    expect(computeEventHash(reordered, GENESIS_HASH)).toBe(computeEventHash(first, GENESIS_HASH));
  });

  it("depends on the previous hash", () => {
    const [first] = entries();
    if (first === undefined) throw new Error("fixture");

    expect(computeEventHash(first, "a")).not.toBe(computeEventHash(first, "b"));
  });
});

describe("linkEvents", () => {
  it("chains each event to the one before", () => {
    const linked = linkEvents(entries(), GENESIS_HASH);

    expect(linked[0]?.previousHash).toBe(GENESIS_HASH);
    expect(linked[1]?.previousHash).toBe(linked[0]?.hash);
    expect(linked[2]?.previousHash).toBe(linked[1]?.hash);
  });
});

describe("verifyHashChain", () => {
  it("accepts an intact chain", () => {
    expect(verifyHashChain(linkEvents(entries(), GENESIS_HASH))).toEqual({
      valid: true,
      lastVerifiedPosition: 3,
      errors: [],
    });
  });

  it("accepts an empty journal", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("flags an edited payload at its position", () => {
    const linked = linkEvents(entries(), GENESIS_HASH);
    const edited: StoredEvent[] = linked.map((e) =>
      e.globalPosition === 2 ? { ...e, event: { ...e.event, payload: { ...e.event.payload, shares: "1" } } } : e,
    );

    const result = verifyHashChain(edited);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{ position: 2, reason: "event content does not match its hash" }]);
  });

  it("flags a removed event", () => {
    const linked = linkEvents(entries(), GENESIS_HASH);
    const withoutSecond = [linked[0], linked[2]].filter((e): e is StoredEvent => e !== undefined);

    const result = verifyHashChain(withoutSecond);

    expect(result.errors).toEqual([
      { position: 3, reason: "expected global position 2, found 3" },
      { position: 3, reason: "previousHash does not match the preceding event" },
    ]);
  });
});
