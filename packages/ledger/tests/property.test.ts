/**
 * Property-based tests for @sluice/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Partial withdrawals never burn fewer shares than the locked ratio
 * 2. Partial redemptions never pay more assets than the locked ratio
 * 3. Claimable consumption conserves both fields
 * 4. Conversion rounds in the vault's favour
 * 5. Snapshot → restore → snapshot keeps every record
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { RedeemLedger } from "../src/redeem-ledger.js";
import { sharesToUnderlying, underlyingToShares } from "../src/conversion.js";
import { mulDiv } from "../src/uint-math.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbAmount = fc.bigInt({ min: 1n, max: 10n ** 24n });

/** A claimable pair plus a strict fraction of its assets. */
const arbPartialWithdraw = fc
  .tuple(fc.bigInt({ min: 2n, max: 10n ** 24n }), arbAmount)
  .chain(([assets, shares]) =>
    fc.tuple(fc.constant(assets), fc.constant(shares), fc.bigInt({ min: 1n, max: assets - 1n })),
  );

/** A claimable pair plus a strict fraction of its shares. */
const arbPartialRedeem = fc
  .tuple(arbAmount, fc.bigInt({ min: 2n, max: 10n ** 24n }))
  .chain(([assets, shares]) =>
    fc.tuple(fc.constant(assets), fc.constant(shares), fc.bigInt({ min: 1n, max: shares - 1n })),
  );

type Step = { readonly kind: "assets" | "shares"; readonly weight: number };

const arbSteps = fc.array(
  fc.record({
    kind: fc.constantFrom<"assets" | "shares">("assets", "shares"),
    weight: fc.integer({ min: 1, max: 100 }),
  }),
  { minLength: 1, maxLength: 12 },
);

// =============================================================================
// Property: Rounding Direction
// =============================================================================

describe("property: claimable consumption rounds against the claimant", () => {
  it("partial withdrawal burns at least assets * shares / storedAssets", () => {
    fc.assert(
      fc.property(arbPartialWithdraw, ([storedAssets, storedShares, assets]) => {
        const ledger = new RedeemLedger({ now: () => 0 });
        ledger.increaseClaimable("alice", "USDC", storedAssets, storedShares);

        const burned = ledger.consumeClaimableByAssets("alice", "USDC", assets);
        expect(burned * storedAssets >= assets * storedShares).toBe(true);
        expect(burned <= storedShares).toBe(true);
      }),
      { numRuns: 300 },
    );
  });

  it("partial redemption pays at most shares * storedAssets / storedShares", () => {
    fc.assert(
      fc.property(arbPartialRedeem, ([storedAssets, storedShares, shares]) => {
        const ledger = new RedeemLedger({ now: () => 0 });
        ledger.increaseClaimable("alice", "USDC", storedAssets, storedShares);

        const paid = ledger.consumeClaimableByShares("alice", "USDC", shares);
        expect(paid * storedShares <= shares * storedAssets).toBe(true);
        expect(paid <= storedAssets).toBe(true);
      }),
      { numRuns: 300 },
    );
  });
});

// =============================================================================
// Property: Conservation
// =============================================================================

describe("property: claimable consumption conserves value", () => {
  it("consumed + remaining equals the stored pair after any sequence", () => {
    fc.assert(
      fc.property(arbAmount, arbAmount, arbSteps, (storedAssets, storedShares, steps: Step[]) => {
        const ledger = new RedeemLedger({ now: () => 0 });
        ledger.increaseClaimable("alice", "USDC", storedAssets, storedShares);

        let paidAssets = 0n;
        let burnedShares = 0n;

        for (const step of steps) {
          const current = ledger.getClaimable("alice", "USDC");
          if (step.kind === "assets") {
            const assets = (current.assets * BigInt(step.weight)) / 100n;
            burnedShares += ledger.consumeClaimableByAssets("alice", "USDC", assets);
            paidAssets += assets;
          } else {
            const shares = (current.shares * BigInt(step.weight)) / 100n;
            paidAssets += ledger.consumeClaimableByShares("alice", "USDC", shares);
            burnedShares += shares;
          }
        }

        const remaining = ledger.getClaimable("alice", "USDC");
        expect(paidAssets + remaining.assets).toBe(storedAssets);
        expect(burnedShares + remaining.shares).toBe(storedShares);
      }),
      { numRuns: 300 },
    );
  });

  it("pending increase then full consume leaves no record", () => {
    fc.assert(
      fc.property(fc.array(arbAmount, { minLength: 1, maxLength: 10 }), (amounts) => {
        const ledger = new RedeemLedger({ now: () => 1 });
        let total = 0n;
        for (const amount of amounts) {
          ledger.increasePending("alice", "USDC", amount);
          total += amount;
        }
        expect(ledger.getPending("alice", "USDC").shares).toBe(total);

        ledger.consumePending("alice", "USDC", total);
        expect(ledger.listPending()).toHaveLength(0);
      }),
      { numRuns: 200 },
    );
  });
});

// =============================================================================
// Property: Conversion Rounding
// =============================================================================

describe("property: conversion never favours the caller", () => {
  it("shares → underlying → shares never returns more shares", () => {
    fc.assert(
      fc.property(arbAmount, arbAmount, arbAmount, (shares, totalAssets, totalSupply) => {
        const assets = sharesToUnderlying(shares, totalAssets, totalSupply);
        const back = underlyingToShares(assets, totalAssets, totalSupply);
        expect(back <= shares).toBe(true);
      }),
      { numRuns: 300 },
    );
  });

  it("mulDiv up and down differ by at most one", () => {
    fc.assert(
      fc.property(arbAmount, arbAmount, arbAmount, (a, b, d) => {
        const diff = mulDiv(a, b, d, "up") - mulDiv(a, b, d, "down");
        expect(diff === 0n || diff === 1n).toBe(true);
        expect(diff === 0n).toBe((a * b) % d === 0n);
      }),
      { numRuns: 300 },
    );
  });
});

// =============================================================================
// Property: Snapshot Roundtrip
// =============================================================================

describe("property: snapshot roundtrip", () => {
  it("restoring a snapshot reproduces the same records", () => {
    fc.assert(
      fc.property(
        fc.array(
          fc.tuple(fc.constantFrom("alice", "bob", "carol"), fc.constantFrom("USDC", "EURC"), arbAmount, arbAmount),
          { minLength: 1, maxLength: 10 },
        ),
        (ops) => {
          const ledger = new RedeemLedger({ now: () => 42 });
          for (const [account, asset, a, b] of ops) {
            ledger.increasePending(account, asset, a);
            ledger.increaseClaimable(account, asset, a, b);
          }

          const snap = ledger.snapshot();
          const restored = RedeemLedger.fromSnapshot(snap);
          const again = restored.snapshot();

          expect(again.pending).toEqual(snap.pending);
          expect(again.claimable).toEqual(snap.claimable);
          expect(restored.totals()).toEqual(ledger.totals());
        },
      ),
      { numRuns: 100 },
    );
  });
});
