/**
 * Tests for bounded-width integer arithmetic.
 *
 * Covers:
 * - Width constants
 * - mulDiv rounding in both directions
 * - Overflow and division-by-zero failures
 * - Integer string parsing
 */

import { describe, it, expect } from "vitest";
import {
  MAX_UINT64,
  MAX_UINT128,
  MAX_UINT256,
  assertUint,
  assertUint256,
  fitsUint,
  formatUint,
  maxOf,
  maxUint,
  minOf,
  mulDiv,
  parseUint,
  pow10,
} from "../src/uint-math.js";
import { LedgerError } from "../src/types.js";

// ─── Widths ──────────────────────────────────────────────────────────────

describe("widths", () => {
  it("computes 2^bits - 1", () => {
    expect(MAX_UINT64).toBe(18_446_744_073_709_551_615n);
    expect(maxUint(128)).toBe(MAX_UINT128);
    expect(MAX_UINT128 + 1n).toBe(2n ** 128n);
  });

  it("fitsUint checks both bounds", () => {
    expect(fitsUint(0n, 64)).toBe(true);
    expect(fitsUint(MAX_UINT64, 64)).toBe(true);
    expect(fitsUint(MAX_UINT64 + 1n, 64)).toBe(false);
    expect(fitsUint(-1n, 256)).toBe(false);
  });
});

// ─── mulDiv ──────────────────────────────────────────────────────────────

describe("mulDiv", () => {
  it("rounds down by default", () => {
    expect(mulDiv(10n, 3n, 4n)).toBe(7n);
  });

  it("rounds up when asked and there is a remainder", () => {
    expect(mulDiv(10n, 3n, 4n, "up")).toBe(8n);
  });

  it("does not round up an exact quotient", () => {
    expect(mulDiv(10n, 3n, 5n, "up")).toBe(6n);
  });

  it("keeps the full product before dividing", () => {
    expect(mulDiv(MAX_UINT256, MAX_UINT256, MAX_UINT256)).toBe(MAX_UINT256);
  });

  it("throws MATH_OVERFLOW when the quotient leaves uint256", () => {
    try {
      mulDiv(MAX_UINT256, 2n, 1n);
      expect.unreachable("should have thrown");
    } catch (e) {
      expect(e).toBeInstanceOf(LedgerError);
      expect(e).toMatchObject({ code: "MATH_OVERFLOW" });
    }
  });

  it("throws on division by zero", () => {
    expect(() => mulDiv(1n, 1n, 0n)).toThrow("Division by zero");
  });
});

// ─── Validation ──────────────────────────────────────────────────────────

describe("assertUint", () => {
  it("accepts zero", () => {
    expect(() => assertUint(0n)).not.toThrow();
  });

  it("rejects negatives with INVALID_AMOUNT", () => {
    try {
      assertUint(-5n, "shares");
      expect.unreachable("should have thrown");
    } catch (e) {
      expect(e).toBeInstanceOf(LedgerError);
      expect(e).toMatchObject({
        code: "INVALID_AMOUNT",
        message: "shares must be a non-negative integer, got -5",
      });
    }
  });
});

describe("assertUint256", () => {
  it("passes values through", () => {
    expect(assertUint256(MAX_UINT256)).toBe(MAX_UINT256);
  });

  it("rejects values past uint256", () => {
    expect(() => assertUint256(MAX_UINT256 + 1n)).toThrow("result exceeds uint256");
  });
});

// ─── Helpers ─────────────────────────────────────────────────────────────

describe("pow10", () => {
  it("computes powers of ten", () => {
    expect(pow10(0)).toBe(1n);
    expect(pow10(18)).toBe(1_000_000_000_000_000_000n);
  });

  it("rejects fractional exponents", () => {
    expect(() => pow10(1.5)).toThrow(LedgerError);
  });
});

describe("maxOf / minOf", () => {
  it("pick the larger and smaller value", () => {
    expect(maxOf(3n, 7n)).toBe(7n);
    expect(minOf(3n, 7n)).toBe(3n);
  });
});

describe("parseUint / formatUint", () => {
  it("parses canonical integer strings", () => {
    expect(parseUint("0")).toBe(0n);
    expect(parseUint("340282366920938463463374607431768211455")).toBe(MAX_UINT128);
  });

  it("rejects signs, decimals and leading zeros", () => {
    expect(() => parseUint("-1")).toThrow(LedgerError);
    expect(() => parseUint("1.0")).toThrow(LedgerError);
    expect(() => parseUint("01")).toThrow(LedgerError);
    expect(() => parseUint(" 1")).toThrow(LedgerError);
  });

  it("formats in base 10", () => {
    expect(formatUint(1_000_000n)).toBe("1000000");
  });
});
