/**
 * @sluice/ledger — Bounded-width unsigned integer arithmetic.
 *
 * All arithmetic uses bigint. Every stored quantity has a declared bit
 * width; operations that would leave it fail instead of wrapping.
 *
 * Rules:
 * - No floating-point operations
 * - No negative values anywhere in the core
 * - Rounding direction is always explicit at the call site
 */

import { LedgerError } from "./types.js";

// ─── Widths ──────────────────────────────────────────────────────────────

export type UintWidth = 64 | 128 | 192 | 256;

/** Largest value representable in `bits` unsigned bits. */
export function maxUint(bits: UintWidth): bigint {
  return (1n << BigInt(bits)) - 1n;
}

export const MAX_UINT64 = maxUint(64);
export const MAX_UINT128 = maxUint(128);
export const MAX_UINT192 = maxUint(192);
export const MAX_UINT256 = maxUint(256);

/** Rounding direction for integer division. */
export type Rounding = "down" | "up";

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Assert that a value is a non-negative bigint.
 * Throws LedgerError("INVALID_AMOUNT") otherwise.
 */
export function assertUint(value: bigint, label = "amount"): void {
  if (typeof value !== "bigint" || value < 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be a non-negative integer, got ${String(value)}`,
    );
  }
}

/**
 * Whether `value` fits in `bits` unsigned bits.
 */
export function fitsUint(value: bigint, bits: UintWidth): boolean {
  return value >= 0n && value <= maxUint(bits);
}

/**
 * Assert that a computed value fits in uint256.
 * Throws LedgerError("MATH_OVERFLOW") otherwise.
 */
export function assertUint256(value: bigint, label = "result"): bigint {
  if (value > MAX_UINT256) {
    throw new LedgerError("MATH_OVERFLOW", `${label} exceeds uint256`);
  }
  return value;
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * Compute `a * b / denominator` with explicit rounding.
 *
 * The product is exact (bigint has no intermediate overflow); only the
 * final quotient is checked against uint256.
 */
export function mulDiv(
  a: bigint,
  b: bigint,
  denominator: bigint,
  rounding: Rounding = "down",
): bigint {
  if (denominator === 0n) {
    throw new LedgerError("MATH_OVERFLOW", "Division by zero");
  }
  const product = a * b;
  const quotient = product / denominator;
  if (rounding === "up" && product % denominator !== 0n) {
    return assertUint256(quotient + 1n, "mulDiv");
  }
  return assertUint256(quotient, "mulDiv");
}

/** `10 ** exp` for a non-negative integer exponent. */
export function pow10(exp: number): bigint {
  if (!Number.isInteger(exp) || exp < 0) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `pow10 exponent must be a non-negative integer, got ${String(exp)}`,
    );
  }
  return 10n ** BigInt(exp);
}

/** Larger of two bigints. */
export function maxOf(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/** Smaller of two bigints. */
export function minOf(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

// ─── String form ─────────────────────────────────────────────────────────

/**
 * Parse a base-10 unsigned integer string.
 *
 * "1000" → 1000n. Rejects signs, decimals, whitespace and leading zeros.
 */
export function parseUint(value: string, label = "amount"): bigint {
  if (typeof value !== "string" || !/^(0|[1-9]\d*)$/.test(value)) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be a base-10 unsigned integer string, got "${String(value)}"`,
    );
  }
  return BigInt(value);
}

/** Render a bigint amount for JSON payloads. */
export function formatUint(value: bigint): string {
  return value.toString(10);
}
