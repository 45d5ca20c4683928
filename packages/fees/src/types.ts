/**
 * @sluice/fees — Types and constants for fee accrual.
 *
 * Rules:
 * - Rates are bigint integers scaled to FEE_SCALE (10_000 = 100%)
 * - Fee amounts are in underlying units
 * - Fee configurations are replaced, never mutated in place
 */

import type { FeeConfig } from "@sluice/types";

// ─── Constants ───────────────────────────────────────────────────────────

/** 100% in rate units (basis points). */
export const FEE_SCALE = 10_000n;

/** 365 days. Management fees accrue linearly over this period. */
export const SECONDS_PER_YEAR = 31_536_000n;

/** Ceiling per fee type, in rate units. */
export const MAX_PERFORMANCE_FEE_RATE = 5_000n;
export const MAX_MANAGEMENT_FEE_RATE = 1_000n;
export const MAX_WITHDRAWAL_FEE_RATE = 500n;

// ─── Rates ───────────────────────────────────────────────────────────────

/** The three configurable rates, without settlement state. */
export interface FeeRates {
  readonly performanceFeeRate: bigint;
  readonly managementFeeRate: bigint;
  readonly withdrawalFeeRate: bigint;
}

/** JSON form of a FeeConfig. */
export interface FeeConfigView {
  readonly performanceFeeRate: string;
  readonly managementFeeRate: string;
  readonly withdrawalFeeRate: string;
  readonly lastUpdateTimestamp: string;
  readonly highWaterMark: string;
}

// ─── Settlement ──────────────────────────────────────────────────────────

/**
 * Result of settling accrued fees against one totals snapshot.
 * The caller mints `feeShares` to the fee recipient when nonzero.
 */
export interface FeeSettlement {
  readonly managementFee: bigint;
  readonly performanceFee: bigint;
  readonly totalFee: bigint;

  /** underlyingToShares(totalFee) at the settlement totals */
  readonly feeShares: bigint;

  /** Configuration after settlement */
  readonly fees: FeeConfig;
}

/** Result of replacing the rates: the settlement that preceded it, and the new config. */
export interface FeeUpdate {
  readonly settlement: FeeSettlement;
  readonly fees: FeeConfig;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type FeeErrorCode = "INVALID_FEES";

/**
 * Structured error from the fee engine.
 */
export class FeeError extends Error {
  public readonly code: FeeErrorCode;

  constructor(code: FeeErrorCode, message: string) {
    super(message);
    this.name = "FeeError";
    this.code = code;
  }
}
