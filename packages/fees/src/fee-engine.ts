/**
 * @sluice/fees — Fee accrual engine.
 *
 *   management  = rate * totalAssets * elapsed / (SECONDS_PER_YEAR * FEE_SCALE)
 *   performance = rate * (shareValue - highWaterMark) * totalSupply
 *                   / (FEE_SCALE * oneShareUnit)        when shareValue > HWM
 *   withdrawal  = ceil(assets * rate / FEE_SCALE)
 *
 * Rules:
 * - Management fees accrue linearly, never compounded within a period
 * - Performance fees apply to the whole supply's gain above one global mark
 * - The high-water mark never decreases
 * - The engine is pure: it returns new configurations, it never stores one
 */

import type { FeeConfig, Totals } from "@sluice/types";
import type { ConversionEngine } from "@sluice/ledger";
import { assertUint, maxOf, mulDiv } from "@sluice/ledger";
import type { FeeConfigView, FeeRates, FeeSettlement, FeeUpdate } from "./types.js";
import {
  FEE_SCALE,
  FeeError,
  MAX_MANAGEMENT_FEE_RATE,
  MAX_PERFORMANCE_FEE_RATE,
  MAX_WITHDRAWAL_FEE_RATE,
  SECONDS_PER_YEAR,
} from "./types.js";

// ─── Validation ──────────────────────────────────────────────────────────

const CEILINGS: readonly (readonly [keyof FeeRates, bigint])[] = [
  ["performanceFeeRate", MAX_PERFORMANCE_FEE_RATE],
  ["managementFeeRate", MAX_MANAGEMENT_FEE_RATE],
  ["withdrawalFeeRate", MAX_WITHDRAWAL_FEE_RATE],
];

/**
 * Throws INVALID_FEES if any rate is negative or above its ceiling.
 */
export function validateFeeRates(rates: FeeRates): void {
  for (const [field, ceiling] of CEILINGS) {
    const rate = rates[field];
    if (rate < 0n || rate > ceiling) {
      throw new FeeError(
        "INVALID_FEES",
        `${field} must be between 0 and ${ceiling.toString()}, got ${rate.toString()}`,
      );
    }
  }
}

/**
 * A fresh configuration: validated rates, accrual starting at `now`,
 * high-water mark at the current share value.
 */
export function createFeeConfig(rates: FeeRates, now: bigint, highWaterMark: bigint): FeeConfig {
  validateFeeRates(rates);
  assertUint(now, "now");
  assertUint(highWaterMark, "highWaterMark");
  return {
    performanceFeeRate: rates.performanceFeeRate,
    managementFeeRate: rates.managementFeeRate,
    withdrawalFeeRate: rates.withdrawalFeeRate,
    lastUpdateTimestamp: now,
    highWaterMark,
  };
}

export function formatFeeConfig(fees: FeeConfig): FeeConfigView {
  return {
    performanceFeeRate: fees.performanceFeeRate.toString(),
    managementFeeRate: fees.managementFeeRate.toString(),
    withdrawalFeeRate: fees.withdrawalFeeRate.toString(),
    lastUpdateTimestamp: fees.lastUpdateTimestamp.toString(),
    highWaterMark: fees.highWaterMark.toString(),
  };
}

// ─── Engine ──────────────────────────────────────────────────────────────

export class FeeAccrualEngine {
  private readonly _conversion: ConversionEngine;

  constructor(conversion: ConversionEngine) {
    this._conversion = conversion;
  }

  /**
   * Management fee accrued since lastUpdateTimestamp, in underlying.
   * A clock behind the last update accrues nothing.
   */
  accruedManagementFee(fees: FeeConfig, totals: Totals, now: bigint): bigint {
    if (fees.managementFeeRate === 0n) {
      return 0n;
    }
    const elapsed = now > fees.lastUpdateTimestamp ? now - fees.lastUpdateTimestamp : 0n;
    return mulDiv(
      fees.managementFeeRate * totals.totalAssets,
      elapsed,
      SECONDS_PER_YEAR * FEE_SCALE,
      "down",
    );
  }

  /**
   * Performance fee on the supply's gain above the high-water mark, in underlying.
   */
  accruedPerformanceFee(fees: FeeConfig, totals: Totals): bigint {
    if (fees.performanceFeeRate === 0n || totals.shareValue <= fees.highWaterMark) {
      return 0n;
    }
    return mulDiv(
      fees.performanceFeeRate * (totals.shareValue - fees.highWaterMark),
      totals.totalSupply,
      FEE_SCALE * this._conversion.oneShareUnit,
      "down",
    );
  }

  /**
   * Settle both fees against one snapshot.
   *
   * The high-water mark moves to max(HWM, shareValue) on every call;
   * lastUpdateTimestamp moves only when something was charged.
   */
  settle(fees: FeeConfig, totals: Totals, now: bigint): FeeSettlement {
    assertUint(now, "now");
    const managementFee = this.accruedManagementFee(fees, totals, now);
    const performanceFee = this.accruedPerformanceFee(fees, totals);
    const totalFee = managementFee + performanceFee;

    const feeShares =
      totalFee === 0n
        ? 0n
        : this._conversion.underlyingToShares(totalFee, totals.totalAssets, totals.totalSupply);

    return {
      managementFee,
      performanceFee,
      totalFee,
      feeShares,
      fees: {
        ...fees,
        highWaterMark: maxOf(fees.highWaterMark, totals.shareValue),
        lastUpdateTimestamp: totalFee > 0n ? now : fees.lastUpdateTimestamp,
      },
    };
  }

  /**
   * Replace the rates. Accrual under the old rates is settled first and
   * the period restarts at `now`, so new rates never apply retroactively.
   */
  update(fees: FeeConfig, rates: FeeRates, totals: Totals, now: bigint): FeeUpdate {
    validateFeeRates(rates);
    const settlement = this.settle(fees, totals, now);
    return {
      settlement,
      fees: {
        performanceFeeRate: rates.performanceFeeRate,
        managementFeeRate: rates.managementFeeRate,
        withdrawalFeeRate: rates.withdrawalFeeRate,
        lastUpdateTimestamp: now,
        highWaterMark: settlement.fees.highWaterMark,
      },
    };
  }

  /**
   * Withdrawal fee on `assets`, rounded up against the holder.
   */
  withdrawalFee(fees: FeeConfig, assets: bigint): bigint {
    assertUint(assets, "assets");
    if (fees.withdrawalFeeRate === 0n) {
      return 0n;
    }
    return mulDiv(assets, fees.withdrawalFeeRate, FEE_SCALE, "up");
  }
}
