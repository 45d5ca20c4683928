/**
 * Tests for the fee accrual engine.
 *
 * Covers:
 * - Rate validation against per-type ceilings
 * - Linear management fee accrual
 * - Performance fee above the high-water mark
 * - Settlement: HWM update, lastUpdateTimestamp rule, fee share pricing
 * - Rate updates that settle first and restart the period
 * - Withdrawal fee rounding
 */

import { describe, it, expect } from "vitest";
import type { FeeConfig, Totals } from "@sluice/types";
import { ConversionEngine } from "@sluice/ledger";
import type { RateProvider } from "@sluice/ledger";
import {
  FeeAccrualEngine,
  createFeeConfig,
  formatFeeConfig,
  validateFeeRates,
} from "../src/fee-engine.js";
import { FeeError, SECONDS_PER_YEAR } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const noRates: RateProvider = {
  convertToUnderlying: (_asset, amount) => amount,
  convertFromUnderlying: (_asset, amount) => amount,
  isSupported: () => false,
};

const conversion = new ConversionEngine({
  canonicalAsset: "USDC",
  shareDecimals: 6,
  rates: noRates,
});

const engine = new FeeAccrualEngine(conversion);

const T0 = 1_700_000_000n;

function feeConfig(overrides: Partial<FeeConfig> = {}): FeeConfig {
  return {
    performanceFeeRate: 1_000n,
    managementFeeRate: 200n,
    withdrawalFeeRate: 100n,
    lastUpdateTimestamp: T0,
    highWaterMark: 1_000_000n,
    ...overrides,
  };
}

function totals(totalAssets: bigint, totalSupply: bigint, shareValue: bigint): Totals {
  return { totalAssets, totalSupply, shareValue };
}

// ─── Validation ──────────────────────────────────────────────────────────

describe("validateFeeRates", () => {
  it("accepts rates at their ceilings", () => {
    expect(() =>
      validateFeeRates({ performanceFeeRate: 5_000n, managementFeeRate: 1_000n, withdrawalFeeRate: 500n }),
    ).not.toThrow();
  });

  it.each([
    ["performanceFeeRate", { performanceFeeRate: 5_001n, managementFeeRate: 0n, withdrawalFeeRate: 0n }],
    ["managementFeeRate", { performanceFeeRate: 0n, managementFeeRate: 1_001n, withdrawalFeeRate: 0n }],
    ["withdrawalFeeRate", { performanceFeeRate: 0n, managementFeeRate: 0n, withdrawalFeeRate: 501n }],
    ["withdrawalFeeRate", { performanceFeeRate: 0n, managementFeeRate: 0n, withdrawalFeeRate: -1n }],
  ])("rejects an out-of-range %s", (field, rates) => {
    try {
      validateFeeRates(rates);
      expect.unreachable("should have thrown");
    } catch (e) {
      if (!(e instanceof FeeError)) throw e;
      expect(e.code).toBe("INVALID_FEES");
      expect(e.message).toContain(field);
    }
  });

  it("createFeeConfig validates and starts accrual at now", () => {
    const fees = createFeeConfig(
      { performanceFeeRate: 1_000n, managementFeeRate: 200n, withdrawalFeeRate: 100n },
      T0,
      1_000_000n,
    );
    expect(fees).toEqual(feeConfig());
    expect(() =>
      createFeeConfig({ performanceFeeRate: 9_999n, managementFeeRate: 0n, withdrawalFeeRate: 0n }, T0, 0n),
    ).toThrow(FeeError);
  });

  it("formats every field as a decimal string", () => {
    expect(formatFeeConfig(feeConfig())).toEqual({
      performanceFeeRate: "1000",
      managementFeeRate: "200",
      withdrawalFeeRate: "100",
      lastUpdateTimestamp: "1700000000",
      highWaterMark: "1000000",
    });
  });
});

// ─── Management Fee ──────────────────────────────────────────────────────

describe("accruedManagementFee", () => {
  const t = totals(1_000_000_000n, 1_000_000_000n, 1_000_000n);

  it("charges the full rate over one year", () => {
    // 200 * 1e9 * 1y / (1y * 10_000) = 2% of 1e9
    expect(engine.accruedManagementFee(feeConfig(), t, T0 + SECONDS_PER_YEAR)).toBe(20_000_000n);
  });

  it("accrues linearly", () => {
    expect(engine.accruedManagementFee(feeConfig(), t, T0 + SECONDS_PER_YEAR / 2n)).toBe(10_000_000n);
  });

  it("is zero with no elapsed time", () => {
    expect(engine.accruedManagementFee(feeConfig(), t, T0)).toBe(0n);
  });

  it("is zero when the clock is behind the last update", () => {
    expect(engine.accruedManagementFee(feeConfig(), t, T0 - 100n)).toBe(0n);
  });

  it("is zero at a zero rate", () => {
    expect(
      engine.accruedManagementFee(feeConfig({ managementFeeRate: 0n }), t, T0 + SECONDS_PER_YEAR),
    ).toBe(0n);
  });
});

// ─── Performance Fee ─────────────────────────────────────────────────────

describe("accruedPerformanceFee", () => {
  it("charges the rate on the whole supply's gain above the mark", () => {
    // 1_000 * 100_000 * 1e9 / (10_000 * 1e6) = 10_000_000
    const t = totals(1_100_000_000n, 1_000_000_000n, 1_100_000n);
    expect(engine.accruedPerformanceFee(feeConfig(), t)).toBe(10_000_000n);
  });

  it("is zero at the mark", () => {
    const t = totals(1_000_000_000n, 1_000_000_000n, 1_000_000n);
    expect(engine.accruedPerformanceFee(feeConfig(), t)).toBe(0n);
  });

  it("is zero below the mark", () => {
    const t = totals(900_000_000n, 1_000_000_000n, 900_000n);
    expect(engine.accruedPerformanceFee(feeConfig(), t)).toBe(0n);
  });
});

// ─── Settlement ──────────────────────────────────────────────────────────

describe("settle", () => {
  it("charges both fees and prices them in shares at the snapshot", () => {
    const t = conversion.toSnapshot(1_100_000_000n, 1_000_000_000n);
    expect(t.shareValue).toBe(1_099_999n);

    const now = T0 + SECONDS_PER_YEAR / 2n;
    const result = engine.settle(feeConfig(), t, now);

    // 200 * 1.1e9 * 0.5y / (1y * 10_000)
    expect(result.managementFee).toBe(11_000_000n);
    // 1_000 * 99_999 * 1e9 / 1e10
    expect(result.performanceFee).toBe(9_999_900n);
    expect(result.totalFee).toBe(20_999_900n);
    // 20_999_900 * (1e9 + 1) / (1.1e9 + 1)
    expect(result.feeShares).toBe(19_090_818n);
    expect(result.fees.highWaterMark).toBe(1_099_999n);
    expect(result.fees.lastUpdateTimestamp).toBe(now);
  });

  it("raises the mark but keeps lastUpdateTimestamp when nothing is charged", () => {
    const fees = feeConfig({ performanceFeeRate: 0n, managementFeeRate: 0n });
    const t = totals(1_200_000_000n, 1_000_000_000n, 1_200_000n);
    const result = engine.settle(fees, t, T0 + 3_600n);

    expect(result.totalFee).toBe(0n);
    expect(result.feeShares).toBe(0n);
    expect(result.fees.highWaterMark).toBe(1_200_000n);
    expect(result.fees.lastUpdateTimestamp).toBe(T0);
  });

  it("never lowers the mark", () => {
    const t = totals(500_000_000n, 1_000_000_000n, 500_000n);
    const result = engine.settle(feeConfig({ managementFeeRate: 0n }), t, T0 + 10n);
    expect(result.fees.highWaterMark).toBe(1_000_000n);
  });

  it("leaves the input configuration untouched", () => {
    const fees = feeConfig();
    engine.settle(fees, totals(2_000_000_000n, 1_000_000_000n, 2_000_000n), T0 + 60n);
    expect(fees).toEqual(feeConfig());
  });
});

// ─── Update ──────────────────────────────────────────────────────────────

describe("update", () => {
  it("settles under the old rates, then restarts the period", () => {
    const t = totals(1_000_000_000n, 1_000_000_000n, 1_000_000n);
    const now = T0 + SECONDS_PER_YEAR;
    const { settlement, fees } = engine.update(
      feeConfig(),
      { performanceFeeRate: 2_000n, managementFeeRate: 50n, withdrawalFeeRate: 0n },
      t,
      now,
    );

    expect(settlement.managementFee).toBe(20_000_000n);
    expect(fees).toEqual({
      performanceFeeRate: 2_000n,
      managementFeeRate: 50n,
      withdrawalFeeRate: 0n,
      lastUpdateTimestamp: now,
      highWaterMark: 1_000_000n,
    });
  });

  it("rejects invalid rates before settling", () => {
    const t = totals(1_000_000_000n, 1_000_000_000n, 1_000_000n);
    expect(() =>
      engine.update(
        feeConfig(),
        { performanceFeeRate: 0n, managementFeeRate: 0n, withdrawalFeeRate: 600n },
        t,
        T0 + 1n,
      ),
    ).toThrow(FeeError);
  });
});

// ─── Withdrawal Fee ──────────────────────────────────────────────────────

describe("withdrawalFee", () => {
  it("takes 1% of 100 as 1", () => {
    expect(engine.withdrawalFee(feeConfig(), 100n)).toBe(1n);
  });

  it("rounds up against the holder", () => {
    // 12_345 * 100 / 10_000 = 123.45 → 124
    expect(engine.withdrawalFee(feeConfig(), 12_345n)).toBe(124n);
    expect(engine.withdrawalFee(feeConfig(), 1n)).toBe(1n);
  });

  it("is zero at a zero rate", () => {
    expect(engine.withdrawalFee(feeConfig({ withdrawalFeeRate: 0n }), 12_345n)).toBe(0n);
  });
});
