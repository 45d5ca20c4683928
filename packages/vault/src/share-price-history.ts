/**
 * Share-price history.
 *
 * Periodic samples of the vault totals, and the performance figures
 * derived from them: total return, TVL change and annualized return.
 * All figures are integer basis points, floored.
 */

import type { UnixSeconds } from "@sluice/types";
import { SECONDS_PER_YEAR } from "@sluice/fees";
import { VaultError } from "./types.js";

const BPS = 10_000n;

export interface SharePriceSample {
  readonly timestamp: UnixSeconds;
  readonly totalAssets: bigint;
  readonly totalSupply: bigint;
  readonly shareValue: bigint;
}

export interface SharePriceSummary {
  readonly from: UnixSeconds;
  readonly to: UnixSeconds;
  readonly samples: number;
  readonly firstShareValue: bigint;
  readonly lastShareValue: bigint;
  readonly minShareValue: bigint;
  readonly maxShareValue: bigint;
  readonly returnBps: bigint;
  readonly tvlChangeBps: bigint;
  readonly aprBps: bigint;
}

export interface SharePriceHistoryOptions {
  /** Oldest samples are dropped past this count. Default 10_000. */
  readonly maxSamples?: number | undefined;
}

export class SharePriceHistory {
  private readonly _samples: SharePriceSample[] = [];
  private readonly _maxSamples: number;

  constructor(options?: SharePriceHistoryOptions) {
    this._maxSamples = options?.maxSamples ?? 10_000;
    if (!Number.isInteger(this._maxSamples) || this._maxSamples < 1) {
      throw new VaultError("INVALID_CONFIG", `maxSamples must be a positive integer, got ${this._maxSamples}`);
    }
  }

  /**
   * Append a sample. A sample at the latest timestamp replaces it;
   * an older one is rejected.
   */
  record(sample: SharePriceSample): void {
    if (sample.totalAssets < 0n || sample.totalSupply < 0n || sample.shareValue < 0n) {
      throw new VaultError("INVALID_OBSERVATION", "Sample amounts must be non-negative");
    }

    const latest = this.latest();
    if (latest !== undefined && sample.timestamp < latest.timestamp) {
      throw new VaultError(
        "INVALID_OBSERVATION",
        `Sample at ${sample.timestamp} is older than the latest sample at ${latest.timestamp}`,
      );
    }

    if (latest !== undefined && sample.timestamp === latest.timestamp) {
      this._samples[this._samples.length - 1] = sample;
      return;
    }

    this._samples.push(sample);
    if (this._samples.length > this._maxSamples) {
      this._samples.shift();
    }
  }

  /** Whether a sample at `timestamp` would be accepted. */
  accepts(timestamp: UnixSeconds): boolean {
    const latest = this.latest();
    return latest === undefined || timestamp >= latest.timestamp;
  }

  latest(): SharePriceSample | undefined {
    return this._samples[this._samples.length - 1];
  }

  samples(from?: UnixSeconds): readonly SharePriceSample[] {
    return from === undefined ? [...this._samples] : this._samples.filter((s) => s.timestamp >= from);
  }

  /**
   * Performance over the samples at or after `from`; undefined when
   * there are none.
   */
  summary(options?: { readonly from?: UnixSeconds | undefined }): SharePriceSummary | undefined {
    const window = this.samples(options?.from);
    const first = window[0];
    const last = window[window.length - 1];
    if (first === undefined || last === undefined) {
      return undefined;
    }

    let minShareValue = first.shareValue;
    let maxShareValue = first.shareValue;
    for (const sample of window) {
      if (sample.shareValue < minShareValue) minShareValue = sample.shareValue;
      if (sample.shareValue > maxShareValue) maxShareValue = sample.shareValue;
    }

    const returnBps = changeBps(first.shareValue, last.shareValue);
    const elapsed = BigInt(last.timestamp - first.timestamp);

    return {
      from: first.timestamp,
      to: last.timestamp,
      samples: window.length,
      firstShareValue: first.shareValue,
      lastShareValue: last.shareValue,
      minShareValue,
      maxShareValue,
      returnBps,
      tvlChangeBps: changeBps(first.totalAssets, last.totalAssets),
      aprBps: elapsed === 0n ? 0n : floorDiv(returnBps * SECONDS_PER_YEAR, elapsed),
    };
  }
}

/** (to - from) * 10_000 / from, floored; 0 when `from` is 0. */
function changeBps(from: bigint, to: bigint): bigint {
  return from === 0n ? 0n : floorDiv((to - from) * BPS, from);
}

/** Division rounding toward negative infinity. Divisor is positive. */
function floorDiv(a: bigint, b: bigint): bigint {
  const q = a / b;
  return a % b !== 0n && a < 0n ? q - 1n : q;
}
