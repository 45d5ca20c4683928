/**
 * @sluice/ledger — Conversion engine.
 *
 * Pure conversions between shares, the canonical accounting unit
 * ("underlying") and per-asset units, against a totals snapshot.
 *
 *   sharesToUnderlying = shares * (totalAssets + 1) / (totalSupply + offset)
 *   underlyingToShares = assets * (totalSupply + offset) / (totalAssets + 1)
 *
 * The +1 / +offset virtual terms keep the ratio defined on an empty
 * vault and blunt share-inflation attacks. Every conversion rounds down.
 */

import type { AssetId, Totals } from "@sluice/types";
import type { ConversionConfig, ConversionDirection, RateProvider } from "./types.js";
import { LedgerError } from "./types.js";
import { assertUint, assertUint256, mulDiv, pow10 } from "./uint-math.js";

// ─── Pure Functions ──────────────────────────────────────────────────────

/**
 * Underlying value of `shares` at the given totals. Rounds down.
 */
export function sharesToUnderlying(
  shares: bigint,
  totalAssets: bigint,
  totalSupply: bigint,
  offset: bigint = 1n,
): bigint {
  assertUint(shares, "shares");
  assertUint(totalAssets, "totalAssets");
  assertUint(totalSupply, "totalSupply");
  return mulDiv(shares, totalAssets + 1n, totalSupply + offset, "down");
}

/**
 * Shares worth `assets` underlying at the given totals. Rounds down.
 */
export function underlyingToShares(
  assets: bigint,
  totalAssets: bigint,
  totalSupply: bigint,
  offset: bigint = 1n,
): bigint {
  assertUint(assets, "assets");
  assertUint(totalAssets, "totalAssets");
  assertUint(totalSupply, "totalSupply");
  return mulDiv(assets, totalSupply + offset, totalAssets + 1n, "down");
}

// ─── Engine ──────────────────────────────────────────────────────────────

/**
 * Conversion engine bound to one vault's constants.
 * Holds no mutable state.
 */
export class ConversionEngine {
  readonly canonicalAsset: AssetId;
  readonly offset: bigint;
  readonly oneShareUnit: bigint;
  private readonly _rates: RateProvider;

  constructor(config: ConversionConfig) {
    const decimalsOffset = config.decimalsOffset ?? 0;
    if (!Number.isInteger(decimalsOffset) || decimalsOffset < 0 || decimalsOffset > 18) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `decimalsOffset must be an integer in [0, 18], got ${String(decimalsOffset)}`,
      );
    }
    if (!Number.isInteger(config.shareDecimals) || config.shareDecimals < 0 || config.shareDecimals > 36) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `shareDecimals must be an integer in [0, 36], got ${String(config.shareDecimals)}`,
      );
    }

    this.canonicalAsset = config.canonicalAsset;
    this.offset = pow10(decimalsOffset);
    this.oneShareUnit = pow10(config.shareDecimals);
    this._rates = config.rates;
  }

  sharesToUnderlying(shares: bigint, totalAssets: bigint, totalSupply: bigint): bigint {
    return sharesToUnderlying(shares, totalAssets, totalSupply, this.offset);
  }

  underlyingToShares(assets: bigint, totalAssets: bigint, totalSupply: bigint): bigint {
    return underlyingToShares(assets, totalAssets, totalSupply, this.offset);
  }

  /**
   * Build a Totals snapshot, pricing one whole share.
   */
  toSnapshot(totalAssets: bigint, totalSupply: bigint): Totals {
    return {
      totalAssets,
      totalSupply,
      shareValue: this.sharesToUnderlying(this.oneShareUnit, totalAssets, totalSupply),
    };
  }

  /**
   * Whether `asset` can be converted (canonical or known to the rate source).
   */
  isSupported(asset: AssetId): boolean {
    return asset === this.canonicalAsset || this._rates.isSupported(asset);
  }

  /**
   * Throws ASSET_NOT_SUPPORTED unless `asset` can be converted.
   */
  assertSupported(asset: AssetId): void {
    if (!this.isSupported(asset)) {
      throw new LedgerError("ASSET_NOT_SUPPORTED", `Asset not supported: "${asset}"`);
    }
  }

  /**
   * Convert between per-asset units and underlying.
   * Identity for the canonical asset; otherwise delegated to the rate source.
   */
  convertAssetUnits(asset: AssetId, amount: bigint, direction: ConversionDirection): bigint {
    assertUint(amount);
    if (asset === this.canonicalAsset) {
      return amount;
    }
    this.assertSupported(asset);

    const converted =
      direction === "toUnderlying"
        ? this._rates.convertToUnderlying(asset, amount)
        : this._rates.convertFromUnderlying(asset, amount);

    assertUint(converted, `converted ${asset} amount`);
    return assertUint256(converted, `converted ${asset} amount`);
  }
}
