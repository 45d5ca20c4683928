/**
 * Financial Types
 *
 * Core records of the redemption ledger and the fee engine.
 *
 * Rules:
 * - All amounts are bigint inside the core (no floating point)
 * - Amounts cross serialization boundaries as base-10 integer strings
 * - Timestamps are unix seconds
 */

/** Identifier of a holder, controller, operator, or system account. */
export type AccountId = string;

/** Identifier of a supported asset (token symbol or address). */
export type AssetId = string;

/** Unix timestamp in seconds. */
export type UnixSeconds = number;

/**
 * Shares escrowed for a future fulfillment, keyed by (account, asset).
 * Not yet priced.
 */
export interface PendingRedeem {
  readonly shares: bigint;

  /** Time of the latest request; 0 once the record is empty. */
  readonly requestTime: bigint;
}

/**
 * A fulfilled redemption awaiting withdrawal, keyed by (account, asset).
 * The (assets, shares) pair locks the exchange ratio.
 */
export interface ClaimableRedeem {
  readonly assets: bigint;
  readonly shares: bigint;
}

/**
 * Fee configuration. One instance per vault.
 * Rates are scaled to FEE_SCALE (10_000 = 100%).
 */
export interface FeeConfig {
  readonly performanceFeeRate: bigint;
  readonly managementFeeRate: bigint;
  readonly withdrawalFeeRate: bigint;
  readonly lastUpdateTimestamp: bigint;

  /** Share value at the last settlement. Never decreases. */
  readonly highWaterMark: bigint;
}

/**
 * Vault totals at one instant. Computed, never persisted.
 */
export interface Totals {
  readonly totalAssets: bigint;
  readonly totalSupply: bigint;

  /** Underlying value of one whole share unit at these totals. */
  readonly shareValue: bigint;
}

/** JSON form of a PendingRedeem. */
export interface PendingRedeemView {
  readonly shares: string;
  readonly requestTime: string;
}

/** JSON form of a ClaimableRedeem. */
export interface ClaimableRedeemView {
  readonly assets: string;
  readonly shares: string;
}
