/**
 * @sluice/ledger — Types for the redemption ledger and conversion engine.
 *
 * Rules:
 * - All types are readonly
 * - Stored records are replaced, never mutated in place
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type {
  AccountId,
  AssetId,
  PendingRedeemView,
  ClaimableRedeemView,
} from "@sluice/types";

// ─── Collaborators ───────────────────────────────────────────────────────

/**
 * Per-asset rate source. Implemented outside the core (oracle, fixed table).
 * Both directions round down.
 */
export interface RateProvider {
  convertToUnderlying(asset: AssetId, amount: bigint): bigint;
  convertFromUnderlying(asset: AssetId, amount: bigint): bigint;
  isSupported(asset: AssetId): boolean;
}

/** Direction of a per-asset unit conversion. */
export type ConversionDirection = "toUnderlying" | "fromUnderlying";

/**
 * Static configuration of the conversion engine.
 */
export interface ConversionConfig {
  /** Asset whose per-asset conversion is the identity */
  readonly canonicalAsset: AssetId;

  /** Decimals of one whole share (10^shareDecimals base units) */
  readonly shareDecimals: number;

  /** Virtual share offset exponent; offset = 10^decimalsOffset. Default 0. */
  readonly decimalsOffset?: number | undefined;

  readonly rates: RateProvider;
}

// ─── Ledger Records ──────────────────────────────────────────────────────

/** A pending record with its key, as listed by the ledger. */
export interface PendingEntry {
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly shares: bigint;
  readonly requestTime: bigint;
}

/** A claimable record with its key, as listed by the ledger. */
export interface ClaimableEntry {
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly assets: bigint;
  readonly shares: bigint;
}

/** Aggregate ledger position, for one asset or across all assets. */
export interface LedgerTotals {
  readonly pendingShares: bigint;
  readonly claimableShares: bigint;
  readonly claimableAssets: bigint;
}

/**
 * Opaque in-memory checkpoint used to roll back a failed operation.
 */
export interface LedgerCheckpoint {
  readonly pending: ReadonlyMap<string, PendingEntry>;
  readonly claimable: ReadonlyMap<string, ClaimableEntry>;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the redemption ledger.
 * Used for persistence and rehydration.
 */
export interface RedeemLedgerSnapshot {
  readonly version: 1;
  readonly pending: readonly (PendingRedeemView & {
    readonly account: AccountId;
    readonly asset: AssetId;
  })[];
  readonly claimable: readonly (ClaimableRedeemView & {
    readonly account: AccountId;
    readonly asset: AssetId;
  })[];
  readonly createdAt: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger and conversion operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_PENDING_SHARES"
  | "INSUFFICIENT_CLAIMABLE_SHARES"
  | "INSUFFICIENT_CLAIMABLE_ASSETS"
  | "TOO_MANY_SHARES"
  | "TOO_MANY_ASSETS"
  | "ASSET_NOT_SUPPORTED"
  | "INVALID_AMOUNT"
  | "INVALID_SNAPSHOT"
  | "MATH_OVERFLOW";

/**
 * Structured error from the ledger engine.
 * Always thrown, never returned.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
