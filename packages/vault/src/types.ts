/**
 * Vault Types
 *
 * Collaborator interfaces and records for the redemption controller.
 * The controller composes independent capabilities instead of one
 * token/vault/access-control type:
 *
 * 1. ShareToken — share balances, mint and burn
 * 2. AssetTransfer — custody of the supported assets
 * 3. AccessGate — delegation and roles
 * 4. PauseGate — the external pause flag
 * 5. Clock — unix seconds
 *
 * Rules:
 * - All records are readonly
 * - Amounts are bigint; collaborators fail loudly, they never clamp
 */

import type { AccountId, AssetId, UnixSeconds } from "@sluice/types";
import type { ConversionEngine } from "@sluice/ledger";
import type { FeeRates } from "@sluice/fees";
import type { EventStore } from "@sluice/event-store";
import type { SharePriceHistory } from "./share-price-history.js";

// =============================================================================
// Collaborators
// =============================================================================

export interface ShareToken {
  balanceOf(account: AccountId): bigint;
  totalSupply(): bigint;
  mint(to: AccountId, shares: bigint): void;
  burn(from: AccountId, shares: bigint): void;
  transfer(from: AccountId, to: AccountId, shares: bigint): void;
}

/**
 * Asset custody. `transfer` pays out of the vault's own holdings.
 *
 * A failed operation is only undone here when the implementation also
 * provides `checkpoint()` (see Rollback). Without it, transfers made
 * before the failure stand, so a fulfillment batch is atomic for custody
 * only with rollback support. A batch makes at most one fee transfer per
 * asset, after every entry has been priced.
 */
export interface AssetTransfer {
  transfer(asset: AssetId, to: AccountId, amount: bigint): void;
  transferFrom(asset: AssetId, from: AccountId, to: AccountId, amount: bigint): void;
}

export type VaultRole = "operator" | "valuation" | "admin";

export interface AccessGate {
  /** True when `caller` is `controller` itself or an approved delegate. */
  isAuthorized(controller: AccountId, caller: AccountId): boolean;
  hasRole(role: VaultRole, account: AccountId): boolean;
}

export interface PauseGate {
  isPaused(): boolean;
}

export interface Clock {
  /** Whole seconds; anything else fails the operation with INVALID_TIMESTAMP. */
  now(): UnixSeconds;
}

/**
 * A collaborator that can undo its own changes. `checkpoint()` returns
 * a function restoring the state at the time of the call.
 */
export interface Rollback {
  checkpoint(): () => void;
}

export function supportsRollback(value: object): value is Rollback {
  return "checkpoint" in value && typeof value.checkpoint === "function";
}

// =============================================================================
// Configuration
// =============================================================================

export interface RedemptionControllerConfig {
  readonly conversion: ConversionEngine;
  readonly shares: ShareToken;
  readonly custody: AssetTransfer;
  readonly access: AccessGate;
  readonly pause: PauseGate;
  readonly clock: Clock;

  /** Holds escrowed shares and the vault's assets */
  readonly vaultAccount: AccountId;

  /** Receives fee shares and withdrawal fees */
  readonly feeRecipient: AccountId;

  readonly feeRates: FeeRates;

  /** Valuation at construction, in underlying. Default 0. */
  readonly initialTotalAssets?: bigint | undefined;

  /** Journal for domain events */
  readonly journal?: EventStore | undefined;

  /** Sampled after every successful mutating operation */
  readonly history?: SharePriceHistory | undefined;

  /** Event and correlation ID source. Default: crypto.randomUUID */
  readonly generateId?: (() => string) | undefined;
}

// =============================================================================
// Operations
// =============================================================================

export interface FulfillEntry {
  readonly asset: AssetId;
  readonly shares: bigint;
  readonly controller: AccountId;
}

/** Pricing of one fulfilled entry. */
export interface FulfillResult {
  readonly asset: AssetId;
  readonly controller: AccountId;
  readonly shares: bigint;

  /** Gross value in underlying, removed from totalAssets */
  readonly underlying: bigint;

  /** Gross amount in asset units */
  readonly grossAssets: bigint;

  /** Withdrawal fee in asset units, paid to the fee recipient */
  readonly fee: bigint;

  /** Amount made claimable */
  readonly assets: bigint;
}

/**
 * Counters behind the conservation check:
 *   pendingShares + claimableShares + circulatingSupply
 *     == totalMinted - sharesRedeemed
 */
export interface VaultAccounting {
  readonly totalMinted: bigint;
  readonly sharesRedeemed: bigint;
  readonly pendingShares: bigint;
  readonly claimableShares: bigint;
  readonly claimableAssets: bigint;
  readonly escrowedShares: bigint;
  readonly circulatingSupply: bigint;
}

// =============================================================================
// Errors
// =============================================================================

export type VaultErrorCode =
  | "UNAUTHORIZED"
  | "PAUSED"
  | "INSUFFICIENT_BALANCE"
  | "LENGTH_MISMATCH"
  | "REENTRANT_CALL"
  | "NOTHING_TO_REDEEM"
  | "NOTHING_TO_WITHDRAW"
  | "NOTHING_TO_MINT"
  | "NO_PENDING_REDEEM"
  | "INVALID_OBSERVATION"
  | "INVALID_CONFIG"
  | "RESERVED_ACCOUNT"
  | "INVALID_TIMESTAMP";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}
