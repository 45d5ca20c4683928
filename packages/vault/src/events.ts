/**
 * Vault domain events.
 *
 * Naming convention: `<subsystem>.<action>`
 *
 * Streams:
 * - redeem:<asset>:<controller> — one redemption slot's history
 * - vault — deposits, valuations and fee settlements
 *
 * Amounts are integer strings. Payloads are type aliases so they fit
 * the store's Record<string, unknown> payload slot.
 */

import type { AccountId, AssetId } from "@sluice/types";
import type { FeeConfigView } from "@sluice/fees";

export const VAULT_EVENTS = {
  REDEEM_REQUESTED: "redeem.requested",
  REDEEM_CANCELED: "redeem.canceled",
  REDEEM_FULFILLED: "redeem.fulfilled",
  REDEEM_WITHDRAWN: "redeem.withdrawn",
  VAULT_DEPOSITED: "vault.deposited",
  TOTAL_ASSETS_REPORTED: "vault.total_assets_reported",
  FEES_SETTLED: "fees.settled",
  FEES_UPDATED: "fees.updated",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

export const VAULT_STREAM = "vault";

export function redeemStreamId(asset: AssetId, controller: AccountId): string {
  return `redeem:${asset}:${controller}`;
}

// =============================================================================
// Redemption Events
// =============================================================================

export type RedeemRequestedPayload = {
  readonly asset: AssetId;
  readonly controller: AccountId;
  readonly owner: AccountId;
  readonly shares: string;
  readonly pendingShares: string;
};

export type RedeemCanceledPayload = {
  readonly asset: AssetId;
  readonly controller: AccountId;
  readonly receiver: AccountId;
  readonly shares: string;
  readonly pendingShares: string;
};

export type RedeemFulfilledPayload = {
  readonly asset: AssetId;
  readonly controller: AccountId;
  readonly shares: string;
  readonly underlying: string;
  readonly assets: string;
  readonly fee: string;
  readonly batchSize: number;
};

export type RedeemWithdrawnPayload = {
  readonly asset: AssetId;
  readonly controller: AccountId;
  readonly receiver: AccountId;
  readonly assets: string;
  readonly shares: string;
  readonly mode: "withdraw" | "redeem";
};

// =============================================================================
// Vault Events
// =============================================================================

export type VaultDepositedPayload = {
  readonly asset: AssetId;
  readonly owner: AccountId;
  readonly receiver: AccountId;
  readonly amount: string;
  readonly underlying: string;
  readonly shares: string;
};

export type TotalAssetsReportedPayload = {
  readonly previous: string;
  readonly totalAssets: string;
};

export type FeesSettledPayload = {
  readonly managementFee: string;
  readonly performanceFee: string;
  readonly feeShares: string;
  readonly recipient: AccountId;
  readonly highWaterMark: string;
};

export type FeesUpdatedPayload = {
  readonly fees: FeeConfigView;
};

/** Payload carried by each event type. */
export type VaultEventPayloads = {
  readonly "redeem.requested": RedeemRequestedPayload;
  readonly "redeem.canceled": RedeemCanceledPayload;
  readonly "redeem.fulfilled": RedeemFulfilledPayload;
  readonly "redeem.withdrawn": RedeemWithdrawnPayload;
  readonly "vault.deposited": VaultDepositedPayload;
  readonly "vault.total_assets_reported": TotalAssetsReportedPayload;
  readonly "fees.settled": FeesSettledPayload;
  readonly "fees.updated": FeesUpdatedPayload;
};
