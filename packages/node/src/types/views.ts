/**
 * Response views: the JSON forms of controller results. Every amount is
 * rendered as a base-10 string.
 */

import type {
  ClaimableRedeem,
  ClaimableRedeemView,
  PendingRedeem,
  PendingRedeemView,
  Totals,
} from "@sluice/types";
import type { FeeSettlement } from "@sluice/fees";
import type { StoredEvent } from "@sluice/event-store";
import type { FulfillResult, SharePriceSample, SharePriceSummary, VaultAccounting } from "@sluice/vault";

export interface TotalsView {
  readonly totalAssets: string;
  readonly totalSupply: string;
  readonly shareValue: string;
}

export function totalsView(totals: Totals): TotalsView {
  return {
    totalAssets: totals.totalAssets.toString(),
    totalSupply: totals.totalSupply.toString(),
    shareValue: totals.shareValue.toString(),
  };
}

export interface AccountingView {
  readonly totalMinted: string;
  readonly sharesRedeemed: string;
  readonly pendingShares: string;
  readonly claimableShares: string;
  readonly claimableAssets: string;
  readonly escrowedShares: string;
  readonly circulatingSupply: string;
}

export function accountingView(accounting: VaultAccounting): AccountingView {
  return {
    totalMinted: accounting.totalMinted.toString(),
    sharesRedeemed: accounting.sharesRedeemed.toString(),
    pendingShares: accounting.pendingShares.toString(),
    claimableShares: accounting.claimableShares.toString(),
    claimableAssets: accounting.claimableAssets.toString(),
    escrowedShares: accounting.escrowedShares.toString(),
    circulatingSupply: accounting.circulatingSupply.toString(),
  };
}

export interface FulfillResultView {
  readonly asset: string;
  readonly controller: string;
  readonly shares: string;
  readonly underlying: string;
  readonly grossAssets: string;
  readonly fee: string;
  readonly assets: string;
}

export function fulfillResultView(result: FulfillResult): FulfillResultView {
  return {
    asset: result.asset,
    controller: result.controller,
    shares: result.shares.toString(),
    underlying: result.underlying.toString(),
    grossAssets: result.grossAssets.toString(),
    fee: result.fee.toString(),
    assets: result.assets.toString(),
  };
}

export function pendingView(pending: PendingRedeem): PendingRedeemView {
  return { shares: pending.shares.toString(), requestTime: pending.requestTime.toString() };
}

export function claimableView(claimable: ClaimableRedeem): ClaimableRedeemView {
  return { assets: claimable.assets.toString(), shares: claimable.shares.toString() };
}

export interface SettlementView {
  readonly managementFee: string;
  readonly performanceFee: string;
  readonly totalFee: string;
  readonly feeShares: string;
  readonly highWaterMark: string;
}

export function settlementView(settlement: FeeSettlement): SettlementView {
  return {
    managementFee: settlement.managementFee.toString(),
    performanceFee: settlement.performanceFee.toString(),
    totalFee: settlement.totalFee.toString(),
    feeShares: settlement.feeShares.toString(),
    highWaterMark: settlement.fees.highWaterMark.toString(),
  };
}

export interface SharePriceSampleView {
  readonly timestamp: number;
  readonly totalAssets: string;
  readonly totalSupply: string;
  readonly shareValue: string;
}

export function sampleView(sample: SharePriceSample): SharePriceSampleView {
  return {
    timestamp: sample.timestamp,
    totalAssets: sample.totalAssets.toString(),
    totalSupply: sample.totalSupply.toString(),
    shareValue: sample.shareValue.toString(),
  };
}

export interface SharePriceSummaryView {
  readonly from: number;
  readonly to: number;
  readonly samples: number;
  readonly firstShareValue: string;
  readonly lastShareValue: string;
  readonly minShareValue: string;
  readonly maxShareValue: string;
  readonly returnBps: string;
  readonly tvlChangeBps: string;
  readonly aprBps: string;
}

export function summaryView(summary: SharePriceSummary): SharePriceSummaryView {
  return {
    from: summary.from,
    to: summary.to,
    samples: summary.samples,
    firstShareValue: summary.firstShareValue.toString(),
    lastShareValue: summary.lastShareValue.toString(),
    minShareValue: summary.minShareValue.toString(),
    maxShareValue: summary.maxShareValue.toString(),
    returnBps: summary.returnBps.toString(),
    tvlChangeBps: summary.tvlChangeBps.toString(),
    aprBps: summary.aprBps.toString(),
  };
}

export interface EventView {
  readonly streamId: string;
  readonly version: number;
  readonly globalPosition: number;
  readonly appendedAt: string;
  readonly hash: string;
  readonly type: string;
  readonly metadata: StoredEvent["event"]["metadata"];
  readonly payload: StoredEvent["event"]["payload"];
}

export function eventView(stored: StoredEvent): EventView {
  return {
    streamId: stored.streamId,
    version: stored.version,
    globalPosition: stored.globalPosition,
    appendedAt: stored.appendedAt,
    hash: stored.hash,
    type: stored.event.type,
    metadata: stored.event.metadata,
    payload: stored.event.payload,
  };
}
