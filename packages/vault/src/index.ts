/**
 * @sluice/vault — Asynchronous redemptions for a multi-asset vault.
 *
 * - RedemptionController: request → fulfill → withdraw/redeem, cancel,
 *   batch fulfillment against one snapshot, deposits, valuation, fees
 * - Collaborator interfaces and their in-memory implementations
 * - SharePriceHistory: sampled totals and derived return figures
 *
 * Design rules:
 * - Every mutating operation is atomic and non-reentrant
 * - Ledger and totals change before any asset leaves the vault
 * - Withdraw and redeem stay open while the vault is paused
 */

// Controller
export { RedemptionController, REQUEST_ID } from "./redemption-controller.js";

// In-memory collaborators
export {
  InMemoryShareToken,
  InMemoryAssetCustody,
  StaticRateProvider,
  InMemoryAccessGate,
  PauseSwitch,
  ManualClock,
  systemClock,
} from "./adapters.js";
export type { AssetRate } from "./adapters.js";

// Share-price history
export { SharePriceHistory } from "./share-price-history.js";
export type {
  SharePriceSample,
  SharePriceSummary,
  SharePriceHistoryOptions,
} from "./share-price-history.js";

// Events
export { VAULT_EVENTS, VAULT_STREAM, redeemStreamId } from "./events.js";
export type {
  VaultEventType,
  VaultEventPayloads,
  RedeemRequestedPayload,
  RedeemCanceledPayload,
  RedeemFulfilledPayload,
  RedeemWithdrawnPayload,
  VaultDepositedPayload,
  TotalAssetsReportedPayload,
  FeesSettledPayload,
  FeesUpdatedPayload,
} from "./events.js";

// Types
export { VaultError, supportsRollback } from "./types.js";
export type {
  ShareToken,
  AssetTransfer,
  AccessGate,
  PauseGate,
  Clock,
  Rollback,
  VaultRole,
  RedemptionControllerConfig,
  FulfillEntry,
  FulfillResult,
  VaultAccounting,
  VaultErrorCode,
} from "./types.js";
