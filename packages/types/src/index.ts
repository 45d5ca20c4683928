/**
 * @sluice/types — Shared domain types for the Sluice stack.
 *
 * Used across all packages:
 * - Redemption records (pending, claimable)
 * - Fee configuration and vault totals
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type {
  AccountId,
  AssetId,
  UnixSeconds,
  PendingRedeem,
  ClaimableRedeem,
  FeeConfig,
  Totals,
  PendingRedeemView,
  ClaimableRedeemView,
} from "./financial.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isUintString,
  isUint,
  isPendingRedeemView,
  isClaimableRedeemView,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
