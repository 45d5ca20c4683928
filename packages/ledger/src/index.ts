/**
 * @sluice/ledger — Redemption ledger and conversion engine.
 *
 * A pure TypeScript core with zero runtime dependencies.
 * Enforces the redemption accounting invariants:
 * - Every stored quantity fits its declared bit width
 * - Pending and claimable records never go negative
 * - Claimable (assets, shares) pairs keep their locked ratio
 * - All conversions round in the vault's favor
 * - All arithmetic uses bigint (no floating point)
 */

// Redemption ledger
export {
  RedeemLedger,
  PENDING_SHARES_MAX,
  REQUEST_TIME_MAX,
  CLAIMABLE_ASSETS_MAX,
  CLAIMABLE_SHARES_MAX,
} from "./redeem-ledger.js";
export type { RedeemLedgerOptions } from "./redeem-ledger.js";

// Conversion engine
export {
  ConversionEngine,
  sharesToUnderlying,
  underlyingToShares,
} from "./conversion.js";

// Bounded-width arithmetic
export {
  maxUint,
  MAX_UINT64,
  MAX_UINT128,
  MAX_UINT192,
  MAX_UINT256,
  assertUint,
  assertUint256,
  fitsUint,
  mulDiv,
  pow10,
  maxOf,
  minOf,
  parseUint,
  formatUint,
} from "./uint-math.js";
export type { UintWidth, Rounding } from "./uint-math.js";

// Types
export type {
  RateProvider,
  ConversionDirection,
  ConversionConfig,
  PendingEntry,
  ClaimableEntry,
  LedgerTotals,
  LedgerCheckpoint,
  RedeemLedgerSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
