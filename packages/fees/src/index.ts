/**
 * @sluice/fees — Fee accrual for the vault.
 *
 * - Management fee: linear in time and total assets
 * - Performance fee: above a single global high-water mark
 * - Withdrawal fee: charged at fulfillment, rounded up
 * - Hard ceilings per fee type
 */

export {
  FeeAccrualEngine,
  validateFeeRates,
  createFeeConfig,
  formatFeeConfig,
} from "./fee-engine.js";

export {
  FEE_SCALE,
  SECONDS_PER_YEAR,
  MAX_PERFORMANCE_FEE_RATE,
  MAX_MANAGEMENT_FEE_RATE,
  MAX_WITHDRAWAL_FEE_RATE,
  FeeError,
} from "./types.js";

export type {
  FeeRates,
  FeeConfigView,
  FeeSettlement,
  FeeUpdate,
  FeeErrorCode,
} from "./types.js";
