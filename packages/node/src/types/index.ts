/**
 * Type barrel — re-exports all public types from @sluice/node.
 */

// DTOs
export {
  UintStringSchema,
  AccountSchema,
  AssetSchema,
  PaginationQuerySchema,
  DepositSchema,
  ReportTotalAssetsSchema,
  RequestRedeemSchema,
  CancelRedeemSchema,
  FulfillSchema,
  FulfillBatchSchema,
  WithdrawSchema,
  RedeemSchema,
  OperatorSchema,
  UpdateFeesSchema,
  CreditSchema,
  PauseSchema,
  ListEventsQuerySchema,
  SharePriceQuerySchema,
} from "./dto.js";
export type {
  DepositDto,
  ReportTotalAssetsDto,
  RequestRedeemDto,
  CancelRedeemDto,
  FulfillDto,
  FulfillBatchDto,
  WithdrawDto,
  RedeemDto,
  OperatorDto,
  UpdateFeesDto,
  CreditDto,
  PauseDto,
  ListEventsQuery,
  SharePriceQuery,
} from "./dto.js";

// Views
export type {
  TotalsView,
  AccountingView,
  FulfillResultView,
  SettlementView,
  SharePriceSampleView,
  SharePriceSummaryView,
  EventView,
} from "./views.js";

// Error
export { ApiError, createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// Auth
export { ROLE_PERMISSIONS, ROLE_VAULT_ROLES, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
