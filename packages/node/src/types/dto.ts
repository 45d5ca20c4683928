/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Amounts travel
 * as base-10 unsigned integer strings and parse to bigint.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

export const UintStringSchema = z
  .string()
  .regex(/^(0|[1-9]\d*)$/, "must be a base-10 unsigned integer string")
  .transform((v) => BigInt(v));

export const AccountSchema = z.string().min(1).max(128);
export const AssetSchema = z.string().min(1).max(64);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Deposits and Valuation
// =============================================================================

export const DepositSchema = z.object({
  asset: AssetSchema,
  amount: UintStringSchema,
  /** Defaults to the caller */
  receiver: AccountSchema.optional(),
  /** Defaults to the caller */
  owner: AccountSchema.optional(),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const ReportTotalAssetsSchema = z.object({
  totalAssets: UintStringSchema,
});

export type ReportTotalAssetsDto = z.infer<typeof ReportTotalAssetsSchema>;

// =============================================================================
// Redemption Requests
// =============================================================================

export const RequestRedeemSchema = z.object({
  asset: AssetSchema,
  shares: UintStringSchema,
  controller: AccountSchema.optional(),
  owner: AccountSchema.optional(),
});

export type RequestRedeemDto = z.infer<typeof RequestRedeemSchema>;

/** Without `shares`, the whole pending amount is canceled. */
export const CancelRedeemSchema = z.object({
  asset: AssetSchema,
  shares: UintStringSchema.optional(),
  controller: AccountSchema.optional(),
  receiver: AccountSchema.optional(),
});

export type CancelRedeemDto = z.infer<typeof CancelRedeemSchema>;

// =============================================================================
// Fulfillment
// =============================================================================

export const FulfillSchema = z.object({
  asset: AssetSchema,
  shares: UintStringSchema,
  controller: AccountSchema,
});

export type FulfillDto = z.infer<typeof FulfillSchema>;

export const FulfillBatchSchema = z.object({
  entries: z.array(FulfillSchema).max(500),
});

export type FulfillBatchDto = z.infer<typeof FulfillBatchSchema>;

// =============================================================================
// Claims
// =============================================================================

export const WithdrawSchema = z.object({
  asset: AssetSchema,
  assets: UintStringSchema,
  receiver: AccountSchema.optional(),
  controller: AccountSchema.optional(),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const RedeemSchema = z.object({
  asset: AssetSchema,
  shares: UintStringSchema,
  receiver: AccountSchema.optional(),
  controller: AccountSchema.optional(),
});

export type RedeemDto = z.infer<typeof RedeemSchema>;

export const OperatorSchema = z.object({
  operator: AccountSchema,
  approved: z.boolean(),
});

export type OperatorDto = z.infer<typeof OperatorSchema>;

// =============================================================================
// Fees
// =============================================================================

export const UpdateFeesSchema = z.object({
  performanceFeeRate: UintStringSchema,
  managementFeeRate: UintStringSchema,
  withdrawalFeeRate: UintStringSchema,
});

export type UpdateFeesDto = z.infer<typeof UpdateFeesSchema>;

// =============================================================================
// Administration
// =============================================================================

export const CreditSchema = z.object({
  holder: AccountSchema,
  asset: AssetSchema,
  amount: UintStringSchema,
});

export type CreditDto = z.infer<typeof CreditSchema>;

export const PauseSchema = z.object({
  paused: z.boolean(),
});

export type PauseDto = z.infer<typeof PauseSchema>;

// =============================================================================
// Queries
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  streamId: z.string().min(1).optional(),
  correlationId: z.string().min(1).optional(),
  type: z.string().min(1).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;

export const SharePriceQuerySchema = z.object({
  from: z.coerce.number().int().min(0).optional(),
});

export type SharePriceQuery = z.infer<typeof SharePriceQuerySchema>;
