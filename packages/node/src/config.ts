/**
 * @sluice/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { AccountId, AssetId } from "@sluice/types";
import type { AssetRate } from "@sluice/vault";
import type { Role } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

const bps = (fallback: string) => z.string().regex(/^\d+$/, "must be an integer").default(fallback).transform((v) => BigInt(v));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Vault
  CANONICAL_ASSET: z.string().min(1).default("USDC"),
  SHARE_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),
  DECIMALS_OFFSET: z.coerce.number().int().min(0).max(18).default(0),
  VAULT_ACCOUNT: z.string().min(1).default("vault"),
  FEE_RECIPIENT: z.string().min(1).default("fee-recipient"),
  ASSET_RATES: z.string().default(""),

  // Fees, in basis points
  PERFORMANCE_FEE_BPS: bps("0"),
  MANAGEMENT_FEE_BPS: bps("0"),
  WITHDRAWAL_FEE_BPS: bps("0"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  readonly role: Role;
  readonly account: AccountId;
}

function isRole(value: string): value is Role {
  return value === "admin" || value === "operator" || value === "viewer";
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:role1:account1,key2:role2:account2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const [key, role, account, ...rest] = entry.trim().split(":");
    if (key === undefined || role === undefined || account === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:role:account`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in API_KEYS. Must be: admin, operator, or viewer`,
      );
    }
    if (account === "") {
      throw new Error("Account cannot be empty in API_KEYS");
    }

    keys.push({ key, role, account });
  }

  return keys;
}

// =============================================================================
// Asset Rate Parsing
// =============================================================================

/**
 * Parse the ASSET_RATES env var.
 *
 * Format: "EURC:11:10,USDT:1:1", the underlying per asset unit as
 * numerator:denominator.
 */
export function parseAssetRates(raw: string): ReadonlyMap<AssetId, AssetRate> {
  const rates = new Map<AssetId, AssetRate>();
  if (raw.trim() === "") {
    return rates;
  }

  for (const entry of raw.split(",")) {
    const [asset, numerator, denominator, ...rest] = entry.trim().split(":");
    if (
      asset === undefined ||
      asset === "" ||
      numerator === undefined ||
      denominator === undefined ||
      rest.length > 0 ||
      !/^[1-9]\d*$/.test(numerator) ||
      !/^[1-9]\d*$/.test(denominator)
    ) {
      throw new Error(
        `Invalid ASSET_RATES entry: "${entry.trim()}". Expected format: asset:numerator:denominator with positive integers`,
      );
    }
    if (rates.has(asset)) {
      throw new Error(`Duplicate asset "${asset}" in ASSET_RATES`);
    }
    rates.set(asset, { numerator: BigInt(numerator), denominator: BigInt(denominator) });
  }

  return rates;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
