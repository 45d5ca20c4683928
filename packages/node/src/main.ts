/**
 * @sluice/node — Entry point.
 *
 * Loads config, bootstraps the Hono app, starts the HTTP server and
 * handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys, parseAssetRates } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";
import { ROLE_VAULT_ROLES } from "./types/auth.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const parsedKeys = parseApiKeys(config.API_KEYS);
  let auth: AuthConfig | undefined;
  if (parsedKeys.length > 0) {
    const apiKeys = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      apiKeys.set(k.key, k);
    }
    auth = { apiKeys };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; callers act as the X-Account header");
  }

  const { app } = createApp({
    serviceConfig: {
      canonicalAsset: config.CANONICAL_ASSET,
      shareDecimals: config.SHARE_DECIMALS,
      decimalsOffset: config.DECIMALS_OFFSET,
      vaultAccount: config.VAULT_ACCOUNT,
      feeRecipient: config.FEE_RECIPIENT,
      assetRates: parseAssetRates(config.ASSET_RATES),
      feeRates: {
        performanceFeeRate: config.PERFORMANCE_FEE_BPS,
        managementFeeRate: config.MANAGEMENT_FEE_BPS,
        withdrawalFeeRate: config.WITHDRAWAL_FEE_BPS,
      },
      roles: parsedKeys.map((k) => ({ account: k.account, roles: ROLE_VAULT_ROLES[k.role] })),
    },
    logger,
    auth,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, canonicalAsset: config.CANONICAL_ASSET },
    "Sluice node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
