/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Separated from
 * main.ts so tests create the app without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { VaultService } from "./services/vault-service.js";
import type { VaultServiceConfig } from "./services/vault-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { accountHeaderMiddleware, authMiddleware, requirePermission } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createVaultRoutes } from "./routes/vault.js";
import { createRedemptionRoutes } from "./routes/redemptions.js";
import { createEventRoutes } from "./routes/events.js";
import { createMetricsRoutes } from "./routes/metrics.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: Omit<VaultServiceConfig, "logger">;
  /** Defaults to a silent logger */
  readonly logger?: Logger | undefined;
  /** Auth configuration. When provided, API-key auth is enabled. */
  readonly auth?: AuthConfig | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VaultService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const service = new VaultService({ ...options.serviceConfig, logger });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(logger));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
    app.on(["POST", "PUT"], "/api/*", requirePermission("write"));
  } else {
    app.use("/api/*", accountHeaderMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1", createVaultRoutes());
  app.route("/api/v1", createRedemptionRoutes());
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1/metrics", createMetricsRoutes());

  return { app, service };
}
