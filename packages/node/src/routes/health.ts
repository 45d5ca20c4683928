/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (journal hash chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { VaultService } from "../services/vault-service.js";

export function createHealthRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.verifyJournal();
    const ready = integrity.valid;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        journal: {
          status: ready ? "ok" : "down",
          lastVerifiedPosition: integrity.lastVerifiedPosition,
          errors: integrity.errors.length,
        },
        paused: service.pause.isPaused(),
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
