/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { AccountId } from "@sluice/types";
import type { VaultService } from "../services/vault-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The vault service (set for every /api request) */
    service: VaultService;

    /** Account the request acts as (API key account, or X-Account) */
    caller: AccountId;

    /** Authentication context (set by auth middleware in secured mode) */
    auth: AuthContext;
  };
}
