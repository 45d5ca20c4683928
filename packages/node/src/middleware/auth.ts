/**
 * Authentication middleware.
 *
 * Secured mode: the X-Api-Key header is looked up in the configured key
 * registry; the key's account becomes the caller.
 * Unsecured mode (development, tests): the caller is the X-Account header.
 *
 * On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const ACCOUNT_HEADER = "X-Account";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", { identity: record.key, role: record.role, account: record.account });
    c.set("caller", record.account);
    return next();
  };
}

/**
 * Unsecured mode: act as the account named in X-Account.
 */
export function accountHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const account = c.req.header(ACCOUNT_HEADER);
    if (account === undefined || account === "") {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `${ACCOUNT_HEADER} header required`),
        401,
      );
    }
    c.set("caller", account);
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Must run AFTER authMiddleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}
