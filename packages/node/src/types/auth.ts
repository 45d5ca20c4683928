/**
 * Authentication and authorization types.
 *
 * API keys via the X-Api-Key header. Each key acts as one vault account.
 *
 * Role hierarchy: admin > operator > viewer
 */

import type { AccountId } from "@sluice/types";
import type { VaultRole } from "@sluice/vault";

// =============================================================================
// Roles & Permissions
// =============================================================================

export type Role = "admin" | "operator" | "viewer";

/** Permission levels for role-based access control */
export type Permission = "read" | "write" | "admin";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

/** Vault capabilities granted to the account behind each role */
export const ROLE_VAULT_ROLES: Record<Role, readonly VaultRole[]> = {
  viewer: [],
  operator: ["operator", "valuation"],
  admin: ["operator", "valuation", "admin"],
};

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly identity: string;
  readonly role: Role;
  readonly account: AccountId;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly account: AccountId;
}
