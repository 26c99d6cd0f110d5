/**
 * Authentication and authorization types.
 *
 * Supports three ways to identify the caller:
 * 1. API key via X-Api-Key header
 * 2. JWT bearer token via Authorization header
 * 3. X-Principal header (unsecured mode only: dev and tests)
 *
 * Every caller resolves to a custody principal and a role.
 */

import type { Principal } from "@custody/types";

// =============================================================================
// Roles
// =============================================================================

/**
 * - owner: may read any account's history and the full event log
 * - holder: may act on and read only its own account
 */
export type Role = "owner" | "holder";

export const ROLES: readonly Role[] = ["owner", "holder"];

export function isRole(value: string): value is Role {
  return value === "owner" || value === "holder";
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt" | "header";
  readonly principal: Principal;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly principal: Principal;
}

// =============================================================================
// JWT Claims
// =============================================================================

export interface JwtClaims {
  /** The custody principal */
  readonly sub: Principal;
  readonly role: Role;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
