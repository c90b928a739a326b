/**
 * Authentication and authorization types.
 *
 * Two strategies:
 * 1. API key via X-Api-Key header
 * 2. JWT bearer token via Authorization header
 *
 * Either one resolves to the identity the protocol sees as the caller.
 */

import { z } from "zod";

// =============================================================================
// Roles & Permissions
// =============================================================================

export const ROLES = ["admin", "operator", "staker", "relayer"] as const;

export type Role = (typeof ROLES)[number];

export type Permission = "transact" | "collect-rewards" | "administer" | "relay";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  staker: ["transact"],
  operator: ["transact", "collect-rewards"],
  admin: ["transact", "collect-rewards", "administer"],
  relayer: ["relay"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved caller, set by the auth middleware. `identity` is the address
 * every protocol call is made as.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt";
  readonly identity: string;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly identity: string;
}

// =============================================================================
// JWT Claims
// =============================================================================

export const JwtClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(ROLES),
  iss: z.string().default(""),
  exp: z.number().int(),
  iat: z.number().int(),
});

export type JwtClaims = z.infer<typeof JwtClaimsSchema>;
