/**
 * Authentication middleware.
 *
 * Supports two strategies:
 * 1. API key via X-Api-Key header → looked up in the configured key registry
 * 2. JWT bearer token via Authorization header → HMAC-SHA256 signature verify
 *
 * Presented credentials must be valid (401 otherwise); on success the
 * caller is stored with `c.set("auth", ...)`. Requests without credentials
 * pass through unauthenticated and reach only the routes no permission
 * guards, which are the reads.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { Context, MiddlewareHandler } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext, ApiKeyRecord, JwtClaims, Permission } from "../types/auth.js";
import { JwtClaimsSchema, hasPermission } from "../types/auth.js";
import { ApiError } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** JWT HMAC secret (if JWT auth is enabled) */
  readonly jwtSecret?: string | undefined;
  /** Expected JWT issuer */
  readonly jwtIssuer?: string | undefined;
}

/**
 * Create authentication middleware. Tries X-Api-Key first, then
 * Authorization: Bearer. `now` is Unix seconds and checks JWT expiry.
 */
export function authMiddleware(
  config: AuthConfig,
  now: () => number = () => Math.floor(Date.now() / 1000),
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    let auth: AuthContext | undefined;

    // Strategy 1: API Key
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey !== undefined) {
      const record = config.apiKeys.get(apiKey);
      if (record === undefined) {
        throw new ApiError("UNAUTHORIZED", 401, "Invalid API key");
      }
      auth = { type: "api-key", identity: record.identity, role: record.role };
    }

    // Strategy 2: JWT Bearer
    if (auth === undefined) {
      const authHeader = c.req.header("Authorization");
      if (authHeader !== undefined && authHeader.startsWith("Bearer ")) {
        if (config.jwtSecret === undefined) {
          throw new ApiError("UNAUTHORIZED", 401, "JWT authentication not configured");
        }
        const claims = verifyJwt(authHeader.slice(7), config.jwtSecret, now(), config.jwtIssuer);
        if (claims === undefined) {
          throw new ApiError("UNAUTHORIZED", 401, "Invalid or expired JWT");
        }
        auth = { type: "jwt", identity: claims.sub, role: claims.role };
      }
    }

    c.set("auth", auth);
    await next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Create a permission guard. Must run after authMiddleware: 401 without a
 * caller, 403 when the caller's role lacks the permission.
 */
export function requirePermission(permission: Permission): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (auth === undefined) {
      throw new ApiError("UNAUTHORIZED", 401, "Authentication required");
    }
    if (!hasPermission(auth.role, permission)) {
      throw new ApiError("FORBIDDEN", 403, `Role '${auth.role}' lacks '${permission}' permission`);
    }
    await next();
  };
}

/** The authenticated caller; route handlers run behind requirePermission. */
export function senderOf(c: Context<AppEnv>): string {
  const auth = c.get("auth");
  if (auth === undefined) {
    throw new ApiError("UNAUTHORIZED", 401, "Authentication required");
  }
  return auth.identity;
}

// =============================================================================
// JWT Helpers
// =============================================================================

const HeaderSchema = z.object({ alg: z.literal("HS256") });

function decodeSegment(segment: string): unknown {
  try {
    const decoded: unknown = JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
    return decoded;
  } catch {
    return undefined;
  }
}

function sign(input: string, secret: string): Buffer {
  return createHmac("sha256", secret).update(input).digest();
}

/**
 * Verify an HS256 JWT.
 *
 * @returns Decoded claims, or undefined if invalid or expired at `now`.
 */
export function verifyJwt(
  token: string,
  secret: string,
  now: number,
  expectedIssuer?: string,
): JwtClaims | undefined {
  const [headerB64, payloadB64, signatureB64, ...rest] = token.split(".");
  if (
    headerB64 === undefined ||
    payloadB64 === undefined ||
    signatureB64 === undefined ||
    rest.length > 0
  ) {
    return undefined;
  }

  const expected = sign(`${headerB64}.${payloadB64}`, secret);
  const presented = Buffer.from(signatureB64, "base64url");
  if (presented.length !== expected.length || !timingSafeEqual(presented, expected)) {
    return undefined;
  }

  const header = HeaderSchema.safeParse(decodeSegment(headerB64));
  if (!header.success) {
    return undefined;
  }

  const claims = JwtClaimsSchema.safeParse(decodeSegment(payloadB64));
  if (!claims.success) {
    return undefined;
  }
  if (claims.data.exp < now) {
    return undefined;
  }
  if (expectedIssuer !== undefined && claims.data.iss !== expectedIssuer) {
    return undefined;
  }
  return claims.data;
}

/**
 * Create a signed JWT for testing/bootstrapping.
 */
export function signJwt(
  claims: Omit<JwtClaims, "iat"> & { iat?: number },
  secret: string,
): string {
  const header = Buffer.from(JSON.stringify({ alg: "HS256", typ: "JWT" })).toString("base64url");
  const payload = Buffer.from(
    JSON.stringify({ ...claims, iat: claims.iat ?? Math.floor(Date.now() / 1000) }),
  ).toString("base64url");
  const signature = sign(`${header}.${payload}`, secret).toString("base64url");
  return `${header}.${payload}.${signature}`;
}
