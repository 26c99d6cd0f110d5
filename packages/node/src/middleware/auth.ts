/**
 * Caller identity.
 *
 * Secured mode (`authMiddleware`) resolves the caller from an X-Api-Key
 * header, or failing that an HS256 bearer token, to a principal and role.
 * Unsecured mode (`principalHeaderMiddleware`) takes the caller from the
 * X-Principal header and is meant for dev and tests only.
 *
 * Either way the result lands in `c.get("auth")`; anything else is a 401.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { Context, MiddlewareHandler } from "hono";
import { isPrincipal } from "@custody/types";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext, ApiKeyRecord, JwtClaims } from "../types/auth.js";
import { isRole } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export interface AuthConfig {
  /** API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
  /** HS256 secret; bearer tokens are refused without it */
  readonly jwtSecret?: string | undefined;
  /** Required `iss` claim, if set */
  readonly jwtIssuer?: string | undefined;
}

type Resolution =
  | { readonly ok: true; readonly auth: AuthContext }
  | { readonly ok: false; readonly message: string };

function unauthorized(c: Context<AppEnv>, message: string): Response {
  return c.json(createErrorEnvelope("UNAUTHORIZED", message), 401);
}

function fromApiKey(keys: AuthConfig["apiKeys"], key: string): Resolution {
  const record = keys.get(key);
  if (record === undefined) {
    return { ok: false, message: "Invalid API key" };
  }
  return { ok: true, auth: { type: "api-key", principal: record.principal, role: record.role } };
}

function fromBearer(config: AuthConfig, token: string): Resolution {
  if (config.jwtSecret === undefined) {
    return { ok: false, message: "JWT authentication not configured" };
  }
  const claims = verifyJwt(token, config.jwtSecret, config.jwtIssuer);
  if (claims === undefined) {
    return { ok: false, message: "Invalid or expired JWT" };
  }
  return { ok: true, auth: { type: "jwt", principal: claims.sub, role: claims.role } };
}

/**
 * Secured mode. An X-Api-Key header wins over Authorization: Bearer.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header("X-Api-Key");
    const authorization = c.req.header("Authorization");

    let resolved: Resolution;
    if (apiKey !== undefined) {
      resolved = fromApiKey(config.apiKeys, apiKey);
    } else if (authorization?.startsWith("Bearer ") === true) {
      resolved = fromBearer(config, authorization.slice("Bearer ".length));
    } else {
      resolved = { ok: false, message: "Authentication required" };
    }

    if (!resolved.ok) {
      return unauthorized(c, resolved.message);
    }
    c.set("auth", resolved.auth);
    return next();
  };
}

/**
 * Unsecured mode: the X-Principal header names the caller, who is an
 * owner exactly when it names `ownerPrincipal`.
 */
export function principalHeaderMiddleware(
  ownerPrincipal: string | undefined,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const principal = c.req.header("X-Principal");
    if (!isPrincipal(principal)) {
      return unauthorized(c, "X-Principal header required");
    }

    c.set("auth", {
      type: "header",
      principal,
      role: principal === ownerPrincipal ? "owner" : "holder",
    });
    return next();
  };
}

// =============================================================================
// JWT
// =============================================================================

function decodeSegment(segment: string): Record<string, unknown> | undefined {
  try {
    const value: unknown = JSON.parse(Buffer.from(segment, "base64url").toString("utf-8"));
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      return undefined;
    }
    return Object.fromEntries(Object.entries(value));
  } catch {
    return undefined;
  }
}

function signatureMatches(signingInput: string, signature: string, secret: string): boolean {
  const expected = createHmac("sha256", secret).update(signingInput).digest();
  const given = Buffer.from(signature, "base64url");
  return given.length === expected.length && timingSafeEqual(given, expected);
}

/**
 * Verify an HS256 token and read its custody claims.
 *
 * @param nowSeconds - Unix time to check `exp` against
 * @returns The claims, or undefined for a bad signature, algorithm,
 *   shape, issuer or an expired token.
 */
export function verifyJwt(
  token: string,
  secret: string,
  expectedIssuer?: string,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): JwtClaims | undefined {
  const parts = token.split(".");
  if (parts.length !== 3) {
    return undefined;
  }
  const [headerB64, payloadB64, signatureB64] = parts as [string, string, string];

  if (!signatureMatches(`${headerB64}.${payloadB64}`, signatureB64, secret)) {
    return undefined;
  }
  if (decodeSegment(headerB64)?.["alg"] !== "HS256") {
    return undefined;
  }

  const payload = decodeSegment(payloadB64);
  if (payload === undefined) {
    return undefined;
  }

  const { sub, role, exp, iat, iss } = payload;
  if (
    !isPrincipal(sub) ||
    typeof role !== "string" ||
    !isRole(role) ||
    typeof exp !== "number" ||
    typeof iat !== "number" ||
    exp < nowSeconds
  ) {
    return undefined;
  }
  if (expectedIssuer !== undefined && iss !== expectedIssuer) {
    return undefined;
  }

  return { sub, role, iss: typeof iss === "string" ? iss : "", exp, iat };
}
