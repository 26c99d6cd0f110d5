/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - JWT bearer auth (valid, invalid, expired, wrong issuer)
 * - X-Principal header mode
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../../src/types/auth.js";
import {
  authMiddleware,
  principalHeaderMiddleware,
  verifyJwt,
} from "../../src/middleware/auth.js";
import { createTestApp, jsonRequest, signToken } from "../setup.js";

const JWT_SECRET = "test-secret";

function makeApp(apiKeys: ApiKeyRecord[] = [], withJwt = true) {
  const keyMap = new Map<string, ApiKeyRecord>();
  for (const k of apiKeys) {
    keyMap.set(k.key, k);
  }

  const app = new Hono<AppEnv>();
  app.use(
    "*",
    authMiddleware({
      apiKeys: keyMap,
      jwtSecret: withJwt ? JWT_SECRET : undefined,
      jwtIssuer: "custody",
    }),
  );
  app.get("/test", (c) => {
    const auth = c.get("auth");
    return c.json({ auth });
  });

  return app;
}

function futureExp(): number {
  return Math.floor(Date.now() / 1000) + 3600;
}

// =============================================================================
// API Key
// =============================================================================

describe("API Key auth", () => {
  it("resolves the key to its principal and role", async () => {
    const app = makeApp([{ key: "key-1", role: "holder", principal: "alice" }]);

    const res = await app.request("/test", { headers: { "X-Api-Key": "key-1" } });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({ type: "api-key", principal: "alice", role: "holder" });
  });

  it("returns 401 for an unknown API key", async () => {
    const app = makeApp([{ key: "key-1", role: "holder", principal: "alice" }]);
    const res = await app.request("/test", { headers: { "X-Api-Key": "nope" } });
    expect(res.status).toBe(401);
  });

  it("returns 401 when no credentials are given", async () => {
    const res = await makeApp().request("/test");
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: "Authentication required" },
    });
  });
});

// =============================================================================
// JWT
// =============================================================================

describe("JWT auth", () => {
  it("accepts a valid token", async () => {
    const token = signToken(
      { sub: "bob", role: "owner", iss: "custody", exp: futureExp() },
      JWT_SECRET,
    );

    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({ type: "jwt", principal: "bob", role: "owner" });
  });

  it("rejects a token signed with another secret", async () => {
    const token = signToken(
      { sub: "bob", role: "holder", iss: "custody", exp: futureExp() },
      "other-secret",
    );
    const res = await makeApp().request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });
    expect(res.status).toBe(401);
  });

  it("rejects an expired token", () => {
    const token = signToken(
      { sub: "bob", role: "holder", iss: "custody", exp: 1000 },
      JWT_SECRET,
    );
    expect(verifyJwt(token, JWT_SECRET)).toBeUndefined();
  });

  it("rejects the wrong issuer", () => {
    const token = signToken(
      { sub: "bob", role: "holder", iss: "elsewhere", exp: futureExp() },
      JWT_SECRET,
    );
    expect(verifyJwt(token, JWT_SECRET, "custody")).toBeUndefined();
    expect(verifyJwt(token, JWT_SECRET)?.sub).toBe("bob");
  });

  it("rejects an unknown role", () => {
    const token = signToken({ sub: "bob", role: "admin", exp: futureExp() }, JWT_SECRET);
    expect(verifyJwt(token, JWT_SECRET)).toBeUndefined();
  });

  it("rejects a token that is not HS256", () => {
    const token = signToken(
      { sub: "bob", role: "holder", exp: futureExp() },
      JWT_SECRET,
      { alg: "none", typ: "JWT" },
    );
    expect(verifyJwt(token, JWT_SECRET)).toBeUndefined();
  });

  it("checks expiry against the given clock", () => {
    const token = signToken({ sub: "bob", role: "holder", iss: "custody", exp: 2000 }, JWT_SECRET);
    expect(verifyJwt(token, JWT_SECRET, "custody", 1999)).toEqual({
      sub: "bob",
      role: "holder",
      iss: "custody",
      exp: 2000,
      iat: 1,
    });
    expect(verifyJwt(token, JWT_SECRET, "custody", 2001)).toBeUndefined();
  });

  it("returns 401 for a bearer token when JWT is not configured", async () => {
    const token = signToken({ sub: "bob", role: "holder", exp: futureExp() }, JWT_SECRET);
    const res = await makeApp([], false).request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error: { code: "UNAUTHORIZED", message: "JWT authentication not configured" },
    });
  });

  it("rejects malformed tokens", () => {
    expect(verifyJwt("not-a-jwt", JWT_SECRET)).toBeUndefined();
    expect(verifyJwt("a.b.c", JWT_SECRET)).toBeUndefined();
  });
});

// =============================================================================
// X-Principal header
// =============================================================================

describe("principalHeaderMiddleware", () => {
  function headerApp() {
    const app = new Hono<AppEnv>();
    app.use("*", principalHeaderMiddleware("root"));
    app.get("/test", (c) => c.json({ auth: c.get("auth") }));
    return app;
  }

  it("makes the named principal a holder", async () => {
    const res = await headerApp().request("/test", { headers: { "X-Principal": "alice" } });
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({ type: "header", principal: "alice", role: "holder" });
  });

  it("makes the owner principal an owner", async () => {
    const res = await headerApp().request("/test", { headers: { "X-Principal": "root" } });
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth.role).toBe("owner");
  });

  it("returns 401 for a blank principal", async () => {
    const res = await headerApp().request("/test", { headers: { "X-Principal": "   " } });
    expect(res.status).toBe(401);
  });
});

// =============================================================================
// Secured app
// =============================================================================

describe("secured app", () => {
  it("ignores X-Principal once credentials are configured", async () => {
    const { app } = createTestApp({
      auth: {
        apiKeys: new Map([["k-alice", { key: "k-alice", role: "holder", principal: "alice" }]]),
      },
    });

    const spoofed = await app.request(
      jsonRequest("/api/v1/deposits", "POST", { amount: "5" }, { "X-Principal": "alice" }),
    );
    expect(spoofed.status).toBe(401);

    const res = await app.request(
      jsonRequest("/api/v1/deposits", "POST", { amount: "5" }, { "X-Api-Key": "k-alice" }),
    );
    expect(res.status).toBe(201);
  });
});
