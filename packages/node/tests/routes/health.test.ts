/**
 * Tests for health and readiness routes.
 */

import { describe, it, expect, vi } from "vitest";
import { createTestApp } from "../setup.js";

describe("GET /health", () => {
  it("returns ok without authentication", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { status: string };
    expect(body.status).toBe("ok");
  });

  it("echoes the request ID", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health", { headers: { "X-Request-Id": "req-health-1" } });
    expect(res.headers.get("X-Request-Id")).toBe("req-health-1");
  });
});

describe("GET /ready", () => {
  it("is ready when invariants hold and the chain verifies", async () => {
    const { app, service } = createTestApp();
    await service.deposit("alice", 100n);

    const res = await app.request("/ready");
    expect(res.status).toBe(200);

    const body = (await res.json()) as {
      status: string;
      heldBalance: string;
      subsystems: Record<string, { status: string }>;
    };
    expect(body.status).toBe("ready");
    expect(body.heldBalance).toBe("100");
    expect(body.subsystems).toEqual({
      ledger: { status: "ok" },
      eventStore: { status: "ok" },
    });
  });

  it("reports not_ready when the event chain fails to verify", async () => {
    const { app, service } = createTestApp();
    await service.deposit("alice", 100n);
    vi.spyOn(service.eventStore, "verifyIntegrity").mockReturnValue({
      valid: false,
      lastVerifiedPosition: 0,
      errors: [{ position: 1, reason: "Hash mismatch at position 1" }],
    });

    const res = await app.request("/ready");
    expect(res.status).toBe(503);

    const body = (await res.json()) as {
      status: string;
      subsystems: Record<string, { status: string; detail?: string }>;
    };
    expect(body.status).toBe("not_ready");
    expect(body.subsystems["ledger"]).toEqual({ status: "ok" });
    expect(body.subsystems["eventStore"]).toEqual({
      status: "down",
      detail: "chainValid=false, lastVerifiedPosition=0, errors=1",
    });
  });
});
