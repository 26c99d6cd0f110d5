/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (ledger invariants + event chain integrity)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { CustodyService } from "../services/custody-service.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly detail?: string | undefined;
}

export function createHealthRoutes(service: CustodyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const { ready, invariants, integrity } = service.checkReadiness();

    const ledger: SubsystemStatus = invariants.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: invariants.violations.map((v) => `${v.invariant}: ${v.detail}`).join("; "),
        };

    const eventStore: SubsystemStatus = integrity.valid
      ? { status: "ok" }
      : {
          status: "down",
          detail: `chainValid=false, lastVerifiedPosition=${integrity.lastVerifiedPosition}, errors=${integrity.errors.length}`,
        };

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        heldBalance: invariants.heldBalance.toString(),
        subsystems: { ledger, eventStore },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
