/**
 * Account and ledger query routes.
 *
 * GET /api/v1/accounts/:principal          — Balance and counters
 * GET /api/v1/accounts/:principal/history  — Deposits and withdrawals (self or owner)
 * GET /api/v1/capacity                     — Limits and remaining capacity
 * GET /api/v1/stats                        — Global counters and held balance
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  toAccountResponse,
  toCapacityResponse,
  toStatsResponse,
} from "../types/dto.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/accounts/:principal", (c) => {
    const service = c.get("service");
    const account = service.getAccount(c.req.param("principal"));
    return c.json({ data: toAccountResponse(account) });
  });

  routes.get("/accounts/:principal/history", (c) => {
    const service = c.get("service");
    const { principal: caller } = c.get("auth");

    // Throws CustodyError(NOT_AUTHORIZED) → 403
    const history = service.historyOf(caller, c.req.param("principal"));

    return c.json({
      data: {
        principal: history.principal,
        deposits: history.deposits.map((a) => a.toString()),
        withdrawals: history.withdrawals.map((a) => a.toString()),
      },
    });
  });

  routes.get("/capacity", (c) => {
    const service = c.get("service");
    return c.json({ data: toCapacityResponse(service.capacity()) });
  });

  routes.get("/stats", (c) => {
    const service = c.get("service");
    return c.json({ data: toStatsResponse(service.globalStats()) });
  });

  return routes;
}
