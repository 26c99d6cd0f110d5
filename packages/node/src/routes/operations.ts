/**
 * Custody operation routes. The caller always acts on its own account.
 *
 * POST /api/v1/deposits     — Deposit into the caller's account
 * POST /api/v1/withdrawals  — Withdraw to the caller
 * POST /api/v1/receive      — Unsolicited inbound value for the caller
 */

import { Hono } from "hono";
import type { Context } from "hono";
import { parseAmount } from "@custody/ledger";
import type { OperationContext } from "@custody/vault";
import type { AppEnv } from "../types/api-contract.js";
import { AmountRequestSchema, toOperationResponse } from "../types/dto.js";
import type { AmountRequestDto } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

function operationContext(c: Context<AppEnv>): OperationContext {
  return {
    actor: c.get("auth").principal,
    correlationId: c.get("requestId"),
  };
}

export function createOperationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/deposits
  routes.post("/deposits", validateBody(AmountRequestSchema), async (c) => {
    const service = c.get("service");
    const { principal } = c.get("auth");
    const body = c.get("validatedBody") as AmountRequestDto;

    const receipt = await service.deposit(
      principal,
      parseAmount(body.amount),
      operationContext(c),
    );

    return c.json({ data: toOperationResponse(receipt) }, 201);
  });

  // POST /api/v1/withdrawals
  routes.post("/withdrawals", validateBody(AmountRequestSchema), async (c) => {
    const service = c.get("service");
    const { principal } = c.get("auth");
    const body = c.get("validatedBody") as AmountRequestDto;

    const receipt = await service.withdraw(
      principal,
      parseAmount(body.amount),
      operationContext(c),
    );

    return c.json({ data: toOperationResponse(receipt) }, 201);
  });

  // POST /api/v1/receive
  routes.post("/receive", validateBody(AmountRequestSchema), async (c) => {
    const service = c.get("service");
    const { principal } = c.get("auth");
    const body = c.get("validatedBody") as AmountRequestDto;

    const receipt = await service.receive(
      principal,
      parseAmount(body.amount),
      operationContext(c),
    );

    return c.json({ data: toOperationResponse(receipt) }, 201);
  });

  return routes;
}
