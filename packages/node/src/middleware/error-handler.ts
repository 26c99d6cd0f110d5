/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Custody rejections keep their code and structured detail;
 * structural faults become a 500 with the message hidden.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { rejectionDetails } from "@custody/types";
import { CustodyError } from "@custody/ledger";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<string, ContentfulStatusCode> = {
  // Rejections
  ZERO_AMOUNT: 400,
  NOT_AUTHORIZED: 403,
  REENTRANCY_REJECTED: 409,
  CAPACITY_EXCEEDED: 422,
  INSUFFICIENT_BALANCE: 422,
  WITHDRAW_LIMIT_EXCEEDED: 422,
  TRANSFER_FAILED: 502,

  // Ledger input faults
  INVALID_AMOUNT: 400,
  INVALID_PRINCIPAL: 400,

  // Event store
  INVALID_POSITION: 400,
  INVALID_STREAM_ID: 400,
};

function codeOf(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function getStatusCode(code: string | undefined): ContentfulStatusCode {
  if (code !== undefined) {
    return STATUS_MAP[code] ?? 500;
  }
  return 500;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = codeOf(err);
  const status = getStatusCode(code);

  if (status === 500) {
    // Don't leak internal details
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  if (err instanceof CustodyError) {
    const details = rejectionDetails(err.rejection);
    return c.json(
      createErrorEnvelope(
        err.code,
        err.message,
        Object.keys(details).length > 0 ? details : undefined,
      ),
      status,
    );
  }

  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message), status);
}
