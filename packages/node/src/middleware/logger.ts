/**
 * Structured request logging middleware.
 *
 * Hands one entry per request to the supplied sink; main.ts writes
 * them through pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Caller, once authenticated */
  readonly principal?: string | undefined;
}

/**
 * Logs method, path, status, duration and caller after each request.
 */
export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      principal: c.get("auth")?.principal,
    });
  };
}
