/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { CustodyService } from "../services/custody-service.js";
import type { AuthContext } from "./auth.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The custody instance serving this app */
    service: CustodyService;

    /** Resolved caller (set by auth middleware) */
    auth: AuthContext;

    /** Parsed request body (set by validateBody) */
    validatedBody: unknown;
  };
}
