/**
 * Notification log routes.
 *
 * GET /api/v1/events — Owner: every event. Holder: its own account's events.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");
    const auth = c.get("auth");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const query = queryResult.data;
    const visible = auth.role === "owner"
      ? service.readAllEvents()
      : service.readAccountEvents(auth.principal);
    const after = query.afterPosition;
    const events = after !== undefined
      ? visible.filter((e) => e.globalPosition > after)
      : visible;

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.globalPosition,
    );

    return c.json(result);
  });

  return routes;
}
