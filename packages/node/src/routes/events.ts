/**
 * Event query routes.
 *
 * GET /api/v1/events — Committed wrapper notifications (cursor pagination)
 *
 * Query: type, afterPosition, cursor, limit.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema, toNotificationDto } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    const events = service
      .readEvents({ type: query.type, afterPosition: query.afterPosition })
      .map(toNotificationDto);

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.position,
      "position",
    );

    return c.json(result);
  });

  return routes;
}
