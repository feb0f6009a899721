/**
 * Event query routes.
 *
 * GET /api/v1/events  — Committed distributor events (cursor pagination,
 *                       optional ?type= filter)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListEventsQuerySchema } from "../types/dto.js";
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
      .events()
      .filter((e) => query.type === undefined || e.type === query.type);

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.metadata.sequence,
      "sequence",
    );

    return c.json(result);
  });

  return routes;
}
