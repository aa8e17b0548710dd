/**
 * Event query routes.
 *
 * GET /api/v1/events  — Committed domain events (cursor pagination)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";
import { paginate } from "../types/pagination.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(ListEventsQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.req.valid("query");

    const events = service.exchange.events.readAll({ type: query.type });
    const page = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (logged) => logged.position,
      "position",
    );

    return c.json({
      data: page.data.map((logged) => ({ position: logged.position, ...logged.event })),
      pagination: page.pagination,
    });
  });

  return routes;
}
