/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (custody reserve matches deposits)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ExchangeService } from "../services/exchange-service.js";

export function createHealthRoutes(service: ExchangeService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = service.isReady();
    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        settlement: service.config.settlementSymbol,
        events: service.exchange.events.length,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
