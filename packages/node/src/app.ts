/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can build the app without starting
 * the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { ExchangeService } from "./services/exchange-service.js";
import type { ExchangeServiceConfig } from "./services/exchange-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { principalMiddleware } from "./middleware/principal.js";
import { createHealthRoutes } from "./routes/health.js";
import { createProfileRoutes } from "./routes/profiles.js";
import { createBalanceRoutes } from "./routes/balances.js";
import { createOfferRoutes } from "./routes/offers.js";
import { createEscrowRoutes } from "./routes/escrows.js";
import { createEventRoutes } from "./routes/events.js";
import { createSettlementRoutes } from "./routes/settlement.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: ExchangeServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ExchangeService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new ExchangeService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no caller identity required) ────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", principalMiddleware());
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/profiles", createProfileRoutes());
  app.route("/api/v1/balances", createBalanceRoutes());
  app.route("/api/v1/offers", createOfferRoutes());
  app.route("/api/v1/escrows", createEscrowRoutes());
  app.route("/api/v1/events", createEventRoutes());
  app.route(
    "/api/v1/settlement",
    createSettlementRoutes({ mintEnabled: options.serviceConfig.mintEnabled }),
  );

  return { app, service };
}
