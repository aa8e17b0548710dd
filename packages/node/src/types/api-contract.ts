/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { ExchangeService } from "../services/exchange-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The exchange instance served by this app */
    service: ExchangeService;

    /** Acting principal from X-Principal (set by principal middleware) */
    principal: string;
  };
}
