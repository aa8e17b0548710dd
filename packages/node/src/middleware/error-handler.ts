/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps exchange and settlement error codes to HTTP status codes.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ExchangeError } from "@souk/exchange";
import { SettlementError } from "@souk/settlement";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

export const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Exchange: validation
  INVALID_INPUT: 400,
  INVALID_ADDRESS: 400,
  INVALID_PRICE_PARAMETERS: 400,
  CANNOT_TRADE_WITH_SELF: 400,
  TRADE_AMOUNT_TOO_LOW: 400,
  TRADE_AMOUNT_TOO_HIGH: 400,

  // Exchange: authorization
  UNAUTHORIZED: 403,

  // Exchange: lookup and state
  OFFER_NOT_FOUND: 404,
  ESCROW_NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  PROFILE_REQUIRED: 409,
  OFFER_INACTIVE: 409,
  INVALID_STATE: 409,
  REENTRANT_CALL: 409,

  // Exchange: resources and timing
  INSUFFICIENT_BALANCE: 422,
  ACTIVE_ESCROWS_EXIST: 422,
  ESCROW_TIMEOUT: 422,

  // Settlement
  INVALID_AMOUNT: 400,
  INSUFFICIENT_ALLOWANCE: 422,
  INSUFFICIENT_FUNDS: 422,
};

function domainCode(err: Error): string | undefined {
  if (err instanceof ExchangeError || err instanceof SettlementError) {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof HTTPException) {
    const code = err.status === 400 ? "VALIDATION_ERROR" : "HTTP_ERROR";
    return c.json(createErrorEnvelope(code, err.message), err.status);
  }

  const code = domainCode(err);
  const status = code !== undefined ? STATUS_MAP[code] : undefined;

  // Don't leak internal details
  if (code === undefined || status === undefined) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message), status);
}
