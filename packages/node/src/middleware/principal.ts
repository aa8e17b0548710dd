/**
 * Caller identity middleware.
 *
 * Reads the acting principal from the X-Principal header. Requests
 * without one are rejected with 401.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const PRINCIPAL_HEADER = "X-Principal";

export function principalMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const principal = c.req.header(PRINCIPAL_HEADER)?.trim();
    if (principal === undefined || principal === "") {
      return c.json(
        createErrorEnvelope("UNAUTHENTICATED", `Missing ${PRINCIPAL_HEADER} header`),
        401,
      );
    }

    c.set("principal", principal);
    await next();
  };
}
