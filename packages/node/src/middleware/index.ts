/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, validateQuery } from "./validate.js";
export { principalMiddleware, PRINCIPAL_HEADER } from "./principal.js";
