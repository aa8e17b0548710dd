/**
 * Route barrel — re-exports all route factories.
 */

export { createHealthRoutes } from "./health.js";
export { createProfileRoutes } from "./profiles.js";
export { createBalanceRoutes } from "./balances.js";
export { createOfferRoutes } from "./offers.js";
export { createEscrowRoutes } from "./escrows.js";
export { createEventRoutes } from "./events.js";
export { createSettlementRoutes } from "./settlement.js";
export type { SettlementRouteOptions } from "./settlement.js";
