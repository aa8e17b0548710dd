/**
 * @souk/node — HTTP service exposing the exchange.
 */

export { ExchangeService, PRICE_DECIMALS } from "./services/exchange-service.js";
export type {
  ExchangeServiceConfig,
  OfferView,
  EscrowView,
  SettlementAccountView,
} from "./services/exchange-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
