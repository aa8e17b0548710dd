/**
 * @souk/exchange — Escrow-mediated peer-to-peer trading engine.
 *
 * Sellers deposit the settlement asset into custody and publish priced
 * offers. Buyers open escrows that lock part of the seller's deposit
 * until the seller confirms off-platform payment, the buyer cancels,
 * or an arbitrator resolves a dispute.
 *
 * Exchange is the entry point. The component classes are exported for
 * composition and testing.
 */

// Facade
export { Exchange } from "./exchange.js";
export type { ExchangeOptions, BalanceAudit } from "./exchange.js";

// Components
export { ExchangeStore } from "./store.js";
export type { StoreCheckpoint } from "./store.js";
export { ProfileRegistry } from "./profiles.js";
export { BalanceBook } from "./balances.js";
export { OfferBook } from "./offers.js";
export { EscrowEngine, computeFiatAmount } from "./escrows.js";
export { DisputeArbitration, fixedArbitrator } from "./arbitration.js";
export type { ArbitratorPolicy } from "./arbitration.js";
export { ReentrancyGuard } from "./guard.js";

// Event log
export { ExchangeEventLog } from "./events.js";
export type {
  LoggedEvent,
  EventLogReadOptions,
  EventLogHandler,
  EventLogSubscription,
  ExchangeEventLogOptions,
  SubscriberFailure,
} from "./events.js";

// Types, constants, errors
export {
  PRICE_PRECISION,
  DEFAULT_PAYMENT_WINDOW_SECONDS,
  DEFAULT_MAX_OPEN_ESCROWS_PER_OFFER,
  DEFAULT_LIMITS,
  ERROR_CATEGORY,
  errorCategory,
  ExchangeError,
} from "./types.js";
export type {
  CallContext,
  ExchangeLimits,
  CreateOfferParams,
  OfferFilter,
  ExchangeErrorCode,
  ErrorCategory,
  ExchangeSnapshot,
  BalanceSnapshotEntry,
  IndexSnapshotEntry,
} from "./types.js";
