/**
 * @souk/types — Shared domain types for the Souk trading engine.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Trading records
export type {
  Principal,
  OfferId,
  EscrowId,
  Profile,
  Offer,
  Escrow,
  EscrowStatus,
  DisputeResolution,
  BalanceRecord,
} from "./trading.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isPrincipal,
  isEscrowStatus,
  isProfile,
  isOffer,
  isEscrow,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
