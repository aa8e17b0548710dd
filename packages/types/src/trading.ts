/**
 * Trading Types
 *
 * Records owned by the exchange store: profiles, offers, escrows and
 * per-principal balance records.
 *
 * Rules:
 * - All amounts are bigint base units of the settlement asset
 * - All timestamps are integer unix seconds
 * - Records are immutable; a transition replaces the record
 * - Records reference each other by id, never by structure
 */

/**
 * An identified participant (seller, buyer, arbitrator).
 * Any non-empty string; the empty string is the invalid principal.
 */
export type Principal = string;

/** Offer identifier. Allocated from 1; 0 is never a valid id. */
export type OfferId = number;

/** Escrow identifier. Allocated from 1. */
export type EscrowId = number;

/**
 * Reputation and identity record, one per principal.
 */
export interface Profile {
  readonly principal: Principal;
  readonly displayName: string;
  readonly primaryContact: string;
  readonly secondaryContact: string;
  readonly joinedAt: number;

  /** Escrows opened with this principal on either side */
  readonly totalTrades: number;

  /** Trades that ended in this principal's favour */
  readonly completedTrades: number;

  /** Disputes this principal lost */
  readonly disputedTrades: number;

  /** Running integer average of seconds between escrow open and seller confirmation */
  readonly averageSettlementSeconds: number;
}

/**
 * A priced sell offer.
 */
export interface Offer {
  readonly id: OfferId;
  readonly seller: Principal;
  readonly maxTradeAmount: bigint;
  readonly minTradeAmount: bigint;

  /** Fiat units per settlement unit, scaled by PRICE_PRECISION */
  readonly unitPrice: bigint;

  /** Fiat currency code (e.g., "NGN", "EUR") */
  readonly currency: string;

  /** Free-form payment method label (e.g., "bank transfer") */
  readonly paymentMethod: string;

  /** Escrows against this offer currently pending or disputed */
  readonly openEscrows: number;
  readonly active: boolean;
  readonly createdAt: number;
}

/**
 * Lifecycle status of an escrow.
 *
 * pending → completed | cancelled | disputed
 * disputed → completed
 */
export type EscrowStatus = "pending" | "completed" | "cancelled" | "disputed";

/** Which party an arbitrator settled a dispute for. */
export type DisputeResolution = "buyer" | "seller";

/**
 * Funds locked against an offer on behalf of a buyer.
 */
export interface Escrow {
  readonly id: EscrowId;
  readonly offerId: OfferId;
  readonly buyer: Principal;
  readonly seller: Principal;

  /** Settlement-asset amount locked from the seller's deposit */
  readonly amount: bigint;

  /** Display-only fiat equivalent: amount × unitPrice / PRICE_PRECISION */
  readonly fiatAmount: bigint;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly status: EscrowStatus;
  readonly resolution?: DisputeResolution | undefined;
}

/**
 * Custody bookkeeping for one principal.
 * Invariant: locked ≤ deposited.
 */
export interface BalanceRecord {
  readonly deposited: bigint;
  readonly locked: bigint;
}
