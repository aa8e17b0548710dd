/**
 * @souk/exchange — Engine types, constants and errors.
 *
 * Rules:
 * - Every mutating call carries an explicit CallContext (caller + clock)
 * - Fail-closed: invalid calls throw ExchangeError, never partially apply
 */

import type {
  BalanceRecord,
  Escrow,
  Offer,
  Principal,
  Profile,
} from "@souk/types";

// ─── Constants ───────────────────────────────────────────────────────────

/** Fixed-point scale of Offer.unitPrice. */
export const PRICE_PRECISION = 10n ** 18n;

/** Seconds a seller has to confirm payment after an escrow opens. */
export const DEFAULT_PAYMENT_WINDOW_SECONDS = 48 * 60 * 60;

/** Maximum pending + disputed escrows against a single offer. */
export const DEFAULT_MAX_OPEN_ESCROWS_PER_OFFER = 100;

// ─── Call Context ────────────────────────────────────────────────────────

/**
 * Identity and time of a single call. Passed explicitly so the engine
 * never reads ambient globals.
 */
export interface CallContext {
  readonly caller: Principal;

  /** Unix seconds */
  readonly now: number;
}

// ─── Configuration ───────────────────────────────────────────────────────

export interface ExchangeLimits {
  readonly paymentWindowSeconds: number;
  readonly maxOpenEscrowsPerOffer: number;
}

export const DEFAULT_LIMITS: ExchangeLimits = {
  paymentWindowSeconds: DEFAULT_PAYMENT_WINDOW_SECONDS,
  maxOpenEscrowsPerOffer: DEFAULT_MAX_OPEN_ESCROWS_PER_OFFER,
} as const;

/**
 * Parameters of a new sell offer.
 */
export interface CreateOfferParams {
  readonly maxTradeAmount: bigint;
  readonly minTradeAmount: bigint;
  readonly unitPrice: bigint;
  readonly currency: string;
  readonly paymentMethod: string;
}

/**
 * Filter for listing offers.
 */
export interface OfferFilter {
  readonly seller?: Principal | undefined;
  readonly activeOnly?: boolean | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for exchange operations. */
export type ExchangeErrorCode =
  // validation
  | "INVALID_INPUT"
  | "INVALID_ADDRESS"
  | "INVALID_PRICE_PARAMETERS"
  | "CANNOT_TRADE_WITH_SELF"
  | "TRADE_AMOUNT_TOO_LOW"
  | "TRADE_AMOUNT_TOO_HIGH"
  // authorization
  | "UNAUTHORIZED"
  // not found / wrong state
  | "ALREADY_EXISTS"
  | "PROFILE_REQUIRED"
  | "OFFER_NOT_FOUND"
  | "OFFER_INACTIVE"
  | "ESCROW_NOT_FOUND"
  | "INVALID_STATE"
  // resource
  | "INSUFFICIENT_BALANCE"
  | "ACTIVE_ESCROWS_EXIST"
  // timing
  | "ESCROW_TIMEOUT"
  // call boundary
  | "REENTRANT_CALL";

export type ErrorCategory =
  | "validation"
  | "authorization"
  | "state"
  | "resource"
  | "timing"
  | "concurrency";

export const ERROR_CATEGORY: Readonly<Record<ExchangeErrorCode, ErrorCategory>> = {
  INVALID_INPUT: "validation",
  INVALID_ADDRESS: "validation",
  INVALID_PRICE_PARAMETERS: "validation",
  CANNOT_TRADE_WITH_SELF: "validation",
  TRADE_AMOUNT_TOO_LOW: "validation",
  TRADE_AMOUNT_TOO_HIGH: "validation",
  UNAUTHORIZED: "authorization",
  ALREADY_EXISTS: "state",
  PROFILE_REQUIRED: "state",
  OFFER_NOT_FOUND: "state",
  OFFER_INACTIVE: "state",
  ESCROW_NOT_FOUND: "state",
  INVALID_STATE: "state",
  INSUFFICIENT_BALANCE: "resource",
  ACTIVE_ESCROWS_EXIST: "resource",
  ESCROW_TIMEOUT: "timing",
  REENTRANT_CALL: "concurrency",
} as const;

export function errorCategory(code: ExchangeErrorCode): ErrorCategory {
  return ERROR_CATEGORY[code];
}

/**
 * Structured error from the exchange engine.
 * Always thrown — never returned silently.
 */
export class ExchangeError extends Error {
  public readonly code: ExchangeErrorCode;

  constructor(code: ExchangeErrorCode, message: string) {
    super(message);
    this.name = "ExchangeError";
    this.code = code;
  }

  get category(): ErrorCategory {
    return ERROR_CATEGORY[this.code];
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface BalanceSnapshotEntry {
  readonly principal: Principal;
  readonly record: BalanceRecord;
}

export interface IndexSnapshotEntry {
  readonly principal: Principal;
  readonly ids: readonly number[];
}

/**
 * Full copy of the exchange store. Used for persistence and rehydration.
 */
export interface ExchangeSnapshot {
  readonly version: 1;
  readonly nextOfferId: number;
  readonly nextEscrowId: number;
  readonly profiles: readonly Profile[];
  readonly offers: readonly Offer[];
  readonly escrows: readonly Escrow[];
  readonly balances: readonly BalanceSnapshotEntry[];
  readonly offerIndex: readonly IndexSnapshotEntry[];
  readonly escrowIndex: readonly IndexSnapshotEntry[];
}
