/**
 * Escrow Engine — the escrow state machine.
 *
 * pending → completed   (seller confirms fiat payment received)
 * pending → cancelled   (buyer backs out; funds return to seller's pool)
 * pending → disputed    (either party contests)
 * disputed → completed  (arbitrator decides; see DisputeArbitration)
 *
 * Every transition moves the offer's open-escrow counter, the seller's
 * balance record and the profiles together. The caller (Exchange) makes
 * each call atomic.
 */

import type {
  Escrow,
  EscrowId,
  EscrowStatus,
  OfferId,
  Principal,
} from "@souk/types";
import type { SettlementLedger } from "@souk/settlement";
import type { BalanceBook } from "./balances.js";
import type { OfferBook } from "./offers.js";
import type { ProfileRegistry } from "./profiles.js";
import type { ExchangeStore } from "./store.js";
import type { CallContext, ExchangeLimits } from "./types.js";
import { ExchangeError, PRICE_PRECISION } from "./types.js";

// =============================================================================
// Valid Transitions
// =============================================================================

const VALID_TRANSITIONS: Record<EscrowStatus, readonly EscrowStatus[]> = {
  pending: ["completed", "cancelled", "disputed"],
  disputed: ["completed"],
  completed: [],
  cancelled: [],
};

/**
 * Fiat equivalent of a settlement amount at a fixed-point unit price.
 * Truncates toward zero.
 */
export function computeFiatAmount(amount: bigint, unitPrice: bigint): bigint {
  return (amount * unitPrice) / PRICE_PRECISION;
}

// =============================================================================
// Escrow Engine
// =============================================================================

export class EscrowEngine {
  private readonly store: ExchangeStore;
  private readonly profiles: ProfileRegistry;
  private readonly balances: BalanceBook;
  private readonly offers: OfferBook;
  private readonly settlement: SettlementLedger;
  private readonly limits: ExchangeLimits;

  constructor(
    store: ExchangeStore,
    profiles: ProfileRegistry,
    balances: BalanceBook,
    offers: OfferBook,
    settlement: SettlementLedger,
    limits: ExchangeLimits,
  ) {
    this.store = store;
    this.profiles = profiles;
    this.balances = balances;
    this.offers = offers;
    this.settlement = settlement;
    this.limits = limits;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Open an escrow against an active offer, locking `amount` of the
   * seller's available balance.
   */
  open(ctx: CallContext, offerId: OfferId, amount: bigint): Escrow {
    const buyer = ctx.caller;
    this.profiles.require(buyer);

    const offer = this.offers.require(offerId);
    if (!offer.active) {
      throw new ExchangeError("OFFER_INACTIVE", `Offer ${String(offerId)} is inactive`);
    }
    if (offer.seller === buyer) {
      throw new ExchangeError("CANNOT_TRADE_WITH_SELF", "Sellers cannot open escrows on their own offers");
    }
    if (amount < offer.minTradeAmount) {
      throw new ExchangeError(
        "TRADE_AMOUNT_TOO_LOW",
        `Amount ${amount.toString()} is below the offer minimum ${offer.minTradeAmount.toString()}`,
      );
    }
    if (amount > offer.maxTradeAmount) {
      throw new ExchangeError(
        "TRADE_AMOUNT_TOO_HIGH",
        `Amount ${amount.toString()} is above the offer maximum ${offer.maxTradeAmount.toString()}`,
      );
    }

    const available = this.balances.availableOf(offer.seller);
    if (available < amount) {
      throw new ExchangeError(
        "INSUFFICIENT_BALANCE",
        `Seller '${offer.seller}' has ${available.toString()} available, escrow needs ${amount.toString()}`,
      );
    }
    if (offer.openEscrows >= this.limits.maxOpenEscrowsPerOffer) {
      throw new ExchangeError(
        "INVALID_STATE",
        `Offer ${String(offerId)} already has ${String(offer.openEscrows)} open escrows`,
      );
    }

    this.offers.incrementOpen(offerId);
    this.balances.lock(offer.seller, amount);

    const escrow: Escrow = {
      id: this.store.allocateEscrowId(),
      offerId,
      buyer,
      seller: offer.seller,
      amount,
      fiatAmount: computeFiatAmount(amount, offer.unitPrice),
      createdAt: ctx.now,
      updatedAt: ctx.now,
      status: "pending",
    };

    this.store.putEscrow(escrow);
    this.store.appendEscrowIndex(buyer, escrow.id);
    this.store.appendEscrowIndex(offer.seller, escrow.id);
    this.profiles.recordTradeOpened(buyer);
    this.profiles.recordTradeOpened(offer.seller);

    return escrow;
  }

  /**
   * Seller confirms the buyer's fiat payment; the escrowed amount leaves
   * custody to the buyer.
   */
  confirmPayment(ctx: CallContext, escrowId: EscrowId): Escrow {
    const escrow = this.requireStatus(escrowId, "pending");
    if (ctx.caller !== escrow.seller) {
      throw new ExchangeError("UNAUTHORIZED", `Only the seller can confirm escrow ${String(escrowId)}`);
    }
    if (ctx.now < escrow.createdAt) {
      throw new ExchangeError(
        "INVALID_INPUT",
        `Confirmation time ${String(ctx.now)} precedes escrow ${String(escrowId)} opening at ${String(escrow.createdAt)}`,
      );
    }
    if (!this.isPaymentWindowOpen(escrow, ctx.now)) {
      throw new ExchangeError(
        "ESCROW_TIMEOUT",
        `Escrow ${String(escrowId)} payment window closed at ${String(this.paymentDeadline(escrow))}`,
      );
    }

    const updated = this.transition(escrow, "completed", ctx.now);
    this.offers.decrementOpen(escrow.offerId);
    this.balances.unlock(escrow.seller, escrow.amount);
    this.balances.debit(escrow.seller, escrow.amount);
    this.profiles.recordSettlement(escrow.seller, ctx.now - escrow.createdAt);

    this.settlement.transferOut(escrow.buyer, escrow.amount);
    return updated;
  }

  /**
   * Buyer withdraws from the trade. Funds never left custody, so they
   * simply return to the seller's available pool.
   */
  cancel(ctx: CallContext, escrowId: EscrowId): Escrow {
    const escrow = this.requireStatus(escrowId, "pending");
    if (ctx.caller !== escrow.buyer) {
      throw new ExchangeError("UNAUTHORIZED", `Only the buyer can cancel escrow ${String(escrowId)}`);
    }

    const updated = this.transition(escrow, "cancelled", ctx.now);
    this.offers.decrementOpen(escrow.offerId);
    this.balances.unlock(escrow.seller, escrow.amount);
    return updated;
  }

  /**
   * Either party freezes the escrow for arbitration.
   */
  raiseDispute(ctx: CallContext, escrowId: EscrowId): Escrow {
    const escrow = this.requireStatus(escrowId, "pending");
    if (ctx.caller !== escrow.buyer && ctx.caller !== escrow.seller) {
      throw new ExchangeError(
        "UNAUTHORIZED",
        `Only the buyer or seller can dispute escrow ${String(escrowId)}`,
      );
    }

    return this.transition(escrow, "disputed", ctx.now);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(escrowId: EscrowId): Escrow | undefined {
    return this.store.getEscrow(escrowId);
  }

  require(escrowId: EscrowId): Escrow {
    const escrow = this.store.getEscrow(escrowId);
    if (escrow === undefined) {
      throw new ExchangeError("ESCROW_NOT_FOUND", `Escrow ${String(escrowId)} not found`);
    }
    return escrow;
  }

  /** Escrows where `principal` is buyer or seller, in creation order. */
  escrowsOf(principal: Principal): readonly Escrow[] {
    return this.store
      .escrowIdsOf(principal)
      .map((id) => this.store.getEscrow(id))
      .filter((escrow): escrow is Escrow => escrow !== undefined);
  }

  /** Escrows opened against `offerId`, in creation order. */
  escrowsForOffer(offerId: OfferId): readonly Escrow[] {
    return this.store.escrows().filter((escrow) => escrow.offerId === offerId);
  }

  paymentDeadline(escrow: Escrow): number {
    return escrow.createdAt + this.limits.paymentWindowSeconds;
  }

  /**
   * Whether the seller may still confirm at `now`. Evaluated lazily;
   * nothing expires escrows in the background.
   */
  isPaymentWindowOpen(escrow: Escrow, now: number): boolean {
    return now <= this.paymentDeadline(escrow);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transitions (shared with DisputeArbitration)
  // ───────────────────────────────────────────────────────────────────────

  requireStatus(escrowId: EscrowId, status: EscrowStatus): Escrow {
    const escrow = this.require(escrowId);
    if (escrow.status !== status) {
      throw new ExchangeError(
        "INVALID_STATE",
        `Escrow ${String(escrowId)} is '${escrow.status}', expected '${status}'`,
      );
    }
    return escrow;
  }

  transition(
    escrow: Escrow,
    target: EscrowStatus,
    now: number,
    patch?: Partial<Pick<Escrow, "resolution">>,
  ): Escrow {
    const allowed = VALID_TRANSITIONS[escrow.status];
    if (!allowed.includes(target)) {
      throw new ExchangeError(
        "INVALID_STATE",
        `Cannot transition escrow ${String(escrow.id)} from '${escrow.status}' to '${target}'`,
      );
    }

    const updated: Escrow = { ...escrow, ...patch, status: target, updatedAt: now };
    this.store.putEscrow(updated);
    return updated;
  }
}
