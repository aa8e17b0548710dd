/**
 * Offer Book — priced sell offers.
 *
 * Rules:
 * - Offer ids come from the store allocator, starting at 1
 * - Creating an offer checks affordability at that moment only;
 *   funds are reserved per escrow when one opens
 * - Offers are deactivated, never deleted, and never reactivated
 * - An offer with open escrows cannot be deactivated
 */

import type { Offer, OfferId, Principal } from "@souk/types";
import type { BalanceBook } from "./balances.js";
import type { ProfileRegistry } from "./profiles.js";
import type { ExchangeStore } from "./store.js";
import type { CallContext, CreateOfferParams, OfferFilter } from "./types.js";
import { ExchangeError } from "./types.js";
import { assertPositive, assertText } from "./validate.js";

export class OfferBook {
  private readonly store: ExchangeStore;
  private readonly profiles: ProfileRegistry;
  private readonly balances: BalanceBook;

  constructor(store: ExchangeStore, profiles: ProfileRegistry, balances: BalanceBook) {
    this.store = store;
    this.profiles = profiles;
    this.balances = balances;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  create(ctx: CallContext, params: CreateOfferParams): Offer {
    this.profiles.require(ctx.caller);

    assertPositive("maxTradeAmount", params.maxTradeAmount);
    assertPositive("minTradeAmount", params.minTradeAmount);
    assertText("currency", params.currency);
    assertText("paymentMethod", params.paymentMethod);

    if (params.maxTradeAmount < params.minTradeAmount) {
      throw new ExchangeError(
        "INVALID_PRICE_PARAMETERS",
        `maxTradeAmount ${params.maxTradeAmount.toString()} is below minTradeAmount ${params.minTradeAmount.toString()}`,
      );
    }
    if (params.unitPrice <= 0n) {
      throw new ExchangeError("INVALID_PRICE_PARAMETERS", "unitPrice must be greater than zero");
    }

    const available = this.balances.availableOf(ctx.caller);
    if (available < params.maxTradeAmount) {
      throw new ExchangeError(
        "INSUFFICIENT_BALANCE",
        `'${ctx.caller}' has ${available.toString()} available, offer max is ${params.maxTradeAmount.toString()}`,
      );
    }

    const offer: Offer = {
      id: this.store.allocateOfferId(),
      seller: ctx.caller,
      maxTradeAmount: params.maxTradeAmount,
      minTradeAmount: params.minTradeAmount,
      unitPrice: params.unitPrice,
      currency: params.currency,
      paymentMethod: params.paymentMethod,
      openEscrows: 0,
      active: true,
      createdAt: ctx.now,
    };

    this.store.putOffer(offer);
    this.store.appendOfferIndex(ctx.caller, offer.id);
    return offer;
  }

  deactivate(ctx: CallContext, offerId: OfferId): Offer {
    const offer = this.require(offerId);
    if (!offer.active) {
      throw new ExchangeError("OFFER_INACTIVE", `Offer ${String(offerId)} is already inactive`);
    }
    if (offer.seller !== ctx.caller) {
      throw new ExchangeError("UNAUTHORIZED", `Only the seller can deactivate offer ${String(offerId)}`);
    }
    if (offer.openEscrows > 0) {
      throw new ExchangeError(
        "ACTIVE_ESCROWS_EXIST",
        `Offer ${String(offerId)} has ${String(offer.openEscrows)} open escrow(s)`,
      );
    }

    const updated: Offer = { ...offer, active: false };
    this.store.putOffer(updated);
    return updated;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Open-escrow counter (engine only)
  // ───────────────────────────────────────────────────────────────────────

  incrementOpen(offerId: OfferId): void {
    const offer = this.require(offerId);
    this.store.putOffer({ ...offer, openEscrows: offer.openEscrows + 1 });
  }

  decrementOpen(offerId: OfferId): void {
    const offer = this.require(offerId);
    if (offer.openEscrows === 0) {
      throw new Error(`Offer ${String(offerId)} open-escrow counter would go negative`);
    }
    this.store.putOffer({ ...offer, openEscrows: offer.openEscrows - 1 });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(offerId: OfferId): Offer | undefined {
    return this.store.getOffer(offerId);
  }

  require(offerId: OfferId): Offer {
    const offer = this.store.getOffer(offerId);
    if (offer === undefined) {
      throw new ExchangeError("OFFER_NOT_FOUND", `Offer ${String(offerId)} not found`);
    }
    return offer;
  }

  list(filter?: OfferFilter): readonly Offer[] {
    return this.store.offers().filter((offer) => {
      if (filter?.seller !== undefined && offer.seller !== filter.seller) {
        return false;
      }
      if (filter?.activeOnly === true && !offer.active) {
        return false;
      }
      return true;
    });
  }

  /** Offers created by `principal`, in creation order. */
  offersOf(principal: Principal): readonly Offer[] {
    return this.store
      .offerIdsOf(principal)
      .map((id) => this.store.getOffer(id))
      .filter((offer): offer is Offer => offer !== undefined);
  }
}
