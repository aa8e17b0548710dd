/**
 * Tests for the offer book: creation checks, deactivation and listing.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Harness } from "./helpers.js";
import { T0, at, codeOf, createHarness, fund, offerParams, onboard } from "./helpers.js";

describe("offers", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    onboard(h, "joe");
    onboard(h, "john");
    fund(h, "joe", 1000n);
  });

  // ─── createOffer ────────────────────────────────────────────────────

  describe("createOffer", () => {
    it("creates an active offer with sequential ids", () => {
      const first = h.exchange.createOffer(at("joe", T0 + 1), offerParams());
      const second = h.exchange.createOffer(at("joe"), offerParams({ currency: "USD" }));

      expect(first).toEqual({
        id: 1,
        seller: "joe",
        maxTradeAmount: 500n,
        minTradeAmount: 10n,
        unitPrice: 2_000_000_000_000_000_000n,
        currency: "EUR",
        paymentMethod: "SEPA transfer",
        openEscrows: 0,
        active: true,
        createdAt: T0 + 1,
      });
      expect(second.id).toBe(2);
    });

    it("does not lock any funds", () => {
      h.exchange.createOffer(at("joe"), offerParams({ maxTradeAmount: 1000n }));
      expect(h.exchange.auditBalances().totalLocked).toBe(0n);
    });

    it("checks affordability per offer, not across offers", () => {
      h.exchange.createOffer(at("joe"), offerParams({ maxTradeAmount: 1000n }));
      const second = h.exchange.createOffer(at("joe"), offerParams({ maxTradeAmount: 1000n }));
      expect(second.id).toBe(2);
    });

    it("requires a profile", () => {
      fund(h, "ann", 1000n);
      expect(codeOf(() => h.exchange.createOffer(at("ann"), offerParams()))).toBe(
        "PROFILE_REQUIRED",
      );
    });

    it("rejects max below min", () => {
      expect(
        codeOf(() =>
          h.exchange.createOffer(at("joe"), offerParams({ maxTradeAmount: 5n, minTradeAmount: 6n })),
        ),
      ).toBe("INVALID_PRICE_PARAMETERS");
    });

    it("accepts max equal to min", () => {
      const offer = h.exchange.createOffer(
        at("joe"),
        offerParams({ maxTradeAmount: 6n, minTradeAmount: 6n }),
      );
      expect(offer.maxTradeAmount).toBe(6n);
    });

    it("rejects a zero unit price", () => {
      expect(codeOf(() => h.exchange.createOffer(at("joe"), offerParams({ unitPrice: 0n })))).toBe(
        "INVALID_PRICE_PARAMETERS",
      );
    });

    it("rejects zero trade limits", () => {
      expect(
        codeOf(() => h.exchange.createOffer(at("joe"), offerParams({ minTradeAmount: 0n }))),
      ).toBe("INVALID_INPUT");
      expect(
        codeOf(() => h.exchange.createOffer(at("joe"), offerParams({ maxTradeAmount: 0n }))),
      ).toBe("INVALID_INPUT");
    });

    it("rejects blank currency and payment method", () => {
      expect(codeOf(() => h.exchange.createOffer(at("joe"), offerParams({ currency: " " })))).toBe(
        "INVALID_INPUT",
      );
      expect(
        codeOf(() => h.exchange.createOffer(at("joe"), offerParams({ paymentMethod: "" }))),
      ).toBe("INVALID_INPUT");
    });

    it("rejects a max above the available balance", () => {
      expect(
        codeOf(() => h.exchange.createOffer(at("joe"), offerParams({ maxTradeAmount: 1001n }))),
      ).toBe("INSUFFICIENT_BALANCE");
    });

    it("does not consume an id on failure", () => {
      codeOf(() => h.exchange.createOffer(at("joe"), offerParams({ unitPrice: 0n })));
      expect(h.exchange.createOffer(at("joe"), offerParams()).id).toBe(1);
    });
  });

  // ─── deactivateOffer ────────────────────────────────────────────────

  describe("deactivateOffer", () => {
    it("deactivates an offer with no open escrows", () => {
      const offer = h.exchange.createOffer(at("joe"), offerParams());
      const updated = h.exchange.deactivateOffer(at("joe"), offer.id);

      expect(updated.active).toBe(false);
      expect(h.exchange.getOffer(offer.id)?.active).toBe(false);
    });

    it("rejects unknown offers", () => {
      expect(codeOf(() => h.exchange.deactivateOffer(at("joe"), 42))).toBe("OFFER_NOT_FOUND");
    });

    it("rejects anyone but the seller", () => {
      const offer = h.exchange.createOffer(at("joe"), offerParams());
      expect(codeOf(() => h.exchange.deactivateOffer(at("john"), offer.id))).toBe("UNAUTHORIZED");
    });

    it("rejects an already inactive offer", () => {
      const offer = h.exchange.createOffer(at("joe"), offerParams());
      h.exchange.deactivateOffer(at("joe"), offer.id);
      expect(codeOf(() => h.exchange.deactivateOffer(at("joe"), offer.id))).toBe("OFFER_INACTIVE");
    });

    it("rejects while escrows are open", () => {
      const offer = h.exchange.createOffer(at("joe"), offerParams());
      const escrow = h.exchange.openEscrow(at("john"), offer.id, 100n);

      expect(codeOf(() => h.exchange.deactivateOffer(at("joe"), offer.id))).toBe(
        "ACTIVE_ESCROWS_EXIST",
      );

      h.exchange.cancelEscrow(at("john"), escrow.id);
      expect(h.exchange.deactivateOffer(at("joe"), offer.id).active).toBe(false);
    });
  });

  // ─── Queries ────────────────────────────────────────────────────────

  describe("listing", () => {
    beforeEach(() => {
      fund(h, "john", 1000n);
      h.exchange.createOffer(at("joe"), offerParams());
      h.exchange.createOffer(at("john"), offerParams());
      h.exchange.createOffer(at("joe"), offerParams());
      h.exchange.deactivateOffer(at("joe"), 1);
    });

    it("lists all offers in id order", () => {
      expect(h.exchange.listOffers().map((o) => o.id)).toEqual([1, 2, 3]);
    });

    it("filters by seller and activity", () => {
      expect(h.exchange.listOffers({ seller: "joe" }).map((o) => o.id)).toEqual([1, 3]);
      expect(h.exchange.listOffers({ activeOnly: true }).map((o) => o.id)).toEqual([2, 3]);
      expect(
        h.exchange.listOffers({ seller: "joe", activeOnly: true }).map((o) => o.id),
      ).toEqual([3]);
    });

    it("returns a seller's offers including inactive ones", () => {
      expect(h.exchange.offersOf("joe").map((o) => o.id)).toEqual([1, 3]);
      expect(h.exchange.offersOf("ann")).toEqual([]);
    });
  });
});
