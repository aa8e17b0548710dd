/**
 * Tests for snapshot / restore of the exchange store.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Exchange } from "../src/exchange.js";
import { fixedArbitrator } from "../src/arbitration.js";
import { ExchangeError } from "../src/types.js";
import type { ExchangeSnapshot } from "../src/types.js";
import type { Harness } from "./helpers.js";
import { ARBITER, at, codeOf, createHarness, fund, offerParams, onboard } from "./helpers.js";

describe("snapshot", () => {
  let h: Harness;
  let snapshot: ExchangeSnapshot;

  beforeEach(() => {
    h = createHarness();
    onboard(h, "joe");
    onboard(h, "john");
    fund(h, "joe", 1000n);
    const offer = h.exchange.createOffer(at("joe"), offerParams());
    const first = h.exchange.openEscrow(at("john"), offer.id, 100n);
    h.exchange.openEscrow(at("john"), offer.id, 50n);
    h.exchange.confirmPayment(at("joe"), first.id);
    snapshot = h.exchange.snapshot();
  });

  function restore(from: ExchangeSnapshot): Exchange {
    return Exchange.fromSnapshot(from, {
      settlement: h.ledger,
      arbitrator: fixedArbitrator(ARBITER),
    });
  }

  it("captures allocators, records and indices", () => {
    expect(snapshot.version).toBe(1);
    expect(snapshot.nextOfferId).toBe(2);
    expect(snapshot.nextEscrowId).toBe(3);
    expect(snapshot.profiles.map((p) => p.principal)).toEqual(["joe", "john"]);
    expect(snapshot.escrows.map((e) => e.status)).toEqual(["completed", "pending"]);
    expect(snapshot.balances).toEqual([
      { principal: "joe", record: { deposited: 900n, locked: 50n } },
    ]);
    expect(snapshot.escrowIndex).toEqual([
      { principal: "john", ids: [1, 2] },
      { principal: "joe", ids: [1, 2] },
    ]);
  });

  it("restores to an identical snapshot", () => {
    expect(restore(snapshot).snapshot()).toEqual(snapshot);
  });

  it("continues id allocation and trading after restore", () => {
    const restored = restore(snapshot);

    expect(restored.createOffer(at("joe"), offerParams()).id).toBe(2);
    expect(restored.openEscrow(at("john"), 1, 20n).id).toBe(3);
    expect(restored.cancelEscrow(at("john"), 2).status).toBe("cancelled");
    expect(restored.escrowsOf("john").map((e) => e.id)).toEqual([1, 2, 3]);
  });

  it("does not share state with the source exchange", () => {
    const restored = restore(snapshot);
    restored.cancelEscrow(at("john"), 2);
    expect(h.exchange.getEscrow(2)?.status).toBe("pending");
  });

  it("rejects records with ids at or past the allocator", () => {
    expect(codeOf(() => restore({ ...snapshot, nextEscrowId: 2 }))).toBe("INVALID_INPUT");
    expect(codeOf(() => restore({ ...snapshot, nextOfferId: 1 }))).toBe("INVALID_INPUT");
  });

  it("rejects a balance with more locked than deposited", () => {
    const broken: ExchangeSnapshot = {
      ...snapshot,
      balances: [{ principal: "joe", record: { deposited: 10n, locked: 50n } }],
    };
    expect(() => restore(broken)).toThrow(ExchangeError);
  });

  it("rejects malformed records", () => {
    const broken: ExchangeSnapshot = {
      ...snapshot,
      profiles: snapshot.profiles.map((p) => ({ ...p, totalTrades: -1 })),
    };
    expect(codeOf(() => restore(broken))).toBe("INVALID_INPUT");
  });
});
