/**
 * Runtime type guard tests for @souk/types
 *
 * Valid records narrow; malformed values at system boundaries are rejected.
 */
import { describe, it, expect } from "vitest";
import {
  isPrincipal,
  isEscrowStatus,
  isProfile,
  isOffer,
  isEscrow,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";

const PROFILE = {
  principal: "joe",
  displayName: "Joe",
  primaryContact: "joe@example.test",
  secondaryContact: "+000",
  joinedAt: 1_700_000_000,
  totalTrades: 0,
  completedTrades: 0,
  disputedTrades: 0,
  averageSettlementSeconds: 0,
};

const OFFER = {
  id: 1,
  seller: "joe",
  maxTradeAmount: 1000n,
  minTradeAmount: 10n,
  unitPrice: 8000n,
  currency: "NGN",
  paymentMethod: "bank transfer",
  openEscrows: 0,
  active: true,
  createdAt: 1_700_000_000,
};

const ESCROW = {
  id: 1,
  offerId: 1,
  buyer: "john",
  seller: "joe",
  amount: 1000n,
  fiatAmount: 0n,
  createdAt: 1_700_000_000,
  updatedAt: 1_700_000_000,
  status: "pending",
};

const METADATA = {
  eventId: "evt-1",
  timestamp: 1_700_000_000,
  actor: "joe",
  correlationId: "call-1",
  source: "escrows",
};

// =============================================================================
// Trading guards
// =============================================================================

describe("isPrincipal", () => {
  it("accepts a non-empty string", () => {
    expect(isPrincipal("joe")).toBe(true);
  });

  it("rejects the empty string and non-strings", () => {
    expect(isPrincipal("")).toBe(false);
    expect(isPrincipal(42)).toBe(false);
    expect(isPrincipal(undefined)).toBe(false);
  });
});

describe("isEscrowStatus", () => {
  it("accepts every lifecycle status", () => {
    for (const s of ["pending", "completed", "cancelled", "disputed"]) {
      expect(isEscrowStatus(s)).toBe(true);
    }
  });

  it("rejects unknown statuses", () => {
    expect(isEscrowStatus("resolved")).toBe(false);
    expect(isEscrowStatus("PENDING")).toBe(false);
  });
});

describe("isProfile", () => {
  it("accepts a valid profile", () => {
    expect(isProfile(PROFILE)).toBe(true);
  });

  it("rejects negative counters", () => {
    expect(isProfile({ ...PROFILE, completedTrades: -1 })).toBe(false);
  });

  it("rejects fractional timestamps", () => {
    expect(isProfile({ ...PROFILE, joinedAt: 1.5 })).toBe(false);
  });

  it("rejects null", () => {
    expect(isProfile(null)).toBe(false);
  });
});

describe("isOffer", () => {
  it("accepts a valid offer", () => {
    expect(isOffer(OFFER)).toBe(true);
  });

  it("rejects the sentinel id 0", () => {
    expect(isOffer({ ...OFFER, id: 0 })).toBe(false);
  });

  it("rejects numeric amounts (must be bigint)", () => {
    expect(isOffer({ ...OFFER, maxTradeAmount: 1000 })).toBe(false);
  });
});

describe("isEscrow", () => {
  it("accepts a pending escrow without resolution", () => {
    expect(isEscrow(ESCROW)).toBe(true);
  });

  it("accepts a resolved escrow", () => {
    expect(isEscrow({ ...ESCROW, status: "completed", resolution: "seller" })).toBe(true);
  });

  it("rejects an unknown resolution", () => {
    expect(isEscrow({ ...ESCROW, resolution: "arbitrator" })).toBe(false);
  });

  it("rejects an unknown status", () => {
    expect(isEscrow({ ...ESCROW, status: "expired" })).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(METADATA)).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...METADATA, source: "vault" })).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({ type: "escrow.opened", metadata: METADATA, payload: { escrowId: 1 } }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(isDomainEvent({ type: "escrow.opened", metadata: METADATA, payload: null })).toBe(false);
  });
});
