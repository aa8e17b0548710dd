/**
 * Tests for ExchangeService wiring.
 */

import { describe, it, expect } from "vitest";
import { ExchangeService } from "../src/services/exchange-service.js";
import { ARBITER, T0 } from "./setup.js";

describe("ExchangeService", () => {
  it("reports failing event subscribers without failing the call", () => {
    const reported: string[] = [];
    const service = new ExchangeService({
      arbitrator: ARBITER,
      settlementSymbol: "USDC",
      settlementDecimals: 6,
      paymentWindowSeconds: 172800,
      maxOpenEscrowsPerOffer: 100,
      mintEnabled: false,
      clock: () => T0,
      onSubscriberError: (_err, logged) => reported.push(logged.event.type),
    });
    service.exchange.events.subscribe(() => {
      throw new Error("sink down");
    });

    service.ledger.mint("joe", service.parseAmount("5"));
    service.ledger.approve("joe", service.parseAmount("5"));
    const deposited = service.exchange.deposit(service.context("joe"), service.parseAmount("5"));

    expect(service.formatAmount(deposited)).toBe("5.000000");
    expect(reported).toEqual(["balance.deposited"]);
    expect(service.isReady()).toBe(true);
  });
});
