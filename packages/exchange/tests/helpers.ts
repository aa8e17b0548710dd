/**
 * Shared fixtures for exchange tests.
 */

import { InMemorySettlementLedger, SettlementError } from "@souk/settlement";
import type { Profile } from "@souk/types";
import { Exchange } from "../src/exchange.js";
import { fixedArbitrator } from "../src/arbitration.js";
import { ExchangeError, PRICE_PRECISION } from "../src/types.js";
import type { CallContext, CreateOfferParams, ExchangeLimits } from "../src/types.js";

export const ARBITER = "arbiter";

/** Base clock for every test, in unix seconds. */
export const T0 = 1_700_000_000;

export interface Harness {
  readonly exchange: Exchange;
  readonly ledger: InMemorySettlementLedger;
}

export function at(caller: string, now: number = T0): CallContext {
  return { caller, now };
}

/**
 * Fresh exchange over an in-memory ledger. Correlation ids are
 * "call-1", "call-2", ... in commit order.
 */
export function createHarness(limits?: Partial<ExchangeLimits>): Harness {
  const ledger = new InMemorySettlementLedger();
  let sequence = 0;
  const exchange = new Exchange({
    settlement: ledger,
    arbitrator: fixedArbitrator(ARBITER),
    limits,
    idGenerator: () => `call-${String(++sequence)}`,
  });
  return { exchange, ledger };
}

export function onboard(h: Harness, principal: string, now: number = T0): Profile {
  return h.exchange.createProfile(
    at(principal, now),
    `${principal} trader`,
    `${principal}@mail.test`,
    `@${principal}`,
  );
}

/** Mint, approve and deposit `amount` for `principal`. */
export function fund(h: Harness, principal: string, amount: bigint): void {
  h.ledger.mint(principal, amount);
  h.ledger.approve(principal, amount);
  h.exchange.deposit(at(principal), amount);
}

export function offerParams(overrides?: Partial<CreateOfferParams>): CreateOfferParams {
  return {
    maxTradeAmount: 500n,
    minTradeAmount: 10n,
    unitPrice: 2n * PRICE_PRECISION,
    currency: "EUR",
    paymentMethod: "SEPA transfer",
    ...overrides,
  };
}

/**
 * Error code thrown by `fn`, or undefined if it returned.
 * Anything other than an exchange or settlement error is rethrown.
 */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ExchangeError || err instanceof SettlementError) return err.code;
    throw err;
  }
  return undefined;
}
