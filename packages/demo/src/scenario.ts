/**
 * Scripted trade between two traders and an arbitrator.
 *
 * Runs against the real exchange and an in-memory settlement ledger and
 * reports each step through a Reporter, so the CLI can render it and
 * tests can record it.
 */

import { Exchange, fixedArbitrator } from "@souk/exchange";
import type { BalanceAudit, CallContext } from "@souk/exchange";
import { InMemorySettlementLedger, formatUnits, parseUnits } from "@souk/settlement";

export const DECIMALS = 18;
export const SYMBOL = "SOUK";
export const ARBITER = "arbiter";
export const SELLER = "joe";
export const BUYER = "john";

export interface Reporter {
  step(title: string): void;
  ok(message: string): void;
  info(label: string, value: string): void;
}

export interface ScenarioResult {
  readonly exchange: Exchange;
  readonly ledger: InMemorySettlementLedger;
  readonly audit: BalanceAudit;
}

export const SCENARIO_STEPS = 8;

function units(amount: string): bigint {
  return parseUnits(amount, DECIMALS);
}

function show(amount: bigint): string {
  return `${formatUnits(amount, DECIMALS).replace(/\.?0+$/, "")} ${SYMBOL}`;
}

export function runTradeScenario(reporter: Reporter, start = 1_700_000_000): ScenarioResult {
  let now = start;
  const as = (caller: string): CallContext => ({ caller, now });

  // ─── Boot ───────────────────────────────────────────────────────────

  reporter.step("Boot");
  const ledger = new InMemorySettlementLedger();
  const exchange = new Exchange({ settlement: ledger, arbitrator: fixedArbitrator(ARBITER) });
  reporter.ok(`Exchange ready, arbitrator '${ARBITER}'`);
  reporter.info("Payment window", `${String(exchange.limits.paymentWindowSeconds / 3600)} h`);

  // ─── Profiles ───────────────────────────────────────────────────────

  reporter.step("Profiles");
  exchange.createProfile(as(SELLER), "Joe", "joe@mail.test", "@joe_trades");
  exchange.createProfile(as(BUYER), "John", "john@mail.test", "@john_buys");
  reporter.ok(`Registered '${SELLER}' and '${BUYER}'`);

  // ─── Funding ────────────────────────────────────────────────────────

  reporter.step("Seller deposits into custody");
  ledger.mint(SELLER, units("1000"));
  ledger.approve(SELLER, units("1000"));
  exchange.deposit(as(SELLER), units("1000"));
  reporter.ok(`${SELLER} deposited ${show(units("1000"))}`);
  reporter.info("Custody", show(ledger.custodyBalance()));

  // ─── Offer ──────────────────────────────────────────────────────────

  reporter.step("Seller publishes an offer");
  const offer = exchange.createOffer(as(SELLER), {
    maxTradeAmount: units("1000"),
    minTradeAmount: units("1"),
    unitPrice: units("1.25"),
    currency: "EUR",
    paymentMethod: "SEPA transfer",
  });
  reporter.ok(`Offer #${String(offer.id)}: 1 to 1000 ${SYMBOL} at 1.25 EUR`);

  // ─── Trade 1: confirmed ─────────────────────────────────────────────

  reporter.step("Trade settled by the seller");
  const first = exchange.openEscrow(as(BUYER), offer.id, units("400"));
  reporter.info("Escrow", `#${String(first.id)} locks ${show(first.amount)}`);
  reporter.info("Fiat due", `${formatUnits(first.fiatAmount, DECIMALS).replace(/\.?0+$/, "")} EUR`);
  now += 2 * 3600;
  exchange.confirmPayment(as(SELLER), first.id);
  reporter.ok(`${BUYER} received ${show(ledger.balanceOf(BUYER))}`);

  // ─── Trade 2: disputed ──────────────────────────────────────────────

  reporter.step("Trade disputed and arbitrated");
  const second = exchange.openEscrow(as(BUYER), offer.id, units("100"));
  now += 600;
  exchange.raiseDispute(as(BUYER), second.id);
  reporter.info("Escrow", `#${String(second.id)} disputed by ${BUYER}`);
  now += 3600;
  exchange.resolveDispute(as(ARBITER), second.id, true);
  reporter.ok(`Arbitrator sided with the buyer, ${BUYER} holds ${show(ledger.balanceOf(BUYER))}`);

  // ─── Trade 3: cancelled ─────────────────────────────────────────────

  reporter.step("Trade cancelled by the buyer");
  const third = exchange.openEscrow(as(BUYER), offer.id, units("50"));
  exchange.cancelEscrow(as(BUYER), third.id);
  reporter.ok(`Escrow #${String(third.id)} cancelled, lock released`);

  // ─── Close out ──────────────────────────────────────────────────────

  reporter.step("Seller closes out");
  exchange.deactivateOffer(as(SELLER), offer.id);
  const remaining = exchange.balanceOf(SELLER);
  exchange.withdraw(as(SELLER), remaining);
  reporter.ok(`Offer #${String(offer.id)} deactivated, ${show(remaining)} withdrawn`);

  const audit = exchange.auditBalances();
  reporter.info("Custody", show(ledger.custodyBalance()));
  reporter.info("Events", String(exchange.events.length));

  return { exchange, ledger, audit };
}
