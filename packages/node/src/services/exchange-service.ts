/**
 * ExchangeService — composition root for one exchange instance.
 *
 * Wires the exchange engine to an in-memory settlement ledger and a
 * wall clock, and converts between decimal strings on the wire and
 * base units in the engine.
 */

import type { Escrow, Offer, Principal } from "@souk/types";
import { InMemorySettlementLedger, formatUnits, parseUnits } from "@souk/settlement";
import { Exchange, ExchangeEventLog, fixedArbitrator } from "@souk/exchange";
import type { CallContext, LoggedEvent } from "@souk/exchange";

/** Decimal places of a unit price on the wire. Matches PRICE_PRECISION. */
export const PRICE_DECIMALS = 18;

// =============================================================================
// Config
// =============================================================================

export interface ExchangeServiceConfig {
  readonly arbitrator: Principal;
  readonly settlementSymbol: string;
  readonly settlementDecimals: number;
  readonly paymentWindowSeconds: number;
  readonly maxOpenEscrowsPerOffer: number;
  readonly mintEnabled: boolean;

  /** Unix seconds. Default: wall clock */
  readonly clock?: (() => number) | undefined;

  /** Called when an event subscriber throws; the committed call is unaffected */
  readonly onSubscriberError?: ((error: unknown, logged: LoggedEvent) => void) | undefined;
}

// =============================================================================
// Views
// =============================================================================

export interface OfferView {
  readonly id: number;
  readonly seller: Principal;
  readonly maxTradeAmount: string;
  readonly minTradeAmount: string;
  readonly unitPrice: string;
  readonly currency: string;
  readonly paymentMethod: string;
  readonly openEscrows: number;
  readonly active: boolean;
  readonly createdAt: number;
}

export interface EscrowView {
  readonly id: number;
  readonly offerId: number;
  readonly buyer: Principal;
  readonly seller: Principal;
  readonly amount: string;
  readonly fiatAmount: string;
  readonly status: Escrow["status"];
  readonly resolution: Escrow["resolution"] | null;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly paymentDeadline: number;
}

export interface SettlementAccountView {
  readonly principal: Principal;
  readonly symbol: string;
  readonly decimals: number;
  readonly walletBalance: string;
  readonly allowance: string;
  readonly deposited: string;
}

// =============================================================================
// Service
// =============================================================================

export class ExchangeService {
  readonly config: ExchangeServiceConfig;
  readonly ledger: InMemorySettlementLedger;
  readonly exchange: Exchange;
  private readonly clock: () => number;

  constructor(config: ExchangeServiceConfig) {
    this.config = config;
    this.clock = config.clock ?? (() => Math.floor(Date.now() / 1000));
    this.ledger = new InMemorySettlementLedger();
    this.exchange = new Exchange({
      settlement: this.ledger,
      arbitrator: fixedArbitrator(config.arbitrator),
      limits: {
        paymentWindowSeconds: config.paymentWindowSeconds,
        maxOpenEscrowsPerOffer: config.maxOpenEscrowsPerOffer,
      },
      eventLog: new ExchangeEventLog({ onSubscriberError: config.onSubscriberError }),
    });
  }

  /** Call context for `caller` at the current clock reading. */
  context(caller: Principal): CallContext {
    return { caller, now: this.clock() };
  }

  now(): number {
    return this.clock();
  }

  // ─── Units ──────────────────────────────────────────────────────────

  parseAmount(value: string): bigint {
    return parseUnits(value, this.config.settlementDecimals);
  }

  formatAmount(value: bigint): string {
    return formatUnits(value, this.config.settlementDecimals);
  }

  parsePrice(value: string): bigint {
    return parseUnits(value, PRICE_DECIMALS);
  }

  // ─── Views ──────────────────────────────────────────────────────────

  offerView(offer: Offer): OfferView {
    return {
      ...offer,
      maxTradeAmount: this.formatAmount(offer.maxTradeAmount),
      minTradeAmount: this.formatAmount(offer.minTradeAmount),
      unitPrice: formatUnits(offer.unitPrice, PRICE_DECIMALS),
    };
  }

  escrowView(escrow: Escrow): EscrowView {
    return {
      id: escrow.id,
      offerId: escrow.offerId,
      buyer: escrow.buyer,
      seller: escrow.seller,
      amount: this.formatAmount(escrow.amount),
      fiatAmount: this.formatAmount(escrow.fiatAmount),
      status: escrow.status,
      resolution: escrow.resolution ?? null,
      createdAt: escrow.createdAt,
      updatedAt: escrow.updatedAt,
      paymentDeadline: escrow.createdAt + this.exchange.limits.paymentWindowSeconds,
    };
  }

  settlementAccount(principal: Principal): SettlementAccountView {
    return {
      principal,
      symbol: this.config.settlementSymbol,
      decimals: this.config.settlementDecimals,
      walletBalance: this.formatAmount(this.ledger.balanceOf(principal)),
      allowance: this.formatAmount(this.ledger.allowanceOf(principal)),
      deposited: this.formatAmount(this.exchange.balanceOf(principal)),
    };
  }

  /**
   * Custody reserve matches the sum of deposits.
   */
  isReady(): boolean {
    return this.ledger.custodyBalance() === this.exchange.auditBalances().totalDeposited;
  }
}
