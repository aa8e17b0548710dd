/**
 * Exchange — Top-level coordinator of the trading engine.
 *
 * Composes:
 * - ProfileRegistry: identity and reputation
 * - BalanceBook: custody deposits and escrow locks
 * - OfferBook: priced sell offers
 * - EscrowEngine: the escrow state machine
 * - DisputeArbitration: privileged resolution of disputes
 *
 * Every mutating entry point:
 * 1. passes the reentrancy barrier
 * 2. validates the call context
 * 3. runs against a checkpoint of the store, restored on any failure
 * 4. publishes its events only after the call has committed
 */

import { randomUUID } from "node:crypto";
import type {
  Escrow,
  EscrowId,
  EventSource,
  Offer,
  OfferId,
  Principal,
  Profile,
} from "@souk/types";
import { isEscrow, isOffer, isPrincipal, isProfile } from "@souk/types";
import type { SettlementLedger } from "@souk/settlement";
import type { ArbitratorPolicy } from "./arbitration.js";
import { DisputeArbitration } from "./arbitration.js";
import { BalanceBook } from "./balances.js";
import { EscrowEngine } from "./escrows.js";
import { ExchangeEventLog } from "./events.js";
import { ReentrancyGuard } from "./guard.js";
import { OfferBook } from "./offers.js";
import { ProfileRegistry } from "./profiles.js";
import { ExchangeStore } from "./store.js";
import type {
  CallContext,
  CreateOfferParams,
  ExchangeLimits,
  ExchangeSnapshot,
  OfferFilter,
} from "./types.js";
import { DEFAULT_LIMITS, ExchangeError } from "./types.js";
import { assertContext } from "./validate.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ExchangeOptions {
  readonly settlement: SettlementLedger;
  readonly arbitrator: ArbitratorPolicy;
  readonly limits?: Partial<ExchangeLimits> | undefined;
  readonly eventLog?: ExchangeEventLog | undefined;
  /** Correlation id source for events. Default: random UUIDs */
  readonly idGenerator?: (() => string) | undefined;
}

/**
 * Custody view for invariant checks: every principal's deposited and
 * locked totals.
 */
export interface BalanceAudit {
  readonly entries: readonly {
    readonly principal: Principal;
    readonly deposited: bigint;
    readonly locked: bigint;
  }[];
  readonly totalDeposited: bigint;
  readonly totalLocked: bigint;
}

interface EventDraft {
  readonly type: string;
  readonly payload: Readonly<Record<string, unknown>>;
}

// =============================================================================
// Exchange
// =============================================================================

export class Exchange {
  readonly events: ExchangeEventLog;
  readonly limits: ExchangeLimits;

  private readonly store: ExchangeStore;
  private readonly guard = new ReentrancyGuard();
  private readonly nextId: () => string;
  private readonly profiles: ProfileRegistry;
  private readonly balances: BalanceBook;
  private readonly offers: OfferBook;
  private readonly escrows: EscrowEngine;
  private readonly arbitration: DisputeArbitration;

  constructor(options: ExchangeOptions, store: ExchangeStore = new ExchangeStore()) {
    this.store = store;
    this.limits = resolveLimits(options.limits);
    this.events = options.eventLog ?? new ExchangeEventLog();
    this.nextId = options.idGenerator ?? randomUUID;

    this.profiles = new ProfileRegistry(store);
    this.balances = new BalanceBook(store, options.settlement);
    this.offers = new OfferBook(store, this.profiles, this.balances);
    this.escrows = new EscrowEngine(
      store,
      this.profiles,
      this.balances,
      this.offers,
      options.settlement,
      this.limits,
    );
    this.arbitration = new DisputeArbitration(
      options.arbitrator,
      this.escrows,
      this.offers,
      this.balances,
      this.profiles,
      options.settlement,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Profiles
  // ───────────────────────────────────────────────────────────────────────

  createProfile(
    ctx: CallContext,
    displayName: string,
    primaryContact: string,
    secondaryContact: string,
  ): Profile {
    return this.execute(
      "createProfile",
      ctx,
      "profiles",
      () => this.profiles.create(ctx, displayName, primaryContact, secondaryContact),
      (profile) => [
        { type: "profile.created", payload: { principal: profile.principal, displayName } },
      ],
    );
  }

  updateProfile(ctx: CallContext, primaryContact: string, secondaryContact: string): Profile {
    return this.execute(
      "updateProfile",
      ctx,
      "profiles",
      () => this.profiles.updateContacts(ctx, primaryContact, secondaryContact),
      (profile) => [{ type: "profile.updated", payload: { principal: profile.principal } }],
    );
  }

  getProfile(principal: Principal): Profile | undefined {
    return this.profiles.get(principal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Balances
  // ───────────────────────────────────────────────────────────────────────

  /** Returns the caller's new deposited total. */
  deposit(ctx: CallContext, amount: bigint): bigint {
    return this.execute(
      "deposit",
      ctx,
      "balances",
      () => this.balances.deposit(ctx, amount).deposited,
      (deposited) => [
        {
          type: "balance.deposited",
          payload: { principal: ctx.caller, amount: amount.toString(), deposited: deposited.toString() },
        },
      ],
    );
  }

  /** Returns the caller's new deposited total. */
  withdraw(ctx: CallContext, amount: bigint): bigint {
    return this.execute(
      "withdraw",
      ctx,
      "balances",
      () => this.balances.withdraw(ctx, amount).deposited,
      (deposited) => [
        {
          type: "balance.withdrawn",
          payload: { principal: ctx.caller, amount: amount.toString(), deposited: deposited.toString() },
        },
      ],
    );
  }

  /** Deposited total held in custody for `principal`. */
  balanceOf(principal: Principal): bigint {
    return this.balances.depositedOf(principal);
  }

  auditBalances(): BalanceAudit {
    const entries = this.store.balanceHolders().map((principal) => {
      const record = this.balances.recordOf(principal);
      return { principal, deposited: record.deposited, locked: record.locked };
    });

    return {
      entries,
      totalDeposited: entries.reduce((sum, e) => sum + e.deposited, 0n),
      totalLocked: entries.reduce((sum, e) => sum + e.locked, 0n),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Offers
  // ───────────────────────────────────────────────────────────────────────

  createOffer(ctx: CallContext, params: CreateOfferParams): Offer {
    return this.execute(
      "createOffer",
      ctx,
      "offers",
      () => this.offers.create(ctx, params),
      (offer) => [
        {
          type: "offer.created",
          payload: {
            offerId: offer.id,
            seller: offer.seller,
            minTradeAmount: offer.minTradeAmount.toString(),
            maxTradeAmount: offer.maxTradeAmount.toString(),
            unitPrice: offer.unitPrice.toString(),
            currency: offer.currency,
          },
        },
      ],
    );
  }

  deactivateOffer(ctx: CallContext, offerId: OfferId): Offer {
    return this.execute(
      "deactivateOffer",
      ctx,
      "offers",
      () => this.offers.deactivate(ctx, offerId),
      (offer) => [{ type: "offer.deactivated", payload: { offerId: offer.id } }],
    );
  }

  getOffer(offerId: OfferId): Offer | undefined {
    return this.offers.get(offerId);
  }

  listOffers(filter?: OfferFilter): readonly Offer[] {
    return this.offers.list(filter);
  }

  offersOf(principal: Principal): readonly Offer[] {
    return this.offers.offersOf(principal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Escrows
  // ───────────────────────────────────────────────────────────────────────

  openEscrow(ctx: CallContext, offerId: OfferId, amount: bigint): Escrow {
    return this.execute(
      "openEscrow",
      ctx,
      "escrows",
      () => this.escrows.open(ctx, offerId, amount),
      (escrow) => [
        {
          type: "escrow.opened",
          payload: {
            escrowId: escrow.id,
            offerId: escrow.offerId,
            buyer: escrow.buyer,
            seller: escrow.seller,
            amount: escrow.amount.toString(),
            fiatAmount: escrow.fiatAmount.toString(),
          },
        },
      ],
    );
  }

  confirmPayment(ctx: CallContext, escrowId: EscrowId): Escrow {
    return this.execute(
      "confirmPayment",
      ctx,
      "escrows",
      () => this.escrows.confirmPayment(ctx, escrowId),
      (escrow) => [escrowEvent("escrow.completed", escrow)],
    );
  }

  cancelEscrow(ctx: CallContext, escrowId: EscrowId): Escrow {
    return this.execute(
      "cancelEscrow",
      ctx,
      "escrows",
      () => this.escrows.cancel(ctx, escrowId),
      (escrow) => [escrowEvent("escrow.cancelled", escrow)],
    );
  }

  raiseDispute(ctx: CallContext, escrowId: EscrowId): Escrow {
    return this.execute(
      "raiseDispute",
      ctx,
      "escrows",
      () => this.escrows.raiseDispute(ctx, escrowId),
      (escrow) => [
        { type: "escrow.disputed", payload: { escrowId: escrow.id, raisedBy: ctx.caller } },
      ],
    );
  }

  getEscrow(escrowId: EscrowId): Escrow | undefined {
    return this.escrows.get(escrowId);
  }

  escrowsOf(principal: Principal): readonly Escrow[] {
    return this.escrows.escrowsOf(principal);
  }

  escrowsForOffer(offerId: OfferId): readonly Escrow[] {
    return this.escrows.escrowsForOffer(offerId);
  }

  /**
   * Whether the seller could still confirm `escrowId` at `now`.
   * False for escrows that are not pending.
   */
  isPaymentWindowOpen(escrowId: EscrowId, now: number): boolean {
    const escrow = this.escrows.require(escrowId);
    return escrow.status === "pending" && this.escrows.isPaymentWindowOpen(escrow, now);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Arbitration
  // ───────────────────────────────────────────────────────────────────────

  resolveDispute(ctx: CallContext, escrowId: EscrowId, favorBuyer: boolean): Escrow {
    return this.execute(
      "resolveDispute",
      ctx,
      "arbitration",
      () => this.arbitration.resolve(ctx, escrowId, favorBuyer),
      (escrow) => [
        {
          type: "dispute.resolved",
          payload: {
            escrowId: escrow.id,
            resolution: escrow.resolution,
            amount: escrow.amount.toString(),
          },
        },
      ],
    );
  }

  isArbitrator(principal: Principal): boolean {
    return this.arbitration.isArbitrator(principal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): ExchangeSnapshot {
    return this.store.snapshot();
  }

  /**
   * Rebuild an exchange from a snapshot. Records are validated; id
   * allocation continues from the snapshot's `nextOfferId` and
   * `nextEscrowId` counters.
   */
  static fromSnapshot(snapshot: ExchangeSnapshot, options: ExchangeOptions): Exchange {
    assertSnapshot(snapshot);
    return new Exchange(options, ExchangeStore.fromSnapshot(snapshot));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private execute<T>(
    operation: string,
    ctx: CallContext,
    source: EventSource,
    fn: () => T,
    toEvents: (result: T) => readonly EventDraft[],
  ): T {
    return this.guard.run(operation, () => {
      assertContext(ctx);

      const checkpoint = this.store.checkpoint();
      let result: T;
      try {
        result = fn();
      } catch (err) {
        this.store.rollback(checkpoint);
        throw err;
      }

      const correlationId = this.nextId();
      this.events.append(
        toEvents(result).map((draft, i) => ({
          type: draft.type,
          metadata: {
            eventId: `${correlationId}:${String(i + 1)}`,
            timestamp: ctx.now,
            actor: ctx.caller,
            correlationId,
            source,
          },
          payload: draft.payload,
        })),
      );

      return result;
    });
  }
}

function resolveLimits(overrides: Partial<ExchangeLimits> | undefined): ExchangeLimits {
  const limits: ExchangeLimits = {
    paymentWindowSeconds: overrides?.paymentWindowSeconds ?? DEFAULT_LIMITS.paymentWindowSeconds,
    maxOpenEscrowsPerOffer:
      overrides?.maxOpenEscrowsPerOffer ?? DEFAULT_LIMITS.maxOpenEscrowsPerOffer,
  };

  if (!Number.isSafeInteger(limits.paymentWindowSeconds) || limits.paymentWindowSeconds <= 0) {
    throw new ExchangeError("INVALID_INPUT", "paymentWindowSeconds must be a positive integer");
  }
  if (!Number.isSafeInteger(limits.maxOpenEscrowsPerOffer) || limits.maxOpenEscrowsPerOffer <= 0) {
    throw new ExchangeError("INVALID_INPUT", "maxOpenEscrowsPerOffer must be a positive integer");
  }

  return limits;
}

function escrowEvent(type: string, escrow: Escrow): EventDraft {
  return {
    type,
    payload: {
      escrowId: escrow.id,
      offerId: escrow.offerId,
      buyer: escrow.buyer,
      seller: escrow.seller,
      amount: escrow.amount.toString(),
    },
  };
}

function assertSnapshot(snapshot: ExchangeSnapshot): void {
  if (snapshot.version !== 1) {
    throw new ExchangeError("INVALID_INPUT", `Unsupported snapshot version ${String(snapshot.version)}`);
  }

  const invalid = (what: string): never => {
    throw new ExchangeError("INVALID_INPUT", `Snapshot contains an invalid ${what}`);
  };

  for (const profile of snapshot.profiles) {
    if (!isProfile(profile)) invalid("profile");
  }
  for (const offer of snapshot.offers) {
    if (!isOffer(offer) || offer.id >= snapshot.nextOfferId) invalid("offer");
  }
  for (const escrow of snapshot.escrows) {
    if (!isEscrow(escrow) || escrow.id >= snapshot.nextEscrowId) invalid("escrow");
  }
  for (const { principal, record } of snapshot.balances) {
    if (!isPrincipal(principal) || record.locked < 0n || record.locked > record.deposited) {
      invalid("balance record");
    }
  }
}
