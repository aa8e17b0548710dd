/**
 * Dispute Arbitration — privileged settlement of disputed escrows.
 *
 * The arbitrator is an injected capability checked before anything
 * else. It is fixed when the exchange is built.
 *
 * Settlement-time averages are not updated here, only by
 * EscrowEngine.confirmPayment.
 */

import type { Escrow, EscrowId, Principal } from "@souk/types";
import type { SettlementLedger } from "@souk/settlement";
import type { BalanceBook } from "./balances.js";
import type { EscrowEngine } from "./escrows.js";
import type { OfferBook } from "./offers.js";
import type { ProfileRegistry } from "./profiles.js";
import type { CallContext } from "./types.js";
import { ExchangeError } from "./types.js";

// =============================================================================
// Arbitrator capability
// =============================================================================

export interface ArbitratorPolicy {
  isArbitrator(principal: Principal): boolean;
}

/**
 * Policy that recognises exactly one principal.
 */
export function fixedArbitrator(principal: Principal): ArbitratorPolicy {
  if (principal.length === 0) {
    throw new ExchangeError("INVALID_ADDRESS", "Arbitrator must be a non-empty principal");
  }
  return Object.freeze({
    isArbitrator: (candidate: Principal) => candidate === principal,
  });
}

// =============================================================================
// Dispute Arbitration
// =============================================================================

export class DisputeArbitration {
  private readonly policy: ArbitratorPolicy;
  private readonly escrows: EscrowEngine;
  private readonly offers: OfferBook;
  private readonly balances: BalanceBook;
  private readonly profiles: ProfileRegistry;
  private readonly settlement: SettlementLedger;

  constructor(
    policy: ArbitratorPolicy,
    escrows: EscrowEngine,
    offers: OfferBook,
    balances: BalanceBook,
    profiles: ProfileRegistry,
    settlement: SettlementLedger,
  ) {
    this.policy = policy;
    this.escrows = escrows;
    this.offers = offers;
    this.balances = balances;
    this.profiles = profiles;
    this.settlement = settlement;
  }

  isArbitrator(principal: Principal): boolean {
    return this.policy.isArbitrator(principal);
  }

  /**
   * Settle a disputed escrow.
   *
   * favorBuyer: the amount leaves custody to the buyer; buyer completed +1,
   * seller disputed +1.
   * Otherwise: the amount stays in the seller's deposit; seller
   * completed +1, buyer disputed +1.
   */
  resolve(ctx: CallContext, escrowId: EscrowId, favorBuyer: boolean): Escrow {
    if (!this.policy.isArbitrator(ctx.caller)) {
      throw new ExchangeError("UNAUTHORIZED", `'${ctx.caller}' is not the arbitrator`);
    }

    const escrow = this.escrows.requireStatus(escrowId, "disputed");
    const updated = this.escrows.transition(escrow, "completed", ctx.now, {
      resolution: favorBuyer ? "buyer" : "seller",
    });

    this.offers.decrementOpen(escrow.offerId);
    this.balances.unlock(escrow.seller, escrow.amount);

    if (favorBuyer) {
      this.balances.debit(escrow.seller, escrow.amount);
      this.profiles.recordCompleted(escrow.buyer);
      this.profiles.recordDisputeLost(escrow.seller);
      this.settlement.transferOut(escrow.buyer, escrow.amount);
    } else {
      this.profiles.recordCompleted(escrow.seller);
      this.profiles.recordDisputeLost(escrow.buyer);
    }

    return updated;
  }
}
