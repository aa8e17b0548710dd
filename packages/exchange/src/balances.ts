/**
 * Balance Book — custody accounting per principal.
 *
 * Tracks how much each principal has deposited into custody and how
 * much of that is locked against open escrows.
 *
 * Rules:
 * - locked ≤ deposited, always
 * - available = deposited − locked, never negative
 * - Withdrawals and new commitments draw only on available
 * - Effects are written before the settlement transfer runs
 */

import type { BalanceRecord, Principal } from "@souk/types";
import type { SettlementLedger } from "@souk/settlement";
import type { ExchangeStore } from "./store.js";
import type { CallContext } from "./types.js";
import { ExchangeError } from "./types.js";
import { assertPositive } from "./validate.js";

export class BalanceBook {
  private readonly store: ExchangeStore;
  private readonly settlement: SettlementLedger;

  constructor(store: ExchangeStore, settlement: SettlementLedger) {
    this.store = store;
    this.settlement = settlement;
  }

  // ─── Public operations ──────────────────────────────────────────────

  /**
   * Pull `amount` from the caller into custody. No profile required.
   */
  deposit(ctx: CallContext, amount: bigint): BalanceRecord {
    assertPositive("amount", amount);

    const record = this.store.getBalance(ctx.caller);
    const updated: BalanceRecord = { ...record, deposited: record.deposited + amount };
    this.store.putBalance(ctx.caller, updated);

    this.settlement.transferIn(ctx.caller, amount);
    return updated;
  }

  /**
   * Return `amount` of the caller's available balance.
   */
  withdraw(ctx: CallContext, amount: bigint): BalanceRecord {
    assertPositive("amount", amount);
    this.assertAvailable(ctx.caller, amount);

    const record = this.store.getBalance(ctx.caller);
    const updated: BalanceRecord = { ...record, deposited: record.deposited - amount };
    this.store.putBalance(ctx.caller, updated);

    this.settlement.transferOut(ctx.caller, amount);
    return updated;
  }

  // ─── Engine operations ──────────────────────────────────────────────

  lock(principal: Principal, amount: bigint): void {
    this.assertAvailable(principal, amount);
    const record = this.store.getBalance(principal);
    this.store.putBalance(principal, { ...record, locked: record.locked + amount });
  }

  unlock(principal: Principal, amount: bigint): void {
    const record = this.store.getBalance(principal);
    if (record.locked < amount) {
      throw new Error(
        `Balance invariant violated: unlocking ${amount.toString()} from '${principal}' with only ${record.locked.toString()} locked`,
      );
    }
    this.store.putBalance(principal, { ...record, locked: record.locked - amount });
  }

  /**
   * Remove `amount` from custody on behalf of `principal` (funds about to
   * be paid out). Only unlocked funds can be debited.
   */
  debit(principal: Principal, amount: bigint): void {
    this.assertAvailable(principal, amount);
    const record = this.store.getBalance(principal);
    this.store.putBalance(principal, { ...record, deposited: record.deposited - amount });
  }

  // ─── Queries ────────────────────────────────────────────────────────

  /** Deposited total. The only balance figure exposed publicly. */
  depositedOf(principal: Principal): bigint {
    return this.store.getBalance(principal).deposited;
  }

  recordOf(principal: Principal): BalanceRecord {
    return this.store.getBalance(principal);
  }

  availableOf(principal: Principal): bigint {
    const record = this.store.getBalance(principal);
    return record.deposited - record.locked;
  }

  /** Sum of every deposited total; equals the custody reserve. */
  totalDeposited(): bigint {
    let total = 0n;
    for (const principal of this.store.balanceHolders()) {
      total += this.store.getBalance(principal).deposited;
    }
    return total;
  }

  private assertAvailable(principal: Principal, amount: bigint): void {
    const available = this.availableOf(principal);
    if (available < amount) {
      throw new ExchangeError(
        "INSUFFICIENT_BALANCE",
        `'${principal}' has ${available.toString()} available, needs ${amount.toString()}`,
      );
    }
  }
}
