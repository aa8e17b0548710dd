/**
 * @souk/settlement — In-memory settlement ledger.
 *
 * Holds external balances for every principal, a single custody reserve
 * owned by the exchange, and the allowance each principal has granted
 * to custody. Suitable for tests, the demo and single-process nodes.
 *
 * Properties:
 * - transferIn requires allowance and balance, and consumes allowance
 * - transferOut draws only on the custody reserve
 * - Listeners run synchronously after a transfer; a throwing listener
 *   reverts the transfer and the error propagates
 */

import type { Principal } from "@souk/types";
import type {
  SettlementLedger,
  TransferDirection,
  TransferListener,
  TransferRecord,
  TransferSubscription,
} from "./types.js";
import { SettlementError } from "./types.js";
import { assertPositiveAmount } from "./units.js";

interface LedgerState {
  readonly balance: bigint;
  readonly allowance: bigint;
  readonly custody: bigint;
}

export class InMemorySettlementLedger implements SettlementLedger {
  private readonly _balances = new Map<Principal, bigint>();
  private readonly _allowances = new Map<Principal, bigint>();
  private readonly _listeners = new Set<TransferListener>();
  private readonly _transfers: TransferRecord[] = [];
  private _custody = 0n;

  // ─── Funding ────────────────────────────────────────────────────────

  /**
   * Create `amount` of the asset in `to`'s external balance.
   */
  mint(to: Principal, amount: bigint): void {
    assertPositiveAmount(amount);
    this._balances.set(to, this.balanceOf(to) + amount);
  }

  /**
   * Set the amount custody may pull from `owner`. Replaces any previous
   * allowance.
   */
  approve(owner: Principal, amount: bigint): void {
    if (amount < 0n) {
      throw new SettlementError(
        "INVALID_AMOUNT",
        `Allowance cannot be negative, got ${amount.toString()}`,
      );
    }
    this._allowances.set(owner, amount);
  }

  // ─── SettlementLedger ───────────────────────────────────────────────

  transferIn(from: Principal, amount: bigint): void {
    assertPositiveAmount(amount);

    const allowance = this.allowanceOf(from);
    if (allowance < amount) {
      throw new SettlementError(
        "INSUFFICIENT_ALLOWANCE",
        `Allowance of "${from}" is ${allowance.toString()}, transfer needs ${amount.toString()}`,
      );
    }

    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new SettlementError(
        "INSUFFICIENT_FUNDS",
        `Balance of "${from}" is ${balance.toString()}, transfer needs ${amount.toString()}`,
      );
    }

    this._apply("in", from, amount, {
      balance: balance - amount,
      allowance: allowance - amount,
      custody: this._custody + amount,
    });
  }

  transferOut(to: Principal, amount: bigint): void {
    assertPositiveAmount(amount);

    if (this._custody < amount) {
      throw new SettlementError(
        "RESERVE_INSUFFICIENT",
        `Custody reserve is ${this._custody.toString()}, transfer needs ${amount.toString()}`,
      );
    }

    this._apply("out", to, amount, {
      balance: this.balanceOf(to) + amount,
      allowance: this.allowanceOf(to),
      custody: this._custody - amount,
    });
  }

  // ─── Queries ────────────────────────────────────────────────────────

  balanceOf(principal: Principal): bigint {
    return this._balances.get(principal) ?? 0n;
  }

  allowanceOf(principal: Principal): bigint {
    return this._allowances.get(principal) ?? 0n;
  }

  custodyBalance(): bigint {
    return this._custody;
  }

  /**
   * Sum of every external balance plus custody. Only mint changes it.
   */
  totalSupply(): bigint {
    let total = this._custody;
    for (const balance of this._balances.values()) {
      total += balance;
    }
    return total;
  }

  transfers(): readonly TransferRecord[] {
    return [...this._transfers];
  }

  // ─── Listeners ──────────────────────────────────────────────────────

  onTransfer(listener: TransferListener): TransferSubscription {
    this._listeners.add(listener);
    return {
      unsubscribe: () => {
        this._listeners.delete(listener);
      },
    };
  }

  // ─── Private ────────────────────────────────────────────────────────

  private _apply(
    direction: TransferDirection,
    principal: Principal,
    amount: bigint,
    next: LedgerState,
  ): void {
    const previous: LedgerState = {
      balance: this.balanceOf(principal),
      allowance: this.allowanceOf(principal),
      custody: this._custody,
    };

    const record: TransferRecord = {
      sequence: this._transfers.length + 1,
      direction,
      principal,
      amount,
    };

    this._write(principal, next);
    this._transfers.push(record);

    try {
      for (const listener of [...this._listeners]) {
        listener(record);
      }
    } catch (err) {
      this._transfers.pop();
      this._write(principal, previous);
      throw err;
    }
  }

  private _write(principal: Principal, state: LedgerState): void {
    this._balances.set(principal, state.balance);
    this._allowances.set(principal, state.allowance);
    this._custody = state.custody;
  }
}
