/**
 * @souk/exchange — Reentrancy barrier.
 *
 * Wraps every mutating entry point. While a call is in flight, any
 * nested entry (for example from a settlement transfer listener) fails
 * with REENTRANT_CALL before it can observe uncommitted state.
 */

import { ExchangeError } from "./types.js";

export class ReentrancyGuard {
  private _entered = false;

  get entered(): boolean {
    return this._entered;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this._entered) {
      throw new ExchangeError(
        "REENTRANT_CALL",
        `Cannot call ${operation} while another exchange call is in progress`,
      );
    }

    this._entered = true;
    try {
      return fn();
    } finally {
      this._entered = false;
    }
  }
}
