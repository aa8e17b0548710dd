/**
 * @souk/settlement — Ledger adapter contract.
 *
 * The exchange never moves value itself. It asks a SettlementLedger to
 * pull funds into custody or push them out, and the ledger either
 * succeeds or throws a SettlementError.
 *
 * Rules:
 * - Amounts are positive bigint base units
 * - Failures throw, never return false silently
 * - A failed transfer leaves every balance unchanged
 */

import type { Principal } from "@souk/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for settlement transfers. */
export type SettlementErrorCode =
  | "INSUFFICIENT_ALLOWANCE"
  | "INSUFFICIENT_FUNDS"
  | "RESERVE_INSUFFICIENT"
  | "INVALID_AMOUNT";

/**
 * Structured error from a settlement ledger.
 */
export class SettlementError extends Error {
  public readonly code: SettlementErrorCode;

  constructor(code: SettlementErrorCode, message: string) {
    super(message);
    this.name = "SettlementError";
    this.code = code;
  }
}

// ─── Adapter Contract ────────────────────────────────────────────────────

/**
 * Moves settlement-asset value between a principal and the exchange's
 * custody reserve.
 */
export interface SettlementLedger {
  /**
   * Pull `amount` from `from` into custody.
   * Fails with INSUFFICIENT_ALLOWANCE or INSUFFICIENT_FUNDS.
   */
  transferIn(from: Principal, amount: bigint): void;

  /**
   * Push `amount` from custody to `to`.
   * Fails with RESERVE_INSUFFICIENT, which indicates broken internal accounting.
   */
  transferOut(to: Principal, amount: bigint): void;
}

// ─── Transfer Records ────────────────────────────────────────────────────

export type TransferDirection = "in" | "out";

/**
 * A completed transfer, in execution order.
 */
export interface TransferRecord {
  readonly sequence: number;
  readonly direction: TransferDirection;
  readonly principal: Principal;
  readonly amount: bigint;
}

/**
 * Invoked synchronously after a transfer is applied. A listener that
 * throws reverts the transfer.
 */
export type TransferListener = (transfer: TransferRecord) => void;

export interface TransferSubscription {
  unsubscribe(): void;
}
