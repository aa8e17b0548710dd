/**
 * @souk/exchange — Argument validation shared by every component.
 */

import type { CallContext } from "./types.js";
import { ExchangeError } from "./types.js";

/**
 * Reject an empty caller or a clock reading that is not unix seconds.
 */
export function assertContext(ctx: CallContext): void {
  if (typeof ctx.caller !== "string" || ctx.caller.length === 0) {
    throw new ExchangeError("INVALID_ADDRESS", "Caller must be a non-empty principal");
  }
  if (!Number.isSafeInteger(ctx.now) || ctx.now < 0) {
    throw new ExchangeError(
      "INVALID_INPUT",
      `Call time must be a non-negative integer of seconds, got ${String(ctx.now)}`,
    );
  }
}

/**
 * Reject empty or whitespace-only strings.
 */
export function assertText(field: string, value: string): void {
  if (value.trim() === "") {
    throw new ExchangeError("INVALID_INPUT", `${field} must not be empty`);
  }
}

/**
 * Reject zero and negative amounts.
 */
export function assertPositive(field: string, value: bigint): void {
  if (value <= 0n) {
    throw new ExchangeError(
      "INVALID_INPUT",
      `${field} must be greater than zero, got ${value.toString()}`,
    );
  }
}
