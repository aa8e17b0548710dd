/**
 * @souk/settlement — Unit arithmetic.
 *
 * Converts between human decimal strings and bigint base units.
 *
 * "1000" with decimals=6   → 1000000000n
 * "0.5"  with decimals=18  → 500000000000000000n
 *
 * No floating-point operations. Negative amounts are not settlement
 * amounts and are rejected.
 */

import { SettlementError } from "./types.js";

/**
 * Parse a non-negative decimal string into base units.
 */
export function parseUnits(amount: string, decimals: number): bigint {
  assertDecimals(decimals);

  const trimmed = amount.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new SettlementError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new SettlementError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Format base units as a decimal string with exactly `decimals` places.
 *
 * 10050n with decimals=2 → "100.50"
 */
export function formatUnits(scaled: bigint, decimals: number): string {
  assertDecimals(decimals);
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Throw unless `amount` is strictly positive.
 */
export function assertPositiveAmount(amount: bigint): void {
  if (amount <= 0n) {
    throw new SettlementError(
      "INVALID_AMOUNT",
      `Transfer amounts must be positive, got ${amount.toString()}`,
    );
  }
}

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) {
    throw new SettlementError(
      "INVALID_AMOUNT",
      `Decimals must be an integer between 0 and 36, got ${String(decimals)}`,
    );
  }
}
