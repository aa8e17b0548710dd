/**
 * Tests for InMemorySettlementLedger.
 *
 * Covers:
 * - Minting and allowances
 * - transferIn allowance/funds checks
 * - transferOut reserve checks
 * - Listener dispatch and revert-on-throw
 * - Supply conservation
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemorySettlementLedger } from "../src/in-memory-ledger.js";
import { SettlementError } from "../src/types.js";
import type { TransferRecord } from "../src/types.js";

function codeOf(fn: () => void): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof SettlementError) return err.code;
    throw err;
  }
  return undefined;
}

describe("InMemorySettlementLedger", () => {
  let ledger: InMemorySettlementLedger;

  beforeEach(() => {
    ledger = new InMemorySettlementLedger();
    ledger.mint("joe", 1000n);
  });

  // ─── Funding ─────────────────────────────────────────────────────────

  describe("mint / approve", () => {
    it("mints into the external balance", () => {
      expect(ledger.balanceOf("joe")).toBe(1000n);
      expect(ledger.balanceOf("john")).toBe(0n);
    });

    it("rejects minting zero", () => {
      expect(codeOf(() => ledger.mint("joe", 0n))).toBe("INVALID_AMOUNT");
    });

    it("replaces the previous allowance", () => {
      ledger.approve("joe", 500n);
      ledger.approve("joe", 200n);
      expect(ledger.allowanceOf("joe")).toBe(200n);
    });

    it("rejects a negative allowance", () => {
      expect(codeOf(() => ledger.approve("joe", -1n))).toBe("INVALID_AMOUNT");
    });
  });

  // ─── transferIn ──────────────────────────────────────────────────────

  describe("transferIn", () => {
    it("moves funds into custody and consumes allowance", () => {
      ledger.approve("joe", 600n);
      ledger.transferIn("joe", 400n);

      expect(ledger.balanceOf("joe")).toBe(600n);
      expect(ledger.allowanceOf("joe")).toBe(200n);
      expect(ledger.custodyBalance()).toBe(400n);
    });

    it("fails without allowance", () => {
      expect(codeOf(() => ledger.transferIn("joe", 1n))).toBe("INSUFFICIENT_ALLOWANCE");
      expect(ledger.custodyBalance()).toBe(0n);
    });

    it("fails when the balance is short", () => {
      ledger.approve("joe", 5000n);
      expect(codeOf(() => ledger.transferIn("joe", 1001n))).toBe("INSUFFICIENT_FUNDS");
      expect(ledger.balanceOf("joe")).toBe(1000n);
      expect(ledger.allowanceOf("joe")).toBe(5000n);
    });

    it("rejects non-positive amounts", () => {
      expect(codeOf(() => ledger.transferIn("joe", 0n))).toBe("INVALID_AMOUNT");
    });
  });

  // ─── transferOut ─────────────────────────────────────────────────────

  describe("transferOut", () => {
    beforeEach(() => {
      ledger.approve("joe", 1000n);
      ledger.transferIn("joe", 1000n);
    });

    it("pays out of custody", () => {
      ledger.transferOut("john", 300n);
      expect(ledger.balanceOf("john")).toBe(300n);
      expect(ledger.custodyBalance()).toBe(700n);
    });

    it("fails when the reserve is short", () => {
      expect(codeOf(() => ledger.transferOut("john", 1001n))).toBe("RESERVE_INSUFFICIENT");
      expect(ledger.balanceOf("john")).toBe(0n);
    });
  });

  // ─── Listeners ───────────────────────────────────────────────────────

  describe("onTransfer", () => {
    it("reports transfers in execution order", () => {
      const seen: TransferRecord[] = [];
      ledger.onTransfer((t) => seen.push(t));

      ledger.approve("joe", 100n);
      ledger.transferIn("joe", 100n);
      ledger.transferOut("john", 40n);

      expect(seen).toEqual([
        { sequence: 1, direction: "in", principal: "joe", amount: 100n },
        { sequence: 2, direction: "out", principal: "john", amount: 40n },
      ]);
      expect(ledger.transfers()).toEqual(seen);
    });

    it("stops dispatching after unsubscribe", () => {
      let calls = 0;
      const sub = ledger.onTransfer(() => {
        calls++;
      });
      ledger.approve("joe", 100n);
      ledger.transferIn("joe", 50n);
      sub.unsubscribe();
      ledger.transferIn("joe", 50n);

      expect(calls).toBe(1);
    });

    it("reverts the transfer when a listener throws", () => {
      ledger.approve("joe", 100n);
      ledger.onTransfer(() => {
        throw new Error("callback rejected");
      });

      expect(() => ledger.transferIn("joe", 100n)).toThrow("callback rejected");
      expect(ledger.balanceOf("joe")).toBe(1000n);
      expect(ledger.allowanceOf("joe")).toBe(100n);
      expect(ledger.custodyBalance()).toBe(0n);
      expect(ledger.transfers()).toEqual([]);
    });
  });

  // ─── Conservation ────────────────────────────────────────────────────

  it("transfers never change total supply", () => {
    ledger.mint("john", 250n);
    ledger.approve("joe", 1000n);
    ledger.transferIn("joe", 700n);
    ledger.transferOut("john", 300n);

    expect(ledger.totalSupply()).toBe(1250n);
  });
});
