/**
 * Tests for config.ts — loadConfig.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ ARBITRATOR: "arbiter" });

    expect(config).toEqual({
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      NODE_ENV: "development",
      ARBITRATOR: "arbiter",
      SETTLEMENT_SYMBOL: "USDC",
      SETTLEMENT_DECIMALS: 6,
      MINT_ENABLED: false,
      PAYMENT_WINDOW_SECONDS: 172800,
      MAX_OPEN_ESCROWS_PER_OFFER: 100,
    });
  });

  it("coerces numeric and boolean variables", () => {
    const config = loadConfig({
      ARBITRATOR: "arbiter",
      PORT: "8080",
      SETTLEMENT_DECIMALS: "18",
      MINT_ENABLED: "true",
      PAYMENT_WINDOW_SECONDS: "3600",
      MAX_OPEN_ESCROWS_PER_OFFER: "5",
    });

    expect(config.PORT).toBe(8080);
    expect(config.SETTLEMENT_DECIMALS).toBe(18);
    expect(config.MINT_ENABLED).toBe(true);
    expect(config.PAYMENT_WINDOW_SECONDS).toBe(3600);
    expect(config.MAX_OPEN_ESCROWS_PER_OFFER).toBe(5);
  });

  it("requires an arbitrator", () => {
    expect(() => loadConfig({})).toThrow(ZodError);
    expect(() => loadConfig({ ARBITRATOR: "  " })).toThrow(ZodError);
  });

  it.each([
    ["PORT", "0"],
    ["PORT", "70000"],
    ["LOG_LEVEL", "verbose"],
    ["SETTLEMENT_DECIMALS", "19"],
    ["MINT_ENABLED", "yes"],
    ["PAYMENT_WINDOW_SECONDS", "0"],
    ["MAX_OPEN_ESCROWS_PER_OFFER", "-1"],
  ])("rejects %s=%s", (key, value) => {
    expect(() => loadConfig({ ARBITRATOR: "arbiter", [key]: value })).toThrow(ZodError);
  });
});
