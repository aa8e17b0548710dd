/**
 * Tests for settlement and custody balance routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { SettlementAccountView } from "../../src/services/exchange-service.js";
import { createTestApp, jsonRequest } from "../setup.js";
import type { TestApp } from "../setup.js";

let instance: TestApp;

beforeEach(() => {
  instance = createTestApp();
});

async function account(principal: string): Promise<SettlementAccountView> {
  const res = await instance.app.request(
    jsonRequest(`/api/v1/settlement/${principal}`, "GET", undefined, principal),
  );
  const body = (await res.json()) as { data: SettlementAccountView };
  return body.data;
}

describe("settlement routes", () => {
  it("mints to the caller", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/settlement/mint", "POST", { amount: "250.5" }, "joe"),
    );

    expect(res.status).toBe(201);
    expect(await account("joe")).toEqual({
      principal: "joe",
      symbol: "USDC",
      decimals: 6,
      walletBalance: "250.500000",
      allowance: "0.000000",
      deposited: "0.000000",
    });
  });

  it("mints to another principal", async () => {
    await instance.app.request(
      jsonRequest("/api/v1/settlement/mint", "POST", { to: "john", amount: "3" }, "joe"),
    );
    expect((await account("john")).walletBalance).toBe("3.000000");
  });

  it("has no faucet unless enabled", async () => {
    const locked = createTestApp({ mintEnabled: false });
    const res = await locked.app.request(
      jsonRequest("/api/v1/settlement/mint", "POST", { amount: "1" }, "joe"),
    );
    expect(res.status).toBe(404);
  });

  it("sets the caller's allowance", async () => {
    await instance.app.request(
      jsonRequest("/api/v1/settlement/approve", "POST", { amount: "10" }, "joe"),
    );
    expect((await account("joe")).allowance).toBe("10.000000");
  });

  it("rejects more decimals than the asset has", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/settlement/approve", "POST", { amount: "0.0000001" }, "joe"),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("INVALID_AMOUNT");
  });

  it("rejects negative amounts at validation", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/settlement/approve", "POST", { amount: "-1" }, "joe"),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("balance routes", () => {
  beforeEach(async () => {
    await instance.app.request(
      jsonRequest("/api/v1/settlement/mint", "POST", { amount: "100" }, "joe"),
    );
  });

  it("deposits after approval", async () => {
    await instance.app.request(
      jsonRequest("/api/v1/settlement/approve", "POST", { amount: "60" }, "joe"),
    );
    const res = await instance.app.request(
      jsonRequest("/api/v1/balances/deposit", "POST", { amount: "60" }, "joe"),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: { principal: string; deposited: string } };
    expect(body.data).toEqual({ principal: "joe", deposited: "60.000000" });
    expect(await account("joe")).toMatchObject({
      walletBalance: "40.000000",
      allowance: "0.000000",
      deposited: "60.000000",
    });
  });

  it("returns 422 without allowance", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/balances/deposit", "POST", { amount: "1" }, "joe"),
    );

    expect(res.status).toBe(422);
    const body = (await res.json()) as { error: { code: string } };
    expect(body.error.code).toBe("INSUFFICIENT_ALLOWANCE");
  });

  it("returns 400 for a zero deposit", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/balances/deposit", "POST", { amount: "0" }, "joe"),
    );
    expect(res.status).toBe(400);
  });

  it("withdraws available funds", async () => {
    await instance.app.request(
      jsonRequest("/api/v1/settlement/approve", "POST", { amount: "100" }, "joe"),
    );
    await instance.app.request(
      jsonRequest("/api/v1/balances/deposit", "POST", { amount: "100" }, "joe"),
    );

    const res = await instance.app.request(
      jsonRequest("/api/v1/balances/withdraw", "POST", { amount: "30.25" }, "joe"),
    );
    expect(res.status).toBe(200);

    const balance = await instance.app.request(
      jsonRequest("/api/v1/balances/joe", "GET", undefined, "john"),
    );
    const body = (await balance.json()) as { data: { deposited: string } };
    expect(body.data.deposited).toBe("69.750000");
    expect((await account("joe")).walletBalance).toBe("30.250000");
  });

  it("returns 422 when withdrawing more than deposited", async () => {
    const res = await instance.app.request(
      jsonRequest("/api/v1/balances/withdraw", "POST", { amount: "1" }, "joe"),
    );
    expect(res.status).toBe(422);
  });
});
