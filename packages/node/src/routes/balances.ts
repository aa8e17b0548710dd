/**
 * Custody balance routes.
 *
 * POST /api/v1/balances/deposit     — Pull funds into custody
 * POST /api/v1/balances/withdraw    — Return available funds
 * GET  /api/v1/balances/:principal  — Deposited total
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AmountSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createBalanceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposit", validateBody(AmountSchema), (c) => {
    const service = c.get("service");
    const principal = c.get("principal");
    const amount = service.parseAmount(c.req.valid("json").amount);

    const deposited = service.exchange.deposit(service.context(principal), amount);
    return c.json({ data: { principal, deposited: service.formatAmount(deposited) } });
  });

  routes.post("/withdraw", validateBody(AmountSchema), (c) => {
    const service = c.get("service");
    const principal = c.get("principal");
    const amount = service.parseAmount(c.req.valid("json").amount);

    const deposited = service.exchange.withdraw(service.context(principal), amount);
    return c.json({ data: { principal, deposited: service.formatAmount(deposited) } });
  });

  routes.get("/:principal", (c) => {
    const service = c.get("service");
    const principal = c.req.param("principal");

    return c.json({
      data: {
        principal,
        deposited: service.formatAmount(service.exchange.balanceOf(principal)),
      },
    });
  });

  return routes;
}
