/**
 * Settlement asset routes.
 *
 * GET  /api/v1/settlement/:principal  — Wallet, allowance and custody figures
 * POST /api/v1/settlement/approve     — Set the caller's custody allowance
 * POST /api/v1/settlement/mint        — Faucet (only when MINT_ENABLED)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AmountSchema, MintSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export interface SettlementRouteOptions {
  readonly mintEnabled: boolean;
}

export function createSettlementRoutes(options: SettlementRouteOptions): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:principal", (c) => {
    const service = c.get("service");
    return c.json({ data: service.settlementAccount(c.req.param("principal")) });
  });

  routes.post("/approve", validateBody(AmountSchema), (c) => {
    const service = c.get("service");
    const principal = c.get("principal");

    service.ledger.approve(principal, service.parseAmount(c.req.valid("json").amount));
    return c.json({ data: service.settlementAccount(principal) });
  });

  if (options.mintEnabled) {
    routes.post("/mint", validateBody(MintSchema), (c) => {
      const service = c.get("service");
      const body = c.req.valid("json");
      const to = body.to ?? c.get("principal");

      service.ledger.mint(to, service.parseAmount(body.amount));
      return c.json({ data: service.settlementAccount(to) }, 201);
    });
  }

  return routes;
}
