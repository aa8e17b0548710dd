/**
 * Escrow lifecycle routes.
 *
 * POST /api/v1/escrows               — Open an escrow against an offer
 * GET  /api/v1/escrows?principal=    — Escrows of a principal (default: caller)
 * GET  /api/v1/escrows/:id           — Get a single escrow
 * POST /api/v1/escrows/:id/confirm   — Seller confirms fiat payment
 * POST /api/v1/escrows/:id/cancel    — Buyer cancels
 * POST /api/v1/escrows/:id/dispute   — Either party disputes
 * POST /api/v1/escrows/:id/resolve   — Arbitrator resolves a dispute
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ListEscrowsQuerySchema,
  OpenEscrowSchema,
  ResolveDisputeSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { recordId } from "./params.js";

export function createEscrowRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(OpenEscrowSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");

    const escrow = service.exchange.openEscrow(
      service.context(c.get("principal")),
      body.offerId,
      service.parseAmount(body.amount),
    );

    return c.json({ data: service.escrowView(escrow) }, 201);
  });

  routes.get("/", validateQuery(ListEscrowsQuerySchema), (c) => {
    const service = c.get("service");
    const principal = c.req.valid("query").principal ?? c.get("principal");

    const escrows = service.exchange.escrowsOf(principal);
    return c.json({ data: escrows.map((escrow) => service.escrowView(escrow)) });
  });

  routes.get("/:id", (c) => {
    const service = c.get("service");
    const id = recordId(c.req.param("id"));
    const escrow = service.exchange.getEscrow(id);

    if (escrow === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Escrow ${String(id)} not found`), 404);
    }

    return c.json({
      data: {
        ...service.escrowView(escrow),
        paymentWindowOpen: service.exchange.isPaymentWindowOpen(id, service.now()),
      },
    });
  });

  routes.post("/:id/confirm", (c) => {
    const service = c.get("service");
    const escrow = service.exchange.confirmPayment(
      service.context(c.get("principal")),
      recordId(c.req.param("id")),
    );
    return c.json({ data: service.escrowView(escrow) });
  });

  routes.post("/:id/cancel", (c) => {
    const service = c.get("service");
    const escrow = service.exchange.cancelEscrow(
      service.context(c.get("principal")),
      recordId(c.req.param("id")),
    );
    return c.json({ data: service.escrowView(escrow) });
  });

  routes.post("/:id/dispute", (c) => {
    const service = c.get("service");
    const escrow = service.exchange.raiseDispute(
      service.context(c.get("principal")),
      recordId(c.req.param("id")),
    );
    return c.json({ data: service.escrowView(escrow) });
  });

  routes.post("/:id/resolve", validateBody(ResolveDisputeSchema), (c) => {
    const service = c.get("service");
    const escrow = service.exchange.resolveDispute(
      service.context(c.get("principal")),
      recordId(c.req.param("id")),
      c.req.valid("json").favorBuyer,
    );
    return c.json({ data: service.escrowView(escrow) });
  });

  return routes;
}
