/**
 * Offer routes.
 *
 * POST /api/v1/offers                 — Publish a sell offer
 * GET  /api/v1/offers                 — List offers (cursor pagination)
 * GET  /api/v1/offers/:id             — Get a single offer
 * POST /api/v1/offers/:id/deactivate  — Withdraw an offer
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateOfferSchema, ListOffersQuerySchema } from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";
import { recordId } from "./params.js";

export function createOfferRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateOfferSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");

    const offer = service.exchange.createOffer(service.context(c.get("principal")), {
      maxTradeAmount: service.parseAmount(body.maxTradeAmount),
      minTradeAmount: service.parseAmount(body.minTradeAmount),
      unitPrice: service.parsePrice(body.unitPrice),
      currency: body.currency,
      paymentMethod: body.paymentMethod,
    });

    return c.json({ data: service.offerView(offer) }, 201);
  });

  routes.get("/", validateQuery(ListOffersQuerySchema), (c) => {
    const service = c.get("service");
    const query = c.req.valid("query");

    const offers = service.exchange.listOffers({
      seller: query.seller,
      activeOnly: query.active === "true",
    });
    const filtered =
      query.active === "false" ? offers.filter((offer) => !offer.active) : offers;

    const page = paginate(
      filtered,
      { cursor: query.cursor, limit: query.limit },
      (offer) => offer.id,
      "id",
    );

    return c.json({
      data: page.data.map((offer) => service.offerView(offer)),
      pagination: page.pagination,
    });
  });

  routes.get("/:id", (c) => {
    const service = c.get("service");
    const id = recordId(c.req.param("id"));
    const offer = service.exchange.getOffer(id);

    if (offer === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Offer ${String(id)} not found`), 404);
    }

    return c.json({ data: service.offerView(offer) });
  });

  routes.post("/:id/deactivate", (c) => {
    const service = c.get("service");
    const id = recordId(c.req.param("id"));

    const offer = service.exchange.deactivateOffer(service.context(c.get("principal")), id);
    return c.json({ data: service.offerView(offer) });
  });

  return routes;
}
