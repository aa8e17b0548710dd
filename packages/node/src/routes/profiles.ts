/**
 * Profile routes.
 *
 * POST  /api/v1/profiles             — Create the caller's profile
 * PATCH /api/v1/profiles             — Replace the caller's contacts
 * GET   /api/v1/profiles/:principal  — Read a profile
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateProfileSchema, UpdateProfileSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createProfileRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(CreateProfileSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");

    const profile = service.exchange.createProfile(
      service.context(c.get("principal")),
      body.displayName,
      body.primaryContact,
      body.secondaryContact,
    );

    return c.json({ data: profile }, 201);
  });

  routes.patch("/", validateBody(UpdateProfileSchema), (c) => {
    const service = c.get("service");
    const body = c.req.valid("json");

    const profile = service.exchange.updateProfile(
      service.context(c.get("principal")),
      body.primaryContact,
      body.secondaryContact,
    );

    return c.json({ data: profile });
  });

  routes.get("/:principal", (c) => {
    const service = c.get("service");
    const principal = c.req.param("principal");
    const profile = service.exchange.getProfile(principal);

    if (profile === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Profile '${principal}' not found`),
        404,
      );
    }

    return c.json({ data: profile });
  });

  return routes;
}
