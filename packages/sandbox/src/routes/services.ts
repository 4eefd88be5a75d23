/**
 * Service routes.
 *
 * POST /api/v1/services            — Create a service bound to a subscription
 * GET  /api/v1/services/:id        — Service metadata and charging policy
 * GET  /api/v1/services/:id/token  — Access token for the caller
 */

import { Hono } from "hono";
import type { SandboxEnv } from "../types/api-contract.js";
import type { Marketplace } from "../marketplace.js";
import { CreateServiceSchema } from "../types/dto.js";
import { readJsonBody } from "../middleware/validate.js";

export function createServiceRoutes(marketplace: Marketplace): Hono<SandboxEnv> {
  const routes = new Hono<SandboxEnv>();

  routes.post("/", async (c) => {
    const body = await readJsonBody(c, CreateServiceSchema);
    const service = marketplace.createService(body);
    return c.json({ data: service }, 201);
  });

  routes.get("/:id", (c) => {
    return c.json({ data: marketplace.getService(c.req.param("id")) });
  });

  routes.get("/:id/token", (c) => {
    const token = marketplace.issueToken(c.req.param("id"), c.get("account"));
    return c.json({ data: token });
  });

  return routes;
}
