/**
 * Subscription routes.
 *
 * POST /api/v1/subscriptions               — Create a subscription
 * GET  /api/v1/subscriptions/:id/balance   — Balance of ?account=
 * POST /api/v1/subscriptions/:id/orders    — Order one top-up for the caller
 * GET  /api/v1/subscriptions/:id/services  — Service IDs bound to the subscription
 */

import { Hono } from "hono";
import type { SandboxEnv } from "../types/api-contract.js";
import type { Marketplace } from "../marketplace.js";
import { MarketplaceError } from "../marketplace.js";
import { CreateSubscriptionSchema } from "../types/dto.js";
import { readJsonBody } from "../middleware/validate.js";

export function createSubscriptionRoutes(marketplace: Marketplace): Hono<SandboxEnv> {
  const routes = new Hono<SandboxEnv>();

  routes.post("/", async (c) => {
    const body = await readJsonBody(c, CreateSubscriptionSchema);
    const subscription = marketplace.createSubscription(body);
    return c.json({ data: subscription }, 201);
  });

  routes.get("/:id/balance", (c) => {
    const account = c.req.query("account");
    if (account === undefined || account === "") {
      throw new MarketplaceError("VALIDATION_ERROR", "Query parameter 'account' is required");
    }
    const balance = marketplace.balanceOf(c.req.param("id"), account);
    return c.json({ data: { balance } });
  });

  routes.post("/:id/orders", (c) => {
    const receipt = marketplace.placeOrder(c.req.param("id"), c.get("account"));
    return c.json(
      { data: { orderId: receipt.orderId, subscriptionId: receipt.subscriptionId } },
      201,
    );
  });

  routes.get("/:id/services", (c) => {
    return c.json({ data: marketplace.servicesFor(c.req.param("id")) });
  });

  return routes;
}
