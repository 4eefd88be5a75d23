/**
 * Health check route.
 *
 * GET /health — Liveness probe (always 200 if the app is running)
 */

import { Hono } from "hono";
import type { SandboxEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<SandboxEnv> {
  const routes = new Hono<SandboxEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
