/**
 * Hono application factory.
 *
 * Creates the sandbox marketplace app with middleware and routes.
 * Separated from the server so tests can drive it through
 * app.request() without opening a port.
 */

import { Hono } from "hono";
import type { SandboxEnv } from "./types/api-contract.js";
import { Marketplace } from "./marketplace.js";
import type { MarketplaceOptions } from "./marketplace.js";
import { handleError, handleNotFound } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { consumerMiddleware } from "./middleware/consumer.js";
import { createHealthRoutes } from "./routes/health.js";
import { createSubscriptionRoutes } from "./routes/subscriptions.js";
import { createServiceRoutes } from "./routes/services.js";
import { createProxyRoutes } from "./routes/proxy.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateSandboxAppOptions extends MarketplaceOptions {
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** API key → account address. When empty, every caller is `defaultAccount`. */
  readonly apiKeys?: Readonly<Record<string, string>> | undefined;
  /** Default: 0xconsumer */
  readonly defaultAccount?: string | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface SandboxInstance {
  readonly app: Hono<SandboxEnv>;
  readonly marketplace: Marketplace;
}

/**
 * Create the sandbox app with all middleware and routes.
 */
export function createSandboxApp(options: CreateSandboxAppOptions = {}): SandboxInstance {
  const marketplace = new Marketplace(options);
  const app = new Hono<SandboxEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound(handleNotFound);

  // ─── Health ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());

  // ─── Ledger & Identity APIs ─────────────────────────────────────
  app.use(
    "/api/*",
    consumerMiddleware({
      apiKeys: new Map(Object.entries(options.apiKeys ?? {})),
      defaultAccount: options.defaultAccount ?? "0xconsumer",
    }),
  );
  app.route("/api/v1/subscriptions", createSubscriptionRoutes(marketplace));
  app.route("/api/v1/services", createServiceRoutes(marketplace));

  // ─── Metered Endpoint ───────────────────────────────────────────
  app.route("/proxy", createProxyRoutes(marketplace));

  return { app, marketplace };
}
