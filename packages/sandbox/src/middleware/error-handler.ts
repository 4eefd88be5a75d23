/**
 * Global error handler.
 *
 * Maps MarketplaceError codes to HTTP statuses and renders every error
 * as an `{ error: { code, message } }` envelope.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { MarketplaceError } from "../marketplace.js";
import type { MarketplaceErrorCode } from "../marketplace.js";
import { createErrorEnvelope } from "../types/error.js";

const STATUS_MAP: Record<MarketplaceErrorCode, ContentfulStatusCode> = {
  SUBSCRIPTION_NOT_FOUND: 404,
  SERVICE_NOT_FOUND: 404,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  INSUFFICIENT_CREDITS: 402,
  VALIDATION_ERROR: 400,
};

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof MarketplaceError) {
    return c.json(createErrorEnvelope(err.code, err.message), STATUS_MAP[err.code]);
  }

  // Don't leak internal details
  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}

export function handleNotFound(c: Context): Response {
  return c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404);
}
