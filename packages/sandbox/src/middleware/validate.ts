/**
 * Zod request validation.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { MarketplaceError } from "../marketplace.js";

function formatZodErrors(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Parse the JSON request body against a schema.
 *
 * @throws MarketplaceError VALIDATION_ERROR on invalid JSON or a schema mismatch
 */
export async function readJsonBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new MarketplaceError("VALIDATION_ERROR", "Invalid JSON in request body");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new MarketplaceError(
      "VALIDATION_ERROR",
      `Request body validation failed: ${formatZodErrors(result.error)}`,
    );
  }
  return result.data;
}
