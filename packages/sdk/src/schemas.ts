/**
 * Response schemas for the ledger and identity APIs.
 *
 * Remote payloads are untrusted: anything that does not parse is
 * raised as MALFORMED_RESPONSE with the offending body attached.
 */

import { z } from "zod";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { MeteringError } from "@tollgate/types";
import type { MeteringErrorContext } from "@tollgate/types";

// =============================================================================
// Schemas
// =============================================================================

const CreditsSchema = z.number().int().nonnegative();

/** Balances may arrive as integers or integer strings. */
export const BalanceSchema = z.object({
  balance: z.union([
    CreditsSchema,
    z
      .string()
      .regex(/^\d+$/, "balance must be a non-negative integer")
      .transform((v) => Number(v))
      .pipe(CreditsSchema.max(Number.MAX_SAFE_INTEGER)),
  ]),
});

export const ServiceIdListSchema = z.array(z.string().min(1));

export const ChargingPolicySchema = z
  .object({
    chargeType: z.enum(["fixed", "dynamic"]),
    minCredits: CreditsSchema,
    maxCredits: CreditsSchema,
    amountOfCredits: CreditsSchema,
  })
  .refine((p) => p.minCredits <= p.maxCredits, {
    message: "minCredits must not exceed maxCredits",
  });

export const ServiceSchema = z.object({
  id: z.string().min(1),
  subscriptionId: z.string().min(1),
  name: z.string(),
  description: z.string().optional(),
  chargingPolicy: ChargingPolicySchema,
  endpoints: z.array(z.string()),
});

export const SubscriptionSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  description: z.string().optional(),
  creditsPerOrder: CreditsSchema,
  price: z.number().nonnegative().optional(),
  tokenAddress: z.string().optional(),
});

export const AccessTokenSchema = z.object({
  accessToken: z.string().min(1),
  invocationUri: z.string().url(),
});

// =============================================================================
// Parsing
// =============================================================================

function formatZodErrors(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Parse a payload or throw MALFORMED_RESPONSE.
 */
export function parseResponse<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  data: unknown,
  what: string,
  context: MeteringErrorContext = {},
): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MeteringError(
      "MALFORMED_RESPONSE",
      `Malformed ${what} response: ${formatZodErrors(result.error)}`,
      { ...context, responseBody: data },
    );
  }
  return result.data;
}
