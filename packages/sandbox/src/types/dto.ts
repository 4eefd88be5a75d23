/**
 * Request body schemas.
 */

import { z } from "zod";

const CreditsSchema = z.number().int().nonnegative();

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

export const CreateSubscriptionSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  price: z.number().nonnegative(),
  tokenAddress: z.string().min(1),
  creditsPerOrder: CreditsSchema,
});

export const CreateServiceSchema = z.object({
  subscriptionId: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
  chargingPolicy: ChargingPolicySchema,
  endpoints: z.array(z.string()).default([]),
});

export type CreateSubscriptionDto = z.infer<typeof CreateSubscriptionSchema>;
export type CreateServiceDto = z.infer<typeof CreateServiceSchema>;
