/**
 * Creator-side provisioning for a served endpoint.
 *
 * Creates a subscription and one service bound to the endpoint URL, so a
 * freshly started server can be metered without a pre-existing plan.
 */

import type { LedgerClient } from "@tollgate/sdk";
import type { ChargingPolicy, ServiceId, SubscriptionId } from "@tollgate/types";
import type { CliConfig } from "./config.js";
import { SANDBOX_CHARGING_POLICY } from "./lease.js";

export interface ProvisionPlan {
  readonly price: number;
  readonly tokenAddress: string;
  readonly creditsPerOrder: number;
  readonly chargingPolicy: ChargingPolicy;
}

export interface ProvisionedService {
  readonly subscriptionId: SubscriptionId;
  readonly serviceId: ServiceId;
}

export function provisionPlanFromConfig(config: CliConfig): ProvisionPlan {
  return {
    price: config.PROVISION_PRICE,
    tokenAddress: config.PROVISION_TOKEN_ADDRESS,
    creditsPerOrder: config.PROVISION_CREDITS_PER_ORDER,
    chargingPolicy: SANDBOX_CHARGING_POLICY,
  };
}

/**
 * @param creator ledger client authenticated as the creator
 */
export async function provisionService(
  creator: LedgerClient,
  endpointUrl: string,
  plan: ProvisionPlan,
): Promise<ProvisionedService> {
  const subscription = await creator.createSubscription({
    name: "Tollgate run",
    description: `Credits for ${endpointUrl}`,
    price: plan.price,
    tokenAddress: plan.tokenAddress,
    creditsPerOrder: plan.creditsPerOrder,
  });

  const service = await creator.createService({
    subscriptionId: subscription.id,
    name: "Tollgate endpoint",
    description: `Metered ${endpointUrl}`,
    chargingPolicy: plan.chargingPolicy,
    endpoints: [endpointUrl],
  });

  return { subscriptionId: subscription.id, serviceId: service.id };
}
