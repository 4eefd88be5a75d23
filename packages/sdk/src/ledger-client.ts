/**
 * Ledger Client.
 *
 * Reads balances and service bindings from the subscription ledger and
 * requests top-ups. Never mutates the ledger directly: an order is a
 * request, and the new balance must be re-read.
 *
 * Every transport failure surfaces as LEDGER_UNREACHABLE.
 */

import { MeteringError } from "@tollgate/types";
import type {
  ChargingPolicy,
  Service,
  ServiceId,
  Subscription,
  SubscriptionId,
} from "@tollgate/types";
import { HttpClient } from "./http-client.js";
import {
  BalanceSchema,
  ServiceIdListSchema,
  ServiceSchema,
  SubscriptionSchema,
  parseResponse,
} from "./schemas.js";
import type { ApiEndpointConfig } from "./types.js";

// =============================================================================
// Parameters
// =============================================================================

/** Cancellation for a single ledger call. */
export interface CallOptions {
  readonly signal?: AbortSignal | undefined;
}

export interface CreateSubscriptionParams {
  readonly name: string;
  readonly description?: string | undefined;
  readonly price: number;
  readonly tokenAddress: string;
  readonly creditsPerOrder: number;
}

export interface CreateServiceParams {
  readonly subscriptionId: SubscriptionId;
  readonly name: string;
  readonly description?: string | undefined;
  readonly chargingPolicy: ChargingPolicy;
  readonly endpoints: readonly string[];
}

// =============================================================================
// Client
// =============================================================================

export class LedgerClient {
  private readonly http: HttpClient;

  constructor(config: ApiEndpointConfig) {
    this.http = new HttpClient({ ...config, failureCode: "LEDGER_UNREACHABLE" });
  }

  /**
   * Current credit balance of an account on a subscription.
   */
  async getBalance(
    subscriptionId: SubscriptionId,
    accountAddress: string,
    options: CallOptions = {},
  ): Promise<number> {
    const context = { subscriptionId };
    const result = await this.http.get(
      `/api/v1/subscriptions/${encodeURIComponent(subscriptionId)}/balance`,
      { query: { account: accountAddress }, signal: options.signal, context },
    );
    return parseResponse(BalanceSchema, result.data, "balance", context).balance;
  }

  /**
   * Order one top-up unit. The ledger credits it asynchronously or
   * synchronously; either way the caller must re-read the balance.
   */
  async orderTopUp(subscriptionId: SubscriptionId, options: CallOptions = {}): Promise<void> {
    await this.http.post(
      `/api/v1/subscriptions/${encodeURIComponent(subscriptionId)}/orders`,
      {},
      { signal: options.signal, context: { subscriptionId } },
    );
  }

  /**
   * The single service bound to a subscription.
   *
   * @throws MeteringError AMBIGUOUS_BINDING when zero or several services are bound
   */
  async resolveServiceForSubscription(
    subscriptionId: SubscriptionId,
    options: CallOptions = {},
  ): Promise<ServiceId> {
    const context = { subscriptionId };
    const result = await this.http.get(
      `/api/v1/subscriptions/${encodeURIComponent(subscriptionId)}/services`,
      { signal: options.signal, context },
    );
    const serviceIds = parseResponse(ServiceIdListSchema, result.data, "services", context);

    const [serviceId] = serviceIds;
    if (serviceIds.length !== 1 || serviceId === undefined) {
      throw new MeteringError(
        "AMBIGUOUS_BINDING",
        `Expected 1 service bound to ${subscriptionId}, got ${serviceIds.length}`,
        { subscriptionId, observed: serviceIds },
      );
    }
    return serviceId;
  }

  /**
   * Service metadata, including its charging policy.
   */
  async getService(serviceId: ServiceId, options: CallOptions = {}): Promise<Service> {
    const context = { serviceId };
    const result = await this.http.get(
      `/api/v1/services/${encodeURIComponent(serviceId)}`,
      { signal: options.signal, context },
    );
    return parseResponse(ServiceSchema, result.data, "service", context);
  }

  /**
   * Create a subscription (creator side).
   */
  async createSubscription(params: CreateSubscriptionParams): Promise<Subscription> {
    const result = await this.http.post("/api/v1/subscriptions", params);
    return parseResponse(SubscriptionSchema, result.data, "subscription");
  }

  /**
   * Create a service bound to a subscription (creator side).
   */
  async createService(params: CreateServiceParams): Promise<Service> {
    const result = await this.http.post("/api/v1/services", params, {
      context: { subscriptionId: params.subscriptionId },
    });
    return parseResponse(ServiceSchema, result.data, "service", {
      subscriptionId: params.subscriptionId,
    });
  }
}
