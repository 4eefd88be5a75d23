/**
 * In-memory marketplace state.
 *
 * Holds subscriptions, services, per-account balances and issued access
 * tokens. Debits for metered calls are applied after `settleDelayMs`,
 * mimicking a ledger that settles asynchronously.
 */

import { randomUUID } from "node:crypto";
import type {
  ChargingPolicy,
  Service,
  ServiceId,
  Subscription,
  SubscriptionId,
} from "@tollgate/types";

// =============================================================================
// Errors
// =============================================================================

export type MarketplaceErrorCode =
  | "SUBSCRIPTION_NOT_FOUND"
  | "SERVICE_NOT_FOUND"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INSUFFICIENT_CREDITS"
  | "VALIDATION_ERROR";

export class MarketplaceError extends Error {
  public readonly code: MarketplaceErrorCode;

  constructor(code: MarketplaceErrorCode, message: string) {
    super(message);
    this.name = "MarketplaceError";
    this.code = code;
  }
}

// =============================================================================
// Types
// =============================================================================

export type CallParams = Readonly<Record<string, unknown>>;

/** Produces the metered endpoint's payload. */
export type ServiceHandler = (params: CallParams) => unknown;

/** Request-dependent charge of a dynamic service, clamped to the policy range. */
export type ChargeFn = (params: CallParams) => number;

export interface NewSubscription {
  readonly name?: string | undefined;
  readonly description?: string | undefined;
  readonly creditsPerOrder: number;
  readonly price?: number | undefined;
  readonly tokenAddress?: string | undefined;
}

export interface NewService {
  readonly subscriptionId: SubscriptionId;
  readonly name: string;
  readonly description?: string | undefined;
  readonly chargingPolicy: ChargingPolicy;
  readonly endpoints?: readonly string[] | undefined;
  readonly handler?: ServiceHandler | undefined;
  readonly chargeFn?: ChargeFn | undefined;
}

export interface OrderReceipt {
  readonly orderId: string;
  readonly subscriptionId: SubscriptionId;
  readonly credits: number;
}

export interface IssuedToken {
  readonly accessToken: string;
  readonly invocationUri: string;
}

export interface InvocationOutcome {
  readonly payload: unknown;
  readonly charged: number;
}

export interface MarketplaceOptions {
  /** Delay before a call's debit lands on the balance (default: 0, immediate) */
  readonly settleDelayMs?: number | undefined;
  /** Credits granted per order, overriding every subscription's creditsPerOrder */
  readonly orderCredits?: number | undefined;
  /**
   * Base URL used to build invocation URIs (default: http://localhost).
   * A function is read on every token, for servers whose port is known late.
   */
  readonly invocationBaseUrl?: string | (() => string) | undefined;
}

interface ServiceRecord {
  readonly service: Service;
  readonly handler: ServiceHandler;
  readonly chargeFn: ChargeFn | undefined;
}

interface TokenRecord {
  readonly serviceId: ServiceId;
  readonly account: string;
}

// =============================================================================
// Helpers
// =============================================================================

export const defaultHandler: ServiceHandler = (params) => {
  const name = typeof params["name"] === "string" && params["name"] !== "" ? params["name"] : "World";
  return `Hello ${name}`;
};

/**
 * Credits a call costs under a policy.
 */
export function chargeFor(
  policy: ChargingPolicy,
  chargeFn: ChargeFn | undefined,
  params: CallParams,
): number {
  if (policy.chargeType === "fixed") {
    return policy.amountOfCredits;
  }
  const raw = chargeFn !== undefined ? Math.round(chargeFn(params)) : policy.minCredits;
  return Math.min(policy.maxCredits, Math.max(policy.minCredits, raw));
}

function balanceKey(subscriptionId: SubscriptionId, account: string): string {
  return `${subscriptionId}\u0000${account}`;
}

// =============================================================================
// Marketplace
// =============================================================================

export class Marketplace {
  private readonly subscriptions = new Map<SubscriptionId, Subscription>();
  private readonly services = new Map<ServiceId, ServiceRecord>();
  private readonly balances = new Map<string, number>();
  private readonly pending = new Map<string, number>();
  private readonly tokens = new Map<string, TokenRecord>();
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();
  private readonly settleDelayMs: number;
  private readonly invocationBaseUrl: () => string;
  private orderCredits: number | undefined;
  private sequence = 0;

  constructor(options: MarketplaceOptions = {}) {
    this.settleDelayMs = options.settleDelayMs ?? 0;
    this.orderCredits = options.orderCredits;
    const base = options.invocationBaseUrl ?? "http://localhost";
    if (typeof base === "string") {
      const url = base;
      this.invocationBaseUrl = () => url;
    } else {
      this.invocationBaseUrl = base;
    }
  }

  // ─── Catalogue ──────────────────────────────────────────────────

  createSubscription(params: NewSubscription): Subscription {
    this.sequence++;
    const subscription: Subscription = {
      id: `did:sub:${this.sequence}`,
      name: params.name,
      description: params.description,
      creditsPerOrder: params.creditsPerOrder,
      price: params.price,
      tokenAddress: params.tokenAddress,
    };
    this.subscriptions.set(subscription.id, subscription);
    return subscription;
  }

  createService(params: NewService): Service {
    this.getSubscription(params.subscriptionId);
    this.sequence++;
    const service: Service = {
      id: `did:svc:${this.sequence}`,
      subscriptionId: params.subscriptionId,
      name: params.name,
      description: params.description,
      chargingPolicy: params.chargingPolicy,
      endpoints: params.endpoints ?? [],
    };
    this.services.set(service.id, {
      service,
      handler: params.handler ?? defaultHandler,
      chargeFn: params.chargeFn,
    });
    return service;
  }

  getSubscription(subscriptionId: SubscriptionId): Subscription {
    const subscription = this.subscriptions.get(subscriptionId);
    if (subscription === undefined) {
      throw new MarketplaceError("SUBSCRIPTION_NOT_FOUND", `Subscription ${subscriptionId} not found`);
    }
    return subscription;
  }

  getService(serviceId: ServiceId): Service {
    return this.serviceRecord(serviceId).service;
  }

  /** Services bound to a subscription, in creation order. */
  servicesFor(subscriptionId: SubscriptionId): ServiceId[] {
    this.getSubscription(subscriptionId);
    const ids: ServiceId[] = [];
    for (const record of this.services.values()) {
      if (record.service.subscriptionId === subscriptionId) {
        ids.push(record.service.id);
      }
    }
    return ids;
  }

  // ─── Balances & Orders ──────────────────────────────────────────

  balanceOf(subscriptionId: SubscriptionId, account: string): number {
    this.getSubscription(subscriptionId);
    return this.balances.get(balanceKey(subscriptionId, account)) ?? 0;
  }

  /** Add credits directly, outside the order flow. */
  credit(subscriptionId: SubscriptionId, account: string, credits: number): void {
    this.getSubscription(subscriptionId);
    const key = balanceKey(subscriptionId, account);
    this.balances.set(key, (this.balances.get(key) ?? 0) + credits);
  }

  placeOrder(subscriptionId: SubscriptionId, account: string): OrderReceipt {
    const subscription = this.getSubscription(subscriptionId);
    const credits = this.orderCredits ?? subscription.creditsPerOrder;
    this.credit(subscriptionId, account, credits);
    return { orderId: `ord-${randomUUID()}`, subscriptionId, credits };
  }

  /** Override the credits granted per order; undefined restores each subscription's own. */
  setOrderCredits(credits: number | undefined): void {
    this.orderCredits = credits;
  }

  // ─── Access & Invocation ────────────────────────────────────────

  issueToken(serviceId: ServiceId, account: string): IssuedToken {
    this.serviceRecord(serviceId);
    const accessToken = `tok-${randomUUID()}`;
    this.tokens.set(accessToken, { serviceId, account });
    const baseUrl = this.invocationBaseUrl().replace(/\/+$/, "");
    return {
      accessToken,
      invocationUri: `${baseUrl}/proxy/${encodeURIComponent(serviceId)}`,
    };
  }

  /**
   * Run a metered call: authorize the token, check the account can pay,
   * produce the payload and schedule the debit.
   */
  invoke(serviceId: ServiceId, accessToken: string | undefined, params: CallParams): InvocationOutcome {
    if (accessToken === undefined || accessToken === "") {
      throw new MarketplaceError("UNAUTHORIZED", "Missing bearer token");
    }
    const token = this.tokens.get(accessToken);
    if (token === undefined) {
      throw new MarketplaceError("UNAUTHORIZED", "Invalid access token");
    }
    if (token.serviceId !== serviceId) {
      throw new MarketplaceError("FORBIDDEN", `Token was not issued for ${serviceId}`);
    }

    const record = this.serviceRecord(serviceId);
    const { subscriptionId } = record.service;
    const charge = chargeFor(record.service.chargingPolicy, record.chargeFn, params);
    const key = balanceKey(subscriptionId, token.account);
    const available = (this.balances.get(key) ?? 0) - (this.pending.get(key) ?? 0);
    if (available < charge) {
      throw new MarketplaceError(
        "INSUFFICIENT_CREDITS",
        `Call costs ${charge} credits, ${available} available`,
      );
    }

    const payload = record.handler(params);
    this.scheduleDebit(key, charge);
    return { payload, charged: charge };
  }

  /** Number of debits not yet applied. */
  pendingDebits(): number {
    return this.timers.size;
  }

  /** Cancel every pending debit. */
  dispose(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.pending.clear();
  }

  // ─── Internals ──────────────────────────────────────────────────

  private serviceRecord(serviceId: ServiceId): ServiceRecord {
    const record = this.services.get(serviceId);
    if (record === undefined) {
      throw new MarketplaceError("SERVICE_NOT_FOUND", `Service ${serviceId} not found`);
    }
    return record;
  }

  private scheduleDebit(key: string, charge: number): void {
    if (this.settleDelayMs <= 0) {
      this.debit(key, charge);
      return;
    }

    this.pending.set(key, (this.pending.get(key) ?? 0) + charge);
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      this.pending.set(key, (this.pending.get(key) ?? 0) - charge);
      this.debit(key, charge);
    }, this.settleDelayMs);
    this.timers.add(timer);
  }

  private debit(key: string, charge: number): void {
    this.balances.set(key, (this.balances.get(key) ?? 0) - charge);
  }
}
