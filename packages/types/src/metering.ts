/**
 * Metering domain types.
 *
 * A Subscription is a prepaid credit account bound to exactly one Service.
 * Balances live in the external ledger and are never cached here.
 */

// =============================================================================
// Subscriptions & Services
// =============================================================================

/** Opaque subscription identifier (usually a DID). */
export type SubscriptionId = string;

/** Opaque service identifier (usually a DID). */
export type ServiceId = string;

export interface Subscription {
  readonly id: SubscriptionId;
  readonly name?: string | undefined;
  readonly description?: string | undefined;
  /** Credits granted by a single top-up order */
  readonly creditsPerOrder: number;
  /** Price of one order, in the payment token's smallest unit */
  readonly price?: number | undefined;
  readonly tokenAddress?: string | undefined;
}

export type ChargeType = "fixed" | "dynamic";

/**
 * How many credits a call to a service should cost.
 *
 * Fixed policies always charge `amountOfCredits`.
 * Dynamic policies charge a request-dependent amount in [minCredits, maxCredits].
 */
export interface ChargingPolicy {
  readonly chargeType: ChargeType;
  readonly minCredits: number;
  readonly maxCredits: number;
  readonly amountOfCredits: number;
}

export interface Service {
  readonly id: ServiceId;
  readonly subscriptionId: SubscriptionId;
  readonly name: string;
  readonly description?: string | undefined;
  readonly chargingPolicy: ChargingPolicy;
  readonly endpoints: readonly string[];
}

// =============================================================================
// Access
// =============================================================================

/**
 * Short-lived bearer credential for one service.
 * Expiry is controlled by the identity provider; never persisted.
 */
export interface AccessGrant {
  readonly serviceId: ServiceId;
  readonly accessToken: string;
  readonly invocationUri: string;
}

// =============================================================================
// Charges
// =============================================================================

export type ExpectedCharge =
  | { readonly kind: "exact"; readonly credits: number }
  | { readonly kind: "range"; readonly minCredits: number; readonly maxCredits: number };

export interface ChargeVerdict {
  readonly matched: boolean;
  readonly discrepancies: readonly string[];
}

/** Derived per invocation; discarded once verified. */
export interface ChargeObservation {
  readonly subscriptionId: SubscriptionId;
  readonly serviceId: ServiceId;
  readonly balanceBefore: number;
  readonly balanceAfter: number;
  readonly observedCharge: number;
  readonly expectedCharge: ExpectedCharge;
  readonly verdict: ChargeVerdict;
}
