/**
 * @tollgate/reconciler domain types.
 *
 * The engine talks to its collaborators through narrow ports so that
 * tests can swap in fakes; the SDK clients satisfy them as they are.
 */

import type { AccessResolver, LedgerClient, MeteredInvoker, MeteredRequest } from "@tollgate/sdk";
import type {
  ChargeObservation,
  ChargingPolicy,
  ExpectedCharge,
  MeteringError,
  ServiceId,
  SubscriptionId,
} from "@tollgate/types";

// =============================================================================
// Ports
// =============================================================================

export type LedgerPort = Pick<
  LedgerClient,
  "getBalance" | "orderTopUp" | "resolveServiceForSubscription" | "getService"
>;

export type AccessPort = Pick<AccessResolver, "getAccessGrant">;

export type InvokerPort = Pick<MeteredInvoker, "invoke">;

/** Cancellable wait; must reject once the signal aborts. */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

// =============================================================================
// Policies
// =============================================================================

/**
 * Predicts what a call should cost: a number means an exact charge.
 */
export type CostPredictor = (
  request: MeteredRequest,
  policy: ChargingPolicy,
) => number | ExpectedCharge;

export interface SettlePolicy {
  /** Minimum wait between the call and the first post-call balance read */
  readonly minDelayMs: number;
  /** Extra reads while the balance has not moved */
  readonly maxPolls: number;
  /** Wait before the first extra read */
  readonly pollIntervalMs: number;
  readonly backoffFactor: number;
  readonly maxDelayMs: number;
}

export type MismatchPolicy = "throw" | "report";

export interface CyclePolicy {
  readonly minimumBalance: number;
  readonly maxTopUps: number;
  readonly settle: SettlePolicy;
  /** Bound on the whole cycle; unbounded when absent */
  readonly deadlineMs?: number | undefined;
  readonly onMismatch: MismatchPolicy;
}

export interface CyclePolicyOverrides {
  readonly minimumBalance?: number | undefined;
  readonly maxTopUps?: number | undefined;
  readonly settle?: Partial<SettlePolicy> | undefined;
  readonly deadlineMs?: number | undefined;
  readonly onMismatch?: MismatchPolicy | undefined;
}

// =============================================================================
// Calls
// =============================================================================

export interface MeteredCall {
  readonly subscriptionId: SubscriptionId;
  readonly accountAddress: string;
  readonly request: MeteredRequest;
  readonly costPredictor?: CostPredictor | undefined;
  /** Skips the service lookup when supplied */
  readonly chargingPolicy?: ChargingPolicy | undefined;
  readonly policy?: CyclePolicyOverrides | undefined;
}

export interface EnsuredBalance {
  readonly balance: number;
  readonly topUps: number;
}

// =============================================================================
// Events
// =============================================================================

export type CycleEvent =
  | {
      readonly type: "top-up-ordered";
      readonly subscriptionId: SubscriptionId;
      readonly attempt: number;
      readonly balance: number;
    }
  | {
      readonly type: "balance-ensured";
      readonly subscriptionId: SubscriptionId;
      readonly balance: number;
      readonly topUps: number;
    }
  | {
      readonly type: "service-resolved";
      readonly subscriptionId: SubscriptionId;
      readonly serviceId: ServiceId;
      readonly chargingPolicy: ChargingPolicy;
    }
  | {
      readonly type: "invoked";
      readonly subscriptionId: SubscriptionId;
      readonly serviceId: ServiceId;
      readonly statusCode: number;
      readonly body: unknown;
      readonly balanceBefore: number;
    }
  | {
      readonly type: "settle-read";
      readonly subscriptionId: SubscriptionId;
      readonly poll: number;
      readonly waitedMs: number;
      readonly balance: number;
    }
  | {
      readonly type: "charge-verified";
      readonly observation: ChargeObservation;
    }
  | {
      readonly type: "cycle-failed";
      readonly subscriptionId: SubscriptionId;
      readonly error: MeteringError;
    };
