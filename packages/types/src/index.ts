/**
 * @tollgate/types — Shared domain types for the Tollgate stack.
 *
 * Used across all Tollgate packages:
 * - Subscriptions, services and charging policies
 * - Access grants
 * - Charge observations and verdicts
 * - The metering error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Metering types
export type {
  SubscriptionId,
  ServiceId,
  Subscription,
  ChargeType,
  ChargingPolicy,
  Service,
  AccessGrant,
  ExpectedCharge,
  ChargeVerdict,
  ChargeObservation,
} from "./metering.js";

// Errors
export {
  MeteringError,
  ChargeMismatchError,
  isMeteringError,
  isSoftFailure,
} from "./errors.js";
export type { MeteringErrorCode, MeteringErrorContext } from "./errors.js";

// Runtime type guards
export {
  isNonNegativeCredits,
  isChargeType,
  isChargingPolicy,
  isService,
  isAccessGrant,
  isExpectedCharge,
} from "./guards.js";
