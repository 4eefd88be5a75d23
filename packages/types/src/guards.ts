/**
 * Runtime Type Guards
 *
 * Narrowing functions for metering domain types.
 * Used at system boundaries (API responses, configuration, test fixtures).
 */

import type {
  AccessGrant,
  ChargeType,
  ChargingPolicy,
  ExpectedCharge,
  Service,
} from "./metering.js";

const CHARGE_TYPES = new Set<string>(["fixed", "dynamic"]);

export function isNonNegativeCredits(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function isChargeType(value: unknown): value is ChargeType {
  return typeof value === "string" && CHARGE_TYPES.has(value);
}

export function isChargingPolicy(value: unknown): value is ChargingPolicy {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isChargeType(v.chargeType) &&
    isNonNegativeCredits(v.minCredits) &&
    isNonNegativeCredits(v.maxCredits) &&
    isNonNegativeCredits(v.amountOfCredits) &&
    v.minCredits <= v.maxCredits
  );
}

export function isService(value: unknown): value is Service {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.subscriptionId === "string" &&
    typeof v.name === "string" &&
    isChargingPolicy(v.chargingPolicy) &&
    Array.isArray(v.endpoints) &&
    v.endpoints.every((e) => typeof e === "string")
  );
}

export function isAccessGrant(value: unknown): value is AccessGrant {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.serviceId === "string" &&
    typeof v.accessToken === "string" &&
    v.accessToken.length > 0 &&
    typeof v.invocationUri === "string" &&
    v.invocationUri.length > 0
  );
}

export function isExpectedCharge(value: unknown): value is ExpectedCharge {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  if (v.kind === "exact") {
    return isNonNegativeCredits(v.credits);
  }
  if (v.kind === "range") {
    return (
      isNonNegativeCredits(v.minCredits) &&
      isNonNegativeCredits(v.maxCredits) &&
      v.minCredits <= v.maxCredits
    );
  }
  return false;
}
