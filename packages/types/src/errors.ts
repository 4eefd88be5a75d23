/**
 * Metering error taxonomy.
 *
 * Every failure of a metered call surfaces as a MeteringError with a code
 * and enough context to diagnose it without retrying.
 */

import type { ChargeObservation, ServiceId, SubscriptionId } from "./metering.js";

export type MeteringErrorCode =
  | "LEDGER_UNREACHABLE"
  | "MALFORMED_RESPONSE"
  | "AMBIGUOUS_BINDING"
  | "AUTHORIZATION_DENIED"
  | "INVOCATION_FAILED"
  | "TOP_UP_INEFFECTIVE"
  | "TOP_UP_EXHAUSTED"
  | "CHARGE_MISMATCH"
  | "CYCLE_TIMEOUT";

export interface MeteringErrorContext {
  readonly subscriptionId?: SubscriptionId | undefined;
  readonly serviceId?: ServiceId | undefined;
  /** HTTP status of the failed call (0 for network errors and timeouts) */
  readonly statusCode?: number | undefined;
  readonly responseBody?: unknown;
  readonly url?: string | undefined;
  readonly expected?: unknown;
  readonly observed?: unknown;
  readonly attempts?: number | undefined;
  readonly cause?: unknown;
}

/**
 * Structured error for the metering workflow.
 * Always thrown, never returned as a code.
 */
export class MeteringError extends Error {
  public readonly code: MeteringErrorCode;
  public readonly context: MeteringErrorContext;

  constructor(code: MeteringErrorCode, message: string, context: MeteringErrorContext = {}) {
    super(message);
    this.name = "MeteringError";
    this.code = code;
    this.context = context;
  }
}

/**
 * The observed debit disagreed with the service's charging policy.
 *
 * This is a verification result rather than a crash; callers decide
 * whether to alert or abort.
 */
export class ChargeMismatchError extends MeteringError {
  public readonly observation: ChargeObservation;

  constructor(observation: ChargeObservation) {
    super(
      "CHARGE_MISMATCH",
      `Charge mismatch on ${observation.subscriptionId}: ${observation.verdict.discrepancies.join("; ")}`,
      {
        subscriptionId: observation.subscriptionId,
        serviceId: observation.serviceId,
        expected: observation.expectedCharge,
        observed: observation.observedCharge,
      },
    );
    this.name = "ChargeMismatchError";
    this.observation = observation;
  }
}

export function isMeteringError(err: unknown): err is MeteringError {
  return err instanceof MeteringError;
}

/** CHARGE_MISMATCH is the only failure meant for policy-level handling. */
export function isSoftFailure(err: unknown): err is ChargeMismatchError {
  return err instanceof ChargeMismatchError;
}
