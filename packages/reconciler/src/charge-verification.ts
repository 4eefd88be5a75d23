/**
 * Charge verification.
 *
 * Compares an observed debit with the expectation (from the caller's cost
 * predictor, or derived from the charging policy) and with the policy
 * itself. Pure functions; no I/O.
 */

import type { MeteredRequest } from "@tollgate/sdk";
import { isExpectedCharge } from "@tollgate/types";
import type { ChargeVerdict, ChargingPolicy, ExpectedCharge } from "@tollgate/types";
import type { CostPredictor } from "./types.js";

/**
 * The expectation a policy implies on its own: fixed → exact, dynamic → range.
 */
export function policyExpectation(policy: ChargingPolicy): ExpectedCharge {
  if (policy.chargeType === "fixed") {
    return { kind: "exact", credits: policy.amountOfCredits };
  }
  return { kind: "range", minCredits: policy.minCredits, maxCredits: policy.maxCredits };
}

/**
 * @throws RangeError when the predictor returns anything but whole,
 *   non-negative credits or an ordered range of them
 */
export function expectedChargeFor(
  policy: ChargingPolicy,
  request: MeteredRequest,
  predictor?: CostPredictor,
): ExpectedCharge {
  if (predictor === undefined) {
    return policyExpectation(policy);
  }
  const predicted = predictor(request, policy);
  const expected: ExpectedCharge =
    typeof predicted === "number" ? { kind: "exact", credits: predicted } : predicted;
  if (!isExpectedCharge(expected)) {
    const shown = typeof predicted === "number" ? String(predicted) : JSON.stringify(predicted);
    throw new RangeError(`Cost predictor returned an invalid charge: ${shown}`);
  }
  return expected;
}

/** True when no debit is expected at all. */
export function isZeroCharge(expected: ExpectedCharge): boolean {
  return expected.kind === "exact" ? expected.credits === 0 : expected.maxCredits === 0;
}

function sameExpectation(a: ExpectedCharge, b: ExpectedCharge): boolean {
  if (a.kind === "exact" && b.kind === "exact") {
    return a.credits === b.credits;
  }
  if (a.kind === "range" && b.kind === "range") {
    return a.minCredits === b.minCredits && a.maxCredits === b.maxCredits;
  }
  return false;
}

function formatExpectation(expected: ExpectedCharge): string {
  return expected.kind === "exact"
    ? `${expected.credits} credits`
    : `${expected.minCredits}..${expected.maxCredits} credits`;
}

function satisfies(observed: number, expected: ExpectedCharge): boolean {
  return expected.kind === "exact"
    ? observed === expected.credits
    : observed >= expected.minCredits && observed <= expected.maxCredits;
}

/**
 * Verify an observed charge.
 *
 * The policy always applies: a fixed policy requires exactly
 * `amountOfCredits`, a dynamic one a charge within [minCredits, maxCredits].
 * A predicted expectation that differs from the policy's own is checked too.
 */
export function verifyCharge(
  observedCharge: number,
  expected: ExpectedCharge,
  policy: ChargingPolicy,
): ChargeVerdict {
  const discrepancies: string[] = [];
  const fromPolicy = policyExpectation(policy);

  if (!satisfies(observedCharge, fromPolicy)) {
    discrepancies.push(
      `${policy.chargeType === "fixed" ? "Fixed" : "Dynamic"} policy expects ${formatExpectation(fromPolicy)}, observed ${observedCharge}`,
    );
  }

  if (!sameExpectation(expected, fromPolicy) && !satisfies(observedCharge, expected)) {
    discrepancies.push(`Predicted ${formatExpectation(expected)}, observed ${observedCharge}`);
  }

  return { matched: discrepancies.length === 0, discrepancies };
}
