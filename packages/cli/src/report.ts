/**
 * Cycle reporting: structured pino records and a coloured terminal summary.
 */

import type { ChalkInstance } from "chalk";
import type { Logger } from "pino";
import type { CycleEvent } from "@tollgate/reconciler";
import type { ChargeObservation, ExpectedCharge } from "@tollgate/types";
import { MeteringError } from "@tollgate/types";

// =============================================================================
// Logging
// =============================================================================

export type CycleLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

/**
 * Forward one engine event to pino.
 */
export function logCycleEvent(logger: CycleLogger, event: CycleEvent): void {
  switch (event.type) {
    case "top-up-ordered":
      logger.info(
        { subscriptionId: event.subscriptionId, attempt: event.attempt, balance: event.balance },
        "Top-up ordered",
      );
      return;
    case "balance-ensured":
      logger.info(
        { subscriptionId: event.subscriptionId, balance: event.balance, topUps: event.topUps },
        "Balance ensured",
      );
      return;
    case "service-resolved":
      logger.debug(
        {
          subscriptionId: event.subscriptionId,
          serviceId: event.serviceId,
          chargeType: event.chargingPolicy.chargeType,
        },
        "Service resolved",
      );
      return;
    case "invoked":
      logger.info(
        {
          subscriptionId: event.subscriptionId,
          serviceId: event.serviceId,
          statusCode: event.statusCode,
          balanceBefore: event.balanceBefore,
        },
        "Endpoint invoked",
      );
      return;
    case "settle-read":
      logger.debug(
        {
          subscriptionId: event.subscriptionId,
          poll: event.poll,
          waitedMs: event.waitedMs,
          balance: event.balance,
        },
        "Settle read",
      );
      return;
    case "charge-verified": {
      const { observation } = event;
      const fields = {
        subscriptionId: observation.subscriptionId,
        serviceId: observation.serviceId,
        balanceBefore: observation.balanceBefore,
        balanceAfter: observation.balanceAfter,
        observedCharge: observation.observedCharge,
      };
      if (observation.verdict.matched) {
        logger.info(fields, "Charge verified");
      } else {
        logger.warn({ ...fields, discrepancies: observation.verdict.discrepancies }, "Charge mismatch");
      }
      return;
    }
    case "cycle-failed":
      logger.error(
        { subscriptionId: event.subscriptionId, code: event.error.code, err: event.error },
        "Cycle failed",
      );
      return;
  }
}

// =============================================================================
// Summary
// =============================================================================

function formatExpected(expected: ExpectedCharge): string {
  return expected.kind === "exact"
    ? `${expected.credits}`
    : `${expected.minCredits}..${expected.maxCredits}`;
}

/**
 * One-line summary of a verified call.
 */
export function formatObservation(observation: ChargeObservation, chalk: ChalkInstance): string {
  const mark = observation.verdict.matched ? chalk.green("✓") : chalk.red("✗");
  const balances = `${observation.balanceBefore} → ${observation.balanceAfter}`;
  const charge = `charged ${observation.observedCharge}, expected ${formatExpected(observation.expectedCharge)}`;
  const line = `  ${mark} ${chalk.white(observation.serviceId)}  ${chalk.gray(balances)}  ${charge}`;
  if (observation.verdict.matched) {
    return line;
  }
  return [line, ...observation.verdict.discrepancies.map((d) => chalk.yellow(`      ! ${d}`))].join("\n");
}

/**
 * One-line summary of a failed call.
 */
export function formatFailure(error: unknown, chalk: ChalkInstance): string {
  if (error instanceof MeteringError) {
    return `  ${chalk.red("✗")} ${chalk.red.bold(error.code)} ${error.message}`;
  }
  const message = error instanceof Error ? error.message : String(error);
  return `  ${chalk.red("✗")} ${message}`;
}
