/**
 * @tollgate/reconciler — Metered call reconciliation engine.
 *
 * Drives one metered call end to end and checks that the ledger's debit
 * matches the service's charging policy:
 * - Balance — bounded top-ups until a minimum is met
 * - Invocation — resolve service, grant and call
 * - Settlement — cancellable wait plus backoff polls
 * - Verification — observed debit vs expected charge
 */

// Engine
export { ReconciliationEngine } from "./engine.js";
export type { ReconciliationEngineConfig } from "./engine.js";

// Verification
export {
  policyExpectation,
  expectedChargeFor,
  isZeroCharge,
  verifyCharge,
} from "./charge-verification.js";

// Policy
export {
  DEFAULT_SETTLE_POLICY,
  DEFAULT_CYCLE_POLICY,
  resolvePolicy,
  computePollDelay,
} from "./policy.js";

// Sleep
export { sleep } from "./sleep.js";

// Types
export type {
  LedgerPort,
  AccessPort,
  InvokerPort,
  SleepFn,
  CostPredictor,
  SettlePolicy,
  MismatchPolicy,
  CyclePolicy,
  CyclePolicyOverrides,
  MeteredCall,
  EnsuredBalance,
  CycleEvent,
} from "./types.js";
