/**
 * Cycle policy defaults and merging.
 *
 * Settle backoff: the n-th extra read (1-based) waits
 * min(pollIntervalMs * backoffFactor^(n-1), maxDelayMs).
 */

import type { CyclePolicy, CyclePolicyOverrides, SettlePolicy } from "./types.js";

export const DEFAULT_SETTLE_POLICY: SettlePolicy = {
  minDelayMs: 10000,
  maxPolls: 3,
  pollIntervalMs: 2000,
  backoffFactor: 2,
  maxDelayMs: 30000,
};

export const DEFAULT_CYCLE_POLICY: CyclePolicy = {
  minimumBalance: 2,
  maxTopUps: 5,
  settle: DEFAULT_SETTLE_POLICY,
  onMismatch: "throw",
};

/**
 * Apply overrides field by field; absent or undefined fields keep the base value.
 */
export function resolvePolicy(
  base: CyclePolicy,
  overrides: CyclePolicyOverrides = {},
): CyclePolicy {
  const settle = overrides.settle ?? {};
  return {
    minimumBalance: overrides.minimumBalance ?? base.minimumBalance,
    maxTopUps: overrides.maxTopUps ?? base.maxTopUps,
    settle: {
      minDelayMs: settle.minDelayMs ?? base.settle.minDelayMs,
      maxPolls: settle.maxPolls ?? base.settle.maxPolls,
      pollIntervalMs: settle.pollIntervalMs ?? base.settle.pollIntervalMs,
      backoffFactor: settle.backoffFactor ?? base.settle.backoffFactor,
      maxDelayMs: settle.maxDelayMs ?? base.settle.maxDelayMs,
    },
    deadlineMs: overrides.deadlineMs ?? base.deadlineMs,
    onMismatch: overrides.onMismatch ?? base.onMismatch,
  };
}

/**
 * Wait before the given extra balance read.
 *
 * @param poll - One-based index of the extra read
 */
export function computePollDelay(poll: number, settle: SettlePolicy): number {
  const exponential = settle.pollIntervalMs * Math.pow(settle.backoffFactor, poll - 1);
  return Math.min(exponential, settle.maxDelayMs);
}
