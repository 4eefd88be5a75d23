/**
 * Reconciliation Engine — one metered call, verified against the ledger.
 *
 * Per cycle:
 *   1. ensure a minimum balance (bounded top-ups)
 *   2. resolve service, charging policy and access grant
 *   3. read the balance, then invoke
 *   4. wait for the debit to settle (cancellable, with backoff polls)
 *   5. compare the observed debit with the expected charge
 *
 * Usage:
 *   const engine = new ReconciliationEngine({ ledger, access, invoker });
 *   const observation = await engine.runMeteredCall({
 *     subscriptionId, accountAddress, request: { query: { name: "World" } },
 *   });
 *
 * The engine holds no per-cycle state, so independent subscribers may run
 * cycles concurrently on one instance.
 */

import { ChargeMismatchError, MeteringError } from "@tollgate/types";
import type {
  ChargeObservation,
  ExpectedCharge,
  SubscriptionId,
} from "@tollgate/types";
import { expectedChargeFor, isZeroCharge, verifyCharge } from "./charge-verification.js";
import { DEFAULT_CYCLE_POLICY, computePollDelay, resolvePolicy } from "./policy.js";
import { sleep } from "./sleep.js";
import type {
  AccessPort,
  CycleEvent,
  CyclePolicy,
  CyclePolicyOverrides,
  EnsuredBalance,
  InvokerPort,
  LedgerPort,
  MeteredCall,
  SettlePolicy,
  SleepFn,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ReconciliationEngineConfig {
  readonly ledger: LedgerPort;
  readonly access: AccessPort;
  readonly invoker: InvokerPort;
  /** Defaults for every cycle; each call may override them */
  readonly policy?: CyclePolicyOverrides | undefined;
  /** Structured progress events (the CLI forwards them to pino) */
  readonly onEvent?: ((event: CycleEvent) => void) | undefined;
  /** Injectable for testing */
  readonly sleepFn?: SleepFn | undefined;
}

interface CallOptions {
  readonly signal?: AbortSignal | undefined;
}

// =============================================================================
// Engine
// =============================================================================

export class ReconciliationEngine {
  private readonly ledger: LedgerPort;
  private readonly access: AccessPort;
  private readonly invoker: InvokerPort;
  private readonly policy: CyclePolicy;
  private readonly onEvent: (event: CycleEvent) => void;
  private readonly sleepFn: SleepFn;

  constructor(config: ReconciliationEngineConfig) {
    this.ledger = config.ledger;
    this.access = config.access;
    this.invoker = config.invoker;
    this.policy = resolvePolicy(DEFAULT_CYCLE_POLICY, config.policy);
    this.onEvent = config.onEvent ?? (() => {});
    this.sleepFn = config.sleepFn ?? sleep;
  }

  /**
   * Top up until the balance reaches `minimumRequired`.
   *
   * Each order must strictly increase the balance over the previous
   * reading.
   *
   * @throws MeteringError TOP_UP_INEFFECTIVE when an order did not raise the balance
   * @throws MeteringError TOP_UP_EXHAUSTED when still short after `maxTopUps` orders
   */
  async ensureBalance(
    subscriptionId: SubscriptionId,
    accountAddress: string,
    minimumRequired: number,
    maxTopUps: number,
    options: CallOptions = {},
  ): Promise<EnsuredBalance> {
    const { signal } = options;
    let balance = await this.ledger.getBalance(subscriptionId, accountAddress, { signal });
    let topUps = 0;

    while (balance < minimumRequired) {
      if (topUps >= maxTopUps) {
        throw new MeteringError(
          "TOP_UP_EXHAUSTED",
          `Balance ${balance} still below ${minimumRequired} after ${topUps} top-ups`,
          { subscriptionId, expected: minimumRequired, observed: balance, attempts: topUps },
        );
      }

      await this.ledger.orderTopUp(subscriptionId, { signal });
      topUps++;
      this.onEvent({ type: "top-up-ordered", subscriptionId, attempt: topUps, balance });

      const next = await this.ledger.getBalance(subscriptionId, accountAddress, { signal });
      if (next <= balance) {
        throw new MeteringError(
          "TOP_UP_INEFFECTIVE",
          `Top-up ${topUps} did not increase the balance (was ${balance}, now ${next})`,
          { subscriptionId, expected: `> ${balance}`, observed: next, attempts: topUps },
        );
      }
      balance = next;
    }

    this.onEvent({ type: "balance-ensured", subscriptionId, balance, topUps });
    return { balance, topUps };
  }

  /**
   * Run one full cycle and return the verified observation.
   *
   * With `onMismatch: "report"` a mismatch is returned (verdict.matched
   * false) instead of thrown.
   *
   * @throws MeteringError on any failure; CYCLE_TIMEOUT once `deadlineMs` expires
   */
  async runMeteredCall(call: MeteredCall): Promise<ChargeObservation> {
    const policy = resolvePolicy(this.policy, call.policy);

    try {
      return await this.withDeadline(call.subscriptionId, policy.deadlineMs, (signal) =>
        this.runCycle(call, policy, signal),
      );
    } catch (error) {
      if (error instanceof MeteringError) {
        this.onEvent({ type: "cycle-failed", subscriptionId: call.subscriptionId, error });
      }
      throw error;
    }
  }

  /**
   * Run cycles one after another; stops at the first failure.
   */
  async runSeries(calls: readonly MeteredCall[]): Promise<ChargeObservation[]> {
    const observations: ChargeObservation[] = [];
    for (const call of calls) {
      observations.push(await this.runMeteredCall(call));
    }
    return observations;
  }

  // ===========================================================================
  // Cycle
  // ===========================================================================

  private async runCycle(
    call: MeteredCall,
    policy: CyclePolicy,
    signal: AbortSignal | undefined,
  ): Promise<ChargeObservation> {
    const { subscriptionId, accountAddress, request } = call;

    // 1. Balance
    await this.ensureBalance(
      subscriptionId,
      accountAddress,
      policy.minimumBalance,
      policy.maxTopUps,
      { signal },
    );
    signal?.throwIfAborted();

    // 2. Resolve
    const serviceId = await this.ledger.resolveServiceForSubscription(subscriptionId, { signal });
    const chargingPolicy =
      call.chargingPolicy ?? (await this.ledger.getService(serviceId, { signal })).chargingPolicy;
    this.onEvent({ type: "service-resolved", subscriptionId, serviceId, chargingPolicy });

    const grant = await this.access.getAccessGrant(serviceId, { signal });
    const expectedCharge = expectedChargeFor(chargingPolicy, request, call.costPredictor);
    signal?.throwIfAborted();

    // 3. Invoke
    const balanceBefore = await this.ledger.getBalance(subscriptionId, accountAddress, { signal });
    const result = await this.invoker.invoke(grant, request, { signal });
    this.onEvent({
      type: "invoked",
      subscriptionId,
      serviceId,
      statusCode: result.statusCode,
      body: result.body,
      balanceBefore,
    });

    // 4. Settle
    const balanceAfter = await this.settle(
      subscriptionId,
      accountAddress,
      balanceBefore,
      expectedCharge,
      policy.settle,
      signal,
    );
    signal?.throwIfAborted();

    // 5. Verify
    const observedCharge = balanceBefore - balanceAfter;
    const observation: ChargeObservation = {
      subscriptionId,
      serviceId,
      balanceBefore,
      balanceAfter,
      observedCharge,
      expectedCharge,
      verdict: verifyCharge(observedCharge, expectedCharge, chargingPolicy),
    };
    this.onEvent({ type: "charge-verified", observation });

    if (!observation.verdict.matched && policy.onMismatch === "throw") {
      throw new ChargeMismatchError(observation);
    }
    return observation;
  }

  /**
   * Wait at least `minDelayMs`, read the balance, and keep polling with
   * backoff while it has not moved and a debit is expected.
   */
  private async settle(
    subscriptionId: SubscriptionId,
    accountAddress: string,
    balanceBefore: number,
    expected: ExpectedCharge,
    settle: SettlePolicy,
    signal: AbortSignal | undefined,
  ): Promise<number> {
    await this.sleepFn(settle.minDelayMs, signal);
    let balance = await this.ledger.getBalance(subscriptionId, accountAddress, { signal });
    this.onEvent({ type: "settle-read", subscriptionId, poll: 0, waitedMs: settle.minDelayMs, balance });

    for (let poll = 1; poll <= settle.maxPolls; poll++) {
      if (balance !== balanceBefore || isZeroCharge(expected)) {
        break;
      }
      const delay = computePollDelay(poll, settle);
      await this.sleepFn(delay, signal);
      balance = await this.ledger.getBalance(subscriptionId, accountAddress, { signal });
      this.onEvent({ type: "settle-read", subscriptionId, poll, waitedMs: delay, balance });
    }

    return balance;
  }

  /**
   * Run `fn` under an abort signal that fires after `deadlineMs`.
   * The cycle settles as CYCLE_TIMEOUT at the deadline even when `fn`
   * does not react to the signal, and anything that fails after the
   * deadline fired becomes CYCLE_TIMEOUT too.
   */
  private async withDeadline<T>(
    subscriptionId: SubscriptionId,
    deadlineMs: number | undefined,
    fn: (signal: AbortSignal | undefined) => Promise<T>,
  ): Promise<T> {
    if (deadlineMs === undefined) {
      return fn(undefined);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), deadlineMs);
    const expired = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), {
        once: true,
      });
    });
    try {
      return await Promise.race([fn(controller.signal), expired]);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new MeteringError(
          "CYCLE_TIMEOUT",
          `Cycle for ${subscriptionId} exceeded its ${deadlineMs}ms deadline`,
          { subscriptionId, cause: error },
        );
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
