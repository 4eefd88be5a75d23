/**
 * End-to-end reconciliation against the sandbox marketplace.
 *
 * The engine drives the real SDK clients, which reach the sandbox Hono
 * app in process through createAppFetch (no port, no network).
 *
 * Verifies:
 * - Top-up → call → debit on a fixed-price service
 * - Asynchronous settlement: waiting, polling and too-early reads
 * - Ineffective top-ups and ambiguous bindings
 * - Dynamic pricing with a cost predictor
 * - The cycle deadline against a ledger that stalls
 */

import { describe, it, expect, afterEach } from "vitest";
import { MeteringError } from "@tollgate/types";
import type { ChargingPolicy } from "@tollgate/types";
import { TollgateClient } from "@tollgate/sdk";
import type { MeteredRequest } from "@tollgate/sdk";
import { createAppFetch, createSandboxApp } from "@tollgate/sandbox";
import type { ChargeFn, CreateSandboxAppOptions, Marketplace } from "@tollgate/sandbox";
import { ReconciliationEngine } from "../src/engine.js";
import type { CycleEvent, CyclePolicyOverrides, MeteredCall } from "../src/types.js";
import { DYNAMIC_ONE_TO_FIVE, FIXED_TWO } from "./fakes.js";

// =============================================================================
// Setup
// =============================================================================

const ACCOUNT = "0xconsumer";

const IMMEDIATE: CyclePolicyOverrides = {
  minimumBalance: 2,
  settle: { minDelayMs: 0, maxPolls: 0 },
};

interface Scenario {
  readonly marketplace: Marketplace;
  readonly engine: ReconciliationEngine;
  readonly events: CycleEvent[];
  readonly subscriptionId: string;
  readonly serviceId: string;
}

let active: Marketplace | undefined;

afterEach(() => {
  active?.dispose();
  active = undefined;
});

function scenario(
  options: {
    sandbox?: CreateSandboxAppOptions;
    policy?: CyclePolicyOverrides;
    chargingPolicy?: ChargingPolicy;
    chargeFn?: ChargeFn;
  } = {},
): Scenario {
  const { app, marketplace } = createSandboxApp(options.sandbox);
  active = marketplace;

  const subscription = marketplace.createSubscription({ name: "Hello plan", creditsPerOrder: 2 });
  const service = marketplace.createService({
    subscriptionId: subscription.id,
    name: "Hello",
    chargingPolicy: options.chargingPolicy ?? FIXED_TWO,
    chargeFn: options.chargeFn,
  });

  const client = new TollgateClient({
    ledger: { baseUrl: "http://ledger.local", apiKey: "test-key", fetchFn: createAppFetch(app) },
  });
  const events: CycleEvent[] = [];
  const engine = new ReconciliationEngine({
    ledger: client.ledger,
    access: client.access,
    invoker: client.invoker,
    policy: options.policy ?? IMMEDIATE,
    onEvent: (event) => events.push(event),
  });

  return { marketplace, engine, events, subscriptionId: subscription.id, serviceId: service.id };
}

function helloCall(subscriptionId: string, name: string = "World"): MeteredCall {
  return { subscriptionId, accountAddress: ACCOUNT, request: { query: { name } } };
}

// =============================================================================
// Fixed pricing
// =============================================================================

describe("fixed-price service", () => {
  it("tops up, calls and verifies the debit", async () => {
    const { engine, events, subscriptionId, serviceId } = scenario();

    const observation = await engine.runMeteredCall(helloCall(subscriptionId));

    expect(observation).toEqual({
      subscriptionId,
      serviceId,
      balanceBefore: 2,
      balanceAfter: 0,
      observedCharge: 2,
      expectedCharge: { kind: "exact", credits: 2 },
      verdict: { matched: true, discrepancies: [] },
    });
    expect(events.find((e) => e.type === "invoked")).toMatchObject({
      statusCode: 200,
      body: "Hello World",
    });
  });

  it("orders exactly one top-up per call once the balance is spent", async () => {
    const { engine, events, subscriptionId } = scenario();

    await engine.runSeries([helloCall(subscriptionId), helloCall(subscriptionId)]);

    expect(
      events.flatMap((e) => (e.type === "balance-ensured" ? [e.topUps] : [])),
    ).toEqual([1, 1]);
  });

  it("leaves a funded balance untouched before the call", async () => {
    const { marketplace, engine, events, subscriptionId } = scenario();
    marketplace.credit(subscriptionId, ACCOUNT, 5);

    const observation = await engine.runMeteredCall(helloCall(subscriptionId));

    expect(events.some((e) => e.type === "top-up-ordered")).toBe(false);
    expect([observation.balanceBefore, observation.balanceAfter]).toEqual([5, 3]);
  });
});

// =============================================================================
// Settlement
// =============================================================================

describe("asynchronous settlement", () => {
  it("observes the debit after the minimum delay", async () => {
    const { engine, subscriptionId } = scenario({
      sandbox: { settleDelayMs: 20 },
      policy: { settle: { minDelayMs: 60, maxPolls: 0 } },
    });

    const observation = await engine.runMeteredCall(helloCall(subscriptionId));

    expect(observation.observedCharge).toBe(2);
    expect(observation.verdict.matched).toBe(true);
  });

  it("polls until the debit lands", async () => {
    const { engine, events, subscriptionId } = scenario({
      sandbox: { settleDelayMs: 40 },
      policy: {
        settle: { minDelayMs: 0, maxPolls: 20, pollIntervalMs: 20, backoffFactor: 1, maxDelayMs: 20 },
      },
    });

    const observation = await engine.runMeteredCall(helloCall(subscriptionId));

    expect(observation.verdict.matched).toBe(true);
    const reads = events.filter((e) => e.type === "settle-read");
    expect(reads.length).toBeGreaterThan(1);
    expect(reads.at(-1)).toMatchObject({ balance: 0 });
  });

  it("reports a zero observed charge when it reads too early", async () => {
    const { engine, marketplace, subscriptionId } = scenario({
      sandbox: { settleDelayMs: 5_000 },
      policy: { onMismatch: "report", settle: { minDelayMs: 0, maxPolls: 0 } },
    });

    const observation = await engine.runMeteredCall(helloCall(subscriptionId));

    expect(observation.observedCharge).toBe(0);
    expect(observation.verdict).toEqual({
      matched: false,
      discrepancies: ["Fixed policy expects 2 credits, observed 0"],
    });
    expect(marketplace.pendingDebits()).toBe(1);
  });
});

// =============================================================================
// Failures
// =============================================================================

describe("failures", () => {
  it("raises TOP_UP_INEFFECTIVE when orders add nothing", async () => {
    const { engine, subscriptionId } = scenario({ sandbox: { orderCredits: 0 } });

    const error = await engine.runMeteredCall(helloCall(subscriptionId)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MeteringError);
    expect(error).toMatchObject({
      code: "TOP_UP_INEFFECTIVE",
      message: "Top-up 1 did not increase the balance (was 0, now 0)",
    });
  });

  it("raises AMBIGUOUS_BINDING when two services share the subscription", async () => {
    const { marketplace, engine, subscriptionId } = scenario();
    marketplace.createService({ subscriptionId, name: "Other", chargingPolicy: FIXED_TWO });

    await expect(engine.runMeteredCall(helloCall(subscriptionId))).rejects.toMatchObject({
      code: "AMBIGUOUS_BINDING",
      message: `Expected 1 service bound to ${subscriptionId}, got 2`,
    });
  });
});

// =============================================================================
// Dynamic pricing
// =============================================================================

describe("dynamic-price service", () => {
  const nameLength = (request: MeteredRequest): number =>
    String(request.query?.["name"] ?? "").length;

  it("verifies the predicted charge", async () => {
    const { marketplace, engine, subscriptionId } = scenario({
      chargingPolicy: DYNAMIC_ONE_TO_FIVE,
      chargeFn: (params) => String(params["name"] ?? "").length,
    });
    marketplace.credit(subscriptionId, ACCOUNT, 10);

    const observation = await engine.runMeteredCall({
      ...helloCall(subscriptionId, "Foo"),
      costPredictor: nameLength,
    });

    expect(observation.expectedCharge).toEqual({ kind: "exact", credits: 3 });
    expect([observation.balanceBefore, observation.balanceAfter]).toEqual([10, 7]);
    expect(observation.verdict.matched).toBe(true);
  });

  it("flags a charge the predictor did not expect", async () => {
    const { marketplace, engine, subscriptionId } = scenario({
      chargingPolicy: DYNAMIC_ONE_TO_FIVE,
      chargeFn: () => 4,
    });
    marketplace.credit(subscriptionId, ACCOUNT, 10);

    await expect(
      engine.runMeteredCall({ ...helloCall(subscriptionId, "Foo"), costPredictor: nameLength }),
    ).rejects.toMatchObject({
      code: "CHARGE_MISMATCH",
      message: `Charge mismatch on ${subscriptionId}: Predicted 3 credits, observed 4`,
    });
  });
});

// =============================================================================
// Deadline
// =============================================================================

describe("deadline", () => {
  it("raises CYCLE_TIMEOUT when the ledger stalls after its headers", async () => {
    const stalled: typeof fetch = async () =>
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode('{"data":'));
          },
        }),
        { status: 200 },
      );
    const client = new TollgateClient({
      ledger: { baseUrl: "http://ledger.local", apiKey: "test-key", fetchFn: stalled },
    });
    const events: CycleEvent[] = [];
    const engine = new ReconciliationEngine({
      ledger: client.ledger,
      access: client.access,
      invoker: client.invoker,
      policy: { ...IMMEDIATE, deadlineMs: 50 },
      onEvent: (event) => events.push(event),
    });

    await expect(
      engine.runMeteredCall({ subscriptionId: "did:sub:1", accountAddress: ACCOUNT, request: {} }),
    ).rejects.toMatchObject({
      code: "CYCLE_TIMEOUT",
      message: "Cycle for did:sub:1 exceeded its 50ms deadline",
    });
    expect(events.map((e) => e.type)).toEqual(["cycle-failed"]);
  });
});
