/**
 * The `tollgate` run: acquire a target, reconcile every configured call,
 * report, and map the outcome to an exit code.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import { LedgerClient, TollgateClient } from "@tollgate/sdk";
import { ReconciliationEngine } from "@tollgate/reconciler";
import type { MeteredCall } from "@tollgate/reconciler";
import type { SubscriptionId } from "@tollgate/types";
import type { CliConfig } from "./config.js";
import { cyclePolicyFromConfig } from "./config.js";
import { parseCommand, spawnServer, startSandboxServer, withLease } from "./lease.js";
import type { ServiceLease, SpawnServerOptions } from "./lease.js";
import { provisionPlanFromConfig, provisionService } from "./provision.js";
import { formatFailure, formatObservation, logCycleEvent } from "./report.js";
import type { CycleLogger } from "./report.js";

// =============================================================================
// Target
// =============================================================================

/** Where the calls go and on whose behalf. */
export interface Target {
  readonly ledgerUrl: string;
  readonly identityUrl?: string | undefined;
  readonly apiKey?: string | undefined;
  readonly accountAddress: string;
  readonly subscriptionId: SubscriptionId;
}

export interface TargetLease extends ServiceLease {
  readonly target: Target;
}

export interface AcquireOptions {
  /** Used for provisioning calls; injectable for testing */
  readonly fetchFn?: typeof fetch | undefined;
  /** Default: spawnServer */
  readonly serve?: ((options: SpawnServerOptions) => Promise<ServiceLease>) | undefined;
  readonly logger?: CycleLogger | undefined;
}

function remoteTarget(config: CliConfig): Omit<Target, "subscriptionId"> {
  const { LEDGER_URL, CONSUMER_ADDRESS } = config;
  if (LEDGER_URL === undefined || CONSUMER_ADDRESS === undefined) {
    throw new Error("LEDGER_URL and CONSUMER_ADDRESS are required unless SANDBOX=true");
  }
  return {
    ledgerUrl: LEDGER_URL,
    identityUrl: config.IDENTITY_URL,
    apiKey: config.CONSUMER_API_KEY,
    accountAddress: CONSUMER_ADDRESS,
  };
}

/**
 * As the creator, register a subscription and a service for the served
 * endpoint. Releases the server when provisioning fails.
 */
async function provisionForLease(
  config: CliConfig,
  lease: ServiceLease,
  options: AcquireOptions,
): Promise<SubscriptionId> {
  const { LEDGER_URL, CREATOR_API_KEY } = config;
  if (LEDGER_URL === undefined || CREATOR_API_KEY === undefined) {
    throw new Error("LEDGER_URL and CREATOR_API_KEY are required to provision a service");
  }
  const creator = new LedgerClient({
    baseUrl: LEDGER_URL,
    apiKey: CREATOR_API_KEY,
    timeout: config.REQUEST_TIMEOUT_MS,
    fetchFn: options.fetchFn,
  });
  const endpointUrl = config.SERVE_ENDPOINT_URL ?? lease.url;

  try {
    const provisioned = await provisionService(creator, endpointUrl, provisionPlanFromConfig(config));
    options.logger?.info({ ...provisioned, endpointUrl }, "Service provisioned");
    return provisioned.subscriptionId;
  } catch (error) {
    await lease.release();
    throw error;
  }
}

/**
 * The lease a configuration asks for: a sandbox server, a spawned
 * endpoint process (provisioned when no SUBSCRIPTION_ID is given), or
 * nothing to start.
 */
export async function acquireTarget(
  config: CliConfig,
  options: AcquireOptions = {},
): Promise<TargetLease> {
  if (config.SANDBOX) {
    const lease = await startSandboxServer({ port: config.SANDBOX_PORT });
    return {
      url: lease.url,
      release: () => lease.release(),
      target: {
        ledgerUrl: lease.url,
        apiKey: config.CONSUMER_API_KEY,
        accountAddress: lease.accountAddress,
        subscriptionId: lease.subscriptionId,
      },
    };
  }

  const remote = remoteTarget(config);
  if (config.SERVE_COMMAND !== undefined && config.SERVE_READY_URL !== undefined) {
    const serve = options.serve ?? spawnServer;
    const { command, args } = parseCommand(config.SERVE_COMMAND);
    const lease = await serve({ command, args, readyUrl: config.SERVE_READY_URL });
    const subscriptionId = config.SUBSCRIPTION_ID ?? (await provisionForLease(config, lease, options));
    return { url: lease.url, release: () => lease.release(), target: { ...remote, subscriptionId } };
  }

  if (config.SUBSCRIPTION_ID === undefined) {
    throw new Error("SUBSCRIPTION_ID is required unless SANDBOX=true or SERVE_COMMAND is set");
  }
  return {
    url: remote.ledgerUrl,
    release: async () => {},
    target: { ...remote, subscriptionId: config.SUBSCRIPTION_ID },
  };
}

// =============================================================================
// Run
// =============================================================================

export interface RunOptions {
  readonly config: CliConfig;
  readonly logger: CycleLogger;
  /** Summary output (default: console.log) */
  readonly print?: ((line: string) => void) | undefined;
  readonly chalk?: ChalkInstance | undefined;
  /** Default: acquireTarget(config) with this run's fetchFn and logger */
  readonly acquire?: (() => Promise<TargetLease>) | undefined;
  /** Used for every HTTP call; injectable for testing */
  readonly fetchFn?: typeof fetch | undefined;
}

/**
 * Reconcile each CALL_PARAMS entry in order.
 *
 * @returns 0 when every call verified, 1 otherwise
 */
export async function runCli(options: RunOptions): Promise<number> {
  const { config, logger } = options;
  const print = options.print ?? ((line: string) => console.log(line));
  const paint = options.chalk ?? chalk;
  const acquire =
    options.acquire ?? (() => acquireTarget(config, { fetchFn: options.fetchFn, logger }));
  const onReleaseError = (error: unknown): void => {
    logger.error({ err: error }, "Releasing the target failed");
  };

  return withLease(acquire, async ({ target }) => {
    const endpoint = { apiKey: target.apiKey, timeout: config.REQUEST_TIMEOUT_MS, fetchFn: options.fetchFn };
    const client = new TollgateClient({
      ledger: { baseUrl: target.ledgerUrl, ...endpoint },
      identity: target.identityUrl !== undefined ? { baseUrl: target.identityUrl, ...endpoint } : undefined,
      invocationTimeout: config.REQUEST_TIMEOUT_MS,
    });

    const engine = new ReconciliationEngine({
      ledger: client.ledger,
      access: client.access,
      invoker: client.invoker,
      policy: cyclePolicyFromConfig(config),
      onEvent: (event) => {
        logCycleEvent(logger, event);
        if (event.type === "charge-verified") {
          print(formatObservation(event.observation, paint));
        }
      },
    });

    const calls: MeteredCall[] = config.CALL_PARAMS.map((query) => ({
      subscriptionId: target.subscriptionId,
      accountAddress: target.accountAddress,
      request: { query },
    }));

    print(paint.cyan.bold(`Reconciling ${calls.length} call(s) on ${target.subscriptionId}`));
    try {
      const observations = await engine.runSeries(calls);
      return observations.every((o) => o.verdict.matched) ? 0 : 1;
    } catch (error) {
      print(formatFailure(error, paint));
      return 1;
    }
  }, onReleaseError);
}
