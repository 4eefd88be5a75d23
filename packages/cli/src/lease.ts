/**
 * Scoped server leases.
 *
 * A lease is a running server plus the one way to stop it. `withLease`
 * releases on every exit path, so a failed cycle never leaves the
 * endpoint process or the sandbox server behind.
 */

import { spawn } from "node:child_process";
import type { AddressInfo, Server } from "node:net";
import { serve } from "@hono/node-server";
import { createSandboxApp } from "@tollgate/sandbox";
import type { CreateSandboxAppOptions, Marketplace } from "@tollgate/sandbox";
import type { ChargingPolicy, ServiceId, SubscriptionId } from "@tollgate/types";

// =============================================================================
// Types
// =============================================================================

export interface ServiceLease {
  /** Base URL of the leased server */
  readonly url: string;
  release(): Promise<void>;
}

export type LeaseErrorCode = "NOT_READY" | "EXITED";

export class LeaseError extends Error {
  public readonly code: LeaseErrorCode;

  constructor(code: LeaseErrorCode, message: string) {
    super(message);
    this.name = "LeaseError";
    this.code = code;
  }
}

/** The slice of a child process a lease needs. */
export interface ServerProcess {
  readonly exitCode: number | null;
  kill(signal: NodeJS.Signals): boolean;
  once(event: "exit", listener: () => void): unknown;
  /** Spawn and signalling failures */
  on(event: "error", listener: (error: Error) => void): unknown;
}

// =============================================================================
// withLease
// =============================================================================

/**
 * Acquire a lease, run `fn` with it and release it afterwards, also when
 * `fn` throws.
 *
 * When both `fn` and the release fail, `fn`'s error is rethrown; the
 * release error becomes its `cause` if it has none and is handed to
 * `onReleaseError` either way.
 */
export async function withLease<L extends ServiceLease, T>(
  acquire: () => Promise<L>,
  fn: (lease: L) => Promise<T>,
  onReleaseError?: (error: unknown) => void,
): Promise<T> {
  const lease = await acquire();
  let result: T;
  try {
    result = await fn(lease);
  } catch (error) {
    try {
      await lease.release();
    } catch (releaseError) {
      if (error instanceof Error && error.cause === undefined) {
        error.cause = releaseError;
      }
      onReleaseError?.(releaseError);
    }
    throw error;
  }
  await lease.release();
  return result;
}

// =============================================================================
// Readiness
// =============================================================================

export interface WaitUntilReadyOptions {
  /** Default: 5 */
  readonly maxRetries?: number | undefined;
  /** Default: 1000 */
  readonly intervalMs?: number | undefined;
  readonly fetchFn?: typeof fetch | undefined;
  /** Injectable for testing */
  readonly sleepFn?: ((ms: number) => Promise<void>) | undefined;
  /** Fails fast once this process has exited */
  readonly process?: ServerProcess | undefined;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Poll `url` until it answers 200.
 *
 * @throws LeaseError NOT_READY after `maxRetries` failed attempts
 * @throws LeaseError EXITED when the watched process exits first
 */
export async function waitUntilReady(
  url: string,
  options: WaitUntilReadyOptions = {},
): Promise<void> {
  const maxRetries = options.maxRetries ?? 5;
  const intervalMs = options.intervalMs ?? 1000;
  const fetchFn = options.fetchFn ?? globalThis.fetch;
  const sleepFn = options.sleepFn ?? defaultSleep;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    const exitCode = options.process?.exitCode ?? null;
    if (exitCode !== null) {
      throw new LeaseError("EXITED", `Server process exited with code ${exitCode} before ${url} was ready`);
    }

    try {
      const response = await fetchFn(url);
      if (response.status === 200) {
        return;
      }
    } catch {
      // Not listening yet
    }

    if (attempt < maxRetries) {
      await sleepFn(intervalMs);
    }
  }

  throw new LeaseError("NOT_READY", `Could not reach ${url} after ${maxRetries} attempts`);
}

// =============================================================================
// Spawned process
// =============================================================================

export interface SpawnServerOptions {
  readonly command: string;
  readonly args?: readonly string[] | undefined;
  /** Polled until it answers 200; also the lease URL */
  readonly readyUrl: string;
  readonly wait?: Omit<WaitUntilReadyOptions, "process"> | undefined;
  /** Injectable for testing */
  readonly spawnFn?: ((command: string, args: readonly string[]) => ServerProcess) | undefined;
}

const defaultSpawn = (command: string, args: readonly string[]): ServerProcess =>
  spawn(command, args, { stdio: "ignore" });

function interrupt(child: ServerProcess): Promise<void> {
  if (child.exitCode !== null) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    child.once("exit", () => resolve());
    if (!child.kill("SIGINT")) {
      resolve();
    }
  });
}

/**
 * Start a server process and wait until it is ready.
 * Release sends SIGINT and waits for the process to exit.
 *
 * @throws LeaseError EXITED when the process cannot be started
 */
export async function spawnServer(options: SpawnServerOptions): Promise<ServiceLease> {
  const spawnFn = options.spawnFn ?? defaultSpawn;
  const child = spawnFn(options.command, options.args ?? []);

  // Stays attached for the life of the process; only start-up failures reject
  let failStart: ((error: LeaseError) => void) | undefined;
  child.on("error", (error) => {
    failStart?.(new LeaseError("EXITED", `Server process ${options.command} failed to start: ${error.message}`));
  });
  const failed = new Promise<never>((_resolve, reject) => {
    failStart = reject;
  });

  try {
    await Promise.race([waitUntilReady(options.readyUrl, { ...options.wait, process: child }), failed]);
  } catch (error) {
    await interrupt(child);
    throw error;
  } finally {
    failStart = undefined;
  }

  return {
    url: options.readyUrl,
    release: () => interrupt(child),
  };
}

/**
 * Split a shell-style command line on whitespace.
 */
export function parseCommand(commandLine: string): { command: string; args: string[] } {
  const [command = "", ...args] = commandLine.trim().split(/\s+/);
  return { command, args };
}

// =============================================================================
// Sandbox server
// =============================================================================

export const SANDBOX_CHARGING_POLICY: ChargingPolicy = {
  chargeType: "fixed",
  minCredits: 1,
  maxCredits: 10,
  amountOfCredits: 2,
};

export interface StartSandboxServerOptions {
  /** 0 picks a free port */
  readonly port: number;
  /** Default: 127.0.0.1 */
  readonly hostname?: string | undefined;
  readonly sandbox?: Omit<CreateSandboxAppOptions, "invocationBaseUrl"> | undefined;
  readonly chargingPolicy?: ChargingPolicy | undefined;
}

export interface SandboxLease extends ServiceLease {
  readonly marketplace: Marketplace;
  readonly subscriptionId: SubscriptionId;
  readonly serviceId: ServiceId;
  /** Account every caller acts as when no API keys are configured */
  readonly accountAddress: string;
}

/**
 * Serve a seeded sandbox marketplace over HTTP: one subscription
 * (2 credits per order) bound to one "hello" service.
 * Release closes the server and cancels pending debits.
 */
export async function startSandboxServer(options: StartSandboxServerOptions): Promise<SandboxLease> {
  const hostname = options.hostname ?? "127.0.0.1";
  const sandboxOptions = options.sandbox ?? {};
  const accountAddress = sandboxOptions.defaultAccount ?? "0xconsumer";

  let baseUrl = `http://${hostname}:${options.port}`;
  const { app, marketplace } = createSandboxApp({
    ...sandboxOptions,
    invocationBaseUrl: () => baseUrl,
  });

  const subscription = marketplace.createSubscription({ name: "Sandbox plan", creditsPerOrder: 2 });
  const service = marketplace.createService({
    subscriptionId: subscription.id,
    name: "Hello",
    chargingPolicy: options.chargingPolicy ?? SANDBOX_CHARGING_POLICY,
  });

  const { server, info } = await new Promise<{ server: Server; info: AddressInfo }>(
    (resolve, reject) => {
      const server: Server = serve({ fetch: app.fetch, port: options.port, hostname }, (info) => {
        resolve({ server, info });
      });
      server.once("error", reject);
    },
  );
  baseUrl = `http://${hostname}:${info.port}`;

  return {
    url: baseUrl,
    marketplace,
    subscriptionId: subscription.id,
    serviceId: service.id,
    accountAddress,
    release: () =>
      new Promise<void>((resolve, reject) => {
        marketplace.dispose();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
