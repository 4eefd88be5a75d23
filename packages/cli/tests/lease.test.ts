/**
 * Tests for lease.ts — withLease, waitUntilReady, spawnServer, startSandboxServer.
 */

import { EventEmitter } from "node:events";
import { describe, it, expect, vi } from "vitest";
import {
  LeaseError,
  parseCommand,
  spawnServer,
  startSandboxServer,
  waitUntilReady,
  withLease,
} from "../src/lease.js";
import type { ServerProcess, ServiceLease } from "../src/lease.js";

// =============================================================================
// Helpers
// =============================================================================

const READY_URL = "http://127.0.0.1:8000/health";

function statusFetch(...statuses: number[]) {
  const fn = vi.fn(async () => new Response(null, { status: statuses.shift() ?? 503 }));
  return fn as unknown as typeof fetch & typeof fn;
}

const noSleep = vi.fn(async (_ms: number) => {});

class FakeProcess implements ServerProcess {
  exitCode: number | null = null;
  readonly signals: NodeJS.Signals[] = [];
  private readonly events = new EventEmitter();

  kill(signal: NodeJS.Signals): boolean {
    this.signals.push(signal);
    setTimeout(() => this.exit(0), 0);
    return true;
  }

  once(event: "exit", listener: () => void): this {
    this.events.once(event, listener);
    return this;
  }

  on(event: "error", listener: (error: Error) => void): this {
    this.events.on(event, listener);
    return this;
  }

  exit(code: number): void {
    this.exitCode = code;
    this.events.emit("exit");
  }

  /** A command that cannot be started: an errno exit code and no "exit" event */
  failToStart(error: Error): void {
    this.exitCode = -2;
    this.events.emit("error", error);
  }
}

function fakeLease(): ServiceLease & { released: number } {
  const lease = {
    url: "http://127.0.0.1:9",
    released: 0,
    release: async () => {
      lease.released++;
    },
  };
  return lease;
}

// =============================================================================
// withLease
// =============================================================================

describe("withLease", () => {
  it("returns the result and releases", async () => {
    const lease = fakeLease();

    const result = await withLease(async () => lease, async (l) => l.url);

    expect(result).toBe("http://127.0.0.1:9");
    expect(lease.released).toBe(1);
  });

  it("releases when the body throws", async () => {
    const lease = fakeLease();

    await expect(
      withLease(async () => lease, async () => {
        throw new Error("cycle failed");
      }),
    ).rejects.toThrow("cycle failed");
    expect(lease.released).toBe(1);
  });

  it("keeps the body's error when releasing fails too", async () => {
    const releaseError = new Error("close failed");
    const onReleaseError = vi.fn();
    const lease: ServiceLease = {
      url: "http://127.0.0.1:9",
      release: async () => {
        throw releaseError;
      },
    };

    const error = await withLease(
      async () => lease,
      async () => {
        throw new Error("cycle failed");
      },
      onReleaseError,
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({ message: "cycle failed", cause: releaseError });
    expect(onReleaseError).toHaveBeenCalledWith(releaseError);
  });

  it("does not overwrite an existing cause", async () => {
    const original = new Error("socket closed");
    const onReleaseError = vi.fn();

    const error = await withLease(
      async () => ({
        url: "http://127.0.0.1:9",
        release: async () => {
          throw new Error("close failed");
        },
      }),
      async () => {
        throw new Error("cycle failed", { cause: original });
      },
      onReleaseError,
    ).catch((e: unknown) => e);

    expect(error).toMatchObject({ message: "cycle failed", cause: original });
    expect(onReleaseError).toHaveBeenCalledOnce();
  });

  it("raises a release failure after a successful body", async () => {
    await expect(
      withLease(
        async () => ({
          url: "http://127.0.0.1:9",
          release: async () => {
            throw new Error("close failed");
          },
        }),
        async () => 1,
      ),
    ).rejects.toThrow("close failed");
  });

  it("does not run the body when acquiring fails", async () => {
    const body = vi.fn(async () => 1);

    await expect(
      withLease(async () => {
        throw new LeaseError("NOT_READY", "down");
      }, body),
    ).rejects.toThrow("down");
    expect(body).not.toHaveBeenCalled();
  });
});

// =============================================================================
// waitUntilReady
// =============================================================================

describe("waitUntilReady", () => {
  it("polls until a 200", async () => {
    const fetchFn = statusFetch(503, 200);
    const sleepFn = vi.fn(async (_ms: number) => {});

    await waitUntilReady(READY_URL, { fetchFn, sleepFn, intervalMs: 250 });

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(fetchFn).toHaveBeenCalledWith(READY_URL);
    expect(sleepFn.mock.calls).toEqual([[250]]);
  });

  it("treats network errors as not ready", async () => {
    const fetchFn = vi
      .fn<() => Promise<Response>>()
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(new Response("ok", { status: 200 }));

    await expect(
      waitUntilReady(READY_URL, { fetchFn: fetchFn as unknown as typeof fetch, sleepFn: noSleep }),
    ).resolves.toBeUndefined();
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("throws NOT_READY after maxRetries", async () => {
    const fetchFn = statusFetch();
    const sleepFn = vi.fn(async (_ms: number) => {});

    const error = await waitUntilReady(READY_URL, { fetchFn, sleepFn, maxRetries: 3 }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(LeaseError);
    expect(error).toMatchObject({
      code: "NOT_READY",
      message: "Could not reach http://127.0.0.1:8000/health after 3 attempts",
    });
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(sleepFn).toHaveBeenCalledTimes(2);
  });

  it("fails fast when the process has exited", async () => {
    const child = new FakeProcess();
    child.exitCode = 2;
    const fetchFn = statusFetch(200);

    await expect(waitUntilReady(READY_URL, { fetchFn, process: child })).rejects.toMatchObject({
      code: "EXITED",
      message: "Server process exited with code 2 before http://127.0.0.1:8000/health was ready",
    });
    expect(fetchFn).not.toHaveBeenCalled();
  });
});

// =============================================================================
// spawnServer
// =============================================================================

describe("spawnServer", () => {
  it("waits for readiness and interrupts on release", async () => {
    const child = new FakeProcess();
    const spawnFn = vi.fn((_command: string, _args: readonly string[]) => child);

    const lease = await spawnServer({
      command: "hello-server",
      args: ["--port", "8000"],
      readyUrl: READY_URL,
      wait: { fetchFn: statusFetch(503, 200), sleepFn: noSleep },
      spawnFn,
    });

    expect(spawnFn).toHaveBeenCalledWith("hello-server", ["--port", "8000"]);
    expect(lease.url).toBe(READY_URL);
    expect(child.signals).toEqual([]);

    await lease.release();
    expect(child.signals).toEqual(["SIGINT"]);
    expect(child.exitCode).toBe(0);
  });

  it("interrupts the process when it never becomes ready", async () => {
    const child = new FakeProcess();

    await expect(
      spawnServer({
        command: "hello-server",
        readyUrl: READY_URL,
        wait: { fetchFn: statusFetch(), sleepFn: noSleep, maxRetries: 2 },
        spawnFn: () => child,
      }),
    ).rejects.toMatchObject({ code: "NOT_READY" });
    expect(child.signals).toEqual(["SIGINT"]);
  });

  it("rejects with EXITED when the command cannot be started", async () => {
    const child = new FakeProcess();
    const pending = spawnServer({
      command: "hello-server",
      readyUrl: READY_URL,
      wait: { fetchFn: () => new Promise<Response>(() => {}), sleepFn: noSleep },
      spawnFn: () => child,
    });

    setTimeout(() => child.failToStart(new Error("spawn hello-server ENOENT")), 0);

    const error = await pending.catch((e: unknown) => e);
    expect(error).toBeInstanceOf(LeaseError);
    expect(error).toMatchObject({
      code: "EXITED",
      message: "Server process hello-server failed to start: spawn hello-server ENOENT",
    });
    expect(child.signals).toEqual([]);
  });

  it("keeps listening for process errors after it is ready", async () => {
    const child = new FakeProcess();
    const lease = await spawnServer({
      command: "hello-server",
      readyUrl: READY_URL,
      wait: { fetchFn: statusFetch(200), sleepFn: noSleep },
      spawnFn: () => child,
    });

    expect(() => child.failToStart(new Error("kill EPERM"))).not.toThrow();
    await lease.release();
    expect(child.signals).toEqual([]);
  });

  it("does not signal a process that already exited", async () => {
    const child = new FakeProcess();
    const lease = await spawnServer({
      command: "hello-server",
      readyUrl: READY_URL,
      wait: { fetchFn: statusFetch(200), sleepFn: noSleep },
      spawnFn: () => child,
    });
    child.exit(1);

    await lease.release();
    expect(child.signals).toEqual([]);
  });
});

describe("parseCommand", () => {
  it("splits on whitespace", () => {
    expect(parseCommand("  hello-server   --port 8000 --quiet ")).toEqual({
      command: "hello-server",
      args: ["--port", "8000", "--quiet"],
    });
  });
});

// =============================================================================
// startSandboxServer
// =============================================================================

describe("startSandboxServer", () => {
  it("serves a seeded marketplace until released", async () => {
    const lease = await startSandboxServer({ port: 0 });

    try {
      expect(lease.url).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
      expect(lease.subscriptionId).toBe("did:sub:1");
      expect(lease.serviceId).toBe("did:svc:2");
      expect(lease.accountAddress).toBe("0xconsumer");

      const health = await fetch(`${lease.url}/health`);
      expect(health.status).toBe(200);
      expect(await health.json()).toMatchObject({ status: "ok" });

      const token = lease.marketplace.issueToken(lease.serviceId, lease.accountAddress);
      expect(token.invocationUri).toBe(`${lease.url}/proxy/did%3Asvc%3A2`);
    } finally {
      await lease.release();
    }

    await expect(fetch(`${lease.url}/health`)).rejects.toThrow();
  });
});
