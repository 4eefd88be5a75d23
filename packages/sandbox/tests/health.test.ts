/**
 * Tests for the health endpoint and request-id propagation.
 */

import { describe, it, expect, vi } from "vitest";
import { createSandboxApp } from "../src/app.js";
import type { RequestLogEntry } from "../src/middleware/logger.js";
import { jsonRequest } from "./setup.js";

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createSandboxApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(body.timestamp).toBeDefined();
  });

  it("generates an X-Request-Id", async () => {
    const { app } = createSandboxApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createSandboxApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });
});

describe("request logging", () => {
  it("hands one entry per request to logFn", async () => {
    const logFn = vi.fn<(entry: RequestLogEntry) => void>();
    const { app } = createSandboxApp({ logFn });

    await app.request(jsonRequest("/health", "GET", undefined, { "X-Request-Id": "req-log" }));

    expect(logFn).toHaveBeenCalledOnce();
    expect(logFn.mock.calls[0]![0]).toMatchObject({
      method: "GET",
      path: "/health",
      status: 200,
      requestId: "req-log",
    });
  });
});

describe("unknown routes", () => {
  it("return a NOT_FOUND envelope", async () => {
    const { app } = createSandboxApp();
    const res = await app.request("/nope");

    expect(res.status).toBe(404);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "NOT_FOUND", message: "No route for GET /nope" });
  });
});
