/**
 * Metered Invoker Tests
 */

import { describe, it, expect } from "vitest";
import { MeteringError } from "@tollgate/types";
import type { AccessGrant } from "@tollgate/types";
import { MeteredInvoker } from "../src/metered-invoker.js";
import { createMockFetch, callArgs } from "./mock-fetch.js";

const GRANT: AccessGrant = {
  serviceId: "did:svc:1",
  accessToken: "test-token",
  invocationUri: "https://proxy.example.com/proxy/svc-1",
};

describe("MeteredInvoker.invoke", () => {
  it("calls the invocation URI with the bearer token and query", async () => {
    const fetchFn = createMockFetch([{ status: 200, text: "Hello Foo" }]);
    const invoker = new MeteredInvoker({ fetchFn });

    const result = await invoker.invoke(GRANT, { query: { name: "Foo" } });

    expect(result.body).toBe("Hello Foo");
    expect(result.statusCode).toBe(200);
    const [url, init] = callArgs(fetchFn);
    expect(url).toBe("https://proxy.example.com/proxy/svc-1?name=Foo");
    expect(init.method).toBe("GET");
    expect(init.headers["Authorization"]).toBe("Bearer test-token");
  });

  it("returns JSON payloads without unwrapping them", async () => {
    const fetchFn = createMockFetch([{ status: 200, body: { data: "kept" } }]);
    const invoker = new MeteredInvoker({ fetchFn });

    const result = await invoker.invoke(GRANT);

    expect(result.body).toEqual({ data: "kept" });
  });

  it("posts a JSON body", async () => {
    const fetchFn = createMockFetch([{ status: 200, body: { ok: true } }]);
    const invoker = new MeteredInvoker({ fetchFn });

    await invoker.invoke(GRANT, { method: "POST", body: { prompt: "hi" } });

    const [, init] = callArgs(fetchFn);
    expect(init.method).toBe("POST");
    expect(init.body).toBe('{"prompt":"hi"}');
  });

  it("does not surface a charge header", async () => {
    const fetchFn = createMockFetch([
      { status: 200, text: "Hello World", headers: { "x-credits-charged": "2", "x-request-id": "req-9" } },
    ]);
    const invoker = new MeteredInvoker({ fetchFn });

    const result = await invoker.invoke(GRANT);

    expect(result.headers["x-request-id"]).toBe("req-9");
    expect(result.headers["x-credits-charged"]).toBeUndefined();
  });

  it("merges the query into an invocation URI that already has one", async () => {
    const fetchFn = createMockFetch([{ status: 200, text: "Hello World" }]);
    const invoker = new MeteredInvoker({ fetchFn });

    await invoker.invoke(
      { ...GRANT, invocationUri: "https://proxy.example.com/proxy/svc-1?a=1" },
      { query: { name: "World" } },
    );

    const [url] = callArgs(fetchFn);
    expect(url).toBe("https://proxy.example.com/proxy/svc-1?a=1&name=World");
  });

  it("raises INVOCATION_FAILED with status and body on non-2xx", async () => {
    const fetchFn = createMockFetch([{ status: 500, text: "upstream exploded" }]);
    const invoker = new MeteredInvoker({ fetchFn });

    const error = await invoker.invoke(GRANT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MeteringError);
    const err = error as MeteringError;
    expect(err.code).toBe("INVOCATION_FAILED");
    expect(err.message).toBe("HTTP 500");
    expect(err.context.statusCode).toBe(500);
    expect(err.context.responseBody).toBe("upstream exploded");
    expect(err.context.serviceId).toBe("did:svc:1");
  });

  it("raises INVOCATION_FAILED on network failure", async () => {
    const fetchFn = createMockFetch([{ status: 0, error: new TypeError("fetch failed") }]);
    const invoker = new MeteredInvoker({ fetchFn });

    await expect(invoker.invoke(GRANT)).rejects.toMatchObject({ code: "INVOCATION_FAILED" });
  });
});
