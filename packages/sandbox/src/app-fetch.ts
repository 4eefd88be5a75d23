/**
 * Bridge: Hono app.request() as a fetch function.
 *
 * Routes any absolute URL to the app by path and query, so clients
 * configured with real base URLs talk to the sandbox without a server.
 */

import type { Hono } from "hono";
import type { SandboxEnv } from "./types/api-contract.js";

export function createAppFetch(app: Hono<SandboxEnv>): typeof fetch {
  return async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === "string"
      ? input
      : input instanceof URL
        ? input.toString()
        : input.url;

    // Strip the base URL to get just the path + query
    const urlObj = new URL(url);
    const pathAndQuery = `${urlObj.pathname}${urlObj.search}`;

    const request = new Request(`http://localhost${pathAndQuery}`, {
      method: init?.method ?? "GET",
      headers: init?.headers,
      body: init?.body,
      signal: init?.signal,
    });

    return app.request(request);
  };
}
