/**
 * Metered endpoint.
 *
 * GET|POST /proxy/:serviceId — runs the service handler for a bearer of a
 * valid access token. Query parameters (GET) or the JSON object body (POST)
 * are the call's parameters. The charge is never reported to the caller;
 * the debit settles on the ledger later.
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { SandboxEnv } from "../types/api-contract.js";
import type { CallParams, Marketplace } from "../marketplace.js";

function bearerToken(c: Context<SandboxEnv>): string | undefined {
  const header = c.req.header("Authorization");
  if (header === undefined || !header.startsWith("Bearer ")) {
    return undefined;
  }
  return header.slice(7);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

async function bodyParams(c: Context<SandboxEnv>): Promise<CallParams> {
  const text = await c.req.text();
  if (text.trim() === "") {
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export function createProxyRoutes(marketplace: Marketplace): Hono<SandboxEnv> {
  const routes = new Hono<SandboxEnv>();

  const handle = async (c: Context<SandboxEnv>): Promise<Response> => {
    const params = c.req.method === "POST" ? await bodyParams(c) : c.req.query();
    const serviceId = c.req.param("serviceId") ?? "";
    const outcome = marketplace.invoke(serviceId, bearerToken(c), params);

    if (typeof outcome.payload === "string") {
      return c.text(outcome.payload);
    }
    return c.body(JSON.stringify(outcome.payload ?? null), 200, {
      "Content-Type": "application/json",
    });
  };

  routes.get("/:serviceId", handle);
  routes.post("/:serviceId", handle);

  return routes;
}
