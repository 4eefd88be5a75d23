/**
 * Metered Invoker.
 *
 * Calls a metered endpoint with the grant's bearer token. The response
 * is an opaque payload; the credit cost is never read from it. The
 * ledger's balance delta is the only source of truth.
 */

import type { AccessGrant } from "@tollgate/types";
import { HttpClient } from "./http-client.js";
import type { CallOptions } from "./ledger-client.js";
import type { QueryValue } from "./types.js";

/**
 * Parameters of one metered call.
 */
export interface MeteredRequest {
  /** HTTP method (default: GET) */
  readonly method?: "GET" | "POST" | undefined;
  /** Query parameters; undefined values are omitted */
  readonly query?: Readonly<Record<string, QueryValue>> | undefined;
  /** JSON body for POST calls */
  readonly body?: unknown;
}

export interface InvocationResult {
  /** Parsed JSON, or raw text when the payload is not JSON */
  readonly body: unknown;
  readonly statusCode: number;
  readonly headers: Readonly<Record<string, string>>;
}

export interface MeteredInvokerConfig {
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  readonly fetchFn?: typeof fetch | undefined;
}

export class MeteredInvoker {
  constructor(private readonly config: MeteredInvokerConfig = {}) {}

  /**
   * @throws MeteringError INVOCATION_FAILED on non-2xx (status and body in context)
   */
  async invoke(
    grant: AccessGrant,
    request: MeteredRequest = {},
    options: CallOptions = {},
  ): Promise<InvocationResult> {
    const http = new HttpClient({
      baseUrl: grant.invocationUri,
      bearerToken: grant.accessToken,
      timeout: this.config.timeout,
      fetchFn: this.config.fetchFn,
      failureCode: "INVOCATION_FAILED",
      unwrapEnvelope: false,
    });

    const requestOptions = {
      query: request.query,
      signal: options.signal,
      context: { serviceId: grant.serviceId },
    };

    const result =
      request.method === "POST"
        ? await http.post("", request.body ?? {}, requestOptions)
        : await http.get("", requestOptions);

    return { body: result.data, statusCode: result.status, headers: result.headers };
  }
}
