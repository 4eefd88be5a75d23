/**
 * @tollgate/sdk — SDK types.
 *
 * Types specific to the SDK client layer.
 * Domain types are imported from @tollgate/types.
 */

import type { MeteringErrorCode, MeteringErrorContext } from "@tollgate/types";

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Connection settings for one remote API (ledger or identity provider).
 */
export interface ApiEndpointConfig {
  /** Base URL of the API (e.g., "https://ledger.example.com") */
  readonly baseUrl: string;
  /** API key sent as X-Api-Key (optional) */
  readonly apiKey?: string | undefined;
  /** Request timeout in milliseconds (default: 30000) */
  readonly timeout?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
}

/**
 * Configuration for the low-level HTTP client.
 */
export interface HttpClientConfig extends ApiEndpointConfig {
  /** Error code raised for non-2xx responses, network errors and timeouts */
  readonly failureCode: MeteringErrorCode;
  /** Bearer token sent as Authorization header (optional) */
  readonly bearerToken?: string | undefined;
  /** Unwrap `{ data: ... }` response envelopes (default: true) */
  readonly unwrapEnvelope?: boolean | undefined;
}

/**
 * Configuration for the aggregate Tollgate client.
 */
export interface TollgateClientConfig {
  readonly ledger: ApiEndpointConfig;
  /** Identity provider settings (default: same as ledger) */
  readonly identity?: ApiEndpointConfig | undefined;
  /** Timeout for metered endpoint calls (default: 30000) */
  readonly invocationTimeout?: number | undefined;
  /** Fetch function for metered endpoint calls (default: ledger.fetchFn) */
  readonly invocationFetchFn?: typeof fetch | undefined;
}

// =============================================================================
// Requests & Responses
// =============================================================================

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  readonly query?: Readonly<Record<string, QueryValue>> | undefined;
  /** Caller-supplied cancellation (e.g. a cycle deadline) */
  readonly signal?: AbortSignal | undefined;
  /** Extra context attached to any error raised by this request */
  readonly context?: MeteringErrorContext | undefined;
}

/**
 * Raw result of a successful (2xx) request. The payload is unvalidated.
 */
export interface HttpResult {
  readonly data: unknown;
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}
