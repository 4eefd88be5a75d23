/**
 * @tollgate/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - API key and bearer token header injection
 * - Request ID generation
 * - Timeout handling and caller cancellation
 * - Error normalization into MeteringError
 *
 * Design:
 * - Uses native fetch, injectable for testing
 * - Never retries: every failure propagates immediately
 * - Payloads are returned unvalidated; callers parse them
 */

import { MeteringError } from "@tollgate/types";
import type { MeteringErrorCode } from "@tollgate/types";
import type { HttpClientConfig, HttpResult, QueryValue, RequestOptions } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

/** Generate a simple request ID */
function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Parse a response body: JSON when it parses, raw text otherwise.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Extract selected headers from a Response.
 */
function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  const interestingHeaders = [
    "content-type",
    "x-request-id",
    "retry-after",
  ];

  for (const name of interestingHeaders) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Pull the error message out of an `{ error: { message } }` envelope. */
function errorMessage(body: unknown): string | undefined {
  if (!isRecord(body) || !isRecord(body.error)) return undefined;
  return typeof body.error.message === "string" ? body.error.message : undefined;
}

function isAbortError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "name" in error &&
    error.name === "AbortError"
  );
}

/**
 * Settle with `promise`, or reject with the abort reason as soon as
 * `signal` fires, whether or not the work behind `promise` listens to it.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Join `path` onto the base URL's path and merge `query` into whatever
 * query string the base URL already carries.
 */
function buildUrl(
  baseUrl: string,
  path: string,
  query: Readonly<Record<string, QueryValue>> | undefined,
): string {
  const url = new URL(baseUrl);
  url.pathname = `${url.pathname.replace(/\/+$/, "")}${path}`;
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

// =============================================================================
// HTTP Client
// =============================================================================

/**
 * Low-level HTTP client for one remote API.
 *
 * Every failure is raised as a MeteringError carrying the configured
 * failure code, so each caller decides what "the other side failed" means.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly bearerToken: string | undefined;
  private readonly timeout: number;
  private readonly failureCode: MeteringErrorCode;
  private readonly unwrapEnvelope: boolean;
  private readonly fetchFn: typeof fetch;

  constructor(config: HttpClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.apiKey = config.apiKey;
    this.bearerToken = config.bearerToken;
    this.timeout = config.timeout ?? 30000;
    this.failureCode = config.failureCode;
    this.unwrapEnvelope = config.unwrapEnvelope ?? true;
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
  }

  /**
   * Perform a GET request.
   */
  async get(path: string, options: RequestOptions = {}): Promise<HttpResult> {
    return this.request("GET", path, undefined, options);
  }

  /**
   * Perform a POST request with a JSON body.
   */
  async post(path: string, body: unknown, options: RequestOptions = {}): Promise<HttpResult> {
    return this.request("POST", path, body, options);
  }

  /**
   * Core request method. One attempt only.
   */
  private async request(
    method: string,
    path: string,
    body: unknown,
    options: RequestOptions,
  ): Promise<HttpResult> {
    let url: string;
    try {
      url = buildUrl(this.baseUrl, path, options.query);
    } catch (error) {
      throw new MeteringError(this.failureCode, `Invalid URL: ${this.baseUrl}${path}`, {
        ...options.context,
        statusCode: 0,
        cause: error,
      });
    }

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Accept": "application/json",
      "X-Request-Id": generateRequestId(),
    };

    if (this.apiKey !== undefined) {
      headers["X-Api-Key"] = this.apiKey;
    }
    if (this.bearerToken !== undefined) {
      headers["Authorization"] = `Bearer ${this.bearerToken}`;
    }

    const init: RequestInit = {
      method,
      headers,
    };

    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    const context = { ...options.context, url };

    let received: { response: Response; responseBody: unknown };
    try {
      // The timer covers the body as well as the headers
      received = await this.withTimeout(options.signal, async (signal) => {
        const response = await this.fetchFn(url, { ...init, signal });
        return { response, responseBody: await parseResponseBody(response) };
      });
    } catch (error) {
      if (isAbortError(error)) {
        const cancelled = options.signal?.aborted === true;
        throw new MeteringError(
          this.failureCode,
          cancelled ? "Request aborted" : `Request timed out after ${this.timeout}ms`,
          { ...context, statusCode: 0 },
        );
      }
      throw new MeteringError(
        this.failureCode,
        error instanceof Error ? error.message : "Network error",
        { ...context, statusCode: 0, cause: error },
      );
    }

    const { response, responseBody } = received;
    const responseHeaders = extractHeaders(response);

    if (!response.ok) {
      throw new MeteringError(
        this.failureCode,
        errorMessage(responseBody) ?? `HTTP ${response.status}`,
        { ...context, statusCode: response.status, responseBody },
      );
    }

    const data =
      this.unwrapEnvelope && isRecord(responseBody) && "data" in responseBody
        ? responseBody.data
        : responseBody;

    return { data, status: response.status, headers: responseHeaders };
  }

  /**
   * Run `fn` under a signal that fires on timeout or when the caller's
   * signal fires, and stop waiting for it at that point.
   */
  private async withTimeout<T>(
    signal: AbortSignal | undefined,
    fn: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const onAbort = (): void => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    try {
      return await abortable(fn(controller.signal), controller.signal);
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener("abort", onAbort);
    }
  }
}
