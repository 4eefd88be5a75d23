/**
 * @tollgate/sdk — Typed HTTP clients for metered services.
 *
 * Talks to the subscription ledger, the identity provider and the
 * metered endpoint. Uses native fetch; remote payloads are validated
 * with zod.
 *
 * @packageDocumentation
 */

// Types
export type {
  ApiEndpointConfig,
  HttpClientConfig,
  TollgateClientConfig,
  QueryValue,
  RequestOptions,
  HttpResult,
} from "./types.js";

// HTTP Client
export { HttpClient } from "./http-client.js";

// Clients
export { TollgateClient } from "./client.js";
export { LedgerClient } from "./ledger-client.js";
export type {
  CallOptions,
  CreateSubscriptionParams,
  CreateServiceParams,
} from "./ledger-client.js";
export { AccessResolver } from "./access-resolver.js";
export { MeteredInvoker } from "./metered-invoker.js";
export type {
  MeteredRequest,
  InvocationResult,
  MeteredInvokerConfig,
} from "./metered-invoker.js";

// Schemas
export {
  BalanceSchema,
  ServiceIdListSchema,
  ChargingPolicySchema,
  ServiceSchema,
  SubscriptionSchema,
  AccessTokenSchema,
  parseResponse,
} from "./schemas.js";
