/**
 * @tollgate/sandbox — In-process marketplace emulator.
 *
 * Serves the ledger and identity APIs plus a metered "hello" endpoint
 * from one Hono app, for tests and local runs.
 *
 * @packageDocumentation
 */

export { createSandboxApp } from "./app.js";
export type { CreateSandboxAppOptions, SandboxInstance } from "./app.js";
export { createAppFetch } from "./app-fetch.js";
export {
  Marketplace,
  MarketplaceError,
  chargeFor,
  defaultHandler,
} from "./marketplace.js";
export type {
  MarketplaceErrorCode,
  MarketplaceOptions,
  CallParams,
  ServiceHandler,
  ChargeFn,
  NewSubscription,
  NewService,
  OrderReceipt,
  IssuedToken,
  InvocationOutcome,
} from "./marketplace.js";
export type { RequestLogEntry } from "./middleware/logger.js";
export { createErrorEnvelope } from "./types/error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./types/error.js";
export type { SandboxEnv } from "./types/api-contract.js";
