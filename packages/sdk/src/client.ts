/**
 * @tollgate/sdk — Tollgate Client.
 *
 * Main entry point for the Tollgate SDK. Groups the three remote
 * collaborators of a metered call:
 * - client.ledger: balances, top-ups, service bindings
 * - client.access: access grants from the identity provider
 * - client.invoker: the metered endpoint itself
 */

import { LedgerClient } from "./ledger-client.js";
import { AccessResolver } from "./access-resolver.js";
import { MeteredInvoker } from "./metered-invoker.js";
import type { TollgateClientConfig } from "./types.js";

/**
 * Tollgate SDK client.
 *
 * Usage:
 * ```typescript
 * const client = new TollgateClient({
 *   ledger: { baseUrl: "https://ledger.example.com", apiKey: "your-api-key" },
 * });
 *
 * const balance = await client.ledger.getBalance("did:sub:1", "0xconsumer");
 * ```
 */
export class TollgateClient {
  /** Subscription ledger operations. */
  readonly ledger: LedgerClient;
  /** Identity provider operations. */
  readonly access: AccessResolver;
  /** Metered endpoint calls. */
  readonly invoker: MeteredInvoker;

  constructor(config: TollgateClientConfig) {
    this.ledger = new LedgerClient(config.ledger);
    this.access = new AccessResolver(config.identity ?? config.ledger);
    this.invoker = new MeteredInvoker({
      timeout: config.invocationTimeout ?? config.ledger.timeout,
      fetchFn: config.invocationFetchFn ?? config.ledger.fetchFn,
    });
  }
}
