/**
 * Consumer middleware.
 *
 * Resolves the calling account from the X-Api-Key header. When no keys
 * are configured every request acts as the default account.
 */

import type { MiddlewareHandler } from "hono";
import type { SandboxEnv } from "../types/api-contract.js";
import { MarketplaceError } from "../marketplace.js";

export interface ConsumerConfig {
  /** Map of API key → account address */
  readonly apiKeys: ReadonlyMap<string, string>;
  readonly defaultAccount: string;
}

export function consumerMiddleware(config: ConsumerConfig): MiddlewareHandler<SandboxEnv> {
  return async (c, next) => {
    if (config.apiKeys.size === 0) {
      c.set("account", config.defaultAccount);
      await next();
      return;
    }

    const apiKey = c.req.header("X-Api-Key");
    if (apiKey === undefined) {
      throw new MarketplaceError("UNAUTHORIZED", "Missing API key");
    }
    const account = config.apiKeys.get(apiKey);
    if (account === undefined) {
      throw new MarketplaceError("UNAUTHORIZED", "Invalid API key");
    }

    c.set("account", account);
    await next();
  };
}
