/**
 * Access Resolver.
 *
 * Exchanges a service identifier for a short-lived bearer token and the
 * URI through which the service is invoked. Grants are never cached.
 */

import type { AccessGrant, ServiceId } from "@tollgate/types";
import { HttpClient } from "./http-client.js";
import { AccessTokenSchema, parseResponse } from "./schemas.js";
import type { CallOptions } from "./ledger-client.js";
import type { ApiEndpointConfig } from "./types.js";

export class AccessResolver {
  private readonly http: HttpClient;

  constructor(config: ApiEndpointConfig) {
    this.http = new HttpClient({ ...config, failureCode: "AUTHORIZATION_DENIED" });
  }

  /**
   * @throws MeteringError AUTHORIZATION_DENIED on non-2xx, MALFORMED_RESPONSE on a bad token payload
   */
  async getAccessGrant(serviceId: ServiceId, options: CallOptions = {}): Promise<AccessGrant> {
    const context = { serviceId };
    const result = await this.http.get(
      `/api/v1/services/${encodeURIComponent(serviceId)}/token`,
      { signal: options.signal, context },
    );
    const token = parseResponse(AccessTokenSchema, result.data, "token", context);
    return {
      serviceId,
      accessToken: token.accessToken,
      invocationUri: token.invocationUri,
    };
  }
}
