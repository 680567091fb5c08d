/**
 * OTM adapter: composes the saved-query client, the health probe and the template set.
 */

import type { QueryTemplateSet } from "../domain/types.js";
import type { IHttpClient } from "../http/client.js";
import type { SavedQueryClient } from "../lookup/types.js";
import { OtmHealthCheck, type HealthCheck } from "./health.js";
import { buildQueryTemplates } from "./queries.js";
import { OtmSavedQueryClient } from "./saved-query.js";

export interface OtmAdapterConfig {
  baseUrl: string;
  username: string;
  password: string;
  domain: string;
  subdomain: string;
  timeoutMs?: number;
  healthTimeoutMs?: number;
}

export interface OtmAdapter {
  readonly queries: SavedQueryClient;
  readonly health: HealthCheck;
  readonly templates: QueryTemplateSet;
}

export function createOtmAdapter(config: OtmAdapterConfig, http: IHttpClient): OtmAdapter {
  const credentials = { username: config.username, password: config.password };
  return {
    queries: new OtmSavedQueryClient(
      {
        baseUrl: config.baseUrl,
        domain: config.domain,
        ...credentials,
        timeoutMs: config.timeoutMs,
      },
      http
    ),
    health: new OtmHealthCheck(
      { baseUrl: config.baseUrl, ...credentials, timeoutMs: config.healthTimeoutMs },
      http
    ),
    templates: buildQueryTemplates(config.subdomain),
  };
}
