/**
 * Composition root shared by the server entry point and the CLI demo.
 */

import type { Config } from "./config.js";
import type { IHttpClient } from "./http/client.js";
import type { Logger } from "./logger.js";
import { QueryDispatcher } from "./lookup/dispatcher.js";
import { createOtmAdapter } from "./otm/adapter.js";
import type { HealthCheck } from "./otm/health.js";
import { ShipmentLookupService } from "./service/lookup-service.js";

export type LookupSettings = Pick<
  Config,
  | "OTM_BASE_URL"
  | "OTM_USERNAME"
  | "OTM_PASSWORD"
  | "OTM_DOMAIN"
  | "OTM_SUBDOMAIN"
  | "HTTP_TIMEOUT_MS"
  | "HEALTH_TIMEOUT_MS"
  | "LOOKUP_TIMEOUT_MS"
>;

export interface Services {
  lookup: ShipmentLookupService;
  health: HealthCheck;
}

export function createServices(settings: LookupSettings, http: IHttpClient, logger: Logger): Services {
  const otm = createOtmAdapter(
    {
      baseUrl: settings.OTM_BASE_URL,
      username: settings.OTM_USERNAME,
      password: settings.OTM_PASSWORD,
      domain: settings.OTM_DOMAIN,
      subdomain: settings.OTM_SUBDOMAIN,
      timeoutMs: settings.HTTP_TIMEOUT_MS,
      healthTimeoutMs: settings.HEALTH_TIMEOUT_MS,
    },
    http
  );
  const dispatcher = new QueryDispatcher({
    client: otm.queries,
    templates: otm.templates,
    logger,
    timeoutMs: settings.LOOKUP_TIMEOUT_MS,
  });
  return { lookup: new ShipmentLookupService(dispatcher), health: otm.health };
}
