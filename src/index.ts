/**
 * OTM Shipment Lookup
 *
 * Public API: domain types, lookup core, OTM adapter, service facade and HTTP app factory.
 */

export * from "./domain/index.js";
export * from "./lookup/types.js";
export { QueryDispatcher } from "./lookup/dispatcher.js";
export type { QueryDispatcherConfig, DispatchOptions } from "./lookup/dispatcher.js";
export { mergeResults, mergeShipments } from "./lookup/merger.js";
export type { Identify } from "./lookup/merger.js";
export { createOtmAdapter } from "./otm/adapter.js";
export type { OtmAdapter, OtmAdapterConfig } from "./otm/adapter.js";
export type { HealthCheck, HealthReport } from "./otm/health.js";
export { buildQueryTemplates } from "./otm/queries.js";
export { ShipmentLookupService } from "./service/lookup-service.js";
export type { SearchQuery } from "./service/lookup-service.js";
export { createApp } from "./server/app.js";
export type { AppDependencies } from "./server/app.js";
export { createServices } from "./wiring.js";
export { FetchHttpClient, HttpError } from "./http/client.js";
export type { IHttpClient, HttpRequest, HttpResponse } from "./http/client.js";
export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { loadConfig } from "./config.js";
export type { Config } from "./config.js";
