/**
 * Builds OTM saved-query URLs and maps OTM shipment resources to ShipmentRecord.
 * Single place for OTM-specific payload shapes; no raw OTM types leak to callers.
 */

import type { QueryPage, ShipmentRecord, StatusValue } from "../domain/types.js";
import { malformedResponseError } from "../domain/errors.js";
import {
  otmCollectionSchema,
  otmShipmentSchema,
  type OtmLink,
  type OtmShipment,
  type OtmStatuses,
} from "./types.js";

const REST_ROOT = "/logisticsRestApi/resources-int/v2";

export const SEARCH_FIELDS = [
  "shipmentXid",
  "shipmentName",
  "transportModeGid",
  "servprov.servprovXid",
  "sourceLocation.locationXid",
  "destLocation.locationXid",
  "startTime",
  "endTime",
  "totalWeight",
  "totalVolume",
  "totalActualCost",
  "attribute10",
  "statuses",
].join(",");

/** Status types surfaced on each record; every other status is ignored */
export const TRACKED_STATUS_TYPES: ReadonlySet<string> = new Set([
  "BTF_SHIP_IND",
  "BTF_RATE_IND",
  "SEND_SHIPMENT_USB",
  "SENT_TO_USB",
]);

export interface OtmEndpoint {
  baseUrl: string;
  domain: string;
}

function trimBase(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

/** Text after the first occurrence of `sep`, or the whole string */
function afterFirst(value: string, sep: string): string {
  const idx = value.indexOf(sep);
  return idx === -1 ? value : value.slice(idx + sep.length);
}

export function buildSearchUrl(endpoint: OtmEndpoint, queryName: string, term: string): string {
  return (
    `${trimBase(endpoint.baseUrl)}${REST_ROOT}` +
    `/custom-actions/savedQueries/shipments/${endpoint.domain}/${queryName}` +
    `?fields=${SEARCH_FIELDS}&expand=statuses&parameterValue=${encodeURIComponent(term)}`
  );
}

/** Cheapest authenticated read, used to probe reachability */
export function buildHealthUrl(baseUrl: string): string {
  return `${trimBase(baseUrl)}${REST_ROOT}/shipments?limit=1`;
}

/**
 * XID of a referenced resource, read from the last segment of its link:
 * ".../locations/KFNA.DC_01" -> "DC_01".
 */
export function extractXidFromLink(
  links: readonly OtmLink[] | null | undefined,
  rel = "canonical"
): string | null {
  for (const link of links ?? []) {
    if (link.rel !== rel) continue;
    const href = link.href ?? "";
    const slash = href.lastIndexOf("/");
    if (slash === -1) continue;
    return afterFirst(href.slice(slash + 1), ".");
  }
  return null;
}

/**
 * Human value of a status: "KFNA.SENT_TO_USB - YES" -> "YES",
 * "KFNA.BTF_RATE_IND_NO" -> "NO" for type "KFNA.BTF_RATE_IND".
 */
export function extractStatusValue(statusTypeGid: string, statusValueGid: string): string {
  const value = afterFirst(statusValueGid, ".");
  const dash = value.indexOf(" - ");
  if (dash !== -1) {
    return value.slice(dash + 3).trim();
  }
  const typeName = afterFirst(statusTypeGid, ".");
  if (value.toUpperCase().startsWith(`${typeName.toUpperCase()}_`)) {
    return value.slice(typeName.length + 1).trim();
  }
  const underscore = value.lastIndexOf("_");
  if (underscore !== -1) {
    return value.slice(underscore + 1).trim();
  }
  return value.trim();
}

export function parseInlineStatuses(statuses: OtmStatuses): Record<string, StatusValue> {
  const result: Record<string, StatusValue> = {};
  for (const item of statuses?.items ?? []) {
    const typeGid = item.statusTypeGid ?? "";
    const typeKey = afterFirst(typeGid, ".");
    if (!TRACKED_STATUS_TYPES.has(typeKey)) continue;
    result[typeKey] = {
      value: extractStatusValue(typeGid, item.statusValueGid ?? ""),
      updateDate: item.updateDate?.value ?? item.insertDate?.value ?? null,
    };
  }
  return result;
}

export function parseShipment(raw: OtmShipment): ShipmentRecord {
  const statuses = parseInlineStatuses(raw.statuses);
  return {
    shipmentXid: raw.shipmentXid ?? null,
    shipmentName: raw.shipmentName ?? null,
    transportMode: raw.transportModeGid ?? null,
    carrier: extractXidFromLink(raw.servprov?.links),
    sourceLocation: extractXidFromLink(raw.sourceLocation?.links),
    destLocation: extractXidFromLink(raw.destLocation?.links),
    startTime: raw.startTime?.value ?? null,
    endTime: raw.endTime?.value ?? null,
    insertDate: raw.insertDate?.value ?? null,
    updateDate: raw.updateDate?.value ?? null,
    totalWeight: raw.totalWeight?.value ?? null,
    weightUnit: raw.totalWeight?.unit ?? null,
    totalVolume: raw.totalVolume?.value ?? null,
    volumeUnit: raw.totalVolume?.unit ?? null,
    totalActualCost: raw.totalActualCost?.value ?? null,
    currency: raw.totalActualCost?.currency ?? null,
    // Freight-pay shipments are flagged either way
    shipmentAsWork: Boolean(raw.shipmentAsWork) || "SEND_SHIPMENT_USB" in statuses,
    perspective: raw.perspective ?? null,
    attribute10: raw.attribute10 ?? null,
    statuses,
  };
}

/**
 * Parse a saved-query response body into a page of records.
 * Only items that are not JSON objects are skipped; records without an
 * identifier are kept here and dropped by the merger.
 */
export function parseSavedQueryResponse(body: string, query?: string): QueryPage {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (e) {
    throw malformedResponseError("Malformed JSON in OTM saved query response", e, query);
  }
  const envelope = otmCollectionSchema.safeParse(data);
  if (!envelope.success) {
    throw malformedResponseError("Unexpected OTM collection shape", envelope.error, query);
  }
  const records: ShipmentRecord[] = [];
  for (const item of envelope.data.items ?? []) {
    const shipment = otmShipmentSchema.safeParse(item);
    if (shipment.success) {
      records.push(parseShipment(shipment.data));
    }
  }
  return {
    records,
    count: envelope.data.count ?? records.length,
    hasMore: envelope.data.hasMore ?? false,
  };
}
