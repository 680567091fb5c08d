/**
 * Result merger: concatenates saved-query results in template order and keeps
 * the first record seen for each identifier.
 */

import type { ShipmentRecord } from "../domain/types.js";
import type { RawResult } from "./types.js";

export type Identify<T> = (record: T) => string | null | undefined;

/**
 * Merge results in the order given. Failed results contribute nothing;
 * records without an identifier are dropped and never enter the seen set.
 * Input records are returned by reference, never modified.
 */
export function mergeResults<T>(results: readonly RawResult<T>[], identify: Identify<T>): T[] {
  const seen = new Set<string>();
  const merged: T[] = [];
  for (const result of results) {
    if (!result.ok) continue;
    for (const record of result.value.records) {
      const id = identify(record);
      if (id === null || id === undefined || id === "") continue;
      if (seen.has(id)) continue;
      seen.add(id);
      merged.push(record);
    }
  }
  return merged;
}

/** Shipments are keyed by XID */
export function mergeShipments(results: readonly RawResult[]): ShipmentRecord[] {
  return mergeResults(results, (record) => record.shipmentXid);
}
