/**
 * Saved query templates per search kind. Built once at startup and frozen.
 */

import type { QueryStrategy, QueryTemplate, QueryTemplateSet, SearchKind } from "../domain/types.js";

const SAVED_QUERIES: Record<SearchKind, readonly [[string, QueryStrategy], [string, QueryStrategy]]> = {
  shipment: [
    ["FP_SHP_NAME_DIRECT", "direct"],
    ["FP_SHP_NAME_INDIRECT", "indirect"],
  ],
  order: [
    ["FP_ORD_DIRECT", "direct"],
    ["FP_ORD_INDIRECT", "indirect"],
  ],
};

function template(subdomain: string, kind: SearchKind, [id, strategy]: [string, QueryStrategy]): QueryTemplate {
  return Object.freeze({ id, queryName: `${subdomain}.${id}`, kind, strategy });
}

function pair(subdomain: string, kind: SearchKind): readonly [QueryTemplate, QueryTemplate] {
  const [first, second] = SAVED_QUERIES[kind];
  return Object.freeze([template(subdomain, kind, first), template(subdomain, kind, second)] as const);
}

/** Template set qualified with the OTM sub-domain (e.g. "KFNA.FP_ORD_DIRECT") */
export function buildQueryTemplates(subdomain: string): QueryTemplateSet {
  return Object.freeze({
    shipment: pair(subdomain, "shipment"),
    order: pair(subdomain, "order"),
  });
}
