/**
 * Domain types for the shipment lookup service.
 * Callers work only with these; OTM resource shapes stay inside src/otm.
 */

export const SEARCH_KINDS = ["shipment", "order"] as const;

/** What the search term is matched against: a shipment name/XID or an order/reference number */
export type SearchKind = (typeof SEARCH_KINDS)[number];

export interface SearchRequest {
  /** Trimmed, non-empty */
  term: string;
  kind: SearchKind;
}

/** Direct match vs. match through linked entities */
export type QueryStrategy = "direct" | "indirect";

/** A saved query in OTM that takes the search term as its single parameter */
export interface QueryTemplate {
  readonly id: string;
  /** Fully qualified saved query GID, e.g. "KFNA.FP_ORD_DIRECT" */
  readonly queryName: string;
  readonly kind: SearchKind;
  readonly strategy: QueryStrategy;
}

/** Exactly two templates per kind; the first one's results take precedence when merging */
export type QueryTemplateSet = Readonly<Record<SearchKind, readonly [QueryTemplate, QueryTemplate]>>;

export interface StatusValue {
  value: string;
  updateDate: string | null;
}

/** Normalized shipment hit */
export interface ShipmentRecord {
  /** Identifier used for deduplication; null when OTM omitted it */
  readonly shipmentXid: string | null;
  readonly shipmentName: string | null;
  readonly transportMode: string | null;
  /** Service provider XID */
  readonly carrier: string | null;
  readonly sourceLocation: string | null;
  readonly destLocation: string | null;
  readonly startTime: string | null;
  readonly endTime: string | null;
  readonly insertDate: string | null;
  readonly updateDate: string | null;
  readonly totalWeight: number | string | null;
  readonly weightUnit: string | null;
  readonly totalVolume: number | string | null;
  readonly volumeUnit: string | null;
  readonly totalActualCost: number | string | null;
  readonly currency: string | null;
  readonly shipmentAsWork: boolean;
  readonly perspective: string | null;
  readonly attribute10: string | null;
  /** Keyed by status type (e.g. "SENT_TO_USB") */
  readonly statuses: Readonly<Record<string, StatusValue>>;
}

/** One page of records returned by a saved query */
export interface QueryPage<T = ShipmentRecord> {
  records: T[];
  count: number;
  hasMore: boolean;
}

export interface QuerySummary {
  name: string;
  strategy: QueryStrategy;
  count: number;
  hasMore: boolean;
  error: string | null;
}

/** Merged, deduplicated answer to one lookup */
export interface SearchResponse {
  searchType: SearchKind;
  searchValue: string;
  totalCount: number;
  queries: QuerySummary[];
  errors: string[];
  items: ShipmentRecord[];
}
