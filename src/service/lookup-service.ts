/**
 * Shipment lookup facade: dispatches both saved queries, merges their records
 * and reports per-query outcomes. Callers never see OTM resource shapes.
 */

import type { QuerySummary, SearchResponse } from "../domain/types.js";
import { isLookupError } from "../domain/errors.js";
import type { QueryDispatcher, DispatchOptions } from "../lookup/dispatcher.js";
import { mergeShipments } from "../lookup/merger.js";
import type { LookupResult, QueryRun } from "../lookup/types.js";

export interface SearchQuery {
  term: string;
  /** "shipment" or "order"; anything else fails validation */
  kind: string;
}

export class ShipmentLookupService {
  constructor(private readonly dispatcher: QueryDispatcher) {}

  /**
   * Look up a shipment name/XID or an order/reference number.
   * Validation, total upstream failure and cancellation come back as `ok: false`.
   */
  async search(query: SearchQuery, options?: DispatchOptions): Promise<LookupResult<SearchResponse>> {
    let runs: readonly [QueryRun, QueryRun];
    try {
      runs = await this.dispatcher.dispatch(query.term, query.kind, options);
    } catch (err) {
      if (isLookupError(err)) {
        return { ok: false, error: err };
      }
      throw err;
    }

    const items = mergeShipments(runs.map((r) => r.result));
    const queries = runs.map(({ template, result }): QuerySummary => ({
      name: template.queryName,
      strategy: template.strategy,
      count: result.ok ? result.value.count : 0,
      hasMore: result.ok ? result.value.hasMore : false,
      error: result.ok ? null : result.error.message,
    }));

    return {
      ok: true,
      value: {
        searchType: runs[0].template.kind,
        searchValue: query.term.trim(),
        totalCount: items.length,
        queries,
        errors: queries.flatMap((q) => (q.error === null ? [] : [q.error])),
        items,
      },
    };
  }
}
