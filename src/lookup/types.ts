/**
 * Lookup abstraction: the dispatcher talks to the external system only through SavedQueryClient.
 */

import type { QueryPage, QueryTemplate, ShipmentRecord } from "../domain/types.js";
import type { LookupError } from "../domain/errors.js";

/** Result of an operation that can fail with a structured error */
export type LookupResult<T> = { ok: true; value: T } | { ok: false; error: LookupError };

/** Outcome of one saved query: a page of records or a failure */
export type RawResult<T = ShipmentRecord> = LookupResult<QueryPage<T>>;

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export interface SavedQueryClient {
  /**
   * Run one saved query with `term` as its parameter.
   * Failures are returned, not thrown.
   */
  execute(template: QueryTemplate, term: string, options?: ExecuteOptions): Promise<RawResult>;
}

/** A template paired with what running it produced */
export interface QueryRun {
  readonly template: QueryTemplate;
  readonly result: RawResult;
}
