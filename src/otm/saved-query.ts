/**
 * OTM saved-query operation: runs one custom-action saved query with auth and error handling.
 */

import type { QueryTemplate } from "../domain/types.js";
import type { ExecuteOptions, RawResult, SavedQueryClient } from "../lookup/types.js";
import { isHttpAbort, isHttpTimeout, type IHttpClient } from "../http/client.js";
import {
  authError,
  cancelledError,
  isLookupError,
  networkError,
  upstreamError,
  timeoutError,
} from "../domain/errors.js";
import { basicAuthHeader, type OtmCredentials } from "./auth.js";
import { buildSearchUrl, parseSavedQueryResponse, type OtmEndpoint } from "./mapper.js";

export interface OtmSavedQueryConfig extends OtmEndpoint, OtmCredentials {
  timeoutMs?: number;
}

export class OtmSavedQueryClient implements SavedQueryClient {
  constructor(
    private readonly config: OtmSavedQueryConfig,
    private readonly http: IHttpClient
  ) {}

  async execute(template: QueryTemplate, term: string, options?: ExecuteOptions): Promise<RawResult> {
    const query = template.queryName;
    try {
      const res = await this.http.send({
        method: "GET",
        url: buildSearchUrl(this.config, query, term),
        headers: { Authorization: basicAuthHeader(this.config) },
        timeoutMs: this.config.timeoutMs ?? 30_000,
        signal: options?.signal,
      });

      if (res.status === 401 || res.status === 403) {
        return {
          ok: false,
          error: authError(`OTM rejected credentials with ${res.status}`, res.status, query),
        };
      }
      if (res.status >= 400) {
        return { ok: false, error: upstreamError(res.status, res.body, query) };
      }

      return { ok: true, value: parseSavedQueryResponse(res.body, query) };
    } catch (err) {
      if (isLookupError(err)) {
        return { ok: false, error: err };
      }
      if (isHttpTimeout(err)) {
        return { ok: false, error: timeoutError(`OTM saved query ${query}`, query) };
      }
      if (isHttpAbort(err)) {
        return { ok: false, error: cancelledError(`OTM saved query ${query}`, query) };
      }
      return {
        ok: false,
        error: networkError(
          err instanceof Error ? err.message : "Unknown error during saved query",
          err,
          query
        ),
      };
    }
  }
}
