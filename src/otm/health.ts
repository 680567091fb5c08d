/**
 * Reachability probe against the OTM REST API.
 * Any HTTP answer counts as reachable; the status is reported as-is.
 */

import type { IHttpClient } from "../http/client.js";
import { basicAuthHeader, type OtmCredentials } from "./auth.js";
import { buildHealthUrl } from "./mapper.js";

export type HealthReport =
  | { status: "ok"; otmHttp: number }
  | { status: "error"; detail: string };

export interface HealthCheck {
  check(): Promise<HealthReport>;
}

export interface OtmHealthConfig extends OtmCredentials {
  baseUrl: string;
  timeoutMs?: number;
}

export class OtmHealthCheck implements HealthCheck {
  constructor(
    private readonly config: OtmHealthConfig,
    private readonly http: IHttpClient
  ) {}

  async check(): Promise<HealthReport> {
    try {
      const res = await this.http.send({
        method: "GET",
        url: buildHealthUrl(this.config.baseUrl),
        headers: { Authorization: basicAuthHeader(this.config) },
        timeoutMs: this.config.timeoutMs ?? 10_000,
      });
      return { status: "ok", otmHttp: res.status };
    } catch (err) {
      return { status: "error", detail: err instanceof Error ? err.message : String(err) };
    }
  }
}
