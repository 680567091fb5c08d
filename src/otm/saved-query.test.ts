/**
 * Integration tests: OTM saved-query flow with stubbed HTTP.
 * Verifies request building, response parsing and failure mapping.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { OtmSavedQueryClient } from "./saved-query.js";
import { buildQueryTemplates } from "./queries.js";
import { HttpError } from "../http/client.js";
import { StubHttpClient, delayed, jsonResponse } from "../http/stub-client.js";

const baseUrl = "https://otm.example.test";
const templates = buildQueryTemplates("SUB");
const orderDirect = templates.order[0];

function shipment(xid: string) {
  return { shipmentXid: xid, shipmentName: `LOAD ${xid}` };
}

describe("OtmSavedQueryClient", () => {
  let http: StubHttpClient;
  let client: OtmSavedQueryClient;

  beforeEach(() => {
    http = new StubHttpClient();
    client = new OtmSavedQueryClient(
      {
        baseUrl,
        domain: "ACME",
        username: "test-user",
        password: "test-secret",
        timeoutMs: 5000,
      },
      http
    );
  });

  it("sends an authenticated GET and returns parsed records", async () => {
    http.setResponse(jsonResponse({ items: [shipment("S1"), shipment("S2")], count: 2, hasMore: false }));
    const result = await client.execute(orderDirect, "PO-1");

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.records.map((r) => r.shipmentXid)).toEqual(["S1", "S2"]);
      expect(result.value.count).toBe(2);
    }
    const requests = http.getRecordedRequests();
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe("GET");
    expect(requests[0].url).toContain("/savedQueries/shipments/ACME/SUB.FP_ORD_DIRECT?");
    expect(requests[0].url).toContain("parameterValue=PO-1");
    expect(requests[0].headers?.Authorization).toBe(
      `Basic ${Buffer.from("test-user:test-secret").toString("base64")}`
    );
    expect(requests[0].timeoutMs).toBe(5000);
  });

  it("passes the caller's signal to the HTTP client", async () => {
    http.setResponse(jsonResponse({ items: [] }));
    const controller = new AbortController();
    await client.execute(orderDirect, "PO-1", { signal: controller.signal });
    expect(http.getRecordedRequests()[0].signal).toBe(controller.signal);
  });

  it("returns AUTH_FAILED on 401", async () => {
    http.setResponse({ status: 401, headers: {}, body: "Unauthorized" });
    const result = await client.execute(orderDirect, "PO-1");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.details).toMatchObject({
        code: "AUTH_FAILED",
        httpStatus: 401,
        query: "SUB.FP_ORD_DIRECT",
      });
    }
  });

  it("returns UPSTREAM_ERROR with a truncated body on 500", async () => {
    http.setResponse({ status: 500, headers: {}, body: "x".repeat(300) });
    const result = await client.execute(orderDirect, "PO-1");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("UPSTREAM_ERROR");
      expect(result.error.httpStatus).toBe(500);
      expect(result.error.message).toBe(`OTM returned 500: ${"x".repeat(200)}`);
    }
  });

  it("returns MALFORMED_RESPONSE on invalid JSON", async () => {
    http.setResponse({ status: 200, headers: {}, body: "<html>maintenance</html>" });
    const result = await client.execute(orderDirect, "PO-1");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("MALFORMED_RESPONSE");
      expect(result.error.details.query).toBe("SUB.FP_ORD_DIRECT");
    }
  });

  it("returns TIMEOUT when the HTTP client times out", async () => {
    http.setResponse(async (request) => {
      throw new HttpError(`Request timed out: ${request.url}`, request, "ETIMEDOUT");
    });
    const result = await client.execute(orderDirect, "PO-1");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("TIMEOUT");
      expect(result.error.message).toBe("Request timed out: OTM saved query SUB.FP_ORD_DIRECT");
    }
  });

  it("returns CANCELLED when the caller aborts", async () => {
    http.setResponse(delayed(1_000, jsonResponse({ items: [] })));
    const controller = new AbortController();
    const pending = client.execute(orderDirect, "PO-1", { signal: controller.signal });
    controller.abort();
    const result = await pending;
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("CANCELLED");
    }
  });

  it("returns NETWORK_ERROR on transport failure", async () => {
    http.setResponse(async () => {
      throw new TypeError("fetch failed");
    });
    const result = await client.execute(orderDirect, "PO-1");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("NETWORK_ERROR");
      expect(result.error.message).toBe("fetch failed");
    }
  });
});
