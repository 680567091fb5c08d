#!/usr/bin/env node
/**
 * CLI demo: look up a shipment or order from the command line.
 * Run: npm run demo -- <term> [shipment|order]
 * With OTM_BASE_URL, OTM_USERNAME and OTM_PASSWORD in .env: live API. Without: stub mode.
 */

import "dotenv/config";

import { hasOtmCredentials, loadConfig } from "../config.js";
import { FetchHttpClient, type IHttpClient } from "../http/client.js";
import { jsonResponse, StubHttpClient } from "../http/stub-client.js";
import { createLogger } from "../logger.js";
import { createServices, type LookupSettings } from "../wiring.js";

const STUB_SETTINGS: LookupSettings = {
  OTM_BASE_URL: "https://otm.example.test",
  OTM_USERNAME: "stub",
  OTM_PASSWORD: "stub",
  OTM_DOMAIN: "DEMO",
  OTM_SUBDOMAIN: "DEMO",
  HTTP_TIMEOUT_MS: 5_000,
  HEALTH_TIMEOUT_MS: 5_000,
  LOOKUP_TIMEOUT_MS: 10_000,
};

function stubShipment(xid: string, carrier: string) {
  return {
    shipmentXid: xid,
    shipmentName: `DEMO ${xid}`,
    transportModeGid: "TL",
    servprov: { links: [{ rel: "canonical", href: `https://otm.example.test/servprovs/DEMO.${carrier}` }] },
    totalWeight: { value: 1200, unit: "LB" },
    statuses: {
      items: [{ statusTypeGid: "DEMO.SENT_TO_USB", statusValueGid: "DEMO.SENT_TO_USB - YES" }],
    },
  };
}

/** Direct and indirect queries overlap on one shipment so the merge is visible */
function stubClient(): IHttpClient {
  const stub = new StubHttpClient();
  stub.setResponse(async (request) =>
    request.url.includes("_INDIRECT")
      ? jsonResponse({ items: [stubShipment("SHP-002", "ACME"), stubShipment("SHP-003", "ROADRUNNER")] })
      : jsonResponse({ items: [stubShipment("SHP-001", "ACME"), stubShipment("SHP-002", "ACME")] })
  );
  return stub;
}

async function main() {
  const [term = "DEMO-REF-1", kind = "order"] = process.argv.slice(2);
  const live = hasOtmCredentials(process.env);
  const config = live ? loadConfig(process.env) : undefined;
  const logger = createLogger({ level: config?.LOG_LEVEL ?? "warn", pretty: true });
  const services = config
    ? createServices(config, new FetchHttpClient(), logger)
    : createServices(STUB_SETTINGS, stubClient(), logger);

  console.log(
    live
      ? `Looking up ${kind} "${term}" in OTM (live)...\n`
      : `Looking up ${kind} "${term}" (stub mode — set OTM_BASE_URL, OTM_USERNAME and OTM_PASSWORD for live API)...\n`
  );

  const result = await services.lookup.search({ term, kind });
  if (result.ok) {
    console.log("Queries:", JSON.stringify(result.value.queries, null, 2));
    console.log("Items:", JSON.stringify(result.value.items, null, 2));
  } else {
    console.error("Error:", result.error.toJSON());
    process.exitCode = 1;
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
