/**
 * GET /api/search?q=<term>&type=shipment|order
 *
 * The lookup is aborted when the client goes away before the answer is sent.
 */

import { Router } from "express";
import type { ShipmentLookupService } from "../../service/lookup-service.js";

/** First value of a query-string parameter, if it is a string */
function queryParam(value: unknown): string | undefined {
  if (Array.isArray(value)) return queryParam(value[0]);
  return typeof value === "string" ? value : undefined;
}

export function searchRoutes(lookup: ShipmentLookupService): Router {
  const router = Router();

  router.get("/search", async (req, res) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    const result = await lookup.search(
      {
        term: queryParam(req.query.q) ?? "",
        kind: queryParam(req.query.type) ?? "shipment",
      },
      { signal: controller.signal }
    );
    if (!result.ok) {
      throw result.error;
    }
    res.status(200).json(result.value);
  });

  return router;
}
