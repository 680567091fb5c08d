/**
 * GET /api/health: probes OTM reachability. Always 200; the body says whether OTM answered.
 */

import { Router } from "express";
import type { HealthCheck } from "../../otm/health.js";

export function healthRoutes(health: HealthCheck): Router {
  const router = Router();

  router.get("/health", async (_req, res) => {
    res.status(200).json(await health.check());
  });

  return router;
}
