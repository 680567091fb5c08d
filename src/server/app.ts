/**
 * Express application factory.
 *
 * Middleware order: cors, request logging, routes, then the error handler,
 * which must stay last. A new app per call keeps tests isolated.
 */

import cors from "cors";
import express from "express";
import { pinoHttp } from "pino-http";
import type { Logger } from "../logger.js";
import type { HealthCheck } from "../otm/health.js";
import type { ShipmentLookupService } from "../service/lookup-service.js";
import { errorHandler } from "./middleware/error-handler.js";
import { healthRoutes } from "./routes/health-routes.js";
import { searchRoutes } from "./routes/search-routes.js";
import { staticRoutes } from "./routes/static-routes.js";

export interface AppDependencies {
  lookup: ShipmentLookupService;
  health: HealthCheck;
  logger: Logger;
  staticDir?: string;
  corsOrigin?: string;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.use(cors({ origin: deps.corsOrigin ?? "*" }));
  app.use(pinoHttp({ logger: deps.logger }));

  app.use("/api", searchRoutes(deps.lookup));
  app.use("/api", healthRoutes(deps.health));
  app.use(staticRoutes(deps.staticDir ?? "static"));

  app.use(errorHandler(deps.logger));

  return app;
}
