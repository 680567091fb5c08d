/**
 * Server entry point: load config, wire services, listen, shut down cleanly on SIGTERM/SIGINT.
 */

import "dotenv/config";

import { ZodError } from "zod";
import { loadConfig, type Config } from "./config.js";
import { FetchHttpClient } from "./http/client.js";
import { createLogger } from "./logger.js";
import { createApp } from "./server/app.js";
import { createServices } from "./wiring.js";

function readConfig(): Config {
  try {
    return loadConfig(process.env);
  } catch (err) {
    if (err instanceof ZodError) {
      console.error("Invalid environment configuration:", err.flatten().fieldErrors);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();
const logger = createLogger({ level: config.LOG_LEVEL, pretty: config.NODE_ENV === "development" });
const services = createServices(config, new FetchHttpClient(), logger);
const app = createApp({
  ...services,
  logger,
  staticDir: config.STATIC_DIR,
  corsOrigin: config.CORS_ORIGIN,
});

const server = app.listen(config.PORT, () => {
  logger.info({ port: config.PORT, otm: config.OTM_BASE_URL }, `Listening on :${config.PORT}`);
});

const shutdown = (signal: string) => {
  logger.info({ signal }, "Graceful shutdown initiated");
  server.close((err) => {
    if (err) {
      logger.error({ err }, "Error while closing server");
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
