/**
 * Configuration loaded from environment variables.
 * Credentials and environment-specific values live here, never in lookup logic.
 */

import { z } from "zod";

const configSchema = z.object({
  // OTM REST API (required for live calls)
  OTM_BASE_URL: z
    .string({ required_error: "OTM_BASE_URL is required" })
    .url()
    .transform((url) => url.replace(/\/+$/, "")),
  OTM_USERNAME: z.string({ required_error: "OTM_USERNAME is required" }).min(1, "OTM_USERNAME is required"),
  OTM_PASSWORD: z.string({ required_error: "OTM_PASSWORD is required" }).min(1, "OTM_PASSWORD is required"),
  OTM_DOMAIN: z.string().min(1).default("KRAFT"),
  OTM_SUBDOMAIN: z.string().min(1).default("KFNA"),

  // Timeouts
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HEALTH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(45_000),

  // Server
  PORT: z.coerce.number().int().positive().default(8000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  STATIC_DIR: z.string().default("static"),
  CORS_ORIGIN: z.string().default("*"),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Load and validate config from process.env.
 * Throws ZodError listing every missing or invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    OTM_BASE_URL: env.OTM_BASE_URL,
    OTM_USERNAME: env.OTM_USERNAME,
    OTM_PASSWORD: env.OTM_PASSWORD,
    OTM_DOMAIN: env.OTM_DOMAIN,
    OTM_SUBDOMAIN: env.OTM_SUBDOMAIN,
    HTTP_TIMEOUT_MS: env.HTTP_TIMEOUT_MS,
    HEALTH_TIMEOUT_MS: env.HEALTH_TIMEOUT_MS,
    LOOKUP_TIMEOUT_MS: env.LOOKUP_TIMEOUT_MS,
    PORT: env.PORT,
    NODE_ENV: env.NODE_ENV,
    LOG_LEVEL: env.LOG_LEVEL,
    STATIC_DIR: env.STATIC_DIR,
    CORS_ORIGIN: env.CORS_ORIGIN,
  };
  return configSchema.parse(raw);
}

export function hasOtmCredentials(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.OTM_BASE_URL && env.OTM_USERNAME && env.OTM_PASSWORD);
}
