/**
 * Global error handler. Must be registered last.
 *
 * LookupErrors are expected failures and map to a status by code; anything
 * else is a bug, logged in full and answered with a bare 500.
 */

import type { ErrorRequestHandler } from "express";
import { isLookupError, type LookupErrorCode } from "../../domain/errors.js";
import type { Logger } from "../../logger.js";

/** Codes a failed lookup can carry; a partial failure is only logged */
export type ThrownLookupErrorCode = Exclude<LookupErrorCode, "PARTIAL_UPSTREAM_FAILURE">;

const STATUS_BY_CODE: Record<ThrownLookupErrorCode, number> = {
  VALIDATION_ERROR: 400,
  UPSTREAM_UNAVAILABLE: 502,
  AUTH_FAILED: 502,
  UPSTREAM_ERROR: 502,
  NETWORK_ERROR: 502,
  MALFORMED_RESPONSE: 502,
  TIMEOUT: 504,
  CANCELLED: 503,
};

export function statusForCode(code: LookupErrorCode): number {
  return code === "PARTIAL_UPSTREAM_FAILURE" ? 500 : STATUS_BY_CODE[code];
}

export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, _req, res, _next) => {
    if (isLookupError(err)) {
      logger.warn({ err: err.toJSON() }, "Lookup failed");
      res.status(statusForCode(err.code)).json({
        status: "error",
        code: err.code,
        message: err.message,
      });
      return;
    }

    logger.error({ err }, "Unhandled error");
    res.status(500).json({
      status: "error",
      message: "Internal server error",
    });
  };
}
