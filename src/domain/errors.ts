/**
 * Structured errors for the lookup layer.
 * Per-query failures travel inside results; request-level failures are thrown.
 */

export type LookupErrorCode =
  | "VALIDATION_ERROR"
  | "PARTIAL_UPSTREAM_FAILURE"
  | "UPSTREAM_UNAVAILABLE"
  | "AUTH_FAILED"
  | "UPSTREAM_ERROR"
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "CANCELLED"
  | "MALFORMED_RESPONSE";

export interface LookupErrorDetails {
  code: LookupErrorCode;
  message: string;
  /** HTTP status returned by OTM, when there was one */
  httpStatus?: number;
  /** Saved query the failure belongs to */
  query?: string;
  /** Per-query failures folded into an aggregate error */
  failures?: LookupError[];
  cause?: unknown;
}

export type SerializedLookupError = Omit<LookupErrorDetails, "cause" | "failures"> & {
  failures?: SerializedLookupError[];
};

export class LookupError extends Error {
  readonly details: LookupErrorDetails;

  constructor(details: LookupErrorDetails) {
    super(details.message);
    this.name = "LookupError";
    this.details = details;
    Object.setPrototypeOf(this, LookupError.prototype);
  }

  get code(): LookupErrorCode {
    return this.details.code;
  }

  get httpStatus(): number | undefined {
    return this.details.httpStatus;
  }

  /** Serialize for API responses or logging */
  toJSON(): SerializedLookupError {
    const { cause: _cause, failures, ...rest } = this.details;
    return failures ? { ...rest, failures: failures.map((f) => f.toJSON()) } : rest;
  }
}

export function isLookupError(e: unknown): e is LookupError {
  return e instanceof LookupError;
}

/** Input validation, raised before any call to OTM */
export function validationError(message: string, cause?: unknown): LookupError {
  return new LookupError({ code: "VALIDATION_ERROR", message, cause });
}

/** Exactly one of the two saved queries failed; logged, not thrown */
export function partialUpstreamFailure(failure: LookupError): LookupError {
  return new LookupError({
    code: "PARTIAL_UPSTREAM_FAILURE",
    message: `One lookup query failed: ${failure.message}`,
    query: failure.details.query,
    failures: [failure],
  });
}

export function upstreamUnavailableError(failures: LookupError[]): LookupError {
  return new LookupError({
    code: "UPSTREAM_UNAVAILABLE",
    message: `All lookup queries failed: ${failures.map((f) => f.message).join("; ")}`,
    failures,
  });
}

export function authError(message: string, httpStatus?: number, query?: string): LookupError {
  return new LookupError({ code: "AUTH_FAILED", message, httpStatus, query });
}

/** Non-2xx answer from OTM other than an auth failure */
export function upstreamError(status: number, body: string, query?: string): LookupError {
  return new LookupError({
    code: "UPSTREAM_ERROR",
    message: `OTM returned ${status}: ${body.slice(0, 200)}`,
    httpStatus: status,
    query,
  });
}

export function networkError(message: string, cause?: unknown, query?: string): LookupError {
  return new LookupError({ code: "NETWORK_ERROR", message, cause, query });
}

export function timeoutError(operation: string, query?: string): LookupError {
  return new LookupError({
    code: "TIMEOUT",
    message: `Request timed out: ${operation}`,
    query,
  });
}

export function cancelledError(operation: string, query?: string): LookupError {
  return new LookupError({
    code: "CANCELLED",
    message: `Request cancelled: ${operation}`,
    query,
  });
}

export function malformedResponseError(
  message: string,
  cause?: unknown,
  query?: string
): LookupError {
  return new LookupError({ code: "MALFORMED_RESPONSE", message, cause, query });
}
