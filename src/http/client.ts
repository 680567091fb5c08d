/**
 * HTTP client abstraction. Allows stubbing in tests without touching OTM logic.
 */

export interface HttpRequest {
  method: "GET" | "POST" | "PUT" | "DELETE";
  url: string;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  /** Aborts the request when the caller gives up on it */
  signal?: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export type HttpErrorCode = "ETIMEDOUT" | "ECONNRESET" | "ENOTFOUND" | "ABORT_ERR";

export class HttpError extends Error {
  readonly request: HttpRequest;
  readonly code?: HttpErrorCode;

  constructor(message: string, request: HttpRequest, code?: HttpErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = "HttpError";
    this.request = request;
    this.code = code;
    Object.setPrototypeOf(this, HttpError.prototype);
  }
}

export function isHttpTimeout(e: unknown): boolean {
  return e instanceof HttpError && e.code === "ETIMEDOUT";
}

export function isHttpAbort(e: unknown): boolean {
  return e instanceof HttpError && e.code === "ABORT_ERR";
}

/**
 * Minimal HTTP client interface. Default implementation uses global fetch.
 * Tests inject a stub that returns controlled responses.
 */
export interface IHttpClient {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Default implementation using fetch with timeout and caller cancellation.
 */
export class FetchHttpClient implements IHttpClient {
  async send(request: HttpRequest): Promise<HttpResponse> {
    if (request.signal?.aborted) {
      throw new HttpError(`Request aborted: ${request.url}`, request, "ABORT_ERR");
    }
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeoutMs ?? 30_000);
    const onAbort = () => controller.abort();
    request.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const res = await fetch(request.url, {
        method: request.method,
        headers: {
          Accept: "application/json",
          ...(request.body !== undefined ? { "Content-Type": "application/json" } : {}),
          ...request.headers,
        },
        body: request.body,
        signal: controller.signal,
      });
      const body = await res.text();
      const headers: Record<string, string> = {};
      res.headers.forEach((v, k) => (headers[k] = v));
      return { status: res.status, headers, body };
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        if (timedOut) {
          throw new HttpError(`Request timed out: ${request.url}`, request, "ETIMEDOUT", err);
        }
        throw new HttpError(`Request aborted: ${request.url}`, request, "ABORT_ERR", err);
      }
      throw err;
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener("abort", onAbort);
    }
  }
}
