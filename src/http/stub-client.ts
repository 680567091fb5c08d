/**
 * Stub HTTP client for tests: record requests and return configured responses.
 */

import { HttpError, type HttpRequest, type HttpResponse, type IHttpClient } from "./client.js";

export type StubResponse = HttpResponse | ((request: HttpRequest) => Promise<HttpResponse>);

/**
 * Stub that returns queued responses in request order, falling back to a
 * sticky default once the queue is drained.
 * Function responses receive the request, so they can route on the URL.
 */
export class StubHttpClient implements IHttpClient {
  private responses: StubResponse[] = [];
  private fallback: StubResponse | undefined;
  private recordedRequests: HttpRequest[] = [];

  /** Set one response to return for every request */
  setResponse(res: StubResponse): void {
    this.responses = [];
    this.fallback = res;
  }

  /** Set a sequence of responses (one per request) */
  setResponses(res: StubResponse[]): void {
    this.responses = [...res];
    this.fallback = undefined;
  }

  /** Append a response to the queue */
  addResponse(res: StubResponse): void {
    this.responses.push(res);
  }

  getRecordedRequests(): HttpRequest[] {
    return [...this.recordedRequests];
  }

  /** Clear recorded requests and response queue */
  reset(): void {
    this.recordedRequests = [];
    this.responses = [];
    this.fallback = undefined;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.recordedRequests.push(request);
    const next = this.responses.shift() ?? this.fallback;
    if (next === undefined) {
      return {
        status: 500,
        headers: {},
        body: JSON.stringify({ error: "No stub response configured" }),
      };
    }
    if (typeof next === "function") {
      return next(request);
    }
    return next;
  }
}

/** JSON response helper */
export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return {
    status,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  };
}

/**
 * Response that arrives after `ms`, or rejects with ABORT_ERR as soon as the
 * request's signal fires. Works with real and fake timers.
 */
export function delayed(ms: number, res: HttpResponse): (request: HttpRequest) => Promise<HttpResponse> {
  return (request) =>
    new Promise<HttpResponse>((resolve, reject) => {
      const abort = () => {
        clearTimeout(timer);
        reject(new HttpError(`Request aborted: ${request.url}`, request, "ABORT_ERR"));
      };
      const timer = setTimeout(() => {
        request.signal?.removeEventListener("abort", abort);
        resolve(res);
      }, ms);
      if (request.signal?.aborted) {
        abort();
        return;
      }
      request.signal?.addEventListener("abort", abort, { once: true });
    });
}
