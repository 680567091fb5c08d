/**
 * Unit tests: FetchHttpClient against a stubbed global fetch.
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import { FetchHttpClient, HttpError } from "./client.js";

/** fetch stand-in that never answers and rejects like fetch does when its signal aborts */
function hangingFetch() {
  return vi.fn(
    (_url: string | URL | Request, init?: RequestInit) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => {
          reject(Object.assign(new Error("This operation was aborted"), { name: "AbortError" }));
        });
      })
  );
}

describe("FetchHttpClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  it("returns status, headers and body", async () => {
    const fetchMock = vi.fn(async () =>
      new Response('{"items":[]}', { status: 200, headers: { "x-request-id": "r-1" } })
    );
    vi.stubGlobal("fetch", fetchMock);

    const res = await new FetchHttpClient().send({
      method: "GET",
      url: "https://otm.example.test/x",
      headers: { Authorization: "Basic dTpw" },
    });

    expect(res.status).toBe(200);
    expect(res.body).toBe('{"items":[]}');
    expect(res.headers["x-request-id"]).toBe("r-1");
    expect(fetchMock).toHaveBeenCalledWith(
      "https://otm.example.test/x",
      expect.objectContaining({
        method: "GET",
        headers: { Accept: "application/json", Authorization: "Basic dTpw" },
      })
    );
  });

  it("throws ETIMEDOUT when the timeout elapses", async () => {
    vi.useFakeTimers();
    vi.stubGlobal("fetch", hangingFetch());

    const pending = new FetchHttpClient().send({ method: "GET", url: "https://otm.example.test/slow", timeoutMs: 100 });
    const assertion = expect(pending).rejects.toMatchObject({ name: "HttpError", code: "ETIMEDOUT" });
    await vi.advanceTimersByTimeAsync(100);
    await assertion;
  });

  it("throws ABORT_ERR when the caller's signal fires", async () => {
    vi.stubGlobal("fetch", hangingFetch());
    const controller = new AbortController();

    const pending = new FetchHttpClient().send({
      method: "GET",
      url: "https://otm.example.test/slow",
      signal: controller.signal,
    });
    controller.abort();

    const err = await pending.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ code: "ABORT_ERR" });
  });

  it("does not call fetch when the signal is already aborted", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const controller = new AbortController();
    controller.abort();

    await expect(
      new FetchHttpClient().send({ method: "GET", url: "https://otm.example.test/x", signal: controller.signal })
    ).rejects.toMatchObject({ code: "ABORT_ERR" });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
