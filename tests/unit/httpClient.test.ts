/**
 * Unit tests for the fetch-based JSON client
 *
 * fetch is stubbed; nothing leaves the process
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { HttpError, httpRequest } from "@/clients/http";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("httpRequest", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should send JSON and parse the reply", async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse({ ok: true }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const result = await httpRequest<{ ok: boolean }>({
      method: "POST",
      url: "https://llm.test/v1/embeddings",
      headers: { Authorization: "Bearer test-secret" },
      json: { input: ["a"] },
    });

    expect(result).toEqual({ ok: true });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://llm.test/v1/embeddings");
    expect(init.body).toBe('{"input":["a"]}');
    expect(init.headers).toEqual({
      "Content-Type": "application/json",
      Accept: "application/json",
      Authorization: "Bearer test-secret",
    });
  });

  it("should raise HttpError with a body snippet on non-2xx", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ error: "bad key" }, 401)));

    const error = await httpRequest({ method: "GET", url: "https://llm.test/v1/models" }).catch(
      (err: unknown) => err,
    );
    expect(error).toBeInstanceOf(HttpError);
    expect(error instanceof HttpError && error.status).toBe(401);
    expect(error instanceof HttpError && error.bodySnippet).toBe('{"error":"bad key"}');
  });

  it("should not retry by default", async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}, 503));
    vi.stubGlobal("fetch", fetchMock);

    await expect(httpRequest({ method: "GET", url: "https://llm.test/x" })).rejects.toThrow(
      HttpError,
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("should retry retryable statuses when asked", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({}, 503))
      .mockResolvedValueOnce(jsonResponse({ ok: true }));
    vi.stubGlobal("fetch", fetchMock);

    const result = await httpRequest({
      method: "GET",
      url: "https://llm.test/x",
      retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 2 },
    });

    expect(result).toEqual({ ok: true });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
