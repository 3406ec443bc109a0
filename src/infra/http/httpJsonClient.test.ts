import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpJsonClient, parseRetryAfter } from "./httpJsonClient";

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  vi.stubGlobal("fetch", handler);
};

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("HttpJsonClient", () => {
  it("retries retryable failures up to configured attempts", async () => {
    let attempts = 0;

    setFetch(async () => {
      attempts += 1;
      if (attempts < 3) {
        throw new Error("socket reset");
      }

      return new Response(JSON.stringify({ ok: true }), { status: 200 });
    });

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/retry",
      method: "GET",
      timeoutMs: 500,
      retries: 2,
      retryDelayMs: 1,
    });

    expect(result._unsafeUnwrap()).toEqual({ ok: true });
    expect(attempts).toBe(3);
  });

  it("maps aborted requests to timeout errors", async () => {
    setFetch(
      async (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;

          if (!signal) {
            reject(new Error("missing abort signal"));
            return;
          }

          signal.addEventListener("abort", () => {
            reject(new DOMException("Aborted", "AbortError"));
          });
        }),
    );

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/timeout",
      method: "GET",
      timeoutMs: 5,
      retries: 0,
      retryDelayMs: 1,
    });

    const failure = result._unsafeUnwrapErr();
    expect(failure.code).toBe("timeout");
    expect(failure.retryable).toBe(true);
  });

  it("maps non-success statuses with retryability metadata", async () => {
    setFetch(async () => new Response("unavailable", { status: 503 }));

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/status",
      method: "GET",
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    const failure = result._unsafeUnwrapErr();
    expect(failure.code).toBe("non_success_status");
    expect(failure.httpStatus).toBe(503);
    expect(failure.retryable).toBe(true);
  });

  it("maps invalid JSON payloads as non-retryable", async () => {
    setFetch(async () => new Response("not-json", { status: 200 }));

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/json",
      method: "GET",
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    const failure = result._unsafeUnwrapErr();
    expect(failure.code).toBe("invalid_json");
    expect(failure.retryable).toBe(false);
  });

  it("waits for Retry-After instead of the linear backoff", async () => {
    let attempts = 0;
    setFetch(async () => {
      attempts += 1;
      return attempts === 1
        ? new Response("slow down", { status: 429, headers: { "Retry-After": "0" } })
        : new Response(JSON.stringify([1, 2]), { status: 200 });
    });

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/limited",
      method: "GET",
      timeoutMs: 500,
      retries: 1,
      retryDelayMs: 60_000,
    });

    expect(result._unsafeUnwrap()).toEqual([1, 2]);
    expect(attempts).toBe(2);
  });

  it("spaces consecutive requests by the minimum interval", async () => {
    const startedAt: number[] = [];
    setFetch(async () => {
      startedAt.push(Date.now());
      return new Response("{}", { status: 200 });
    });

    const client = new HttpJsonClient({ minIntervalMs: 40 });
    const request = {
      url: "https://example.test/spaced",
      method: "GET",
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    } as const;
    await client.requestJson(request);
    await client.requestJson(request);

    expect(startedAt).toHaveLength(2);
    expect((startedAt[1] ?? 0) - (startedAt[0] ?? 0)).toBeGreaterThanOrEqual(30);
  });
});

describe("parseRetryAfter", () => {
  it("reads delta-seconds and HTTP dates", () => {
    const now = Date.parse("Wed, 21 Oct 2026 07:28:00 GMT");

    expect(parseRetryAfter("2", now)).toBe(2000);
    expect(parseRetryAfter("Wed, 21 Oct 2026 07:28:05 GMT", now)).toBe(5000);
    expect(parseRetryAfter("soon", now)).toBeUndefined();
    expect(parseRetryAfter(null, now)).toBeUndefined();
  });
});
