import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpJsonClient } from "../../http/httpJsonClient";
import { FinnhubNewsProvider } from "./finnhubNewsProvider";

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  vi.stubGlobal("fetch", handler);
};

afterEach(() => {
  vi.unstubAllGlobals();
});

const newsWindow = {
  from: new Date("2026-01-01T00:00:00.000Z"),
  to: new Date("2026-01-10T00:00:00.000Z"),
};

const provider = () =>
  new FinnhubNewsProvider("https://finnhub.io", "test-key", 5_000, new HttpJsonClient());

describe("FinnhubNewsProvider", () => {
  it("maps provider payloads to normalized items", async () => {
    let requestedUrl = "";
    setFetch(async (input) => {
      requestedUrl = String(input);
      return new Response(
        JSON.stringify([
          {
            id: 9001,
            category: "company",
            datetime: 1_705_000_000,
            headline: "ACME announces capacity expansion",
            related: "ACME,ZEN",
            source: "Newswire",
            summary: "Plant commissioning details",
            url: "https://news.example/acme-1",
          },
        ]),
        { status: 200 },
      );
    });

    const items = await provider().fetchArticles({ symbol: "acme", limit: 10, ...newsWindow });

    expect(requestedUrl).toBe(
      "https://finnhub.io/api/v1/company-news?symbol=ACME&from=2026-01-01&to=2026-01-10&token=test-key",
    );
    expect(items._unsafeUnwrap()).toEqual([
      {
        id: "finnhub-9001",
        provider: "finnhub",
        providerItemId: "9001",
        title: "ACME announces capacity expansion",
        summary: "Plant commissioning details",
        url: "https://news.example/acme-1",
        imageUrl: undefined,
        source: "Newswire",
        publishedAt: new Date(1_705_000_000 * 1000),
        symbols: ["ACME", "ZEN"],
        topics: ["company"],
      },
    ]);
  });

  it("handles missing optional fields with defaults", async () => {
    setFetch(
      async () =>
        new Response(JSON.stringify([{ datetime: 1_705_111_111, headline: "ZEN update" }]), {
          status: 200,
        }),
    );

    const [item] = (
      await provider().fetchArticles({ symbol: "ZEN", limit: 5, ...newsWindow })
    )._unsafeUnwrap();

    expect(item?.providerItemId).toBe("ZEN-1705111111-0");
    expect(item?.summary).toBeUndefined();
    expect(item?.symbols).toEqual(["ZEN"]);
    expect(item?.topics).toEqual(["market-news"]);
    expect(item?.url).toBe("");
  });

  it("enforces the request limit and skips invalid rows", async () => {
    setFetch(
      async () =>
        new Response(
          JSON.stringify([
            { headline: "Valid 1", datetime: 1_700_000_000 },
            { headline: "   ", datetime: 1_700_000_001 },
            { headline: "Valid 2", datetime: "yesterday" },
          ]),
          { status: 200 },
        ),
    );

    const items = await provider().fetchArticles({ symbol: "ACME", limit: 3, ...newsWindow });

    expect(items._unsafeUnwrap().map((item) => item.title)).toEqual(["Valid 1"]);
  });

  it("maps rate-limit responses to rate_limited boundary errors", async () => {
    setFetch(
      async () =>
        new Response("rate limit", { status: 429, headers: { "Retry-After": "0" } }),
    );

    const items = await provider().fetchArticles({ symbol: "ACME", limit: 5, ...newsWindow });

    const failure = items._unsafeUnwrapErr();
    expect(failure.code).toBe("rate_limited");
    expect(failure.httpStatus).toBe(429);
    expect(failure.retryable).toBe(true);
  });

  it("maps auth failures to auth_invalid boundary errors", async () => {
    setFetch(async () => new Response("unauthorized", { status: 401 }));

    const items = await provider().fetchArticles({ symbol: "ACME", limit: 5, ...newsWindow });

    expect(items._unsafeUnwrapErr().code).toBe("auth_invalid");
  });

  it("maps malformed JSON payloads to invalid_json boundary errors", async () => {
    setFetch(async () => new Response("not-json", { status: 200 }));

    const items = await provider().fetchArticles({ symbol: "ACME", limit: 5, ...newsWindow });

    expect(items._unsafeUnwrapErr().code).toBe("invalid_json");
  });

  it("rejects payloads that are not arrays", async () => {
    setFetch(async () => new Response(JSON.stringify({ error: "nope" }), { status: 200 }));

    const items = await provider().fetchArticles({ symbol: "ACME", limit: 5, ...newsWindow });

    expect(items._unsafeUnwrapErr().code).toBe("malformed_response");
  });

  it("throws when api key is missing", () => {
    expect(() => new FinnhubNewsProvider("https://finnhub.io", "")).toThrow(
      "FINNHUB_API_KEY is required",
    );
  });
});
