import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  NewsProviderPort,
  NewsSearchRequest,
  NormalizedNewsItem,
} from "../../../core/ports/inboundPorts";
import { HttpJsonClient, type HttpClientError } from "../../http/httpJsonClient";

const finnhubNewsItemSchema = z.object({
  category: z.string().optional(),
  datetime: z.number().optional(),
  headline: z.string().optional(),
  id: z.number().optional(),
  image: z.string().optional(),
  related: z.string().optional(),
  source: z.string().optional(),
  summary: z.string().optional(),
  url: z.string().optional(),
});

type FinnhubNewsItem = z.infer<typeof finnhubNewsItemSchema>;

/** Finnhub takes `YYYY-MM-DD` bounds in UTC. */
const toIsoDate = (value: Date): string => value.toISOString().slice(0, 10);

/**
 * Translates Finnhub company-news payloads into the app's normalized news contract.
 * Used for market context around an issuer; it never feeds the document analysis.
 */
export class FinnhubNewsProvider implements NewsProviderPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "FINNHUB_API_KEY is required when NEWS_PROVIDER is set to finnhub.",
      );
    }
  }

  async fetchArticles(
    request: NewsSearchRequest,
  ): Promise<Result<NormalizedNewsItem[], AppBoundaryError>> {
    const symbol = request.symbol.toUpperCase();
    const url = new URL("/api/v1/company-news", this.baseUrl);
    url.searchParams.set("symbol", symbol);
    url.searchParams.set("from", toIsoDate(request.from));
    url.searchParams.set("to", toIsoDate(request.to));
    url.searchParams.set("token", this.apiKey);

    const payloadResult = await this.httpClient.requestJson({
      url: url.toString(),
      method: "GET",
      timeoutMs: this.timeoutMs,
      retries: 2,
      retryDelayMs: 250,
    });

    if (payloadResult.isErr()) {
      return err(this.fromHttpError(payloadResult.error));
    }

    const payload = payloadResult.value;
    if (!Array.isArray(payload)) {
      return err({
        source: "news",
        code: "malformed_response",
        provider: "finnhub",
        message: "Finnhub news response was not an array.",
        retryable: false,
      });
    }

    return ok(
      payload
        .slice(0, request.limit)
        .map((raw, index) => {
          const parsed = finnhubNewsItemSchema.safeParse(raw);
          return parsed.success ? this.toNormalizedItem(symbol, parsed.data, index) : null;
        })
        .filter((item): item is NormalizedNewsItem => item !== null),
    );
  }

  private fromHttpError(failure: HttpClientError): AppBoundaryError {
    return {
      source: "news",
      code: this.mapHttpCode(failure),
      provider: "finnhub",
      message: failure.message,
      retryable: failure.retryable,
      httpStatus: failure.httpStatus,
      cause: failure.cause,
    };
  }

  private mapHttpCode(failure: HttpClientError): AppBoundaryError["code"] {
    if (failure.httpStatus === 429) {
      return "rate_limited";
    }

    if (failure.httpStatus === 401 || failure.httpStatus === 403) {
      return "auth_invalid";
    }

    if (failure.code === "timeout") {
      return "timeout";
    }

    if (failure.code === "invalid_json") {
      return "invalid_json";
    }

    if (failure.code === "transport_error") {
      return "transport_error";
    }

    return "provider_error";
  }

  /**
   * Produces stable provider identities so repeat polls yield the same item ids.
   */
  private toNormalizedItem(
    symbol: string,
    item: FinnhubNewsItem,
    index: number,
  ): NormalizedNewsItem | null {
    const title = item.headline?.trim();
    if (!title) {
      return null;
    }

    const providerItemId =
      item.id === undefined
        ? `${symbol}-${item.datetime ?? "na"}-${index}`
        : String(item.id);

    const relatedSymbols = item.related
      ? item.related
          .split(",")
          .map((value) => value.trim().toUpperCase())
          .filter(Boolean)
      : [];
    if (!relatedSymbols.includes(symbol)) {
      relatedSymbols.push(symbol);
    }

    return {
      id: `finnhub-${providerItemId}`,
      provider: "finnhub",
      providerItemId,
      title,
      summary: item.summary?.trim() || undefined,
      url: item.url ?? "",
      imageUrl: item.image || undefined,
      source: item.source || undefined,
      publishedAt:
        item.datetime === undefined ? new Date(0) : new Date(item.datetime * 1000),
      symbols: relatedSymbols,
      topics: item.category ? [item.category] : ["market-news"],
    };
  }
}
