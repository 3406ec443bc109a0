import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type {
  NewsProviderPort,
  NewsSearchRequest,
  NormalizedNewsItem,
} from "../../../core/ports/inboundPorts";

const HOUR_MS = 60 * 60 * 1000;

/**
 * Supplies repeatable headlines so the news command works without vendor credentials.
 */
export class MockNewsProvider implements NewsProviderPort {
  async fetchArticles(
    request: NewsSearchRequest,
  ): Promise<Result<NormalizedNewsItem[], AppBoundaryError>> {
    const baseDate = request.to;
    const symbol = request.symbol.toUpperCase();

    return ok(
      Array.from({ length: Math.min(5, request.limit) }, (_, index) => ({
        id: `mock-${symbol}-${index}`,
        provider: "mock-news-wire",
        providerItemId: `${symbol}-${baseDate.getTime()}-${index}`,
        title: `${symbol} mock headline ${index + 1}`,
        summary: `${symbol} update on issue subscription, anchor investors and listing date`,
        url: `https://example.local/news/${symbol}/${index}`,
        source: "Mock Wire",
        publishedAt: new Date(baseDate.getTime() - index * HOUR_MS),
        symbols: [symbol],
        topics: ["ipo"],
      })),
    );
  }
}
