import type { Result } from "neverthrow";
import type { AnalysisFailure, AppBoundaryError } from "../entities/appError";
import type { Page } from "../entities/document";

/**
 * An opened PDF whose pages are read one at a time.
 */
export interface PdfPageSource {
  readonly pageCount: number;
  readPage(pageNumber: number): Promise<Page>;
  close(): Promise<void>;
}

export interface PdfTextLayerPort {
  open(content: Uint8Array): Promise<Result<PdfPageSource, AnalysisFailure>>;
}

export type NewsSearchRequest = {
  symbol: string;
  from: Date;
  to: Date;
  limit: number;
};

export type NormalizedNewsItem = {
  id: string;
  provider: string;
  providerItemId: string;
  title: string;
  summary?: string;
  url: string;
  imageUrl?: string;
  source?: string;
  publishedAt: Date;
  symbols: string[];
  topics: string[];
};

export interface NewsProviderPort {
  fetchArticles(
    request: NewsSearchRequest,
  ): Promise<Result<NormalizedNewsItem[], AppBoundaryError>>;
}
