import { err, ok, type Result } from "neverthrow";
import type {
  AnalysisResult,
  Availability,
  FinancialInsight,
  SummaryResult,
  TocDiagnostics,
} from "../../core/entities/analysis";
import {
  analysisFailure,
  type AnalysisFailure,
  type AnalysisFailureCode,
  type PipelineStage,
} from "../../core/entities/appError";
import type { Page, StoredDocument } from "../../core/entities/document";
import type {
  PdfPageSource,
  PdfTextLayerPort,
} from "../../core/ports/inboundPorts";
import type {
  AnalysisRepositoryPort,
  ClockPort,
  DocumentRepositoryPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type { AnalysisConfig } from "../pipeline/analysisConfig";
import {
  CompanyNameCollector,
  companyNameFromFileName,
} from "../pipeline/companyName";
import { FinancialTableParser } from "../pipeline/financialTableParser";
import { computeKpis } from "../pipeline/kpiEngine";
import { alignSectionRange, extractSection } from "../pipeline/sectionExtractor";
import { TextRankSummarizer } from "../pipeline/textRank";
import {
  HeadingScanner,
  isMdaTitle,
  parseStructuredToc,
  resolveMdaRange,
  selectTocStrategy,
  type TocStrategy,
} from "../pipeline/tocLocator";
import { AnalysisCache } from "./analysisCache";

const branchStages: Partial<Record<AnalysisFailureCode, PipelineStage>> = {
  section_not_found: "toc",
  summary_unavailable: "summary",
  no_financial_data: "financials",
};

const cancelled = (stage: PipelineStage): AnalysisFailure =>
  analysisFailure("cancelled", stage, "The analysis was cancelled by the caller");

const unavailable = <T>(failure: AnalysisFailure): Availability<T> => ({
  status: "unavailable",
  code: failure.code,
  reason: failure.message,
});

const availabilityOf = <T>(result: Result<T, AnalysisFailure>): Availability<T> =>
  result.match<Availability<T>>(
    (value) => ({ status: "available", value }),
    (failure) => unavailable(failure),
  );

type StreamedDocument = {
  tocPages: Page[];
  parser: FinancialTableParser;
  scanner: HeadingScanner;
  names: CompanyNameCollector;
};

/**
 * Assembles the insight for one stored prospectus: KPIs and trends from the statement tables,
 * and an extractive summary of the management discussion section.
 * Results are cached per file id; a readable PDF always yields a best-effort result.
 */
export class InsightService {
  private readonly cache = new AnalysisCache<AnalysisResult>();
  private readonly summarizer: TextRankSummarizer;

  constructor(
    private readonly documents: DocumentRepositoryPort,
    private readonly textLayer: PdfTextLayerPort,
    private readonly clock: ClockPort,
    private readonly config: AnalysisConfig,
    private readonly analyses?: AnalysisRepositoryPort,
  ) {
    this.summarizer = new TextRankSummarizer(config.summary);
  }

  analyze(
    fileId: string,
    signal?: AbortSignal,
  ): Promise<Result<AnalysisResult, AnalysisFailure>> {
    return this.cache.getOrCompute(
      fileId,
      (computationSignal) => this.loadOrRun(fileId, computationSignal),
      signal,
    );
  }

  async getSummary(
    fileId: string,
    signal?: AbortSignal,
  ): Promise<Result<SummaryResult, AnalysisFailure>> {
    const analysis = await this.analyze(fileId, signal);
    if (analysis.isErr()) {
      return err(analysis.error);
    }

    const summary = analysis.value.summary;
    if (summary.status === "available") {
      return ok(summary.value);
    }

    return err(
      analysisFailure(summary.code, branchStages[summary.code] ?? "summary", summary.reason),
    );
  }

  /**
   * Reads the text layer of every page. Pages are not cached.
   */
  async getDocumentPages(
    fileId: string,
    signal?: AbortSignal,
  ): Promise<Result<Page[], AnalysisFailure>> {
    return this.withSource(fileId, async (source) => {
      const pages: Page[] = [];
      for (let pageNumber = 1; pageNumber <= source.pageCount; pageNumber += 1) {
        if (signal?.aborted) {
          return err(cancelled("text_layer"));
        }
        pages.push(await source.readPage(pageNumber));
      }

      return ok(pages);
    });
  }

  /** Forgets the cached analysis of a document, aborting one in flight. */
  forget(fileId: string): void {
    this.cache.invalidate(fileId);
  }

  private async loadOrRun(
    fileId: string,
    signal: AbortSignal,
  ): Promise<Result<AnalysisResult, AnalysisFailure>> {
    const persisted = await this.analyses?.findByFileId(fileId);
    if (persisted) {
      logger.debug({ fileId }, "Loaded persisted analysis");
      return ok(persisted);
    }

    const result = await this.withSource(fileId, (source, document) =>
      this.run(document, source, signal),
    );
    if (result.isOk()) {
      await this.analyses?.save(result.value);
    }

    return result;
  }

  private async withSource<T>(
    fileId: string,
    use: (
      source: PdfPageSource,
      document: StoredDocument,
    ) => Promise<Result<T, AnalysisFailure>>,
  ): Promise<Result<T, AnalysisFailure>> {
    const document = await this.documents.findById(fileId);
    if (!document) {
      return err(
        analysisFailure("document_not_found", "storage", `No document stored under '${fileId}'`),
      );
    }

    const opened = await this.textLayer.open(document.content);
    if (opened.isErr()) {
      return err(opened.error);
    }

    try {
      return await use(opened.value, document);
    } finally {
      await opened.value.close();
    }
  }

  private async run(
    document: StoredDocument,
    source: PdfPageSource,
    signal: AbortSignal,
  ): Promise<Result<AnalysisResult, AnalysisFailure>> {
    const startedAt = this.clock.now().getTime();
    const pageCount = source.pageCount;
    logger.info({ fileId: document.fileId, pageCount }, "Analysis started");

    const streamed = await this.streamPages(source, signal);
    if (streamed.isErr()) {
      return err(streamed.error);
    }

    const { tocPages, parser, scanner, names } = streamed.value;
    const strategy = selectTocStrategy(parseStructuredToc(tocPages, pageCount), scanner);
    logger.debug(
      { fileId: document.fileId, strategy: strategy.kind, entries: strategy.entries.length },
      "Table of contents resolved",
    );

    const summary = await this.summarize(strategy, source, tocPages, signal);
    if (summary.isErr() && summary.error.code === "cancelled") {
      return err(summary.error);
    }

    const financials = parser.finish().map<FinancialInsight>((parsed) => {
      const computed = computeKpis(parsed.statements, this.config.kpiPrecision);
      return {
        kpis: computed.kpis,
        statements: parsed.statements,
        trends: computed.trends,
        unitScale: parsed.unitScale,
        warnings: computed.warnings,
      };
    });

    const result: AnalysisResult = {
      fileId: document.fileId,
      companyName: names.best() ?? companyNameFromFileName(document.fileName),
      pageCount,
      toc: this.diagnosticsOf(strategy),
      financials: availabilityOf(financials),
      summary: availabilityOf(summary),
    };

    for (const [branch, availability] of [
      ["financials", result.financials],
      ["summary", result.summary],
    ] as const) {
      if (availability.status === "unavailable") {
        logger.warn(
          { fileId: document.fileId, branch, code: availability.code },
          availability.reason,
        );
      }
    }

    logger.info(
      {
        fileId: document.fileId,
        pageCount,
        tocStrategy: strategy.kind,
        durationMs: this.clock.now().getTime() - startedAt,
      },
      "Analysis completed",
    );

    return ok(result);
  }

  /**
   * One pass over every page feeds the table parser, the heading scan and the issuer name;
   * only the opening pages are kept for the table of contents.
   */
  private async streamPages(
    source: PdfPageSource,
    signal: AbortSignal,
  ): Promise<Result<StreamedDocument, AnalysisFailure>> {
    const streamed: StreamedDocument = {
      tocPages: [],
      parser: new FinancialTableParser(),
      scanner: new HeadingScanner(),
      names: new CompanyNameCollector(),
    };

    for (let pageNumber = 1; pageNumber <= source.pageCount; pageNumber += 1) {
      if (signal.aborted) {
        return err(cancelled("text_layer"));
      }

      const page = await source.readPage(pageNumber);
      if (pageNumber <= this.config.tocScanPages) {
        streamed.tocPages.push(page);
      }
      streamed.parser.consumePage(page);
      streamed.scanner.consumePage(page);
      streamed.names.consumePage(page);
    }

    return ok(streamed);
  }

  private async summarize(
    strategy: TocStrategy,
    source: PdfPageSource,
    tocPages: Page[],
    signal: AbortSignal,
  ): Promise<Result<SummaryResult, AnalysisFailure>> {
    const location = resolveMdaRange(
      strategy.entries,
      source.pageCount,
      this.config.sectionMaxPages,
    );
    if (location.isErr()) {
      return err(location.error);
    }

    const readPage = (pageNumber: number): Promise<Page> => {
      const kept = tocPages[pageNumber - 1];
      return kept ? Promise.resolve(kept) : source.readPage(pageNumber);
    };

    const range =
      strategy.kind === "structured"
        ? await alignSectionRange(
            location.value.range,
            source.pageCount,
            this.config.pageOffsetSearch,
            readPage,
            signal,
          )
        : location.value.range;

    const sectionPages: Page[] = [];
    for (let pageNumber = range.startPage; pageNumber <= range.endPage; pageNumber += 1) {
      if (signal.aborted) {
        return err(cancelled("section"));
      }
      sectionPages.push(await readPage(pageNumber));
    }

    const section = extractSection(sectionPages, range, location.value.entry.title);
    return this.summarizer.summarize(section.text).map((extract) => ({
      summary: extract.summary,
      startPage: section.startPage,
      endPage: section.endPage,
      rawText: section.text,
      sentenceCount: extract.sentenceCount,
      selectedSentences: extract.selectedSentences,
    }));
  }

  private diagnosticsOf(strategy: TocStrategy): TocDiagnostics {
    const diagnostics: TocDiagnostics = {
      strategy: strategy.kind,
      entryCount: strategy.entries.length,
    };
    const mda = strategy.entries.find((entry) => isMdaTitle(entry.title));
    return mda ? { ...diagnostics, mdaTitle: mda.title } : diagnostics;
  }
}
