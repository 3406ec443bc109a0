import { describe, expect, it } from "vitest";
import { FakeTextLayer, PDF_BYTES } from "../../__tests__/fixtures/fakeTextLayer";
import { textPage } from "../../__tests__/fixtures/pageFixtures";
import {
  contentsPage,
  coverPage,
  mdaPages,
  mdaSentences,
  prospectusPages,
  riskPage,
} from "../../__tests__/fixtures/prospectusFixture";
import type { Page } from "../../core/entities/document";
import type { ClockPort } from "../../core/ports/outboundPorts";
import {
  InMemoryAnalysisRepository,
  InMemoryDocumentRepository,
} from "../../infra/storage/inMemoryRepositories";
import { defaultAnalysisConfig } from "../pipeline/analysisConfig";
import { InsightService } from "./insightService";

const clock: ClockPort = { now: () => new Date("2026-03-01T00:00:00.000Z") };

const setup = async (pages: Page[], content: Uint8Array = PDF_BYTES) => {
  const documents = new InMemoryDocumentRepository();
  const analyses = new InMemoryAnalysisRepository();
  const textLayer = new FakeTextLayer(pages);
  await documents.save({
    fileId: "file-1",
    fileName: "3f2b8c1e-9a7d-4c2e-8f1a-0b6d5e4c3a21_acme-chemicals_rhp.pdf",
    content,
    pageCount: pages.length,
    byteSize: content.byteLength,
    createdAt: clock.now(),
  });
  const service = new InsightService(
    documents,
    textLayer,
    clock,
    defaultAnalysisConfig,
    analyses,
  );

  return { documents, analyses, textLayer, service };
};

const nextTick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("InsightService.analyze", () => {
  it("assembles KPIs and the MDA summary from one document", async () => {
    const { service, textLayer } = await setup(prospectusPages);

    const result = (await service.analyze("file-1"))._unsafeUnwrap();

    expect(result.companyName).toBe("ACME CHEMICALS LIMITED");
    expect(result.pageCount).toBe(7);
    expect(result.toc).toEqual({
      strategy: "structured",
      entryCount: 3,
      mdaTitle: "Management's Discussion and Analysis",
    });

    if (result.financials.status !== "available") {
      throw new Error("expected financials");
    }
    const { kpis, warnings, unitScale } = result.financials.value;
    expect(kpis.revenue?.value).toBe(1200);
    expect(kpis.revenue_growth_pct?.value).toBe(20);
    expect(kpis.net_profit_growth_pct?.value).toBe(25);
    expect(kpis.debt_to_equity?.value).toBe(1.5);
    expect(kpis.total_assets).toEqual({
      name: "total_assets",
      value: 5000,
      unit: "currency",
      period: "FY2024",
    });
    expect(warnings).toEqual([]);
    expect(unitScale).toEqual({ unit: "units", multiplier: 1 });

    if (result.summary.status !== "available") {
      throw new Error("expected summary");
    }
    expect(result.summary.value.startPage).toBe(4);
    expect(result.summary.value.endPage).toBe(5);
    expect(result.summary.value.sentenceCount).toBe(4);
    expect(result.summary.value.summary).toBe(
      `MANAGEMENT'S DISCUSSION AND ANALYSIS ${mdaSentences.join(" ")}`,
    );
    expect(textLayer.closes).toBe(1);
  });

  it("runs one computation for concurrent callers and caches the result", async () => {
    const { service, textLayer, analyses } = await setup(prospectusPages);

    const [first, second] = await Promise.all([
      service.analyze("file-1"),
      service.analyze("file-1"),
    ]);
    const third = await service.analyze("file-1");

    expect(first._unsafeUnwrap()).toBe(second._unsafeUnwrap());
    expect(third._unsafeUnwrap()).toBe(first._unsafeUnwrap());
    expect(textLayer.opens).toBe(1);
    expect(await analyses.findByFileId("file-1")).toBe(first._unsafeUnwrap());
  });

  it("serves a persisted analysis without reading the document", async () => {
    const first = await setup(prospectusPages);
    const stored = (await first.service.analyze("file-1"))._unsafeUnwrap();

    const textLayer = new FakeTextLayer(prospectusPages);
    const restarted = new InsightService(
      first.documents,
      textLayer,
      clock,
      defaultAnalysisConfig,
      first.analyses,
    );

    expect((await restarted.analyze("file-1"))._unsafeUnwrap()).toBe(stored);
    expect(textLayer.opens).toBe(0);
  });

  it("reports missing financial data while still summarizing", async () => {
    const { service } = await setup([
      coverPage,
      contentsPage,
      riskPage,
      ...mdaPages,
      textPage(6, "FINANCIAL STATEMENTS\nThe restated statements are available for inspection."),
      textPage(7, "DECLARATION\nAll statements made in this document are true and correct."),
    ]);

    const result = (await service.analyze("file-1"))._unsafeUnwrap();

    expect(result.financials).toEqual({
      status: "unavailable",
      code: "no_financial_data",
      reason: "No recognizable financial statement line items were found",
    });
    expect(result.summary.status).toBe("available");
  });

  it("falls back to the file name and reports a missing section", async () => {
    const { service } = await setup([
      textPage(1, "RED HERRING PROSPECTUS\nThis page intentionally carries no issuer name."),
      textPage(2, "General information about the offer and its objects."),
    ]);

    const result = (await service.analyze("file-1"))._unsafeUnwrap();

    expect(result.companyName).toBe("ACME CHEMICALS");
    expect(result.toc).toEqual({ strategy: "heuristic_heading_scan", entryCount: 0 });
    expect(result.summary).toEqual({
      status: "unavailable",
      code: "section_not_found",
      reason: "No management discussion heading was found",
    });
  });

  it("fails for unknown ids and unreadable content without caching", async () => {
    const { service, documents } = await setup(
      prospectusPages,
      new TextEncoder().encode("not a pdf"),
    );

    expect((await service.analyze("missing"))._unsafeUnwrapErr().code).toBe(
      "document_not_found",
    );
    expect((await service.analyze("file-1"))._unsafeUnwrapErr().code).toBe(
      "unreadable_pdf",
    );

    await documents.delete("file-1");
    await documents.save({
      fileId: "file-1",
      fileName: "acme.pdf",
      content: PDF_BYTES,
      pageCount: 7,
      byteSize: PDF_BYTES.byteLength,
      createdAt: clock.now(),
    });
    expect((await service.analyze("file-1")).isOk()).toBe(true);
  });
});

describe("InsightService cancellation", () => {
  it("releases only the caller whose signal aborts", async () => {
    const { service, textLayer } = await setup(prospectusPages);
    let release = () => {};
    textLayer.gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const controller = new AbortController();
    const cancelled = service.analyze("file-1", controller.signal);
    const patient = service.analyze("file-1");
    await nextTick();

    controller.abort();
    const cancelledResult = await cancelled;
    expect(cancelledResult._unsafeUnwrapErr().code).toBe("cancelled");

    release();
    expect((await patient).isOk()).toBe(true);
    expect(textLayer.opens).toBe(1);
  });

  it("aborts the shared computation once every caller has left", async () => {
    const { service, textLayer } = await setup(prospectusPages);
    let release = () => {};
    textLayer.gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const controller = new AbortController();
    const pending = service.analyze("file-1", controller.signal);
    await nextTick();
    controller.abort();

    expect((await pending)._unsafeUnwrapErr()).toEqual({
      code: "cancelled",
      stage: "text_layer",
      message: "The analysis was cancelled by the caller",
    });

    release();
    expect((await service.analyze("file-1")).isOk()).toBe(true);
    expect(textLayer.opens).toBe(2);
  });

  it("rejects a caller whose signal is already aborted", async () => {
    const { service, textLayer } = await setup(prospectusPages);
    const controller = new AbortController();
    controller.abort();

    expect((await service.analyze("file-1", controller.signal))._unsafeUnwrapErr().code).toBe(
      "cancelled",
    );
    expect(textLayer.opens).toBe(0);
  });
});

describe("InsightService.getSummary", () => {
  it("returns the summary result", async () => {
    const { service } = await setup(prospectusPages);

    const summary = (await service.getSummary("file-1"))._unsafeUnwrap();

    expect(summary.rawText).toBe(
      ["MANAGEMENT'S DISCUSSION AND ANALYSIS", ...mdaSentences].join("\n"),
    );
    expect(summary.selectedSentences.map((sentence) => sentence.index)).toEqual([0, 1, 2, 3]);
  });

  it("returns the branch failure when no section was found", async () => {
    const { service } = await setup([textPage(1, "Nothing to see here at all.")]);

    expect((await service.getSummary("file-1"))._unsafeUnwrapErr()).toEqual({
      code: "section_not_found",
      stage: "toc",
      message: "No management discussion heading was found",
    });
  });
});

describe("InsightService.getDocumentPages", () => {
  it("reads every page through the text layer", async () => {
    const { service, textLayer } = await setup(prospectusPages);

    const pages = (await service.getDocumentPages("file-1"))._unsafeUnwrap();

    expect(pages.map((page) => page.pageNumber)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(pages[0]?.text).toBe("ACME CHEMICALS LIMITED\nRED HERRING PROSPECTUS");
    expect(textLayer.closes).toBe(1);
  });
});
