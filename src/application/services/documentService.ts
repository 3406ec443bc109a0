import { err, ok, type Result } from "neverthrow";
import type { AnalysisFailure } from "../../core/entities/appError";
import type { StoredDocument } from "../../core/entities/document";
import type { PdfTextLayerPort } from "../../core/ports/inboundPorts";
import type {
  AnalysisJobFactoryPort,
  AnalysisRepositoryPort,
  ClockPort,
  DocumentRepositoryPort,
  IdGeneratorPort,
  QueuePort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type { InsightService } from "./insightService";

export type SubmitOptions = {
  enqueue?: boolean;
};

/**
 * Document intake: validates uploads through the text layer, stores them under a fresh file id
 * and optionally queues a background analysis to warm the cache.
 */
export class DocumentService {
  constructor(
    private readonly documents: DocumentRepositoryPort,
    private readonly textLayer: PdfTextLayerPort,
    private readonly insights: InsightService,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly analyses?: AnalysisRepositoryPort,
    private readonly queue?: QueuePort,
    private readonly jobFactory?: AnalysisJobFactoryPort,
  ) {}

  async submitDocument(
    content: Uint8Array,
    fileName: string,
    options: SubmitOptions = {},
  ): Promise<Result<StoredDocument, AnalysisFailure>> {
    if (options.enqueue && (!this.queue || !this.jobFactory)) {
      throw new Error("Background analysis requested but no queue is configured");
    }

    const opened = await this.textLayer.open(content);
    if (opened.isErr()) {
      logger.warn({ fileName, code: opened.error.code }, opened.error.message);
      return err(opened.error);
    }

    const pageCount = opened.value.pageCount;
    await opened.value.close();

    const document: StoredDocument = {
      fileId: this.ids.next(),
      fileName,
      content,
      pageCount,
      byteSize: content.byteLength,
      createdAt: this.clock.now(),
    };
    await this.documents.save(document);
    logger.info(
      { fileId: document.fileId, fileName, pageCount, byteSize: document.byteSize },
      "Document stored",
    );

    if (options.enqueue && this.queue && this.jobFactory) {
      await this.queue.enqueue("analyze", this.jobFactory.create(document.fileId));
      logger.info({ fileId: document.fileId }, "Analysis job enqueued");
    }

    return ok(document);
  }

  /**
   * Removes the stored document, its persisted analysis and its cache entry.
   * Resolves false when no document was stored under `fileId`.
   */
  async deleteDocument(fileId: string): Promise<boolean> {
    this.insights.forget(fileId);
    await this.analyses?.delete(fileId);
    const removed = await this.documents.delete(fileId);
    logger.info({ fileId, removed }, "Document deleted");
    return removed;
  }
}
