import type { AnalysisResult } from "../../core/entities/analysis";
import type { StoredDocument } from "../../core/entities/document";
import type {
  AnalysisRepositoryPort,
  DocumentRepositoryPort,
} from "../../core/ports/outboundPorts";

/**
 * Process-local document store, selected with `DOCUMENT_STORE=memory`.
 */
export class InMemoryDocumentRepository implements DocumentRepositoryPort {
  private readonly documents = new Map<string, StoredDocument>();

  async save(document: StoredDocument): Promise<void> {
    if (!this.documents.has(document.fileId)) {
      this.documents.set(document.fileId, document);
    }
  }

  async findById(fileId: string): Promise<StoredDocument | null> {
    return this.documents.get(fileId) ?? null;
  }

  async delete(fileId: string): Promise<boolean> {
    return this.documents.delete(fileId);
  }
}

export class InMemoryAnalysisRepository implements AnalysisRepositoryPort {
  private readonly analyses = new Map<string, AnalysisResult>();

  async save(result: AnalysisResult): Promise<void> {
    this.analyses.set(result.fileId, result);
  }

  async findByFileId(fileId: string): Promise<AnalysisResult | null> {
    return this.analyses.get(fileId) ?? null;
  }

  async delete(fileId: string): Promise<void> {
    this.analyses.delete(fileId);
  }
}
