import { eq, sql } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type { AnalysisResult } from "../../core/entities/analysis";
import type { StoredDocument } from "../../core/entities/document";
import type {
  AnalysisRepositoryPort,
  ClockPort,
  DocumentRepositoryPort,
} from "../../core/ports/outboundPorts";
import { analysesTable, documentsTable } from "./schema";

/**
 * Keeps uploaded PDF bytes; documents are immutable once stored.
 */
export class PostgresDocumentRepository implements DocumentRepositoryPort {
  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  async save(document: StoredDocument): Promise<void> {
    await this.db.insert(documentsTable).values(document).onConflictDoNothing();
  }

  async findById(fileId: string): Promise<StoredDocument | null> {
    const [row] = await this.db
      .select()
      .from(documentsTable)
      .where(eq(documentsTable.fileId, fileId))
      .limit(1);

    return row ?? null;
  }

  async delete(fileId: string): Promise<boolean> {
    const removed = await this.db
      .delete(documentsTable)
      .where(eq(documentsTable.fileId, fileId))
      .returning({ fileId: documentsTable.fileId });

    return removed.length > 0;
  }
}

/**
 * Persists finished analyses as one JSON document per file, replaced whole on every save.
 */
export class PostgresAnalysisRepository implements AnalysisRepositoryPort {
  constructor(
    private readonly db: PostgresJsDatabase<Record<string, never>>,
    private readonly clock: ClockPort,
  ) {}

  async save(result: AnalysisResult): Promise<void> {
    await this.db
      .insert(analysesTable)
      .values({ fileId: result.fileId, result, createdAt: this.clock.now() })
      .onConflictDoUpdate({
        target: analysesTable.fileId,
        set: {
          result: sql`excluded.result`,
          createdAt: sql`excluded.created_at`,
        },
      });
  }

  async findByFileId(fileId: string): Promise<AnalysisResult | null> {
    const [row] = await this.db
      .select({ result: analysesTable.result })
      .from(analysesTable)
      .where(eq(analysesTable.fileId, fileId))
      .limit(1);

    return row?.result ?? null;
  }

  async delete(fileId: string): Promise<void> {
    await this.db.delete(analysesTable).where(eq(analysesTable.fileId, fileId));
  }
}
