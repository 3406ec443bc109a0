import type { AnalysisResult } from "../entities/analysis";
import type { StoredDocument } from "../entities/document";

export const jobStages = ["analyze"] as const;

export type JobStage = (typeof jobStages)[number];

export type AnalysisJobPayload = {
  jobId: string;
  fileId: string;
  idempotencyKey: string;
  requestedAt: string;
};

export interface QueuePort {
  enqueue(stage: JobStage, payload: AnalysisJobPayload): Promise<void>;
}

export interface DocumentRepositoryPort {
  save(document: StoredDocument): Promise<void>;
  findById(fileId: string): Promise<StoredDocument | null>;
  delete(fileId: string): Promise<boolean>;
}

/**
 * Durable home of finished analyses. Entries are replaced whole, never patched.
 */
export interface AnalysisRepositoryPort {
  save(result: AnalysisResult): Promise<void>;
  findByFileId(fileId: string): Promise<AnalysisResult | null>;
  delete(fileId: string): Promise<void>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}

export interface AnalysisJobFactoryPort {
  create(fileId: string): AnalysisJobPayload;
}
