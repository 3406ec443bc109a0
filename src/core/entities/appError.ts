/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "validation_error";

/**
 * Describes a normalized failure of the news lookup with provider provenance.
 */
export type AppBoundaryError = {
  source: "news";
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

export type PipelineStage =
  | "storage"
  | "text_layer"
  | "toc"
  | "section"
  | "financials"
  | "summary";

/**
 * Failure taxonomy of the extraction pipeline.
 * Fatal codes abort an analysis; the others degrade one branch of the result.
 */
export type AnalysisFailureCode =
  | "document_not_found"
  | "unreadable_pdf"
  | "cancelled"
  | "section_not_found"
  | "no_financial_data"
  | "summary_unavailable";

export type AnalysisFailure = {
  code: AnalysisFailureCode;
  stage: PipelineStage;
  message: string;
  cause?: unknown;
};

export const analysisFailure = (
  code: AnalysisFailureCode,
  stage: PipelineStage,
  message: string,
  cause?: unknown,
): AnalysisFailure =>
  cause === undefined ? { code, stage, message } : { code, stage, message, cause };
