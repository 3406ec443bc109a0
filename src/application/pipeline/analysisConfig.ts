export type TextRankConfig = {
  damping: number;
  tolerance: number;
  maxIterations: number;
};

export type SummaryConfig = {
  /** Fixed number of sentences to keep; ignored when `ratio` is set. */
  sentences: number;
  ratio?: number;
  minSentences: number;
  minSentenceTokens: number;
  textRank: TextRankConfig;
};

export type AnalysisConfig = {
  tocScanPages: number;
  sectionMaxPages: number;
  pageOffsetSearch: number;
  kpiPrecision: number;
  summary: SummaryConfig;
};

export const defaultAnalysisConfig: AnalysisConfig = {
  tocScanPages: 40,
  sectionMaxPages: 60,
  pageOffsetSearch: 10,
  kpiPrecision: 2,
  summary: {
    sentences: 6,
    minSentences: 3,
    minSentenceTokens: 5,
    textRank: {
      damping: 0.85,
      tolerance: 1e-4,
      maxIterations: 100,
    },
  },
};
