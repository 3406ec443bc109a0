import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { RankedSentence } from "../../core/entities/analysis";
import {
  analysisFailure,
  type AnalysisFailure,
} from "../../core/entities/appError";
import type { SummaryConfig, TextRankConfig } from "./analysisConfig";
import stopwordData from "./data/stopwords.json";
import { splitSentences, tokenize } from "./sentenceSplitter";

export const defaultStopwords: ReadonlySet<string> = new Set(
  z.array(z.string()).parse(stopwordData),
);

export type ExtractiveSummary = {
  summary: string;
  sentenceCount: number;
  selectedSentences: RankedSentence[];
};

/**
 * Weight of the edge between two sentences: shared content words over the sum of log lengths.
 * Lengths count every token; shared words exclude stopwords.
 */
export const sentenceSimilarity = (
  left: string[],
  right: string[],
  stopwords: ReadonlySet<string> = defaultStopwords,
): number => {
  const denominator = Math.log(left.length) + Math.log(right.length);
  if (!(denominator > 0)) {
    return 0;
  }

  const rightWords = new Set(right.filter((token) => !stopwords.has(token)));
  const shared = new Set(
    left.filter((token) => !stopwords.has(token) && rightWords.has(token)),
  );

  return shared.size / denominator;
};

export const buildSimilarityGraph = (
  tokenLists: string[][],
  stopwords: ReadonlySet<string> = defaultStopwords,
): number[][] =>
  tokenLists.map((left, row) =>
    tokenLists.map((right, column) =>
      row === column ? 0 : sentenceSimilarity(left, right, stopwords),
    ),
  );

/**
 * Weighted PageRank. The score mass of nodes without edges is spread evenly over all nodes,
 * so scores always sum to one and an edgeless graph stays uniform.
 */
export const pageRank = (
  weights: number[][],
  config: TextRankConfig,
): number[] => {
  const size = weights.length;
  if (size === 0) {
    return [];
  }

  const { damping } = config;
  const outWeights = weights.map((row) => row.reduce((sum, value) => sum + value, 0));
  let scores: number[] = new Array<number>(size).fill(1 / size);

  for (let iteration = 0; iteration < config.maxIterations; iteration += 1) {
    const current = scores;
    const dangling = current.reduce(
      (sum, score, index) => ((outWeights[index] ?? 0) > 0 ? sum : sum + score),
      0,
    );
    const base = (1 - damping) / size + (damping * dangling) / size;

    const next = current.map((_, target) => {
      let incoming = 0;
      for (let source = 0; source < size; source += 1) {
        const out = outWeights[source] ?? 0;
        const weight = weights[source]?.[target] ?? 0;
        if (out > 0 && weight > 0) {
          incoming += (weight / out) * (current[source] ?? 0);
        }
      }
      return base + damping * incoming;
    });

    const delta = next.reduce(
      (sum, score, index) => sum + Math.abs(score - (current[index] ?? 0)),
      0,
    );
    scores = next;
    if (delta < config.tolerance) {
      break;
    }
  }

  return scores;
};

/**
 * Extractive TextRank summary. Selected sentences keep their document order;
 * `selectedSentences` indexes into the sentences that survived the length filter.
 */
export class TextRankSummarizer {
  constructor(
    private readonly config: SummaryConfig,
    private readonly stopwords: ReadonlySet<string> = defaultStopwords,
  ) {}

  summarize(text: string): Result<ExtractiveSummary, AnalysisFailure> {
    const candidates = splitSentences(text)
      .map((sentence) => ({ sentence, tokens: tokenize(sentence) }))
      .filter(({ tokens }) => tokens.length >= this.config.minSentenceTokens);

    if (candidates.length < this.config.minSentences) {
      return err(
        analysisFailure(
          "summary_unavailable",
          "summary",
          `Only ${candidates.length} usable sentences; at least ${this.config.minSentences} are needed`,
        ),
      );
    }

    const scores = pageRank(
      buildSimilarityGraph(
        candidates.map(({ tokens }) => tokens),
        this.stopwords,
      ),
      this.config.textRank,
    );

    const selected = scores
      .map((score, index) => ({ index, score }))
      .sort((left, right) => right.score - left.score || left.index - right.index)
      .slice(0, this.targetCount(candidates.length))
      .sort((left, right) => left.index - right.index);

    return ok({
      summary: selected
        .map(({ index }) => candidates[index]?.sentence ?? "")
        .join(" "),
      sentenceCount: candidates.length,
      selectedSentences: selected,
    });
  }

  private targetCount(available: number): number {
    const { ratio, sentences } = this.config;
    const wanted = ratio === undefined ? sentences : Math.ceil(ratio * available);
    return Math.min(available, Math.max(1, wanted));
  }
}
