import { describe, expect, it } from "vitest";
import { defaultAnalysisConfig } from "./analysisConfig";
import {
  pageRank,
  sentenceSimilarity,
  TextRankSummarizer,
} from "./textRank";

const textRankConfig = defaultAnalysisConfig.summary.textRank;

describe("sentenceSimilarity", () => {
  it("counts shared content words over the summed log lengths", () => {
    const similarity = sentenceSimilarity(
      ["revenue", "grew", "strongly", "in", "fy23"],
      ["revenue", "in", "fy23", "was", "flat"],
    );
    expect(similarity).toBeCloseTo(2 / (2 * Math.log(5)), 10);
  });

  it("has no edge for single-token sentences", () => {
    expect(sentenceSimilarity(["revenue"], ["revenue"])).toBe(0);
  });
});

describe("pageRank", () => {
  it("keeps an edgeless graph uniform", () => {
    const scores = pageRank(
      [
        [0, 0, 0],
        [0, 0, 0],
        [0, 0, 0],
      ],
      textRankConfig,
    );

    expect(scores).toHaveLength(3);
    for (const score of scores) {
      expect(score).toBeCloseTo(1 / 3, 10);
    }
  });

  it("produces scores that sum to one", () => {
    const scores = pageRank(
      [
        [0, 1, 0.5, 0],
        [1, 0, 0, 0],
        [0.5, 0, 0, 0],
        [0, 0, 0, 0],
      ],
      textRankConfig,
    );

    expect(scores.reduce((sum, score) => sum + score, 0)).toBeCloseTo(1, 6);
    expect(Math.max(...scores)).toBe(scores[0]);
  });

  it("returns nothing for an empty graph", () => {
    expect(pageRank([], textRankConfig)).toEqual([]);
  });
});

describe("TextRankSummarizer", () => {
  const text = [
    "Revenue from operations increased due to higher steel volumes.",
    "Steel volumes and revenue increased across every plant.",
    "Costs fell.",
    "The board met twice during the fiscal year.",
    "Higher steel volumes lifted revenue and operating margins.",
  ].join(" ");

  it("selects the most central sentences in document order", () => {
    const summarizer = new TextRankSummarizer({
      ...defaultAnalysisConfig.summary,
      sentences: 3,
    });

    const result = summarizer.summarize(text)._unsafeUnwrap();
    expect(result.sentenceCount).toBe(4);
    expect(result.selectedSentences.map((entry) => entry.index)).toEqual([0, 1, 3]);
    expect(result.summary).toBe(
      "Revenue from operations increased due to higher steel volumes. Steel volumes and revenue increased across every plant. Higher steel volumes lifted revenue and operating margins.",
    );
  });

  it("ranks the best connected sentence first", () => {
    const summarizer = new TextRankSummarizer({
      ...defaultAnalysisConfig.summary,
      sentences: 1,
    });

    expect(summarizer.summarize(text)._unsafeUnwrap().summary).toBe(
      "Revenue from operations increased due to higher steel volumes.",
    );
  });

  it("sizes the summary from a ratio when one is set", () => {
    const summarizer = new TextRankSummarizer({
      ...defaultAnalysisConfig.summary,
      ratio: 0.5,
    });

    expect(summarizer.summarize(text)._unsafeUnwrap().selectedSentences).toHaveLength(2);
  });

  it("reports summary_unavailable when too few sentences survive", () => {
    const summarizer = new TextRankSummarizer(defaultAnalysisConfig.summary);
    const result = summarizer.summarize(
      "Revenue increased across all business segments this year. Costs fell.",
    );

    expect(result._unsafeUnwrapErr().code).toBe("summary_unavailable");
  });
});
