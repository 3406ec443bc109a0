import type { AnalysisFailureCode } from "./appError";
import type {
  CanonicalLabel,
  FinancialStatements,
  UnitScale,
} from "./financial";

export type TocEntry = {
  title: string;
  page: number;
  level: number;
};

export type TocStrategyKind = "structured" | "heuristic_heading_scan";

export type SectionRange = {
  startPage: number;
  endPage: number;
};

export type Section = SectionRange & {
  name: string;
  text: string;
};

export const kpiNames = [
  "revenue",
  "net_profit",
  "total_assets",
  "total_liabilities",
  "cash_and_equivalents",
  "net_margin",
  "debt_to_equity",
  "current_ratio",
  "revenue_growth_pct",
  "net_profit_growth_pct",
  "ebitda_margin_pct",
  "return_on_equity_pct",
  "equity_to_assets_pct",
  "asset_turnover",
  "free_cash_flow",
] as const;

export type KpiName = (typeof kpiNames)[number];

export type KpiUnit = "currency" | "percentage" | "ratio" | "dimensionless";

export type Kpi = {
  name: KpiName;
  value: number;
  unit: KpiUnit;
  period?: string;
};

export type KpiMap = Partial<Record<KpiName, Kpi>>;

export type TrendPoint = {
  period: string;
  value: number;
};

export type TrendSeries = {
  label: CanonicalLabel;
  points: TrendPoint[];
};

export type FinancialInsight = {
  kpis: KpiMap;
  statements: FinancialStatements;
  trends: TrendSeries[];
  unitScale: UnitScale;
  warnings: string[];
};

export type RankedSentence = {
  index: number;
  score: number;
};

export type SummaryResult = {
  summary: string;
  startPage: number;
  endPage: number;
  rawText: string;
  sentenceCount: number;
  selectedSentences: RankedSentence[];
};

export type Availability<T> =
  | { status: "available"; value: T }
  | { status: "unavailable"; code: AnalysisFailureCode; reason: string };

export type TocDiagnostics = {
  strategy: TocStrategyKind;
  entryCount: number;
  mdaTitle?: string;
};

export type AnalysisResult = {
  fileId: string;
  companyName: string;
  pageCount: number;
  toc: TocDiagnostics;
  financials: Availability<FinancialInsight>;
  summary: Availability<SummaryResult>;
};
