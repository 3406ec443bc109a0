import type {
  Kpi,
  KpiMap,
  KpiName,
  KpiUnit,
  TrendSeries,
} from "../../core/entities/analysis";
import {
  canonicalLabels,
  statementOfLabel,
  type CanonicalLabel,
  type FinancialStatements,
} from "../../core/entities/financial";
import { sortPeriodsDesc } from "./periodHeader";

export type KpiComputation = {
  kpis: KpiMap;
  trends: TrendSeries[];
  warnings: string[];
};

type Series = Record<string, number>;
type SeriesMap = Partial<Record<CanonicalLabel, Series>>;

type RatioRule = {
  name: KpiName;
  numerator: CanonicalLabel;
  denominator: CanonicalLabel;
  unit: KpiUnit;
};

const directKpis: Array<KpiName & CanonicalLabel> = [
  "revenue",
  "net_profit",
  "total_assets",
  "total_liabilities",
  "cash_and_equivalents",
];

const ratioRules: RatioRule[] = [
  { name: "net_margin", numerator: "net_profit", denominator: "revenue", unit: "ratio" },
  {
    name: "debt_to_equity",
    numerator: "total_liabilities",
    denominator: "total_equity",
    unit: "ratio",
  },
  {
    name: "current_ratio",
    numerator: "current_assets",
    denominator: "current_liabilities",
    unit: "ratio",
  },
  { name: "ebitda_margin_pct", numerator: "ebitda", denominator: "revenue", unit: "percentage" },
  {
    name: "return_on_equity_pct",
    numerator: "net_profit",
    denominator: "total_equity",
    unit: "percentage",
  },
  {
    name: "equity_to_assets_pct",
    numerator: "total_equity",
    denominator: "total_assets",
    unit: "percentage",
  },
  { name: "asset_turnover", numerator: "revenue", denominator: "total_assets", unit: "ratio" },
];

const growthRules: Array<{ name: KpiName; label: CanonicalLabel }> = [
  { name: "revenue_growth_pct", label: "revenue" },
  { name: "net_profit_growth_pct", label: "net_profit" },
];

const BALANCE_RELATIVE_TOLERANCE = 0.001;

export const roundTo = (value: number, precision: number): number => {
  const factor = 10 ** precision;
  const rounded = Math.round(value * factor) / factor;
  return Object.is(rounded, -0) ? 0 : rounded;
};

const latestCommonPeriod = (...series: Array<Series | undefined>): string | null => {
  const [first, ...rest] = series;
  if (!first || rest.some((entry) => !entry)) {
    return null;
  }

  const shared = Object.keys(first).filter((period) =>
    rest.every((entry) => entry !== undefined && period in entry),
  );
  return sortPeriodsDesc(shared)[0] ?? null;
};

/**
 * Line-item series keyed by label. Total liabilities are derived from the current and
 * non-current parts for any period the statement leaves them out.
 */
const collectSeries = (statements: FinancialStatements): SeriesMap => {
  const series: SeriesMap = {};
  for (const label of canonicalLabels) {
    const item = statements[statementOfLabel[label]].lineItems[label];
    if (item && Object.keys(item.values).length > 0) {
      series[label] = { ...item.values };
    }
  }

  const current = series.current_liabilities;
  const nonCurrent = series.non_current_liabilities;
  if (current && nonCurrent) {
    const derived: Series = {};
    for (const [period, value] of Object.entries(current)) {
      const other = nonCurrent[period];
      if (other !== undefined) {
        derived[period] = value + other;
      }
    }
    series.total_liabilities = { ...derived, ...series.total_liabilities };
  }

  return series;
};

/**
 * Computes direct, derived and growth KPIs, trend series and balance warnings.
 * A KPI whose inputs are missing, or whose denominator is zero, is left out.
 */
export const computeKpis = (
  statements: FinancialStatements,
  precision: number,
): KpiComputation => {
  const series = collectSeries(statements);
  const kpis: KpiMap = {};
  const put = (name: KpiName, value: number, unit: KpiUnit, period: string) => {
    if (Number.isFinite(value)) {
      const kpi: Kpi = { name, value: roundTo(value, precision), unit, period };
      kpis[name] = kpi;
    }
  };

  for (const label of directKpis) {
    const values = series[label];
    const period = latestCommonPeriod(values);
    if (values && period) {
      put(label, values[period] ?? Number.NaN, "currency", period);
    }
  }

  for (const rule of ratioRules) {
    const numerator = series[rule.numerator];
    const denominator = series[rule.denominator];
    const period = latestCommonPeriod(numerator, denominator);
    const top = period ? numerator?.[period] : undefined;
    const bottom = period ? denominator?.[period] : undefined;
    if (!period || top === undefined || !bottom) {
      continue;
    }

    const ratio = top / bottom;
    put(rule.name, rule.unit === "percentage" ? ratio * 100 : ratio, rule.unit, period);
  }

  for (const rule of growthRules) {
    const values = series[rule.label];
    if (!values) {
      continue;
    }

    const [latest, previous] = sortPeriodsDesc(Object.keys(values));
    const latestValue = latest ? values[latest] : undefined;
    const previousValue = previous ? values[previous] : undefined;
    if (!latest || latestValue === undefined || !previousValue) {
      continue;
    }

    put(
      rule.name,
      ((latestValue - previousValue) / Math.abs(previousValue)) * 100,
      "percentage",
      latest,
    );
  }

  const operating = series.operating_cash_flow;
  const capex = series.capital_expenditure;
  const cashPeriod = latestCommonPeriod(operating, capex);
  const operatingValue = cashPeriod ? operating?.[cashPeriod] : undefined;
  const capexValue = cashPeriod ? capex?.[cashPeriod] : undefined;
  if (cashPeriod && operatingValue !== undefined && capexValue !== undefined) {
    put("free_cash_flow", operatingValue - Math.abs(capexValue), "currency", cashPeriod);
  }

  return {
    kpis,
    trends: buildTrends(series, precision),
    warnings: balanceWarnings(series, precision),
  };
};

/** One series per line item with at least two periods, oldest first. */
const buildTrends = (series: SeriesMap, precision: number): TrendSeries[] =>
  canonicalLabels.flatMap((label) => {
    const values = series[label];
    if (!values) {
      return [];
    }

    const periods = sortPeriodsDesc(Object.keys(values)).reverse();
    if (periods.length < 2) {
      return [];
    }

    return [
      {
        label,
        points: periods.map((period) => ({
          period,
          value: roundTo(values[period] ?? 0, precision),
        })),
      },
    ];
  });

const balanceWarnings = (series: SeriesMap, precision: number): string[] => {
  const assets = series.total_assets;
  const liabilities = series.total_liabilities;
  const equity = series.total_equity;
  const period = latestCommonPeriod(assets, liabilities, equity);
  if (!period) {
    return [];
  }

  const assetValue = assets?.[period] ?? 0;
  const funding = (liabilities?.[period] ?? 0) + (equity?.[period] ?? 0);
  const tolerance = Math.max(1, Math.abs(assetValue) * BALANCE_RELATIVE_TOLERANCE);
  if (Math.abs(assetValue - funding) <= tolerance) {
    return [];
  }

  return [
    `Balance sheet does not balance for ${period}: total assets ${roundTo(assetValue, precision)} vs liabilities plus equity ${roundTo(funding, precision)}`,
  ];
};
