import type {
  AnalysisResult,
  Kpi,
  TrendSeries,
} from "../core/entities/analysis";

const formatKpi = (kpi: Kpi): string => {
  const value = kpi.unit === "percentage" ? `${kpi.value}%` : String(kpi.value);
  return `- ${kpi.name}: ${value} (${kpi.unit}${kpi.period ? `, ${kpi.period}` : ""})`;
};

const formatTrend = (trend: TrendSeries): string =>
  `- ${trend.label}: ${trend.points
    .map((point) => `${point.period}=${point.value}`)
    .join(", ")}`;

/**
 * Formats an analysis into a compact terminal report for manual inspection.
 */
export const formatAnalysisReport = (result: AnalysisResult): string => {
  const lines: string[] = [];

  lines.push(`Analysis for ${result.companyName}`);
  lines.push(`File: ${result.fileId}`);
  lines.push(`Pages: ${result.pageCount}`);
  lines.push(
    `Table of contents: ${result.toc.strategy}, ${result.toc.entryCount} entries${result.toc.mdaTitle ? `, section "${result.toc.mdaTitle}"` : ""}`,
  );
  lines.push("");

  lines.push("KPIs:");
  const financials = result.financials;
  if (financials.status === "unavailable") {
    lines.push(`- unavailable (${financials.code}): ${financials.reason}`);
  } else {
    const kpis = Object.values(financials.value.kpis).filter(
      (kpi): kpi is Kpi => kpi !== undefined,
    );
    if (kpis.length === 0) {
      lines.push("- none");
    }
    kpis.forEach((kpi) => lines.push(formatKpi(kpi)));
    lines.push(
      `Unit scale: ${financials.value.unitScale.unit} (x${financials.value.unitScale.multiplier})`,
    );

    if (financials.value.trends.length > 0) {
      lines.push("");
      lines.push("Trends:");
      financials.value.trends.forEach((trend) => lines.push(formatTrend(trend)));
    }

    if (financials.value.warnings.length > 0) {
      lines.push("");
      lines.push("Warnings:");
      financials.value.warnings.forEach((warning) => lines.push(`- ${warning}`));
    }
  }

  lines.push("");
  const summary = result.summary;
  if (summary.status === "unavailable") {
    lines.push("Summary:");
    lines.push(`- unavailable (${summary.code}): ${summary.reason}`);
  } else {
    lines.push(`Summary (pages ${summary.value.startPage}-${summary.value.endPage}):`);
    lines.push(summary.value.summary);
  }

  return lines.join("\n");
};
