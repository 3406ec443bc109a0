import { err, ok, type Result } from "neverthrow";
import {
  analysisFailure,
  type AnalysisFailure,
} from "../../core/entities/appError";
import type { Page, PageLine, PositionedWord } from "../../core/entities/document";
import {
  statementOfLabel,
  type CanonicalLabel,
  type FinancialStatements,
  type LineItem,
  type ParsedFinancials,
  type Statement,
  type StatementKind,
  type UnitScale,
} from "../../core/entities/financial";
import { defaultLabelDictionary, type LabelDictionary } from "./labelDictionary";
import {
  BASE_UNIT_SCALE,
  detectUnitScale,
  matchUnit,
  parseAmount,
} from "./numberParser";
import {
  assignPeriods,
  detectPeriodHeader,
  findPeriodTokens,
  isPositionalPeriod,
  sortPeriodsDesc,
  type PeriodHeader,
  type PeriodToken,
} from "./periodHeader";

type Figure = {
  text: string;
  value: number;
  multiplier: number | null;
  rightEdge: number;
};

type RawValue = {
  value: number;
  multiplier: number | null;
};

type RowEntry = {
  sourceLabel: string;
  page: number;
  values: Map<string, RawValue>;
};

const CURRENCY_WORD = /^(?:₹|rs\.?|inr|\$|us\$|usd|€|£)$/i;
const NOTE_REFERENCE = /^\d{1,2}$/;
const STATEMENT_HEADINGS = [
  /\bstatement\s+of\s+profit\s+and\s+loss\b/i,
  /\bprofit\s+and\s+loss\s+(?:statement|account)\b/i,
  /\bbalance\s+sheet\b/i,
  /\bstatement\s+of\s+assets\s+and\s+liabilities\b/i,
  /\bcash\s+flows?\s+statement\b/i,
  /\bstatement\s+of\s+cash\s+flows?\b/i,
];
const HEADING_MAX_WORDS = 12;
const GROUPED_DIGITS = /\d[.,]\d/;

const emptyStatement = (kind: StatementKind): Statement => ({
  kind,
  periods: [],
  lineItems: {},
});

/** A word inside a date or year ("March 31, 2024", "FY24"), unless it carries separators or decimals. */
const isPeriodWord = (word: PositionedWord, periods: PeriodToken[]): boolean =>
  !GROUPED_DIGITS.test(word.text) &&
  periods.some((period) => word.start < period.end && period.start < word.end);

/**
 * Splits a row into its label and the trailing run of figures.
 * Loose currency symbols are skipped and a detached unit word ("1,234 Cr") tags the figure before it.
 * The run stops at a year or date, so captions ending in a period carry no figures.
 */
const splitRow = (line: PageLine): { label: string; figures: Figure[] } => {
  const periods = findPeriodTokens(line);
  const figures: Figure[] = [];
  let pendingMultiplier: number | null = null;
  let index = line.words.length - 1;

  for (; index >= 0; index -= 1) {
    const word = line.words[index];
    if (!word) {
      break;
    }
    if (isPeriodWord(word, periods)) {
      break;
    }
    if (CURRENCY_WORD.test(word.text)) {
      continue;
    }

    const unit = matchUnit(word.text);
    const before = line.words[index - 1];
    if (
      unit &&
      pendingMultiplier === null &&
      before &&
      parseAmount(before.text)
    ) {
      pendingMultiplier = unit.multiplier;
      continue;
    }

    const amount = parseAmount(word.text);
    if (!amount) {
      break;
    }

    figures.unshift({
      text: word.text,
      value: amount.value,
      multiplier: amount.multiplier ?? pendingMultiplier,
      rightEdge: word.bbox.x + word.bbox.width,
    });
    pendingMultiplier = null;
  }

  const label = line.words
    .slice(0, index + 1)
    .map((word) => word.text)
    .join(" ");

  return { label, figures };
};

/**
 * Drops a leading note-reference column: a bare 1-2 digit integer followed by at least two figures
 * that are each at least ten times larger.
 */
const dropNoteReference = (figures: Figure[]): Figure[] => {
  const [first, ...rest] = figures;
  if (!first || rest.length < 2 || !NOTE_REFERENCE.test(first.text)) {
    return figures;
  }

  const note = Math.abs(first.value);
  if (note === 0) {
    return figures;
  }

  return rest.every((figure) => Math.abs(figure.value) >= note * 10)
    ? rest
    : figures;
};

const isStatementHeading = (line: PageLine): boolean =>
  line.words.length <= HEADING_MAX_WORDS &&
  STATEMENT_HEADINGS.some((pattern) => pattern.test(line.text));

const hasDatedValues = (entry: RowEntry): boolean =>
  [...entry.values.keys()].some((period) => !isPositionalPeriod(period));

/**
 * Streams pages and accumulates canonical line items from statement tables anywhere in the document.
 * The document unit scale is first-wins and applied to untagged figures when the parse is finished.
 */
export class FinancialTableParser {
  private readonly rows = new Map<CanonicalLabel, RowEntry>();
  private unitScale: UnitScale | null = null;
  private header: PeriodHeader | null = null;
  private matchedRows = 0;

  constructor(
    private readonly dictionary: LabelDictionary = defaultLabelDictionary,
  ) {}

  consumePage(page: Page): void {
    for (const line of page.lines) {
      this.consumeLine(line, page.pageNumber);
    }
  }

  finish(): Result<ParsedFinancials, AnalysisFailure> {
    if (this.rows.size === 0) {
      return err(
        analysisFailure(
          "no_financial_data",
          "financials",
          "No recognizable financial statement line items were found",
        ),
      );
    }

    const unitScale = this.unitScale ?? BASE_UNIT_SCALE;
    return ok({
      statements: this.buildStatements(unitScale),
      unitScale,
      matchedRows: this.matchedRows,
    });
  }

  private consumeLine(line: PageLine, pageNumber: number): void {
    if (!line.text.trim()) {
      return;
    }

    if (!this.unitScale) {
      this.unitScale = detectUnitScale(line.text);
    }

    const header = detectPeriodHeader(line);
    if (
      header &&
      this.dictionary.match(header.leadingText).kind === "unmatched"
    ) {
      this.header = header;
      return;
    }

    if (isStatementHeading(line)) {
      this.header = null;
      return;
    }

    const { label, figures } = splitRow(line);
    if (figures.length === 0) {
      return;
    }

    if (!/[a-z]/i.test(label)) {
      return;
    }

    const match = this.dictionary.match(label);
    if (match.kind === "unmatched") {
      return;
    }

    this.matchedRows += 1;
    this.record(match.label, label, pageNumber, dropNoteReference(figures));
  }

  /**
   * A label keeps one period vocabulary: dated values replace positional ones ("current", "previous")
   * and positional values never join dated ones.
   */
  private record(
    label: CanonicalLabel,
    sourceLabel: string,
    pageNumber: number,
    figures: Figure[],
  ): void {
    const assignments = assignPeriods(
      figures.map((figure) => figure.rightEdge),
      this.header,
    );
    const dated = assignments.some(({ period }) => !isPositionalPeriod(period));

    let entry = this.rows.get(label);
    if (entry && dated !== hasDatedValues(entry)) {
      if (!dated) {
        return;
      }
      entry = undefined;
    }
    if (!entry) {
      entry = { sourceLabel, page: pageNumber, values: new Map() };
      this.rows.set(label, entry);
    }

    for (const { index, period } of assignments) {
      const figure = figures[index];
      if (!figure || entry.values.has(period)) {
        continue;
      }
      entry.values.set(period, {
        value: figure.value,
        multiplier: figure.multiplier,
      });
    }
  }

  private buildStatements(unitScale: UnitScale): FinancialStatements {
    const statements: FinancialStatements = {
      profit_and_loss: emptyStatement("profit_and_loss"),
      balance_sheet: emptyStatement("balance_sheet"),
      cash_flow: emptyStatement("cash_flow"),
    };

    for (const [label, entry] of this.rows) {
      const statement = statements[statementOfLabel[label]];
      const values: Record<string, number> = {};
      for (const [period, raw] of entry.values) {
        values[period] = raw.value * (raw.multiplier ?? unitScale.multiplier);
      }

      const item: LineItem = {
        label,
        sourceLabel: entry.sourceLabel,
        page: entry.page,
        values,
      };
      statement.lineItems[label] = item;
      statement.periods = sortPeriodsDesc([
        ...statement.periods,
        ...Object.keys(values),
      ]);
    }

    return statements;
  }
}
