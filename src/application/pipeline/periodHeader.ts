import type { PageLine } from "../../core/entities/document";

export type PeriodToken = {
  period: string;
  start: number;
  end: number;
  rightEdge: number;
};

export type PeriodColumn = {
  period: string;
  rightEdge: number;
};

export type PeriodHeader = {
  columns: PeriodColumn[];
  /** Text printed before the first period, usually "Particulars" or "Year ended". */
  leadingText: string;
};

/** A figure's position within its row, mapped to the period it belongs to. */
export type PeriodAssignment = {
  index: number;
  period: string;
};

const MONTHS = [
  "jan",
  "feb",
  "mar",
  "apr",
  "may",
  "jun",
  "jul",
  "aug",
  "sep",
  "oct",
  "nov",
  "dec",
];
const MONTH = `(${MONTHS.join("|")})[a-z]*\\.?`;

type PeriodRule = {
  pattern: RegExp;
  toPeriod: (match: RegExpMatchArray) => string | null;
};

const pad = (value: number): string => String(value).padStart(2, "0");

const fiscalYear = (year: number): string => `FY${year}`;

const expandYear = (digits: string): number =>
  digits.length === 2 ? 2000 + Number(digits) : Number(digits);

const isoDate = (
  year: string | undefined,
  month: string | undefined,
  day: string | undefined,
): string | null => {
  const monthIndex = MONTHS.indexOf((month ?? "").slice(0, 3).toLowerCase());
  const dayNumber = Number(day);
  if (monthIndex < 0 || !year || dayNumber < 1 || dayNumber > 31) {
    return null;
  }

  return `${year}-${pad(monthIndex + 1)}-${pad(dayNumber)}`;
};

/** Rules in priority order; a later rule never claims text an earlier rule already matched. */
const periodRules: PeriodRule[] = [
  {
    pattern: new RegExp(`\\b${MONTH}\\s+(\\d{1,2}),?\\s+(\\d{4})\\b`, "gi"),
    toPeriod: (match) => isoDate(match[3], match[1], match[2]),
  },
  {
    pattern: new RegExp(
      `\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+${MONTH},?\\s+(\\d{4})\\b`,
      "gi",
    ),
    toPeriod: (match) => isoDate(match[3], match[2], match[1]),
  },
  {
    pattern:
      /\b(?:(?:fy|fiscal(?:\s+year)?)\s*'?)?((?:19|20)\d{2})\s*[-–/]\s*(\d{2}|\d{4})\b/gi,
    toPeriod: (match) => {
      const startYear = Number(match[1]);
      const endDigits = match[2] ?? "";
      const endYear =
        endDigits.length === 2
          ? startYear - (startYear % 100) + Number(endDigits)
          : Number(endDigits);

      return endYear === startYear + 1 ? fiscalYear(endYear) : null;
    },
  },
  {
    pattern: /\b(?:fy|fiscal(?:\s+year)?)\s*'?(\d{4}|\d{2})\b/gi,
    toPeriod: (match) => fiscalYear(expandYear(match[1] ?? "")),
  },
  {
    pattern: /\b((?:19|20)\d{2})\b/g,
    toPeriod: (match) => fiscalYear(Number(match[1])),
  },
];

const overlaps = (
  token: { start: number; end: number },
  claimed: PeriodToken[],
): boolean =>
  claimed.some((other) => token.start < other.end && other.start < token.end);

const rightEdgeOf = (line: PageLine, start: number, end: number): number => {
  const covering = line.words.filter(
    (word) => word.start < end && start < word.end,
  );
  if (covering.length === 0) {
    return line.bbox.x + line.bbox.width;
  }

  return Math.max(...covering.map((word) => word.bbox.x + word.bbox.width));
};

/**
 * Finds every period token on a line ("FY23", "Fiscal 2023", "2022-23", "March 31, 2023", "2023"), left to right.
 */
export const findPeriodTokens = (line: PageLine): PeriodToken[] => {
  const tokens: PeriodToken[] = [];
  for (const rule of periodRules) {
    for (const match of line.text.matchAll(rule.pattern)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      const period = rule.toPeriod(match);
      if (!period || overlaps({ start, end }, tokens)) {
        continue;
      }

      tokens.push({ period, start, end, rightEdge: rightEdgeOf(line, start, end) });
    }
  }

  return tokens.sort((left, right) => left.start - right.start);
};

const CONNECTING_WORDS: ReadonlySet<string> = new Set([
  "as",
  "at",
  "for",
  "the",
  "year",
  "years",
  "period",
  "ended",
  "ending",
  "months",
  "three",
  "six",
  "nine",
  "restated",
  "audited",
  "unaudited",
]);

const isConnectingText = (text: string): boolean => {
  const words = text
    .toLowerCase()
    .replace(/[^a-z\s]/g, " ")
    .split(/\s+/)
    .filter(Boolean);

  return words.every((word) => CONNECTING_WORDS.has(word));
};

/**
 * Recognizes a column header row: at least two period tokens, no other figures,
 * and nothing between the periods except column captions such as "Year ended".
 */
export const detectPeriodHeader = (line: PageLine): PeriodHeader | null => {
  const tokens = findPeriodTokens(line);
  if (tokens.length < 2) {
    return null;
  }

  let remainder = "";
  let cursor = 0;
  for (const token of tokens) {
    remainder += ` ${line.text.slice(cursor, token.start)}`;
    cursor = token.end;
  }
  remainder += ` ${line.text.slice(cursor)}`;
  if (/\d/.test(remainder)) {
    return null;
  }

  for (let index = 1; index < tokens.length; index += 1) {
    const previous = tokens[index - 1];
    const current = tokens[index];
    if (
      previous &&
      current &&
      !isConnectingText(line.text.slice(previous.end, current.start))
    ) {
      return null;
    }
  }

  const first = tokens[0];
  return {
    columns: tokens.map((token) => ({
      period: token.period,
      rightEdge: token.rightEdge,
    })),
    leadingText: first ? line.text.slice(0, first.start).trim() : "",
  };
};

/** Labels used for columns of a table printed without a period header. */
export const fallbackPeriodLabel = (index: number): string => {
  if (index === 0) {
    return "current";
  }

  return index === 1 ? "previous" : `previous_${index}`;
};

/** True for the labels of columns printed without a period header. */
export const isPositionalPeriod = (period: string): boolean =>
  /^(?:current|previous(?:_\d+)?)$/.test(period);

const alignByCount = (
  figureCount: number,
  columns: PeriodColumn[],
): PeriodAssignment[] => {
  const first = columns[0];
  if (!first || figureCount === 0) {
    return [];
  }

  const assignments: PeriodAssignment[] = [{ index: 0, period: first.period }];
  let columnIndex = columns.length - 1;
  for (
    let index = figureCount - 1;
    index >= 1 && columnIndex >= 1;
    index -= 1, columnIndex -= 1
  ) {
    const column = columns[columnIndex];
    if (column) {
      assignments.push({ index, period: column.period });
    }
  }

  return assignments.sort((left, right) => left.index - right.index);
};

const minimumGap = (columns: PeriodColumn[]): number => {
  const edges = columns.map((column) => column.rightEdge).sort((a, b) => a - b);
  let gap = Number.POSITIVE_INFINITY;
  for (let index = 1; index < edges.length; index += 1) {
    gap = Math.min(gap, (edges[index] ?? 0) - (edges[index - 1] ?? 0));
  }

  return gap;
};

/**
 * Maps a row's figures (by right edge) to periods.
 * Figures snap to the header column whose right edge is nearest, within half the narrowest column gap.
 * A collision or a stray figure falls back to count alignment; with no header, columns are positional.
 */
export const assignPeriods = (
  rightEdges: number[],
  header: PeriodHeader | null,
): PeriodAssignment[] => {
  if (!header || header.columns.length === 0) {
    return rightEdges.map((_, index) => ({
      index,
      period: fallbackPeriodLabel(index),
    }));
  }

  const tolerance = minimumGap(header.columns) / 2;
  const used = new Set<number>();
  const assignments: PeriodAssignment[] = [];
  for (const [index, edge] of rightEdges.entries()) {
    let nearest = -1;
    let distance = Number.POSITIVE_INFINITY;
    header.columns.forEach((column, columnIndex) => {
      const candidate = Math.abs(column.rightEdge - edge);
      if (candidate < distance) {
        distance = candidate;
        nearest = columnIndex;
      }
    });

    const column = header.columns[nearest];
    if (!column || distance >= tolerance || used.has(nearest)) {
      return alignByCount(rightEdges.length, header.columns);
    }

    used.add(nearest);
    assignments.push({ index, period: column.period });
  }

  return assignments;
};

/**
 * Recency of a period label; larger is more recent. Fiscal years end on March 31.
 */
export const periodRecency = (period: string): number => {
  const fiscal = /^FY(\d{4}|\d{2})$/.exec(period);
  if (fiscal) {
    return expandYear(fiscal[1] ?? "") * 10_000 + 331;
  }

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(period);
  if (iso) {
    return Number(`${iso[1]}${iso[2]}${iso[3]}`);
  }

  if (period === "current") {
    return 0;
  }
  if (period === "previous") {
    return -1;
  }

  const older = /^previous_(\d+)$/.exec(period);
  return older ? -Number(older[1]) : Number.MIN_SAFE_INTEGER;
};

/** Most recent first. */
export const sortPeriodsDesc = (periods: Iterable<string>): string[] =>
  [...new Set(periods)].sort(
    (left, right) => periodRecency(right) - periodRecency(left),
  );
