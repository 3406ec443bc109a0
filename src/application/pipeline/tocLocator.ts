import { err, ok, type Result } from "neverthrow";
import type { TocEntry, TocStrategyKind, SectionRange } from "../../core/entities/analysis";
import {
  analysisFailure,
  type AnalysisFailure,
} from "../../core/entities/appError";
import type { Page, PageLine } from "../../core/entities/document";

export type TocStrategy = {
  kind: TocStrategyKind;
  entries: TocEntry[];
};

export type MdaLocation = {
  entry: TocEntry;
  range: SectionRange;
};

const MDA_LABELS = [
  "management discussion",
  "management's discussion",
  "managements discussion",
  "md&a",
  "mda",
];

const TOC_HEADING = /^(?:table\s+of\s+)?contents$|^index$/i;
const TOC_LINE = /^(.*?[A-Za-z].*?)(?:\s*\.{2,}\s*|\s+)(\d{1,4})$/;
const TRAILING_FIGURE = /\d[\d,.]*$/;
const INDENT_TOLERANCE = 3;
const MIN_STRUCTURED_ENTRIES = 3;
const HEADING_SIZE_RATIO = 1.2;
const HEADING_MAX_WORDS = 12;

/**
 * True when a title names the management discussion section. Curly apostrophes count as straight ones.
 */
export const isMdaTitle = (title: string): boolean => {
  const folded = title.toLowerCase().replace(/[’‘`]/g, "'");
  return MDA_LABELS.some((label) => folded.includes(label));
};

type TocLine = {
  title: string;
  page: number;
  indent: number;
};

const parseTocLine = (line: PageLine, pageCount: number): TocLine | null => {
  const match = TOC_LINE.exec(line.text.trim());
  if (!match) {
    return null;
  }

  const title = (match[1] ?? "").replace(/[.\s]+$/, "").trim();
  const page = Number(match[2]);
  if (!title || TRAILING_FIGURE.test(title) || page < 1 || page > pageCount) {
    return null;
  }

  return { title, page, indent: line.words[0]?.bbox.x ?? line.bbox.x };
};

const isMostlyAscending = (lines: TocLine[]): boolean => {
  let ascending = 0;
  for (let index = 1; index < lines.length; index += 1) {
    if ((lines[index]?.page ?? 0) >= (lines[index - 1]?.page ?? 0)) {
      ascending += 1;
    }
  }

  return lines.length < 2 || ascending / (lines.length - 1) >= 0.8;
};

const tocLinesOf = (page: Page, pageCount: number): TocLine[] => {
  const lines = page.lines
    .map((line) => parseTocLine(line, pageCount))
    .filter((line): line is TocLine => line !== null);
  const hasHeading = page.lines.some((line) => TOC_HEADING.test(line.text.trim()));
  const enough = hasHeading ? lines.length >= 3 : lines.length >= 5;

  return enough && isMostlyAscending(lines) ? lines : [];
};

/**
 * Groups indents into levels: the leftmost indent cluster is level 1.
 */
const levelsByIndent = (indents: number[]): ((indent: number) => number) => {
  const anchors: number[] = [];
  for (const indent of [...indents].sort((a, b) => a - b)) {
    const last = anchors[anchors.length - 1];
    if (last === undefined || indent - last > INDENT_TOLERANCE) {
      anchors.push(indent);
    }
  }

  return (indent) => {
    let level = 1;
    anchors.forEach((anchor, index) => {
      if (indent >= anchor - INDENT_TOLERANCE) {
        level = index + 1;
      }
    });
    return level;
  };
};

/**
 * Parses a printed table of contents from the opening pages.
 */
export const parseStructuredToc = (pages: Page[], pageCount: number): TocEntry[] => {
  const lines = pages.flatMap((page) => tocLinesOf(page, pageCount));
  const levelOf = levelsByIndent(lines.map((line) => line.indent));

  return lines.map((line) => ({
    title: line.title,
    page: line.page,
    level: levelOf(line.indent),
  }));
};

type HeadingCandidate = {
  title: string;
  page: number;
  fontSize: number;
  bold: boolean;
};

/**
 * Collects heading-like lines while pages stream past, then ranks them by font size
 * against the body text size once the whole document has been seen.
 */
export class HeadingScanner {
  private readonly candidates: HeadingCandidate[] = [];
  private readonly sizeCounts = new Map<number, number>();

  consumePage(page: Page): void {
    for (const line of page.lines) {
      const text = line.text.trim();
      if (!text) {
        continue;
      }

      const size = Math.round(line.fontSize);
      this.sizeCounts.set(size, (this.sizeCounts.get(size) ?? 0) + 1);

      const words = text.split(/\s+/);
      if (
        words.length <= HEADING_MAX_WORDS &&
        /[A-Za-z]/.test(text) &&
        !text.endsWith(".")
      ) {
        this.candidates.push({
          title: text,
          page: page.pageNumber,
          fontSize: size,
          bold: line.bold,
        });
      }
    }
  }

  /** Mode of the rounded line font sizes; the smaller size wins a tie. */
  bodyFontSize(): number {
    let body = 0;
    let bodyCount = 0;
    for (const [size, count] of this.sizeCounts) {
      if (count > bodyCount || (count === bodyCount && size < body)) {
        body = size;
        bodyCount = count;
      }
    }

    return body;
  }

  /**
   * Headings in document order. Repeated titles (running headers) keep their first occurrence.
   */
  entries(): TocEntry[] {
    const body = this.bodyFontSize();
    const seen = new Set<string>();
    const headings = this.candidates.filter((candidate) => {
      const isHeading =
        candidate.fontSize >= body * HEADING_SIZE_RATIO ||
        (candidate.bold && candidate.fontSize >= body);
      const key = candidate.title.toLowerCase().replace(/\s+/g, " ");
      if (!isHeading || seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });

    const sizes = [...new Set(headings.map((heading) => heading.fontSize))].sort(
      (a, b) => b - a,
    );

    return headings.map((heading) => ({
      title: heading.title,
      page: heading.page,
      level: sizes.indexOf(heading.fontSize) + 1,
    }));
  }
}

/**
 * Prefers the printed table of contents; falls back to the heading scan when it yields too few entries.
 */
export const selectTocStrategy = (
  structured: TocEntry[],
  scanner: HeadingScanner,
): TocStrategy =>
  structured.length >= MIN_STRUCTURED_ENTRIES
    ? { kind: "structured", entries: structured }
    : { kind: "heuristic_heading_scan", entries: scanner.entries() };

/**
 * Resolves the page range of the management discussion section from ordered TOC entries.
 */
export const resolveMdaRange = (
  entries: TocEntry[],
  pageCount: number,
  sectionMaxPages: number,
): Result<MdaLocation, AnalysisFailure> => {
  const matchIndex = entries.findIndex((entry) => isMdaTitle(entry.title));
  const entry = entries[matchIndex];
  if (!entry || pageCount < 1) {
    return err(
      analysisFailure(
        "section_not_found",
        "toc",
        "No management discussion heading was found",
      ),
    );
  }

  const startPage = Math.min(Math.max(entry.page, 1), pageCount);
  const next = entries
    .slice(matchIndex + 1)
    .find((candidate) => candidate.page > startPage && candidate.level <= entry.level);
  const endPage = next
    ? next.page - 1
    : startPage + sectionMaxPages - 1;

  return ok({
    entry,
    range: {
      startPage,
      endPage: Math.max(startPage, Math.min(endPage, pageCount)),
    },
  });
};
