import type { Section, SectionRange } from "../../core/entities/analysis";
import type { Page } from "../../core/entities/document";
import { isMdaTitle } from "./tocLocator";

export type PageReader = (pageNumber: number) => Promise<Page>;

const PAGE_NUMBER_LINE = /^[-–\s]*(?:page\s+)?\d{1,4}(?:\s+of\s+\d{1,4})?[-–\s]*$/i;
const HEADING_LINES_CHECKED = 5;

const bodyLines = (page: Page): string[] =>
  page.lines
    .map((line) => line.text.trim())
    .filter((text) => text && !PAGE_NUMBER_LINE.test(text));

/**
 * Concatenates the text of the pages inside `range` into prose.
 * Standalone page numbers are dropped and words hyphenated across line breaks are rejoined.
 */
export const extractSection = (
  pages: Page[],
  range: SectionRange,
  name: string,
): Section => {
  const text = pages
    .filter(
      (page) =>
        page.pageNumber >= range.startPage && page.pageNumber <= range.endPage,
    )
    .sort((left, right) => left.pageNumber - right.pageNumber)
    .map((page) => bodyLines(page).join("\n"))
    .filter(Boolean)
    .join("\n")
    .replace(/([a-z])-\n([a-z])/g, "$1$2");

  return { name, startPage: range.startPage, endPage: range.endPage, text };
};

const carriesMdaHeading = (page: Page): boolean =>
  page.lines
    .slice(0, HEADING_LINES_CHECKED)
    .some((line) => isMdaTitle(line.text));

/**
 * Maps a printed (logical) page range onto physical pages.
 * When the physical start page does not open with the section heading, the nearest page within
 * `searchPages` that does sets the offset; the range is shifted by it and kept within the document.
 * An aborted `signal` ends the search at the next page and leaves the range as printed.
 */
export const alignSectionRange = async (
  range: SectionRange,
  pageCount: number,
  searchPages: number,
  readPage: PageReader,
  signal?: AbortSignal,
): Promise<SectionRange> => {
  if (signal?.aborted || carriesMdaHeading(await readPage(range.startPage))) {
    return range;
  }

  for (let distance = 1; distance <= searchPages; distance += 1) {
    for (const offset of [distance, -distance]) {
      const candidate = range.startPage + offset;
      if (candidate < 1 || candidate > pageCount) {
        continue;
      }
      if (signal?.aborted) {
        return range;
      }

      if (carriesMdaHeading(await readPage(candidate))) {
        const endPage = Math.min(pageCount, range.endPage + offset);
        return { startPage: candidate, endPage: Math.max(candidate, endPage) };
      }
    }
  }

  return range;
};
