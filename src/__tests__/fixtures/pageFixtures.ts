import type {
  Page,
  PageLine,
  PositionedWord,
} from "../../core/entities/document";

type LineOptions = {
  x?: number;
  y?: number;
  fontSize?: number;
  bold?: boolean;
};

export type TableCell = {
  text: string;
  /** Right edge of the cell on the page, in points. */
  right: number;
};

const DEFAULT_FONT_SIZE = 10;
const CHAR_WIDTH_RATIO = 0.5;

const wordsOf = (
  text: string,
  offset: number,
  x: number,
  charWidth: number,
  options: Required<Pick<LineOptions, "y" | "fontSize" | "bold">>,
): PositionedWord[] =>
  Array.from(text.matchAll(/\S+/g), (match) => {
    const start = match.index ?? 0;
    return {
      text: match[0],
      bbox: {
        x: x + start * charWidth,
        y: options.y,
        width: match[0].length * charWidth,
        height: options.fontSize,
      },
      fontSize: options.fontSize,
      bold: options.bold,
      start: offset + start,
      end: offset + start + match[0].length,
    };
  });

const lineOf = (
  text: string,
  words: PositionedWord[],
  fontSize: number,
  bold: boolean,
  y: number,
): PageLine => {
  const left = Math.min(...words.map((word) => word.bbox.x));
  const right = Math.max(...words.map((word) => word.bbox.x + word.bbox.width));
  return {
    text,
    words,
    bbox: { x: left, y, width: right - left, height: fontSize },
    fontSize,
    bold,
  };
};

/**
 * Lays a line of text out left to right from `x`, one fixed-width cell per character.
 */
export const textLine = (text: string, options: LineOptions = {}): PageLine => {
  const fontSize = options.fontSize ?? DEFAULT_FONT_SIZE;
  const bold = options.bold ?? false;
  const y = options.y ?? 700;
  const words = wordsOf(text, 0, options.x ?? 50, fontSize * CHAR_WIDTH_RATIO, {
    y,
    fontSize,
    bold,
  });

  return lineOf(text, words, fontSize, bold, y);
};

/**
 * Lays out a table row: the label starts at x=50 and each cell is right-aligned at its `right` edge.
 */
export const tableLine = (
  label: string,
  cells: TableCell[],
  options: LineOptions = {},
): PageLine => {
  const fontSize = options.fontSize ?? DEFAULT_FONT_SIZE;
  const bold = options.bold ?? false;
  const y = options.y ?? 700;
  const charWidth = fontSize * CHAR_WIDTH_RATIO;
  const style = { y, fontSize, bold };

  const words = wordsOf(label, 0, options.x ?? 50, charWidth, style);
  let text = label;
  for (const cell of cells) {
    const offset = text ? text.length + 1 : 0;
    text = text ? `${text} ${cell.text}` : cell.text;
    const cellX = cell.right - cell.text.length * charWidth;
    words.push(...wordsOf(cell.text, offset, cellX, charWidth, style));
  }

  return lineOf(text, words, fontSize, bold, y);
};

export const pageOf = (pageNumber: number, lines: PageLine[]): Page => ({
  pageNumber,
  text: lines.map((line) => line.text).join("\n"),
  lines,
});

/**
 * Builds a page from plain text, one line per newline, top to bottom.
 */
export const textPage = (
  pageNumber: number,
  text: string,
  options: Omit<LineOptions, "y"> = {},
): Page =>
  pageOf(
    pageNumber,
    text
      .split("\n")
      .filter((line) => line.trim())
      .map((line, index) => textLine(line, { ...options, y: 780 - index * 14 })),
  );
