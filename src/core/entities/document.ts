export type StoredDocument = {
  fileId: string;
  fileName: string;
  content: Uint8Array;
  pageCount: number;
  byteSize: number;
  createdAt: Date;
};

export type BoundingBox = {
  x: number;
  y: number;
  width: number;
  height: number;
};

/**
 * One whitespace-delimited word of a text line. `start`/`end` index into the line text.
 */
export type PositionedWord = {
  text: string;
  bbox: BoundingBox;
  fontSize: number;
  bold: boolean;
  start: number;
  end: number;
};

export type PageLine = {
  text: string;
  words: PositionedWord[];
  bbox: BoundingBox;
  fontSize: number;
  bold: boolean;
};

/**
 * Text layer of one physical page. `pageNumber` is 1-based.
 * A page without extractable text has empty `text` and no lines.
 */
export type Page = {
  pageNumber: number;
  text: string;
  lines: PageLine[];
};
