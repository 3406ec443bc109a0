import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { err, ok, type Result } from "neverthrow";
import {
  getDocument,
  GlobalWorkerOptions,
} from "pdfjs-dist/legacy/build/pdf.mjs";
import {
  analysisFailure,
  type AnalysisFailure,
} from "../../core/entities/appError";
import type {
  Page,
  PageLine,
  PositionedWord,
} from "../../core/entities/document";
import type {
  PdfPageSource,
  PdfTextLayerPort,
} from "../../core/ports/inboundPorts";
import { logger } from "../../shared/logger/logger";

export type TextFragment = {
  text: string;
  x: number;
  y: number;
  width: number;
  fontSize: number;
  bold: boolean;
};

type LoadingTask = ReturnType<typeof getDocument>;
type DocumentProxy = Awaited<LoadingTask["promise"]>;

const Y_BUCKET_TOLERANCE = 2;
const BOLD_FONT = /bold|black|heavy|semibold|demi/i;

const configurePdfJsWorker = () => {
  const candidatePaths = [
    path.join(process.cwd(), "node_modules/pdfjs-dist/legacy/build/pdf.worker.mjs"),
    path.join(process.cwd(), "node_modules/pdfjs-dist/build/pdf.worker.mjs"),
  ];

  const resolvedPath = candidatePaths.find((candidate) => fs.existsSync(candidate));
  if (resolvedPath) {
    GlobalWorkerOptions.workerSrc = pathToFileURL(resolvedPath).href;
  }
};

configurePdfJsWorker();

const messageOf = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Splits a text run into words, spreading the run width over its characters.
 */
const wordsOfFragment = (fragment: TextFragment): TextFragment[] => {
  const charWidth = fragment.text.length > 0 ? fragment.width / fragment.text.length : 0;
  return Array.from(fragment.text.matchAll(/\S+/g), (match) => ({
    ...fragment,
    text: match[0],
    x: fragment.x + (match.index ?? 0) * charWidth,
    width: match[0].length * charWidth,
  }));
};

const buildLine = (fragments: TextFragment[]): PageLine | null => {
  const ordered = fragments
    .flatMap(wordsOfFragment)
    .sort((left, right) => left.x - right.x);
  if (ordered.length === 0) {
    return null;
  }

  let text = "";
  const words: PositionedWord[] = ordered.map((word) => {
    const start = text ? text.length + 1 : 0;
    text = text ? `${text} ${word.text}` : word.text;
    return {
      text: word.text,
      bbox: { x: word.x, y: word.y, width: word.width, height: word.fontSize },
      fontSize: word.fontSize,
      bold: word.bold,
      start,
      end: start + word.text.length,
    };
  });

  const left = Math.min(...words.map((word) => word.bbox.x));
  const right = Math.max(...words.map((word) => word.bbox.x + word.bbox.width));
  const fontSize = Math.max(...words.map((word) => word.fontSize));
  const y = Math.min(...words.map((word) => word.bbox.y));

  return {
    text,
    words,
    bbox: { x: left, y, width: right - left, height: fontSize },
    fontSize,
    bold: words.every((word) => word.bold),
  };
};

/**
 * Groups text runs into lines by baseline, top of the page first.
 */
export const linesFromFragments = (fragments: TextFragment[]): PageLine[] => {
  const buckets = new Map<number, TextFragment[]>();
  for (const fragment of fragments) {
    const key = Math.round(fragment.y / Y_BUCKET_TOLERANCE);
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.push(fragment);
    } else {
      buckets.set(key, [fragment]);
    }
  }

  return [...buckets.entries()]
    .sort((left, right) => right[0] - left[0])
    .map(([, bucket]) => buildLine(bucket))
    .filter((line): line is PageLine => line !== null);
};

class PdfjsPageSource implements PdfPageSource {
  constructor(
    private readonly loadingTask: LoadingTask,
    private readonly document: DocumentProxy,
  ) {}

  get pageCount(): number {
    return this.document.numPages;
  }

  /**
   * Reads one page's text layer. A page whose text cannot be read comes back empty.
   */
  async readPage(pageNumber: number): Promise<Page> {
    try {
      const page = await this.document.getPage(pageNumber);
      const textContent = await page.getTextContent();
      const fragments: TextFragment[] = [];
      for (const item of textContent.items) {
        if (!("str" in item) || !item.str.trim()) {
          continue;
        }

        const [scaleX = 0, skewY = 0, skewX = 0, scaleY = 0, x = 0, y = 0] =
          item.transform;
        const fontFamily = textContent.styles[item.fontName]?.fontFamily ?? "";
        fragments.push({
          text: item.str,
          x,
          y,
          width: item.width,
          fontSize:
            item.height > 0
              ? item.height
              : Math.hypot(skewX, scaleY) || Math.hypot(scaleX, skewY),
          bold: BOLD_FONT.test(item.fontName) || BOLD_FONT.test(fontFamily),
        });
      }
      page.cleanup();

      const lines = linesFromFragments(fragments);
      return {
        pageNumber,
        text: lines.map((line) => line.text).join("\n"),
        lines,
      };
    } catch (error) {
      logger.warn(
        { pageNumber, message: messageOf(error) },
        "Skipping unreadable page text layer",
      );
      return { pageNumber, text: "", lines: [] };
    }
  }

  async close(): Promise<void> {
    await this.loadingTask.destroy();
  }
}

/**
 * Opens PDFs with pdf.js and exposes their text layer page by page.
 */
export class PdfjsTextLayer implements PdfTextLayerPort {
  async open(
    content: Uint8Array,
  ): Promise<Result<PdfPageSource, AnalysisFailure>> {
    const loadingTask = getDocument({
      data: new Uint8Array(content),
      useSystemFonts: true,
      disableFontFace: true,
      verbosity: 0,
    });

    try {
      const document = await loadingTask.promise;
      return ok(new PdfjsPageSource(loadingTask, document));
    } catch (error) {
      await loadingTask.destroy();
      return err(
        analysisFailure(
          "unreadable_pdf",
          "text_layer",
          `The file is not a readable PDF: ${messageOf(error)}`,
          error,
        ),
      );
    }
  }
}
