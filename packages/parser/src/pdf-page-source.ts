import { readFile } from "node:fs/promises";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { PageRange, PageText } from "@manualrag/types";
import { DocumentSourceError, errorMessage } from "@manualrag/errors";
import { clampRange } from "./page-source.interface.js";
import type { IPageSource } from "./page-source.interface.js";

type PdfDocument = Awaited<ReturnType<typeof getDocument>["promise"]>;

/** The parts of a pdf.js text item this module reads. */
export interface TextRun {
  str: string;
  hasEOL: boolean;
}

/** Marked-content boundaries carry no text. */
export interface MarkedContent {
  type: string;
}

/**
 * Join pdf.js text items into plain text. Items that end a visual line
 * (`hasEOL`) become line breaks so headings stay on their own line.
 */
export function joinTextItems(items: ReadonlyArray<TextRun | MarkedContent>): string {
  let text = "";
  for (const item of items) {
    if (!("str" in item)) continue;
    text += item.str;
    if (item.hasEOL) text += "\n";
  }
  return text;
}

/**
 * PDF page source backed by Mozilla's pdfjs-dist (legacy Node build).
 * Reads the file once and extracts text page by page on demand.
 */
export class PdfPageSource implements IPageSource {
  private readonly doc: PdfDocument;
  private readonly path: string;

  private constructor(doc: PdfDocument, path: string) {
    this.doc = doc;
    this.path = path;
  }

  static async open(path: string): Promise<PdfPageSource> {
    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(path));
    } catch (err: unknown) {
      throw new DocumentSourceError(`Cannot read PDF: ${errorMessage(err)}`, path, { cause: err });
    }

    try {
      const doc = await getDocument({ data, useSystemFonts: true, isEvalSupported: false }).promise;
      return new PdfPageSource(doc, path);
    } catch (err: unknown) {
      throw new DocumentSourceError(`Cannot parse PDF: ${errorMessage(err)}`, path, {
        cause: err,
      });
    }
  }

  get pageCount(): number {
    return this.doc.numPages;
  }

  async *readPages(range: PageRange): AsyncIterable<PageText> {
    const { start, end } = clampRange(range, this.doc.numPages);
    for (let index = start; index < end; index++) {
      yield { pageNumber: index + 1, rawText: await this.readPage(index) };
    }
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }

  private async readPage(index: number): Promise<string> {
    try {
      // pdf.js numbers pages from 1
      const page = await this.doc.getPage(index + 1);
      const content = await page.getTextContent();
      page.cleanup();
      return joinTextItems(content.items);
    } catch (err: unknown) {
      throw new DocumentSourceError(
        `Cannot extract text from page ${String(index + 1)}: ${errorMessage(err)}`,
        this.path,
        { cause: err },
      );
    }
  }
}
