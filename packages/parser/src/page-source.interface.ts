import type { PageRange, PageText } from "@manualrag/types";

/**
 * Provider of per-page plain text. Pages are addressed 0-indexed; the
 * returned `PageText.pageNumber` is 1-indexed.
 */
export interface IPageSource {
  readonly pageCount: number;
  readPages(range: PageRange): AsyncIterable<PageText>;
  close(): Promise<void>;
}

/**
 * Clamp a requested range to the pages a document actually has.
 * An empty range comes back as `{ start, end: start }`.
 */
export function clampRange(range: PageRange, pageCount: number): PageRange {
  const start = Math.min(Math.max(0, range.start), pageCount);
  const end = Math.min(Math.max(start, range.end), pageCount);
  return { start, end };
}

/**
 * Drain a page source into an array, in ascending page order.
 */
export async function collectPages(source: IPageSource, range: PageRange): Promise<PageText[]> {
  const pages: PageText[] = [];
  for await (const page of source.readPages(range)) {
    pages.push(page);
  }
  return pages;
}
