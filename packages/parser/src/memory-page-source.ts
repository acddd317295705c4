import type { PageRange, PageText } from "@manualrag/types";
import { clampRange } from "./page-source.interface.js";
import type { IPageSource } from "./page-source.interface.js";

/**
 * Page source over text already held in memory, one string per page.
 */
export class InMemoryPageSource implements IPageSource {
  private readonly pages: readonly string[];

  constructor(pages: readonly string[]) {
    this.pages = pages;
  }

  get pageCount(): number {
    return this.pages.length;
  }

  async *readPages(range: PageRange): AsyncIterable<PageText> {
    const { start, end } = clampRange(range, this.pages.length);
    for (let index = start; index < end; index++) {
      yield { pageNumber: index + 1, rawText: this.pages[index] ?? "" };
    }
  }

  async close(): Promise<void> {
    // nothing held open
  }
}
