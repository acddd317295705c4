/** Plain text extracted from a single manual page. */
export interface PageText {
  /** 1-indexed page number as printed in stored metadata. */
  pageNumber: number;
  rawText: string;
}

/**
 * Page window to read from a document source.
 * `start` is 0-indexed and inclusive, `end` is exclusive.
 */
export interface PageRange {
  start: number;
  end: number;
}
