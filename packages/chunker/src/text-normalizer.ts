const NUL_BYTES = /\u0000/g;
// Table-of-contents leader dots ("Axis Calibration ........ 42")
const LEADER_DOTS = /\.{3,}/g;
const BLANK_LINES = /\n\s*\n/g;
const HORIZONTAL_WHITESPACE_RUN = /[^\S\n]{2,}/g;

/**
 * Clean raw page text extracted from a manual.
 *
 * Line structure survives (single newlines are kept) so that headings can
 * still be recognised line by line afterwards.
 */
export function normalizeText(raw: string): string {
  return raw
    .replace(NUL_BYTES, "")
    .replace(LEADER_DOTS, " ")
    .replace(BLANK_LINES, "\n")
    .replace(HORIZONTAL_WHITESPACE_RUN, " ")
    .trim();
}
