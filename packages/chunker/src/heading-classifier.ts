export type HeadingKind = "numbered" | "chapter" | "all-caps" | "lettered";

export interface HeadingMatcher {
  readonly kind: HeadingKind;
  readonly pattern: RegExp;
}

/**
 * Manual-style heading heuristics, checked in order against the whole
 * trimmed line. None of the patterns carries the `g` flag, so `test` stays
 * stateless across calls.
 */
export const HEADING_MATCHERS: readonly HeadingMatcher[] = [
  // "3.2 Axis Calibration"
  { kind: "numbered", pattern: /^\d+[.\d]*\s+[A-Z].{3,}$/ },
  // "CHAPTER 4 Maintenance"
  { kind: "chapter", pattern: /^CHAPTER\s+\w+.*$/ },
  // "TROUBLESHOOTING"
  { kind: "all-caps", pattern: /^[A-Z][A-Z\s]{4,}$/ },
  // "A. Safety Notes"
  { kind: "lettered", pattern: /^[A-Z]\.\s+[A-Z].{3,}$/ },
];

/**
 * Return the kind of the first matcher that accepts the line, or null when
 * the line reads as body text.
 */
export function classifyHeading(line: string): HeadingKind | null {
  const trimmed = line.trim();
  const match = HEADING_MATCHERS.find((matcher) => matcher.pattern.test(trimmed));
  return match ? match.kind : null;
}

export function isHeading(line: string): boolean {
  return classifyHeading(line) !== null;
}
