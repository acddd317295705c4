import { UNKNOWN_SECTION } from "@manualrag/types";
import type { Chunk, ChunkingConfig, PageText } from "@manualrag/types";
import { normalizeText } from "./text-normalizer.js";
import { isHeading } from "./heading-classifier.js";

/**
 * In-progress chunk. Owned by a single extraction pass and reset on every flush.
 */
export interface ChunkAccumulator {
  words: string[];
  /** One entry per contributing line, duplicates allowed. */
  pageNumbers: number[];
  section: string;
}

export function createAccumulator(): ChunkAccumulator {
  return { words: [], pageNumbers: [], section: UNKNOWN_SECTION };
}

/**
 * Heading-aware, word-bounded chunker for manual pages.
 *
 * Lines are accumulated until a heading or the word limit forces a flush.
 * Flushed text is kept only when it is long enough and mentions at least one
 * relevance keyword, so the output is a lossy, troubleshooting-first selection
 * rather than a full segmentation of the manual.
 */
export class ManualChunker {
  private readonly maxWords: number;
  private readonly minChunkLength: number;
  private readonly keywords: string[];

  constructor(config: ChunkingConfig) {
    this.maxWords = config.maxWords;
    this.minChunkLength = config.minChunkLength;
    this.keywords = config.keywords.map((keyword) => keyword.toLowerCase());
  }

  extractChunks(pages: Iterable<PageText>): Chunk[] {
    return [...this.streamChunks(pages)];
  }

  *streamChunks(pages: Iterable<PageText>): Generator<Chunk, void, undefined> {
    const acc = createAccumulator();

    for (const page of pages) {
      for (const rawLine of normalizeText(page.rawText).split("\n")) {
        const line = rawLine.trim();
        if (line.length === 0) continue;

        if (isHeading(line)) {
          yield* this.drain(acc);
          acc.section = line;
          continue;
        }

        for (const words of this.splitLine(line)) {
          if (acc.words.length + words.length >= this.maxWords) {
            yield* this.drain(acc);
          }
          acc.words.push(...words);
          acc.pageNumbers.push(page.pageNumber);
        }
      }
    }

    yield* this.drain(acc);
  }

  /**
   * Flush the accumulator under its current section and clear it.
   */
  private *drain(acc: ChunkAccumulator): Generator<Chunk, void, undefined> {
    if (acc.words.length === 0) return;

    const chunk = this.buildChunk(acc.words, acc.pageNumbers, acc.section);
    acc.words = [];
    acc.pageNumbers = [];

    if (chunk) yield chunk;
  }

  private buildChunk(words: string[], pageNumbers: number[], section: string): Chunk | null {
    const content = words.join(" ");
    if (content.length < this.minChunkLength) return null;
    if (!this.isRelevant(content)) return null;

    return {
      content,
      pageStart: pageNumbers.reduce((a, b) => Math.min(a, b)),
      pageEnd: pageNumbers.reduce((a, b) => Math.max(a, b)),
      section,
    };
  }

  private isRelevant(content: string): boolean {
    const lower = content.toLowerCase();
    return this.keywords.some((keyword) => lower.includes(keyword));
  }

  /**
   * Split a line into word groups. A line that alone would reach the word
   * limit is cut into pieces of `maxWords - 1` words.
   */
  private splitLine(line: string): string[][] {
    const words = line.split(/\s+/);
    if (words.length < this.maxWords) return [words];

    const size = Math.max(1, this.maxWords - 1);
    const pieces: string[][] = [];
    for (let i = 0; i < words.length; i += size) {
      pieces.push(words.slice(i, i + size));
    }
    return pieces;
  }
}
