import { describe, it, expect } from "vitest";
import type { IngestionResult, ScoredChunk } from "@manualrag/types";
import { AppError } from "@manualrag/errors";
import { parseCommand, USAGE } from "./parse-command.js";
import { summarizeIngestion } from "./ingest.js";
import { formatAnswer, formatMatch } from "./query.js";

const MATCH: ScoredChunk = {
  content: "Check the encoder cable.",
  section: "A. Encoder Alarms",
  pageStart: 41,
  pageEnd: 42,
  distance: 0.123456,
};

describe("parseCommand", () => {
  it("recognises ingest", () => {
    expect(parseCommand(["ingest"])).toEqual({ name: "ingest" });
  });

  it("joins the remaining arguments into the query", () => {
    expect(parseCommand(["query", "alarm", "102", "on", "Z"])).toEqual({
      name: "query",
      query: "alarm 102 on Z",
    });
  });

  it("leaves the query unset when none is given", () => {
    expect(parseCommand(["query"])).toEqual({ name: "query", query: undefined });
  });

  it("rejects unknown commands with usage", () => {
    expect(() => parseCommand(["serve"])).toThrow(`Unknown command "serve". ${USAGE}`);
    expect(() => parseCommand([])).toThrow(AppError);
  });
});

describe("summarizeIngestion", () => {
  it("reports counts for a completed run", () => {
    const result: IngestionResult = {
      status: "completed",
      inserted: 8,
      skipped: 2,
      chunksFound: 12,
      chunksAttempted: 10,
      quotaUsed: 1450,
    };

    expect(summarizeIngestion(result)).toBe(
      "Chunks found: 12\nChunks attempted: 10\nInserted: 8\nSkipped: 2\nQuota used today: 1450",
    );
  });

  it("explains an exhausted quota", () => {
    const result: IngestionResult = {
      status: "quota-exhausted",
      inserted: 0,
      skipped: 0,
      chunksFound: 0,
      chunksAttempted: 0,
      quotaUsed: 1460,
    };

    expect(summarizeIngestion(result)).toBe("Daily quota reached (1460 used). Try again tomorrow.");
  });
});

describe("query output", () => {
  it("prints section, pages and distance for a match", () => {
    expect(formatMatch(MATCH, 1)).toBe(
      "Result 1\nSection: A. Encoder Alarms\nPages: 41-42\nDistance: 0.1235\n" +
        "Check the encoder cable.\n" +
        "-".repeat(60),
    );
  });

  it("previews only the first 500 characters of long content", () => {
    const long = { ...MATCH, content: "x".repeat(800) };
    const lines = formatMatch(long, 2).split("\n");

    expect(lines[4]).toHaveLength(500);
  });

  it("prints the card after the matches", () => {
    const text = formatAnswer({ matches: [MATCH], card: "Cause: loose cable." });

    expect(text.startsWith("Top Matches:\n\nResult 1\n")).toBe(true);
    expect(text.endsWith("\n\nSolution Card:\n\nCause: loose cable.")).toBe(true);
  });

  it("says so when nothing matched", () => {
    expect(formatAnswer({ matches: [], card: null })).toBe("No matching manual sections found.");
  });
});
