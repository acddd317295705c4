import { z } from "zod";
import type { AppConfig } from "@manualrag/types";
import { ConfigurationError } from "@manualrag/errors";

export const DEFAULT_RELEVANCE_KEYWORDS = [
  "error",
  "alarm",
  "fault",
  "parameter",
  "axis",
  "reset",
  "homing",
  "speed",
  "motor",
  "limit",
  "gain",
  "calibration",
  "warning",
  "failure",
  "overload",
  "encoder",
] as const;

export const MAX_CHUNK_WORDS = 5000;

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Zod schema for every environment variable the CLI reads.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string({ required_error: "DATABASE_URL is required" })
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://") || url.startsWith("postgres://"), {
        message: "DATABASE_URL must start with postgresql:// or postgres://",
      }),

    // ---------- Gemini ----------
    GEMINI_API_KEY: z
      .string({ required_error: "GEMINI_API_KEY is required" })
      .min(1, "GEMINI_API_KEY is required"),
    GEMINI_EMBED_MODEL: z.string().default("gemini-embedding-001"),
    GEMINI_GENERATION_MODEL: z.string().default("gemini-2.5-flash"),

    // ---------- Manual source ----------
    MANUAL_PDF_PATH: z.string().min(1).default("manuals/manual.pdf"),
    MANUAL_START_PAGE: nonNegativeInt("20"),
    MANUAL_END_PAGE: positiveInt("200"),

    // ---------- Chunking ----------
    CHUNK_MAX_WORDS: z
      .string()
      .default("350")
      .transform(Number)
      .pipe(z.number().int().positive().max(MAX_CHUNK_WORDS)),
    CHUNK_MIN_LENGTH: nonNegativeInt("150"),
    RELEVANCE_KEYWORDS: z
      .string()
      .default(DEFAULT_RELEVANCE_KEYWORDS.join(","))
      .transform((val) =>
        val
          .split(",")
          .map((keyword) => keyword.trim().toLowerCase())
          .filter((keyword) => keyword.length > 0),
      )
      .pipe(z.array(z.string()).min(1, "RELEVANCE_KEYWORDS must name at least one keyword")),

    // ---------- Quota ----------
    QUOTA_DAILY_LIMIT: positiveInt("1500"),
    QUOTA_SAFETY_BUFFER: nonNegativeInt("50"),
    QUOTA_FILE: z.string().min(1).default(".gemini_quota.json"),

    // ---------- Pacing / retrieval ----------
    EMBED_DELAY_MS: nonNegativeInt("1200"),
    SEARCH_TOP_K: positiveInt("3"),
  })
  .superRefine((env, ctx) => {
    if (env.MANUAL_END_PAGE <= env.MANUAL_START_PAGE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["MANUAL_END_PAGE"],
        message: "MANUAL_END_PAGE must be greater than MANUAL_START_PAGE",
      });
    }
    if (env.QUOTA_SAFETY_BUFFER >= env.QUOTA_DAILY_LIMIT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QUOTA_SAFETY_BUFFER"],
        message: "QUOTA_SAFETY_BUFFER must be smaller than QUOTA_DAILY_LIMIT",
      });
    }
  });

function toFieldErrors(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join(".") : "env";
    fields[key] ??= issue.message;
  }
  return fields;
}

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ConfigurationError listing every invalid variable.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const fields = toFieldErrors(result.error);
    throw new ConfigurationError(
      `Invalid configuration: ${Object.entries(fields)
        .map(([key, message]) => `${key} (${message})`)
        .join(", ")}`,
      fields,
    );
  }
  const parsed = result.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
    },

    gemini: {
      apiKey: parsed.GEMINI_API_KEY,
      embedModel: parsed.GEMINI_EMBED_MODEL,
      generationModel: parsed.GEMINI_GENERATION_MODEL,
    },

    manual: {
      pdfPath: parsed.MANUAL_PDF_PATH,
      startPage: parsed.MANUAL_START_PAGE,
      endPage: parsed.MANUAL_END_PAGE,
    },

    chunking: {
      maxWords: parsed.CHUNK_MAX_WORDS,
      minChunkLength: parsed.CHUNK_MIN_LENGTH,
      keywords: parsed.RELEVANCE_KEYWORDS,
    },

    quota: {
      dailyLimit: parsed.QUOTA_DAILY_LIMIT,
      safetyBuffer: parsed.QUOTA_SAFETY_BUFFER,
      filePath: parsed.QUOTA_FILE,
    },

    ingestion: {
      delayMs: parsed.EMBED_DELAY_MS,
    },

    search: {
      topK: parsed.SEARCH_TOP_K,
    },
  };
}
