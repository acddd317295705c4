import { readFile, rename, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { QuotaState } from "@manualrag/types";
import { QuotaStateError, errorMessage } from "@manualrag/errors";

const quotaFileSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "date must be YYYY-MM-DD"),
  used: z.number().int().nonnegative(),
});

export interface QuotaTrackerOptions {
  filePath: string;
  dailyLimit: number;
  safetyBuffer: number;
  /** Clock used to decide which calendar day usage belongs to. */
  now?: () => Date;
}

/**
 * Format a date as YYYY-MM-DD in the local time zone.
 */
export function toCalendarDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${String(date.getFullYear())}-${month}-${day}`;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * File-backed daily budget for embedding requests.
 *
 * The ledger is rewritten after every recorded call, so a crash loses at
 * most the one call that completed before the write. Reads and writes are
 * not locked: one ingestion run at a time owns the file.
 */
export class QuotaTracker {
  private readonly filePath: string;
  private readonly dailyLimit: number;
  private readonly safetyBuffer: number;
  private readonly now: () => Date;

  constructor(options: QuotaTrackerOptions) {
    this.filePath = options.filePath;
    this.dailyLimit = options.dailyLimit;
    this.safetyBuffer = options.safetyBuffer;
    this.now = options.now ?? (() => new Date());
  }

  get limit(): number {
    return this.dailyLimit;
  }

  today(): string {
    return toCalendarDate(this.now());
  }

  /**
   * Read today's usage. A missing file or a ledger from an earlier day
   * starts a fresh count; an unreadable ledger is fatal rather than reset.
   */
  async load(): Promise<QuotaState> {
    const today = this.today();

    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch (err: unknown) {
      if (isMissingFile(err)) {
        return { date: today, used: 0 };
      }
      throw new QuotaStateError(
        `Cannot read quota file: ${errorMessage(err)}`,
        this.filePath,
        { cause: err },
      );
    }

    const stored = this.parse(raw);
    if (stored.date !== today) {
      return { date: today, used: 0 };
    }
    return stored;
  }

  /**
   * Requests still allowed today; zero or negative once the buffered limit is hit.
   */
  remaining(state: QuotaState): number {
    return this.dailyLimit - this.safetyBuffer - state.used;
  }

  /**
   * Charge one embedding call and persist the new count before returning it.
   */
  async recordUse(state: QuotaState): Promise<QuotaState> {
    const next: QuotaState = { date: state.date, used: state.used + 1 };
    await this.save(next);
    return next;
  }

  private parse(raw: string): QuotaState {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err: unknown) {
      throw new QuotaStateError(
        `Quota file is not valid JSON: ${errorMessage(err)}`,
        this.filePath,
        { cause: err },
      );
    }

    const result = quotaFileSchema.safeParse(json);
    if (!result.success) {
      throw new QuotaStateError("Quota file has an unexpected shape", this.filePath, {
        details: { issues: result.error.issues.map((issue) => issue.message) },
      });
    }
    return result.data;
  }

  private async save(state: QuotaState): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    try {
      await mkdir(dirname(this.filePath), { recursive: true });
      await writeFile(tempPath, JSON.stringify(state), "utf8");
      await rename(tempPath, this.filePath);
    } catch (err: unknown) {
      throw new QuotaStateError(
        `Cannot write quota file: ${errorMessage(err)}`,
        this.filePath,
        { cause: err },
      );
    }
  }
}
