import fs from "fs";
import logger from "@/logger";
import { formatCsvRow } from "@/utils/csv";
import FileNameUtils from "@/utils/file-name";
import { formatEventTimestamp } from "./event-sinks";
import type { CsvValue, SessionSummary } from "@/types/tiktok";

const fsp = fs.promises;

export const SESSION_LOG_HEADER = [
  "account",
  "username",
  "start_time",
  "end_time",
  "duration_minutes",
  "comments_count",
  "gifts_count",
  "follows_count",
  "shares_count",
  "joins_count",
  "unknown_count",
  "final_state",
  "terminal_reason",
  "tags",
  "notes",
] as const;

export function toSessionLogRow(summary: SessionSummary): CsvValue[] {
  const { counters } = summary;
  return [
    summary.account,
    summary.username,
    formatEventTimestamp(summary.startTime),
    formatEventTimestamp(summary.endTime),
    Math.round((summary.durationSeconds / 60) * 100) / 100,
    counters.comments,
    counters.gifts,
    counters.follows,
    counters.shares,
    counters.joins,
    counters.unknown,
    summary.finalState,
    summary.reason,
    summary.tags.join(";"),
    summary.notes,
  ];
}

/**
 * Append-only CSV with one row per finished session, one file per run.
 * Appends are serialised so rows from concurrent sessions never interleave.
 */
export default class SessionLog {
  private directory: string;
  private readonly runDate: Date;
  private chain: Promise<void> = Promise.resolve();

  constructor(directory: string, runDate = new Date()) {
    this.directory = directory;
    this.runDate = runDate;
  }

  get file() {
    return FileNameUtils.generateSessionLogPath(this.directory, this.runDate);
  }

  setDirectory(directory: string) {
    this.directory = directory;
  }

  append(summary: SessionSummary): Promise<void> {
    const task = this.chain.then(() => this.write(summary));
    this.chain = task.catch((error) => {
      logger.debug("[Session Log]", `append for ${summary.account} failed, continuing with next row`, error);
    });
    return task;
  }

  private async write(summary: SessionSummary) {
    const file = this.file;
    await fsp.mkdir(this.directory, { recursive: true });

    let content = formatCsvRow(toSessionLogRow(summary));
    try {
      await fsp.access(file);
    } catch {
      content = formatCsvRow(SESSION_LOG_HEADER) + content;
    }

    await fsp.appendFile(file, content, "utf-8");
  }
}
