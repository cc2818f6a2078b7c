import fs from "fs";
import moment from "moment";
import logger from "@/logger";
import { formatCsvRow } from "@/utils/csv";
import FileNameUtils, { EVENT_CATEGORIES } from "@/utils/file-name";
import { SinkError, errorMessage } from "./errors";
import type { CsvValue, EventCategory, LiveEvent, RoutedEvent, SessionPaths } from "@/types/tiktok";

const MAX_STEM_ATTEMPTS = 100;

function isAlreadyExists(error: unknown) {
  const cause = error instanceof SinkError ? error.cause : error;
  return cause instanceof Error && "code" in cause && cause.code === "EEXIST";
}

export const CSV_HEADERS: Record<EventCategory, readonly string[]> = {
  comments: ["timestamp", "user_id", "nickname", "comment", "follower_count"],
  gifts: ["timestamp", "user_id", "nickname", "gift_name", "repeat_count", "streakable", "streaking"],
  follows: ["timestamp", "user_id", "nickname", "follow_count", "share_type", "action"],
  shares: ["timestamp", "user_id", "nickname", "share_type", "share_target", "share_count", "users_joined", "action"],
  joins: [
    "timestamp",
    "user_id",
    "nickname",
    "count",
    "is_top_user",
    "enter_type",
    "action",
    "user_share_type",
    "client_enter_source",
  ],
};

export type LiveDataEvent = Exclude<LiveEvent, { type: "stream-end" } | { type: "connection-error" }>;

export function formatEventTimestamp(at: Date) {
  return moment(at).format("YYYY-MM-DDTHH:mm:ss.SSS");
}

/**
 * Maps an event onto its category and CSV row. Unrecognised kinds give `null`
 * and are never written.
 */
export function routeLiveEvent(event: LiveDataEvent, receivedAt: Date): RoutedEvent | null {
  const ts = formatEventTimestamp(receivedAt);

  switch (event.type) {
    case "comment":
      return {
        category: "comments",
        row: [ts, event.user.userId, event.user.nickname, event.comment, event.followerCount],
      };
    case "gift":
      return {
        category: "gifts",
        row: [
          ts,
          event.user.userId,
          event.user.nickname,
          event.giftName,
          event.repeatCount,
          event.streakable,
          event.streaking,
        ],
      };
    case "follow":
      return {
        category: "follows",
        row: [ts, event.user.userId, event.user.nickname, event.followCount, event.shareType, event.action],
      };
    case "share":
      return {
        category: "shares",
        row: [
          ts,
          event.user.userId,
          event.user.nickname,
          event.shareType,
          event.shareTarget,
          event.shareCount,
          event.usersJoined,
          event.action,
        ],
      };
    case "join":
      return {
        category: "joins",
        row: [
          ts,
          event.user.userId,
          event.user.nickname,
          event.count,
          event.isTopUser,
          event.enterType,
          event.action,
          event.userShareType,
          event.clientEnterSource,
        ],
      };
    case "unknown":
      return null;
  }
}

export class CsvSink {
  public readonly file: string;
  private stream: fs.WriteStream;
  private failure: Error | null = null;

  private constructor(file: string, stream: fs.WriteStream) {
    this.file = file;
    this.stream = stream;
    this.stream.on("error", (err) => {
      this.failure = err;
      logger.error("[Event Sink]", `write stream ${file} failed: ${err.message}`);
    });
  }

  static open(file: string, header: readonly string[]): Promise<CsvSink> {
    return new Promise<CsvSink>((resolve, reject) => {
      const stream = fs.createWriteStream(file, { flags: "wx", encoding: "utf-8" });
      const onError = (err: Error) => reject(new SinkError(file, `cannot open ${file}: ${err.message}`, { cause: err }));
      stream.once("error", onError);
      stream.once("open", () => {
        stream.removeListener("error", onError);
        resolve(new CsvSink(file, stream));
      });
    }).then(async (sink) => {
      await sink.write(header);
      return sink;
    });
  }

  write(values: readonly CsvValue[]): Promise<void> {
    if (this.failure) return Promise.reject(new SinkError(this.file, `${this.file}: ${this.failure.message}`));

    return new Promise<void>((resolve, reject) => {
      this.stream.write(formatCsvRow(values), (err) => {
        if (err) reject(new SinkError(this.file, `write to ${this.file} failed: ${err.message}`, { cause: err }));
        else resolve();
      });
    });
  }

  close(): Promise<void> {
    if (this.stream.destroyed || this.stream.writableFinished) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.stream.end(() => resolve());
    });
  }

  destroy() {
    this.stream.destroy();
  }
}

/** The five per-session CSV files, opened together and closed together. */
export class EventSinks {
  private sinks: Map<EventCategory, CsvSink>;

  private constructor(sinks: Map<EventCategory, CsvSink>) {
    this.sinks = sinks;
  }

  static async open(paths: SessionPaths): Promise<EventSinks> {
    const sinks = new Map<EventCategory, CsvSink>();
    try {
      for (const category of EVENT_CATEGORIES) {
        sinks.set(category, await CsvSink.open(paths.csv[category], CSV_HEADERS[category]));
      }
    } catch (error) {
      sinks.forEach((sink) => sink.destroy());
      throw error instanceof SinkError ? error : new SinkError(paths.stem, errorMessage(error), { cause: error });
    }
    return new EventSinks(sinks);
  }

  /** Opens under the first free stem: `<stem>`, then `<stem>_2`, `<stem>_3`, ... */
  static async openUnique(
    dirname: string,
    sign: string,
    at: Date
  ): Promise<{ paths: SessionPaths; sinks: EventSinks }> {
    for (let sequence = 0; ; sequence++) {
      const paths = FileNameUtils.generateSessionPaths(dirname, sign, at, sequence);
      try {
        return { paths, sinks: await EventSinks.open(paths) };
      } catch (error) {
        if (!isAlreadyExists(error) || sequence + 1 >= MAX_STEM_ATTEMPTS) throw error;
      }
    }
  }

  write({ category, row }: RoutedEvent): Promise<void> {
    const sink = this.sinks.get(category);
    if (!sink) return Promise.reject(new SinkError(category, `no sink for ${category}`));
    return sink.write(row);
  }

  async close(): Promise<void> {
    await Promise.all(Array.from(this.sinks.values()).map((sink) => sink.close()));
  }

  destroy() {
    this.sinks.forEach((sink) => sink.destroy());
  }
}
