// utils/file-name

// One naming scheme for every per-session file: {account}_{YYYYMMDD}_{HHMMSS}

import path from "path";
import moment from "moment";
import type { EventCategory, SessionPaths } from "@/types/tiktok";

export const EVENT_CATEGORIES: readonly EventCategory[] = ["comments", "gifts", "follows", "shares", "joins"];

const FileNameUtils = {
  sanitizeSign(sign: string): string {
    return sign.replace(/^@/, "").replace(/[^\w.-]/g, "_");
  },
  /** `sequence` > 0 adds a `_2`, `_3`, ... suffix for a stem that is already taken. */
  generateSessionStem(sign: string, at: Date, sequence = 0): string {
    const stem = `${FileNameUtils.sanitizeSign(sign)}_${moment(at).format("YYYYMMDD_HHmmss")}`;
    return sequence > 0 ? `${stem}_${sequence + 1}` : stem;
  },
  generateSessionPaths(dirname: string, sign: string, at: Date, sequence = 0, videoExt = "flv"): SessionPaths {
    const stem = FileNameUtils.generateSessionStem(sign, at, sequence);
    const csv = (category: EventCategory) => path.join(dirname, `${stem}_${category}.csv`);
    return {
      stem,
      video: path.join(dirname, `${stem}.${videoExt}`),
      csv: {
        comments: csv("comments"),
        gifts: csv("gifts"),
        follows: csv("follows"),
        shares: csv("shares"),
        joins: csv("joins"),
      },
    };
  },
  generateSessionLogPath(dirname: string, at: Date): string {
    return path.join(dirname, `monitoring_sessions_${moment(at).format("YYYYMMDD")}.csv`);
  },
};

export default FileNameUtils;
