import fs from "fs";
import path from "path";
import logger from "@/logger";
import { errorMessage } from "./errors";
import type { ControlAction, ControlChannelOptions, StatusRecord } from "@/types/tiktok";

const fsp = fs.promises;

export const DEFAULT_PAUSE_SECONDS = 300;

/**
 * Filesystem control protocol. A stop marker (any content, used as the
 * reason) ends the monitor; a pause marker suspends probing for the number of
 * seconds it contains, or the default. Markers are deleted once acted upon.
 * Concurrent writers to the same marker get at-least-once pickup within one
 * poll and nothing more.
 */
export default class ControlChannel {
  public readonly stopFile: string;
  public readonly pauseFile: string;
  public readonly statusFile: string;
  private defaultPauseSeconds: number;

  constructor(options: ControlChannelOptions) {
    this.stopFile = path.resolve(options.directory, options.stopFile ?? "monitor.stop");
    this.pauseFile = path.resolve(options.directory, options.pauseFile ?? "monitor.pause");
    this.statusFile = path.resolve(options.directory, options.statusFile ?? "monitor_status.json");
    this.defaultPauseSeconds = options.defaultPauseSeconds ?? DEFAULT_PAUSE_SECONDS;
  }

  async poll(): Promise<ControlAction> {
    const stop = await this.consume(this.stopFile);
    if (stop !== null) {
      const reason = stop.trim() || "stop marker";
      logger.info("[Control]", `stop requested: ${reason}`);
      return { type: "stop", reason };
    }

    const pause = await this.consume(this.pauseFile);
    if (pause !== null) {
      const seconds = parsePauseSeconds(pause, this.defaultPauseSeconds);
      logger.info("[Control]", `pause requested for ${seconds}s`);
      return { type: "pause", seconds };
    }

    return { type: "none" };
  }

  async writeStatus(record: StatusRecord): Promise<void> {
    const temp = `${this.statusFile}.${process.pid}.tmp`;
    try {
      await fsp.writeFile(temp, JSON.stringify(record, null, 2), "utf-8");
      await fsp.rename(temp, this.statusFile);
    } catch (error) {
      logger.warn("[Control]", `failed to write status file ${this.statusFile}: ${errorMessage(error)}`);
    }
  }

  /** Marker content, or `null` when absent. A present but unreadable marker counts as empty. */
  private async consume(file: string): Promise<string | null> {
    let content: string;
    try {
      content = await fsp.readFile(file, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
      logger.warn("[Control]", `marker ${file} is present but unreadable: ${errorMessage(error)}`);
      content = "";
    }

    try {
      await fsp.unlink(file);
    } catch (error) {
      logger.warn("[Control]", `failed to remove marker ${file}, it may fire again: ${errorMessage(error)}`);
    }

    return content;
  }
}

export function parsePauseSeconds(content: string, fallback: number) {
  const text = content.trim();
  if (!/^\d+$/.test(text)) return fallback;
  const seconds = parseInt(text, 10);
  return seconds > 0 ? seconds : fallback;
}
