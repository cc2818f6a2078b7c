import fs from "fs";
import path from "path";
import { z } from "zod";
import logger from "@/logger";
import FileNameUtils from "@/utils/file-name";
import { ConfigError, errorMessage } from "./errors";
import { diffSnapshots } from "./config-diff";
import type {
  AccountConfig,
  ConfigReload,
  ConfigSnapshot,
  GlobalSettings,
  SettingsOverrides,
} from "@/types/tiktok";

const fsp = fs.promises;

const optionalText = z
  .string()
  .nullish()
  .transform((value) => (value ? value : null));

const accountSchema = z.object({
  username: z.string().trim().min(1),
  enabled: z.boolean().default(true),
  session_id: optionalText,
  tt_target_idc: optionalText,
  tags: z.array(z.string()).default([]),
  notes: z.string().default(""),
});

const settingsSchema = z.object({
  check_interval_seconds: z.number().positive().default(30),
  max_concurrent_recordings: z.number().int().min(1).default(3),
  output_directory: z.string().min(1).default("recordings"),
  session_id: optionalText,
  tt_target_idc: optionalText,
  whitelist_sign_server: optionalText,
});

const configFileSchema = z.object({
  streamers: z.record(z.string().min(1), accountSchema).default({}),
  settings: settingsSchema.default({}),
});

export type ConfigFile = z.input<typeof configFileSchema>;

export const DEFAULT_CONFIG: ConfigFile = {
  streamers: {
    example_user1: {
      username: "@example_user1",
      enabled: false,
      session_id: null,
      tt_target_idc: null,
      tags: ["research", "category1"],
      notes: "Example streamer, set enabled to true to monitor",
    },
    example_user2: {
      username: "@example_user2",
      enabled: false,
      session_id: null,
      tt_target_idc: null,
      tags: ["research", "category2"],
      notes: "Another example streamer",
    },
  },
  settings: {
    check_interval_seconds: 30,
    max_concurrent_recordings: 3,
    output_directory: "recordings",
    session_id: null,
    tt_target_idc: "us-eastred",
    whitelist_sign_server: null,
  },
};

function normalizeHandle(username: string) {
  return username.replace(/^@/, "").toLowerCase();
}

function isMissingFile(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Owns the account file. Every successful load produces a new frozen
 * snapshot; nothing outside this class mutates configuration.
 */
export default class ConfigStore {
  public readonly file: string;
  private overrides: SettingsOverrides;
  private current: ConfigSnapshot | null = null;

  constructor(file: string, overrides: SettingsOverrides = {}) {
    this.file = path.resolve(file);
    this.overrides = overrides;
  }

  get snapshot() {
    return this.current;
  }

  async load(): Promise<ConfigSnapshot> {
    let stat: fs.Stats;
    try {
      stat = await fsp.stat(this.file);
    } catch (error) {
      if (!isMissingFile(error)) throw new ConfigError(`cannot stat ${this.file}: ${errorMessage(error)}`);
      stat = await this.writeTemplate();
    }

    let raw: string;
    try {
      raw = await fsp.readFile(this.file, "utf-8");
    } catch (error) {
      throw new ConfigError(`cannot read ${this.file}: ${errorMessage(error)}`, { cause: error });
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`malformed JSON in ${this.file}: ${errorMessage(error)}`, { cause: error });
    }

    const snapshot = this.toSnapshot(json, stat);
    this.current = snapshot;
    return snapshot;
  }

  /**
   * Returns `null` while the file's mtime and size match the last good load.
   * A failing reload throws `ConfigError` and leaves the current snapshot alone.
   */
  async reloadIfChanged(): Promise<ConfigReload | null> {
    const previous = this.current;
    if (!previous) {
      const snapshot = await this.load();
      return { snapshot, diff: diffSnapshots(snapshot, snapshot) };
    }

    let stat: fs.Stats;
    try {
      stat = await fsp.stat(this.file);
    } catch (error) {
      throw new ConfigError(`cannot stat ${this.file}: ${errorMessage(error)}`, { cause: error });
    }
    if (stat.mtimeMs === previous.source.mtimeMs && stat.size === previous.source.size) return null;

    const snapshot = await this.load();
    return { snapshot, diff: diffSnapshots(previous, snapshot) };
  }

  private async writeTemplate() {
    try {
      await fsp.mkdir(path.dirname(this.file), { recursive: true });
      await fsp.writeFile(this.file, JSON.stringify(DEFAULT_CONFIG, null, 2) + "\n", "utf-8");
      logger.info("[Config Store]", `created default config file: ${this.file}`);
      return await fsp.stat(this.file);
    } catch (error) {
      throw new ConfigError(`cannot create default config ${this.file}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private toSnapshot(json: unknown, stat: fs.Stats): ConfigSnapshot {
    const parsed = configFileSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
      throw new ConfigError(`invalid config ${this.file}: ${issues.join("; ")}`);
    }

    const accounts = new Map<string, Readonly<AccountConfig>>();
    const handles = new Map<string, string>();
    const stems = new Map<string, string>();

    for (const [key, streamer] of Object.entries(parsed.data.streamers)) {
      const handle = normalizeHandle(streamer.username);
      const owner = handles.get(handle);
      if (owner !== undefined) {
        throw new ConfigError(`invalid config ${this.file}: "${key}" and "${owner}" both use ${streamer.username}`);
      }
      handles.set(handle, key);

      // case-folded for case-insensitive filesystems
      const stem = FileNameUtils.sanitizeSign(key).toLowerCase();
      const stemOwner = stems.get(stem);
      if (stemOwner !== undefined) {
        throw new ConfigError(`invalid config ${this.file}: "${key}" and "${stemOwner}" both write files as ${stem}`);
      }
      stems.set(stem, key);

      accounts.set(
        key,
        Object.freeze({
          key,
          username: streamer.username,
          enabled: streamer.enabled,
          sessionId: streamer.session_id,
          targetIdc: streamer.tt_target_idc,
          tags: [...streamer.tags],
          notes: streamer.notes,
        })
      );
    }

    const { settings } = parsed.data;
    const overrides = this.overrides;
    const merged: GlobalSettings = {
      checkIntervalSeconds: overrides.checkIntervalSeconds ?? settings.check_interval_seconds,
      maxConcurrentRecordings: overrides.maxConcurrentRecordings ?? settings.max_concurrent_recordings,
      outputDirectory: overrides.outputDirectory ?? settings.output_directory,
      sessionId: overrides.sessionId ?? settings.session_id,
      targetIdc: overrides.targetIdc ?? settings.tt_target_idc,
      signServer: overrides.signServer ?? settings.whitelist_sign_server,
    };

    return Object.freeze({
      accounts,
      settings: Object.freeze(merged),
      source: { mtimeMs: stat.mtimeMs, size: stat.size },
    });
  }
}
