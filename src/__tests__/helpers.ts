/**
 * In-process stand-ins for the platform client and ffmpeg, plus small
 * filesystem helpers shared by the suites.
 */

import EventEmitter from "events";
import fs from "fs";
import os from "os";
import path from "path";
import { Tiktok } from "@/types/tiktok";
import type {
  AccountConfig,
  GlobalSettings,
  LiveConnectionInfo,
  LiveEvent,
  LiveEventClient,
  SessionRecorder,
  SessionSummary,
  VideoCapture,
  VideoCaptureEvents,
} from "@/types/tiktok";

export function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export async function makeTempDir(prefix = "live-monitor-") {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function readLines(file: string) {
  const content = await fs.promises.readFile(file, "utf-8");
  return content.split("\n").filter((line) => line.length > 0);
}

export async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await fs.promises.readFile(file, "utf-8"));
}

/** Writes `data` as the config file and pushes its mtime forward so a reload always notices. */
export async function writeConfig(file: string, data: unknown, bumpSeconds = 0) {
  await fs.promises.writeFile(file, JSON.stringify(data, null, 2), "utf-8");
  if (bumpSeconds) {
    const at = new Date(Date.now() + bumpSeconds * 1000);
    await fs.promises.utimes(file, at, at);
  }
}

export function makeAccount(key: string, overrides: Partial<AccountConfig> = {}): AccountConfig {
  return {
    key,
    username: `@${key}`,
    enabled: true,
    sessionId: null,
    targetIdc: null,
    tags: [],
    notes: "",
    ...overrides,
  };
}

export function makeSettings(overrides: Partial<GlobalSettings> = {}): GlobalSettings {
  return {
    checkIntervalSeconds: 30,
    maxConcurrentRecordings: 3,
    outputDirectory: "recordings",
    sessionId: null,
    targetIdc: null,
    signServer: null,
    ...overrides,
  };
}

export class FakeEventClient implements LiveEventClient {
  public connectResult: LiveConnectionInfo = { roomId: "7000000000000000001", streamUrl: "https://pull.test/live.flv" };
  public connectError: Error | null = null;
  /** When set, connect waits for it before settling. */
  public connectGate: Promise<void> | null = null;
  public connected = false;
  public disconnects = 0;

  private onEvent: ((event: LiveEvent) => void) | null = null;

  async connect(onEvent: (event: LiveEvent) => void): Promise<LiveConnectionInfo> {
    this.onEvent = onEvent;
    if (this.connectGate) await this.connectGate;
    if (this.connectError) throw this.connectError;
    this.connected = true;
    return this.connectResult;
  }

  async disconnect() {
    this.disconnects++;
    this.connected = false;
  }

  push(event: LiveEvent) {
    this.onEvent?.(event);
  }
}

export class FakeVideoCapture extends EventEmitter<VideoCaptureEvents> implements VideoCapture {
  public started: { input: string; output: string } | null = null;
  public stops = 0;
  public kills = 0;
  /** When set, stop never settles. */
  public hangOnStop = false;

  start(input: string, output: string) {
    this.started = { input, output };
  }

  stop(): Promise<void> {
    this.stops++;
    return this.hangOnStop ? new Promise<void>(() => undefined) : Promise.resolve();
  }

  kill() {
    this.kills++;
  }
}

/** Recorder stand-in whose lifecycle the test drives by hand. */
export class FakeRecorder implements SessionRecorder {
  public state = Tiktok.SessionState.IDLE;
  public readonly done: Promise<SessionSummary>;
  public readonly stopReasons: string[] = [];

  private resolveDone: (summary: SessionSummary) => void;

  constructor(public readonly account: AccountConfig) {
    const { promise, resolve } = deferred<SessionSummary>();
    this.done = promise;
    this.resolveDone = resolve;
  }

  async start() {
    this.state = Tiktok.SessionState.RECORDING;
  }

  stop(reason: string) {
    this.stopReasons.push(reason);
    this.finish(reason);
    return this.done;
  }

  finish(reason: string, finalState: SessionSummary["finalState"] = Tiktok.SessionState.CLOSED) {
    if (this.state === Tiktok.SessionState.CLOSED || this.state === Tiktok.SessionState.FAILED) return;
    this.state = finalState;
    const at = new Date();
    this.resolveDone({
      account: this.account.key,
      username: this.account.username,
      startTime: at,
      endTime: at,
      durationSeconds: 0,
      counters: { comments: 0, gifts: 0, follows: 0, shares: 0, joins: 0, unknown: 0 },
      finalState,
      reason,
      stem: null,
      tags: this.account.tags,
      notes: this.account.notes,
    });
  }
}
