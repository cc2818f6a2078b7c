import type { EventEmitter } from "events";
import type ConfigStore from "@/lib/tiktok/config-store";
import type ControlChannel from "@/lib/tiktok/control-channel";
import type LivenessPoller from "@/lib/tiktok/live-monitor";
import type SessionLog from "@/lib/tiktok/session-log";

export namespace Tiktok {
  export enum SessionState {
    IDLE = "idle",
    CONNECTING = "connecting",
    RECORDING = "recording",
    FINALIZING = "finalizing",
    CLOSED = "closed",
    FAILED = "failed",
  }

  export enum Liveness {
    LIVE = "live",
    NOT_LIVE = "not_live",
    UNKNOWN = "unknown",
  }

  export enum MonitorStatus {
    STARTING = "starting",
    RUNNING = "running",
    PAUSED = "paused",
    STOPPING = "stopping",
    STOPPED = "stopped",
  }
}

// CONFIG

export interface AccountConfig {
  key: string;
  username: string; // "@handle"
  enabled: boolean;
  sessionId: string | null;
  targetIdc: string | null; // data-center routing hint, e.g. "us-eastred"
  tags: string[];
  notes: string;
}

export interface GlobalSettings {
  checkIntervalSeconds: number;
  maxConcurrentRecordings: number;
  outputDirectory: string;
  sessionId: string | null;
  targetIdc: string | null;
  signServer: string | null; // sign provider host, e.g. "tiktok.eulerstream.com"
}

export type SettingsOverrides = Partial<GlobalSettings>;

export interface ConfigSnapshot {
  readonly accounts: ReadonlyMap<string, Readonly<AccountConfig>>;
  readonly settings: Readonly<GlobalSettings>;
  readonly source: { mtimeMs: number; size: number };
}

export interface ConfigDiff {
  added: string[];
  removed: string[];
  toggledOn: string[];
  toggledOff: string[];
  changedMetadata: string[];
  settingsChanged: boolean;
}

export interface ConfigReload {
  snapshot: ConfigSnapshot;
  diff: ConfigDiff;
}

// CONTROL

export type ControlAction =
  | { type: "none" }
  | { type: "stop"; reason: string }
  | { type: "pause"; seconds: number };

// monitor_status.json
export interface StatusRecord {
  timestamp: string;
  status: Tiktok.MonitorStatus;
  active_recordings: number;
  currently_recording: string[];
  extra_info: string;
  pid: number;
}

export type ControlChannelOptions = {
  directory: string;
  stopFile?: string;
  pauseFile?: string;
  statusFile?: string;
  defaultPauseSeconds?: number;
};

// LIVE EVENTS

export interface LiveUser {
  userId: string;
  nickname: string;
}

export type LiveEvent =
  | { type: "comment"; user: LiveUser; comment: string; followerCount: number }
  | {
      type: "gift";
      user: LiveUser;
      giftName: string;
      repeatCount: number;
      streakable: boolean;
      streaking: boolean;
    }
  | { type: "follow"; user: LiveUser; followCount: number; shareType: number; action: number }
  | {
      type: "share";
      user: LiveUser;
      shareType: number;
      shareTarget: string;
      shareCount: number;
      usersJoined: number;
      action: number;
    }
  | {
      type: "join";
      user: LiveUser;
      count: number;
      isTopUser: boolean;
      enterType: number;
      action: number;
      userShareType: string;
      clientEnterSource: string;
    }
  | { type: "stream-end" }
  | { type: "connection-error"; error: Error }
  | { type: "unknown"; kind: string };

export type EventCategory = "comments" | "gifts" | "follows" | "shares" | "joins";

export type EventCounters = Record<EventCategory | "unknown", number>;

export type CsvValue = string | number | boolean | null | undefined;

export interface RoutedEvent {
  category: EventCategory;
  row: CsvValue[];
}

// RECORDER

export interface LiveTarget {
  key: string;
  username: string;
  sessionId: string | null;
  targetIdc: string | null;
}

export interface LiveConnectionInfo {
  roomId: string;
  streamUrl: string | null;
}

export interface LiveEventClient {
  connect(onEvent: (event: LiveEvent) => void): Promise<LiveConnectionInfo>;
  disconnect(): Promise<void>;
}

export interface VideoCaptureEvents {
  error: [Error];
  end: [];
}

export interface VideoCapture extends EventEmitter<VideoCaptureEvents> {
  start(input: string, output: string): void;
  stop(): Promise<void>;
  kill(): void;
}

export type LivenessCheck = (target: LiveTarget, signal: AbortSignal) => Promise<boolean>;

export interface SessionPaths {
  stem: string;
  video: string;
  csv: Record<EventCategory, string>;
}

export interface SessionSummary {
  account: string;
  username: string;
  startTime: Date;
  endTime: Date;
  durationSeconds: number;
  counters: EventCounters;
  finalState: Tiktok.SessionState.CLOSED | Tiktok.SessionState.FAILED;
  reason: string;
  stem: string | null;
  tags: string[];
  notes: string;
}

export type LiveRecorderOptions = {
  account: AccountConfig;
  settings: GlobalSettings;
  client: LiveEventClient;
  video: VideoCapture;
  sessionLog: SessionLog;
  connectTimeoutMs?: number;
  finalizeTimeoutMs?: number;
  now?: () => Date;
};

export interface SessionRecorder {
  readonly account: AccountConfig;
  readonly state: Tiktok.SessionState;
  readonly done: Promise<SessionSummary>;
  start(): Promise<void>;
  stop(reason: string): Promise<SessionSummary>;
}

export type RecorderFactory = (account: AccountConfig, settings: GlobalSettings) => SessionRecorder;

// ORCHESTRATOR

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export type LiveOrchestratorOptions = {
  configStore: ConfigStore;
  control: ControlChannel;
  poller: LivenessPoller;
  sessionLog: SessionLog;
  createRecorder: RecorderFactory;
  probeTimeoutMs?: number;
  sleep?: SleepFn;
};

export type CycleOutcome = "continue" | "paused" | "stop";

export interface CycleReport {
  cycle: number;
  outcome: CycleOutcome;
  live: string[];
  notLive: string[];
  unknown: string[];
  admitted: string[];
  deferred: string[];
}

// EVENTS

export interface LiveRecorderEvents {
  "state-change": [Tiktok.SessionState, Tiktok.SessionState]; // from, to
  "event-dropped": [string]; // unrecognised kind
  closed: [SessionSummary];
}

export interface LiveOrchestratorEvents {
  "config-reloaded": [ConfigDiff];
  "config-error": [Error];
  "session-admitted": [string];
  "session-closed": [SessionSummary];
  cycle: [CycleReport];
}
