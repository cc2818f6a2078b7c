import fs from "fs";
import EventEmitter from "events";
import logger from "@/logger";
import FileNameUtils from "@/utils/file-name";
import { Channel } from "@/utils/channel";
import { withTimeout } from "@/utils/promise";
import { EventSinks, routeLiveEvent } from "./event-sinks";
import { ConnectError, StreamError, errorMessage } from "./errors";
import { Tiktok } from "@/types/tiktok";
import type {
  AccountConfig,
  EventCounters,
  GlobalSettings,
  LiveConnectionInfo,
  LiveEvent,
  LiveEventClient,
  LiveRecorderEvents,
  LiveRecorderOptions,
  SessionPaths,
  SessionRecorder,
  SessionSummary,
  VideoCapture,
} from "@/types/tiktok";
import type SessionLog from "./session-log";

const DEFAULT_CONNECT_TIMEOUT_MS = 30 * 1000;
const DEFAULT_FINALIZE_TIMEOUT_MS = 15 * 1000;

type Inbound = { event: LiveEvent; receivedAt: Date };

export function createCounters(): EventCounters {
  return { comments: 0, gifts: 0, follows: 0, shares: 0, joins: 0, unknown: 0 };
}

/**
 * One recording of one live broadcast:
 * idle -> connecting -> recording -> finalizing -> closed, or connecting -> failed.
 *
 * Inbound client events are queued on a channel and written by a single
 * consumer loop, so rows land in each CSV in arrival order. The recorder never
 * touches orchestrator state; it reports through `done` and its events.
 */
export default class TiktokLiveRecorder extends EventEmitter<LiveRecorderEvents> implements SessionRecorder {
  public readonly account: AccountConfig;
  public readonly counters = createCounters();
  public readonly done: Promise<SessionSummary>;

  public state = Tiktok.SessionState.IDLE;
  public startTime: Date | null = null;
  public paths: SessionPaths | null = null;
  public connection: LiveConnectionInfo | null = null;

  private settings: GlobalSettings;
  private client: LiveEventClient;
  private video: VideoCapture;
  private sessionLog: SessionLog;
  private connectTimeoutMs: number;
  private finalizeTimeoutMs: number;
  private now: () => Date;

  private channel = new Channel<Inbound>();
  private sinks: EventSinks | null = null;
  private consumer: Promise<void> | null = null;
  private stopReason: string | null = null;
  private resolveDone: (summary: SessionSummary) => void;

  constructor(options: LiveRecorderOptions) {
    super();
    this.account = options.account;
    this.settings = options.settings;
    this.client = options.client;
    this.video = options.video;
    this.sessionLog = options.sessionLog;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.finalizeTimeoutMs = options.finalizeTimeoutMs ?? DEFAULT_FINALIZE_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());

    let resolveDone: (summary: SessionSummary) => void = () => undefined;
    this.done = new Promise<SessionSummary>((resolve) => {
      resolveDone = resolve;
    });
    this.resolveDone = resolveDone;
  }

  private get tag() {
    return `${this.account.key} (${this.account.username})`;
  }

  async start(): Promise<void> {
    if (this.state !== Tiktok.SessionState.IDLE) return;

    const startTime = this.now();
    const paths = FileNameUtils.generateSessionPaths(this.settings.outputDirectory, this.account.key, startTime);
    this.startTime = startTime;
    this.paths = paths;
    this._changeState(Tiktok.SessionState.CONNECTING);
    logger.info("[Live Recorder]", `${this.tag} connecting...`);

    try {
      this.connection = await withTimeout(
        this.client.connect((event) => this.channel.push({ event, receivedAt: this.now() })),
        this.connectTimeoutMs,
        () => new ConnectError(this.account.key, `connect timed out after ${this.connectTimeoutMs}ms`)
      );
    } catch (error) {
      const failure =
        error instanceof ConnectError ? error : new ConnectError(this.account.key, errorMessage(error), { cause: error });
      logger.error("[Live Recorder]", `${this.tag} failed to connect: ${failure.message}`);
      this.channel.close();
      await this._bounded(this._disconnect(), "client disconnect", () => undefined);
      await this._settle(Tiktok.SessionState.FAILED, `connect_error: ${failure.message}`);
      return;
    }

    logger.info("[Live Recorder]", `${this.tag} connected to room ${this.connection.roomId}`);

    // a stop that arrived while connecting is honoured before anything is opened
    if (this.stopReason !== null) {
      logger.info("[Live Recorder]", `${this.tag} stop requested while connecting: ${this.stopReason}`);
      this._beginFinalize();
      return;
    }

    let opened: { paths: SessionPaths; sinks: EventSinks };
    try {
      await fs.promises.mkdir(this.settings.outputDirectory, { recursive: true });
      opened = await EventSinks.openUnique(this.settings.outputDirectory, this.account.key, startTime);
      this.sinks = opened.sinks;
      this.paths = opened.paths;
    } catch (error) {
      logger.error("[Live Recorder]", `${this.tag} cannot open event files: ${errorMessage(error)}`);
      if (this.stopReason === null) this.stopReason = `io_error: ${errorMessage(error)}`;
      this._beginFinalize();
      return;
    }

    if (this.stopReason !== null) {
      this._beginFinalize();
      return;
    }

    this._changeState(Tiktok.SessionState.RECORDING);
    logger.info("[Live Recorder]", `${this.tag} recording -> ${opened.paths.stem}`);

    this.consumer = this._consume(opened.sinks);
    this._startVideo(opened.paths.video);
  }

  /** Safe in any state; resolves once the session is closed or failed. */
  stop(reason: string): Promise<SessionSummary> {
    this._requestFinalize(reason);
    return this.done;
  }

  private _requestFinalize(reason: string) {
    if (this.stopReason === null) this.stopReason = reason;

    switch (this.state) {
      case Tiktok.SessionState.IDLE:
      case Tiktok.SessionState.RECORDING:
        this._beginFinalize();
        break;
      default:
        // connecting: handled once connect settles; later states are already on their way out
        break;
    }
  }

  private _beginFinalize() {
    this._changeState(Tiktok.SessionState.FINALIZING);
    this.channel.close();
    this._finalize().catch((error) => {
      logger.error("[Live Recorder]", `${this.tag} finalize crashed`, error);
    });
  }

  private _startVideo(output: string) {
    const url = this.connection?.streamUrl;
    if (!url) {
      logger.warn("[Live Recorder]", `${this.tag} no stream URL offered, recording events only`);
      return;
    }

    this.video.on("error", (err) => {
      logger.error("[Live Recorder]", `${this.tag} video capture failed: ${err.message}`);
      this._requestFinalize(`io_error: video ${err.message}`);
    });
    this.video.on("end", () => logger.info("[Live Recorder]", `${this.tag} video stream ended`));

    try {
      this.video.start(url, output);
    } catch (error) {
      logger.error("[Live Recorder]", `${this.tag} cannot start video capture: ${errorMessage(error)}`);
      this._requestFinalize(`io_error: video ${errorMessage(error)}`);
    }
  }

  private async _consume(sinks: EventSinks) {
    for await (const { event, receivedAt } of this.channel) {
      if (event.type === "stream-end") {
        logger.info("[Live Recorder]", `${this.tag} stream ended`);
        this._requestFinalize("stream_ended");
        break;
      }
      if (event.type === "connection-error") {
        logger.error("[Live Recorder]", `${this.tag} stream error: ${event.error.message}`);
        this._requestFinalize(`stream_error: ${event.error.message}`);
        break;
      }
      if (event.type === "unknown") {
        this.counters.unknown++;
        logger.debug("[Live Recorder]", `${this.tag} ignored event of kind "${event.kind}"`);
        this.emit("event-dropped", event.kind);
        continue;
      }

      const routed = routeLiveEvent(event, receivedAt);
      if (!routed) continue;

      try {
        await sinks.write(routed);
        this.counters[routed.category]++;
      } catch (error) {
        logger.error("[Live Recorder]", `${this.tag} ${errorMessage(error)}`);
        this._requestFinalize(`io_error: ${errorMessage(error)}`);
        break;
      }
    }
  }

  private async _finalize() {
    logger.info("[Live Recorder]", `${this.tag} finalizing (${this.stopReason})`);

    if (this.consumer) await this._bounded(this.consumer, "event drain", () => undefined);
    await this._bounded(this._disconnect(), "client disconnect", () => undefined);
    await this._bounded(this.video.stop(), "video stop", () => this.video.kill());

    const sinks = this.sinks;
    if (sinks) await this._bounded(sinks.close(), "event file close", () => sinks.destroy());

    await this._settle(Tiktok.SessionState.CLOSED, this.stopReason ?? "stopped");
  }

  private _disconnect() {
    return Promise.resolve().then(() => this.client.disconnect());
  }

  /** Awaits `task` for at most the finalize timeout, then runs `force`. */
  private async _bounded(task: Promise<unknown>, label: string, force: () => void) {
    try {
      await withTimeout(task, this.finalizeTimeoutMs, () => new StreamError(`timed out after ${this.finalizeTimeoutMs}ms`));
    } catch (error) {
      logger.warn("[Live Recorder]", `${this.tag} ${label} failed: ${errorMessage(error)}, forcing close`);
      force();
    }
  }

  private async _settle(finalState: SessionSummary["finalState"], reason: string) {
    const endTime = this.now();
    const startTime = this.startTime ?? endTime;
    const summary: SessionSummary = {
      account: this.account.key,
      username: this.account.username,
      startTime,
      endTime,
      durationSeconds: Math.max(0, (endTime.getTime() - startTime.getTime()) / 1000),
      counters: { ...this.counters },
      finalState,
      reason,
      stem: this.paths?.stem ?? null,
      tags: this.account.tags,
      notes: this.account.notes,
    };

    try {
      await this.sessionLog.append(summary);
    } catch (error) {
      logger.error("[Live Recorder]", `${this.tag} failed to write session log: ${errorMessage(error)}`);
    }

    this._changeState(finalState);
    logger.info(
      "[Live Recorder]",
      `${this.tag} ${finalState} (${reason}) - duration ${(summary.durationSeconds / 60).toFixed(1)}m`,
      summary.counters
    );

    this.emit("closed", summary);
    this.resolveDone(summary);
  }

  private _changeState(next: Tiktok.SessionState) {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    logger.debug("[Live Recorder]", `${this.tag} ${previous} -> ${next}`);
    this.emit("state-change", previous, next);
  }
}
