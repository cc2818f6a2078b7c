import EventEmitter from "events";
import moment from "moment";
import logger from "@/logger";
import { sleep as defaultSleep } from "@/utils/promise";
import { toLiveTarget } from "./api";
import { describeDiff, isEmptyDiff } from "./config-diff";
import { ConfigError, errorMessage } from "./errors";
import { DEFAULT_PROBE_TIMEOUT_MS } from "./live-monitor";
import { Tiktok } from "@/types/tiktok";
import type {
  AccountConfig,
  ConfigReload,
  ConfigSnapshot,
  CycleReport,
  GlobalSettings,
  LiveOrchestratorEvents,
  LiveOrchestratorOptions,
  RecorderFactory,
  SessionRecorder,
  SleepFn,
} from "@/types/tiktok";
import type ConfigStore from "./config-store";
import type ControlChannel from "./control-channel";
import type LivenessPoller from "./live-monitor";
import type SessionLog from "./session-log";

// share of the interval a cycle may take before it is reported as slow
const SLOW_CYCLE_RATIO = 0.8;
const ACTIVE_LOG_EVERY = 5;

/**
 * Top-level monitor loop. Owns the active-session map: recorders are admitted,
 * stopped and reaped here only, and report back through their `done` promise.
 */
export default class TiktokLiveOrchestrator extends EventEmitter<LiveOrchestratorEvents> {
  public status = Tiktok.MonitorStatus.STARTING;
  public stopReason: string | null = null;

  private configStore: ConfigStore;
  private control: ControlChannel;
  private poller: LivenessPoller;
  private sessionLog: SessionLog;
  private createRecorder: RecorderFactory;
  private probeTimeoutMs: number;
  private sleep: SleepFn;

  private snapshot: ConfigSnapshot | null = null;
  private sessions = new Map<string, SessionRecorder>();
  private finished: SessionRecorder[] = [];
  private configError: string | null = null;
  private cycleCount = 0;
  private lastActiveLine: string | null = null;
  private abort = new AbortController();
  private shutdownTask: Promise<void> | null = null;

  constructor(options: LiveOrchestratorOptions) {
    super();
    this.configStore = options.configStore;
    this.control = options.control;
    this.poller = options.poller;
    this.sessionLog = options.sessionLog;
    this.createRecorder = options.createRecorder;
    this.probeTimeoutMs = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get settings(): GlobalSettings | null {
    return this.snapshot?.settings ?? null;
  }

  activeAccounts() {
    return Array.from(this.sessions.keys());
  }

  getSession(key: string) {
    return this.sessions.get(key);
  }

  /** First load. A `ConfigError` here is fatal to the caller. */
  async init() {
    const snapshot = await this.configStore.load();
    this.snapshot = snapshot;
    this.sessionLog.setDirectory(snapshot.settings.outputDirectory);

    const enabled = Array.from(snapshot.accounts.values()).filter((account) => account.enabled);
    logger.info(
      "[Live Orchestrator]",
      `loaded ${snapshot.accounts.size} accounts (${enabled.length} enabled), interval ${snapshot.settings.checkIntervalSeconds}s, max ${snapshot.settings.maxConcurrentRecordings} concurrent`
    );
    await this.writeStatus("starting");
  }

  async runCycle(): Promise<CycleReport> {
    const report: CycleReport = {
      cycle: ++this.cycleCount,
      outcome: "continue",
      live: [],
      notLive: [],
      unknown: [],
      admitted: [],
      deferred: [],
    };

    this.reapFinished();

    const action = await this.control.poll();
    if (action.type === "stop") {
      this.stopReason = action.reason;
      this.status = Tiktok.MonitorStatus.STOPPING;
      await this.writeStatus(`stop requested: ${action.reason}`);
      report.outcome = "stop";
      this.emit("cycle", report);
      return report;
    }

    if (action.type === "pause") {
      this.status = Tiktok.MonitorStatus.PAUSED;
      await this.writeStatus(`paused for ${action.seconds}s`);
      logger.info("[Live Orchestrator]", `paused for ${action.seconds}s, ${this.sessions.size} sessions keep recording`);
      await this.sleep(action.seconds * 1000, this.abort.signal);
      report.outcome = "paused";
      this.emit("cycle", report);
      return report;
    }

    this.status = Tiktok.MonitorStatus.RUNNING;
    const snapshot = await this.refreshConfig();
    const { settings } = snapshot;

    const candidates = Array.from(snapshot.accounts.values()).filter(
      (account) => account.enabled && !this.sessions.has(account.key)
    );
    const liveness = await this.poller.probe(
      candidates.map((account) => toLiveTarget(account, settings)),
      this.probeTimeoutMs
    );

    // sessions that closed while probing free their slot for this cycle
    this.reapFinished();

    const live: AccountConfig[] = [];
    for (const account of candidates) {
      switch (liveness.get(account.key) ?? Tiktok.Liveness.UNKNOWN) {
        case Tiktok.Liveness.LIVE:
          report.live.push(account.key);
          live.push(account);
          break;
        case Tiktok.Liveness.NOT_LIVE:
          report.notLive.push(account.key);
          break;
        default:
          report.unknown.push(account.key);
          break;
      }
    }

    for (const account of live) {
      if (this.abort.signal.aborted || this.sessions.size >= settings.maxConcurrentRecordings) {
        report.deferred.push(account.key);
        continue;
      }
      this.admit(account, settings);
      report.admitted.push(account.key);
    }

    if (report.deferred.length) {
      logger.info(
        "[Live Orchestrator]",
        `at capacity (${settings.maxConcurrentRecordings}), deferred: ${report.deferred.join(", ")}`
      );
    }

    await this.writeStatus(describeCycle(report, this.configError));
    this.logActive(report.cycle, settings);
    this.emit("cycle", report);
    return report;
  }

  /** Runs cycles on the configured interval until stopped, then shuts down. */
  async run() {
    if (!this.snapshot) await this.init();

    while (!this.abort.signal.aborted) {
      const startedAt = Date.now();
      let outcome: CycleReport["outcome"] = "continue";

      try {
        outcome = (await this.runCycle()).outcome;
      } catch (error) {
        logger.error("[Live Orchestrator]", "cycle failed, retrying next interval", error);
      }

      if (outcome === "stop") break;
      if (outcome === "paused") continue;

      const intervalMs = (this.snapshot?.settings.checkIntervalSeconds ?? 30) * 1000;
      const elapsed = Date.now() - startedAt;
      if (elapsed > intervalMs * SLOW_CYCLE_RATIO) {
        logger.warn(
          "[Live Orchestrator]",
          `cycle took ${(elapsed / 1000).toFixed(1)}s of a ${intervalMs / 1000}s interval, consider fewer accounts or a longer interval`
        );
      }

      await this.sleep(Math.max(0, intervalMs - elapsed), this.abort.signal);
    }

    await this.shutdown(this.stopReason ?? "stopped");
  }

  /** Interrupts any pending sleep; `run()` then shuts down. */
  requestStop(reason: string) {
    if (this.stopReason === null) this.stopReason = reason;
    this.abort.abort();
  }

  /** Stops every session and waits for each to close. Safe to call more than once. */
  shutdown(reason = this.stopReason ?? "stopped"): Promise<void> {
    if (!this.shutdownTask) this.shutdownTask = this._shutdown(reason);
    return this.shutdownTask;
  }

  private async _shutdown(reason: string) {
    if (this.stopReason === null) this.stopReason = reason;
    this.abort.abort();
    this.status = Tiktok.MonitorStatus.STOPPING;

    const sessions = Array.from(this.sessions.values());
    logger.info("[Live Orchestrator]", `shutting down (${reason}), finalizing ${sessions.length} sessions`);
    await this.writeStatus(`stopping: ${reason}`);

    await Promise.all(sessions.map((session) => session.stop(`shutdown: ${reason}`)));
    this.reapFinished();

    this.status = Tiktok.MonitorStatus.STOPPED;
    await this.writeStatus(`stopped: ${reason}`);
    logger.info("[Live Orchestrator]", "all sessions closed");
  }

  private async refreshConfig(): Promise<ConfigSnapshot> {
    let reload: ConfigReload | null = null;
    try {
      reload = await this.configStore.reloadIfChanged();
      this.configError = null;
    } catch (error) {
      const err = error instanceof Error ? error : new ConfigError(errorMessage(error));
      this.configError = err.message;
      logger.error("[Live Orchestrator]", `config reload failed, keeping last good config: ${err.message}`);
      this.emit("config-error", err);
    }

    if (reload) this.applyReload(reload);
    if (!this.snapshot) throw new ConfigError("no configuration loaded");
    return this.snapshot;
  }

  private applyReload({ snapshot, diff }: ConfigReload) {
    this.snapshot = snapshot;
    if (isEmptyDiff(diff)) return;

    logger.info("[Live Orchestrator]", `config reloaded, ${describeDiff(diff)}`);

    diff.removed.forEach((key) => this.stopSession(key, "removed from config"));
    diff.toggledOff.forEach((key) => this.stopSession(key, "disabled via config"));
    diff.changedMetadata
      .filter((key) => this.sessions.has(key))
      .forEach((key) => logger.info("[Live Orchestrator]", `${key} changed, takes effect on its next session`));

    if (diff.settingsChanged) this.sessionLog.setDirectory(snapshot.settings.outputDirectory);

    this.emit("config-reloaded", diff);
  }

  private admit(account: AccountConfig, settings: GlobalSettings) {
    const recorder = this.createRecorder(account, settings);
    this.sessions.set(account.key, recorder);
    logger.info("[Live Orchestrator]", `${account.username} is live, starting session`);

    recorder.done
      .then((summary) => {
        this.finished.push(recorder);
        this.emit("session-closed", summary);
      })
      .catch((error) => logger.error("[Live Orchestrator]", `${account.key} session report failed`, error));

    recorder.start().catch((error) => {
      logger.error("[Live Orchestrator]", `${account.key} recorder crashed`, error);
    });

    this.emit("session-admitted", account.key);
  }

  private stopSession(key: string, reason: string) {
    const session = this.sessions.get(key);
    if (!session) return;

    logger.info("[Live Orchestrator]", `stopping ${key}: ${reason}`);
    session.stop(reason).catch((error) => logger.error("[Live Orchestrator]", `${key} failed to stop`, error));
  }

  private reapFinished() {
    for (const recorder of this.finished.splice(0)) {
      const key = recorder.account.key;
      if (this.sessions.get(key) === recorder) this.sessions.delete(key);
    }
  }

  private logActive(cycle: number, settings: GlobalSettings) {
    const line = this.activeAccounts().join(", ");
    if (cycle % ACTIVE_LOG_EVERY !== 0 && line === this.lastActiveLine) return;

    this.lastActiveLine = line;
    logger.info(
      "[Live Orchestrator]",
      `currently recording ${this.sessions.size}/${settings.maxConcurrentRecordings}: ${line || "none"}`
    );
  }

  private writeStatus(extraInfo: string) {
    const active = this.activeAccounts();
    return this.control.writeStatus({
      timestamp: moment().format(),
      status: this.status,
      active_recordings: active.length,
      currently_recording: active,
      extra_info: extraInfo,
      pid: process.pid,
    });
  }
}

export function describeCycle(report: CycleReport, configError: string | null = null) {
  let tallies = `live=${report.live.length} not_live=${report.notLive.length} unknown=${report.unknown.length}`;
  if (report.unknown.length) tallies += ` [${report.unknown.join(",")}]`;

  const parts = [tallies];
  if (report.deferred.length) parts.push(`deferred: ${report.deferred.join(",")}`);
  if (configError) parts.push(`config error: ${configError}`);
  return parts.join("; ");
}
