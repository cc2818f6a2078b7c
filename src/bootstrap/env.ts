import path from "path";
import type { SettingsOverrides } from "@/types/tiktok";
import type { CliOptions } from "./cli";

export type RuntimeOptions = {
  configFile: string;
  controlDir: string;
  logDir: string;
  verbose: boolean;
  overrides: SettingsOverrides;
  probeTimeoutMs: number;
  connectTimeoutMs: number;
  finalizeTimeoutMs: number;
  defaultPauseSeconds: number;
};

function seconds(env: NodeJS.ProcessEnv, name: string, fallback: number) {
  const raw = env[name];
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) throw new Error(`${name} must be a positive number, got "${raw}"`);
  return value;
}

/** Merges CLI flags over environment variables over defaults. CLI wins. */
export function resolveRuntimeOptions(cli: CliOptions, env: NodeJS.ProcessEnv = process.env): RuntimeOptions {
  return {
    configFile: path.resolve(cli.config ?? env.MONITOR_CONFIG ?? "streamers_config.json"),
    controlDir: path.resolve(env.CONTROL_DIR || "."),
    logDir: path.resolve(env.LOG_DIR || "logs"),
    verbose: cli.verbose,
    overrides: {
      checkIntervalSeconds: cli.checkInterval,
      maxConcurrentRecordings: cli.maxConcurrent,
      outputDirectory: cli.outputDir,
      sessionId: cli.sessionId,
      targetIdc: cli.dataCenter,
    },
    probeTimeoutMs: seconds(env, "PROBE_TIMEOUT_SECONDS", 10) * 1000,
    connectTimeoutMs: seconds(env, "CONNECT_TIMEOUT_SECONDS", 30) * 1000,
    finalizeTimeoutMs: seconds(env, "FINALIZE_TIMEOUT_SECONDS", 15) * 1000,
    defaultPauseSeconds: Math.floor(seconds(env, "DEFAULT_PAUSE_SECONDS", 300)),
  };
}
